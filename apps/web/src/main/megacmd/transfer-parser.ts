import type { TransferDirection, TransferRecord } from '../../shared/types';

export const UNKNOWN_LABEL = 'Unknown';
export const MAX_FILENAME_LENGTH = 60;

const HEADER_KEYWORDS = ['TYPE', 'TAG', 'STATE'];
const TRUNCATION_MARKER = '...';

// "1         ACTIVE    12%       /data/sample_file.zip"
const SIMPLIFIED_LINE_PATTERN = /^(\d+)\s+(\w+)\s+(\d+)%\s+(.+)$/;

// "⇓    76  /path/to/file.mkv  5.42% of  455.34 MB ACTIVE"
const NATIVE_LINE_PATTERN = /([⇓↓⇑↑])\s+(\d+)\s+(.*?)\s+(\d+(?:\.\d+)?)\s*%\s+of\s+([\d.]+)\s*([KMGT]?B)\s+(\w+)\s*$/;

const UPLOAD_GLYPHS = new Set(['⇑', '↑']);

export function isHeaderLine(line: string): boolean {
  return HEADER_KEYWORDS.every((keyword) => line.includes(keyword));
}

export function truncateFilename(filename: string): string {
  if (filename.length <= MAX_FILENAME_LENGTH) {
    return filename;
  }

  return `${filename.slice(0, MAX_FILENAME_LENGTH - 3)}...`;
}

function lastSegment(value: string): string {
  const segments = value.split('/');
  return segments[segments.length - 1].trim();
}

/**
 * Last `/` segment of a listed path. MEGAcmd shortens long paths in the
 * middle with `...`; when the text after the last marker still holds a `/`,
 * the name comes from that remainder instead of the untruncated prefix.
 */
export function deriveFilename(path: string): string {
  let filename = path.includes('/') ? lastSegment(path) : path;

  if (path.includes(TRUNCATION_MARKER) && path.includes('/')) {
    const parts = path.split(TRUNCATION_MARKER);
    const remainder = parts[parts.length - 1];
    if (parts.length > 1 && remainder.includes('/')) {
      filename = lastSegment(remainder);
    }
  }

  return truncateFilename(filename) || UNKNOWN_LABEL;
}

function clampPercent(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }

  return Math.min(Math.max(value, 0), 100);
}

function parseSimplifiedLine(line: string): TransferRecord | null {
  const match = line.match(SIMPLIFIED_LINE_PATTERN);
  if (!match) {
    return null;
  }

  const [, tag, state, percent, rawPath] = match;
  const path = rawPath.trim();

  return {
    tag,
    state,
    progressPercent: clampPercent(Number.parseFloat(percent)),
    path,
    filename: deriveFilename(path),
    sizeDisplay: UNKNOWN_LABEL,
    direction: null
  };
}

function parseNativeLine(line: string): TransferRecord | null {
  const match = line.match(NATIVE_LINE_PATTERN);
  if (!match) {
    return null;
  }

  const [, glyph, tag, rawPath, percent, sizeValue, sizeUnit, state] = match;
  const path = rawPath.trim();
  const direction: TransferDirection = UPLOAD_GLYPHS.has(glyph) ? 'upload' : 'download';

  return {
    tag,
    state,
    progressPercent: clampPercent(Number.parseFloat(percent)),
    path,
    filename: deriveFilename(path),
    sizeDisplay: `${sizeValue} ${sizeUnit}`,
    direction
  };
}

export function parseTransferLine(line: string): TransferRecord | null {
  const trimmed = line.trim();
  if (!trimmed || isHeaderLine(trimmed)) {
    return null;
  }

  return parseSimplifiedLine(trimmed) || parseNativeLine(trimmed);
}

export function parseTransferList(raw: string): TransferRecord[] {
  if (typeof raw !== 'string' || !raw.trim()) {
    return [];
  }

  const records: TransferRecord[] = [];

  for (const line of raw.trim().split('\n')) {
    const record = parseTransferLine(line);
    if (record) {
      records.push(record);
    }
  }

  return records;
}
