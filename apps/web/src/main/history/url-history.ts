import fs from 'fs/promises';
import path from 'path';

import { historyLog } from '../logger';

export const MAX_HISTORY_ENTRIES = 50;
const MAX_URL_LENGTH = 2048;

function normalizeUrl(value: unknown): string {
  if (typeof value !== 'string') {
    return '';
  }

  return value.trim().slice(0, MAX_URL_LENGTH);
}

export function normalizeUrlHistory(rawHistory: unknown, maxEntries: number = MAX_HISTORY_ENTRIES): string[] {
  if (!Array.isArray(rawHistory)) {
    return [];
  }

  const history: string[] = [];
  const seen = new Set<string>();

  for (const item of rawHistory) {
    if (history.length >= maxEntries) {
      break;
    }

    const url = normalizeUrl(item);
    if (!url || seen.has(url)) {
      continue;
    }

    seen.add(url);
    history.push(url);
  }

  return history;
}

/** Moves `url` to the front, dropping any earlier copy and the oldest overflow. */
export function addUrlToHistory(
  history: readonly string[],
  url: string,
  maxEntries: number = MAX_HISTORY_ENTRIES
): string[] {
  const normalizedUrl = normalizeUrl(url);
  if (!normalizedUrl) {
    return normalizeUrlHistory(history, maxEntries);
  }

  const rest = history.filter((entry) => entry !== normalizedUrl);
  return normalizeUrlHistory([normalizedUrl, ...rest], maxEntries);
}

function isMissingFileError(error: unknown): boolean {
  return Boolean(error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT');
}

export class UrlHistoryStore {
  private entries: string[] = [];
  private readonly filePath: string;
  private readonly maxEntries: number;

  constructor(filePath: string, maxEntries: number = MAX_HISTORY_ENTRIES) {
    this.filePath = filePath;
    this.maxEntries = maxEntries;
  }

  list(): string[] {
    return [...this.entries];
  }

  async load(): Promise<string[]> {
    try {
      const contents = await fs.readFile(this.filePath, 'utf8');
      this.entries = normalizeUrlHistory(JSON.parse(contents), this.maxEntries);
    } catch (error) {
      if (!isMissingFileError(error)) {
        historyLog.warn(`could not read ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`);
      }
      this.entries = [];
    }

    return this.list();
  }

  async add(url: string): Promise<string[]> {
    this.entries = addUrlToHistory(this.entries, url, this.maxEntries);
    await this.save();
    return this.list();
  }

  async clear(): Promise<void> {
    this.entries = [];
    await this.save();
  }

  private async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(this.entries), 'utf8');
  }
}
