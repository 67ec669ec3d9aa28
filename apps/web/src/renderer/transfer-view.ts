import type { SessionSnapshot, TransferRecord, TransferState } from '../shared/types';

export const MAX_HISTORY_ITEMS = 30;
export const MAX_HISTORY_LABEL_LENGTH = 60;
export const MAX_RAW_PREVIEW_LENGTH = 500;
export const EMPTY_LOG_TEXT = 'Ready to download...';

const DEFAULT_STATE_COLOR = '#bdbdbd';
const IDLE_PROGRESS_COLOR = '#9e9e9e';

// Keyed by state words straight from MEGAcmd, so a Map keeps `constructor` and friends out.
const STATE_COLORS = new Map<string, string>([
  ['ACTIVE', '#66bb6a'],
  ['PAUSED', '#ffa726'],
  ['QUEUED', '#42a5f5'],
  ['RETRYING', '#ffee58'],
  ['COMPLETED', '#43a047'],
  ['FAILED', '#ef5350']
]);

const IN_PROGRESS_STATES = new Set(['ACTIVE', 'QUEUED', 'PAUSED']);

export type TransferIcon = 'download' | 'done';

export interface TransferCardView {
  tag: string;
  filename: string;
  state: TransferState;
  stateColor: string;
  progressColor: string;
  progressPercent: number;
  progressText: string;
  icon: TransferIcon;
}

export type ListingView =
  | { kind: 'empty'; title: string; hint: string }
  | { kind: 'unparsed'; title: string; hint: string; preview: string }
  | { kind: 'ready'; cards: TransferCardView[] };

export interface HistoryItemView {
  url: string;
  label: string;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function getStateColor(state: TransferState): string {
  return STATE_COLORS.get(state) ?? DEFAULT_STATE_COLOR;
}

export function formatProgressText(record: Pick<TransferRecord, 'progressPercent' | 'sizeDisplay'>): string {
  const percent = `${Math.trunc(record.progressPercent)}%`;
  return record.sizeDisplay === 'Unknown' ? percent : `${percent} of ${record.sizeDisplay}`;
}

export function toTransferCard(record: TransferRecord): TransferCardView {
  const stateColor = getStateColor(record.state);

  return {
    tag: record.tag,
    filename: record.filename || record.path,
    state: record.state,
    stateColor,
    progressColor: record.state === 'ACTIVE' ? stateColor : IDLE_PROGRESS_COLOR,
    progressPercent: Math.max(0, Math.min(record.progressPercent, 100)),
    progressText: formatProgressText(record),
    icon: IN_PROGRESS_STATES.has(record.state) ? 'download' : 'done'
  };
}

function previewRawListing(raw: string): string {
  return raw.length > MAX_RAW_PREVIEW_LENGTH
    ? `${raw.slice(0, MAX_RAW_PREVIEW_LENGTH)}...`
    : raw;
}

export function describeListing(snapshot: Pick<SessionSnapshot, 'listing' | 'listingStatus'>): ListingView {
  switch (snapshot.listingStatus) {
    case 'ready':
      return { kind: 'ready', cards: snapshot.listing.records.map(toTransferCard) };
    case 'unparsed':
      return {
        kind: 'unparsed',
        title: 'Unable to parse transfer data',
        hint: 'Check the log below for raw output',
        preview: previewRawListing(snapshot.listing.raw)
      };
    default:
      return {
        kind: 'empty',
        title: 'No active transfers',
        hint: 'Add a MEGA URL above to start downloading'
      };
  }
}

export function formatHistoryLabel(url: string): string {
  return url.length > MAX_HISTORY_LABEL_LENGTH
    ? `${url.slice(0, MAX_HISTORY_LABEL_LENGTH)}...`
    : url;
}

export function getHistoryItems(history: readonly string[]): HistoryItemView[] {
  return history.slice(0, MAX_HISTORY_ITEMS).map((url) => ({
    url,
    label: formatHistoryLabel(url)
  }));
}

export function formatLogText(messages: readonly string[]): string {
  return messages.length > 0 ? messages.join('\n') : EMPTY_LOG_TEXT;
}
