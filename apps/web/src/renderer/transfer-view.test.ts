import { describe, expect, it } from 'vitest';

import { parseTransferList } from '../main/megacmd/transfer-parser';
import type { TransferRecord } from '../shared/types';
import {
  describeListing,
  escapeHtml,
  formatHistoryLabel,
  formatLogText,
  formatProgressText,
  getHistoryItems,
  getStateColor,
  toTransferCard
} from './transfer-view';

function record(overrides: Partial<TransferRecord> = {}): TransferRecord {
  return {
    tag: '1234',
    state: 'ACTIVE',
    progressPercent: 45.2,
    path: '/Downloads/ubuntu-22.04.iso',
    filename: 'ubuntu-22.04.iso',
    sizeDisplay: '3.54 GB',
    direction: 'download',
    ...overrides
  };
}

describe('escapeHtml', () => {
  it('escapes markup and quotes', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });
});

describe('formatProgressText', () => {
  it('truncates the percentage and appends a known size', () => {
    expect(formatProgressText({ progressPercent: 45.9, sizeDisplay: '3.54 GB' })).toBe('45% of 3.54 GB');
  });

  it('shows only the percentage when the size is unknown', () => {
    expect(formatProgressText({ progressPercent: 12, sizeDisplay: 'Unknown' })).toBe('12%');
  });
});

describe('toTransferCard', () => {
  it('colors active transfers and their progress bar', () => {
    const card = toTransferCard(record());

    expect(card.stateColor).toBe('#66bb6a');
    expect(card.progressColor).toBe('#66bb6a');
    expect(card.icon).toBe('download');
    expect(card.progressText).toBe('45% of 3.54 GB');
  });

  it('greys the bar for idle states and marks finished ones done', () => {
    const paused = toTransferCard(record({ state: 'PAUSED' }));
    const failed = toTransferCard(record({ state: 'FAILED' }));

    expect(paused.stateColor).toBe('#ffa726');
    expect(paused.progressColor).toBe('#9e9e9e');
    expect(paused.icon).toBe('download');
    expect(failed.stateColor).toBe('#ef5350');
    expect(failed.icon).toBe('done');
  });

  it('uses grey for unknown states', () => {
    expect(getStateColor('VERIFYING')).toBe('#bdbdbd');
  });

  it('uses grey for state words that name object built-ins', () => {
    expect(getStateColor('constructor')).toBe('#bdbdbd');
    expect(getStateColor('toString')).toBe('#bdbdbd');

    const [parsed] = parseTransferList('⇓ 7 /Downloads/a.bin 5.0% of 1.00 MB constructor');
    const card = toTransferCard(parsed);

    expect(card.state).toBe('constructor');
    expect(card.stateColor).toBe('#bdbdbd');
    expect(card.progressColor).toBe('#9e9e9e');
  });
});

describe('describeListing', () => {
  it('shows the empty state before the first poll and for blank output', () => {
    const pending = describeListing({ listing: { raw: '', records: [], updatedAt: null }, listingStatus: 'pending' });
    const empty = describeListing({ listing: { raw: '', records: [], updatedAt: 1 }, listingStatus: 'empty' });

    expect(pending).toEqual({
      kind: 'empty',
      title: 'No active transfers',
      hint: 'Add a MEGA URL above to start downloading'
    });
    expect(empty).toEqual(pending);
  });

  it('previews the first 500 characters of unparsed output', () => {
    const raw = 'x'.repeat(501);
    const view = describeListing({ listing: { raw, records: [], updatedAt: 1 }, listingStatus: 'unparsed' });

    expect(view.kind).toBe('unparsed');
    if (view.kind === 'unparsed') {
      expect(view.title).toBe('Unable to parse transfer data');
      expect(view.preview).toBe(`${'x'.repeat(500)}...`);
    }
  });

  it('keeps short unparsed output intact', () => {
    const view = describeListing({ listing: { raw: 'not logged in', records: [], updatedAt: 1 }, listingStatus: 'unparsed' });
    expect(view).toMatchObject({ kind: 'unparsed', preview: 'not logged in' });
  });

  it('builds one card per record in order', () => {
    const view = describeListing({
      listing: { raw: 'rows', records: [record({ tag: '1' }), record({ tag: '2' })], updatedAt: 1 },
      listingStatus: 'ready'
    });

    expect(view.kind === 'ready' ? view.cards.map((card) => card.tag) : []).toEqual(['1', '2']);
  });
});

describe('history items', () => {
  it('cuts labels longer than 60 characters', () => {
    const url = `https://mega.nz/file/${'a'.repeat(60)}`;
    expect(formatHistoryLabel(url)).toBe(`${url.slice(0, 60)}...`);
    expect(formatHistoryLabel('https://mega.nz/file/short')).toBe('https://mega.nz/file/short');
  });

  it('lists at most 30 entries', () => {
    const history = Array.from({ length: 35 }, (_, index) => `https://mega.nz/file/${index}`);
    const items = getHistoryItems(history);

    expect(items).toHaveLength(30);
    expect(items[0]).toEqual({ url: 'https://mega.nz/file/0', label: 'https://mega.nz/file/0' });
  });
});

describe('formatLogText', () => {
  it('falls back to the ready text', () => {
    expect(formatLogText([])).toBe('Ready to download...');
    expect(formatLogText(['a', 'b'])).toBe('a\nb');
  });
});
