import { describe, expect, it } from 'vitest';

import type { SessionSnapshot } from '../shared/types';
import { renderPage, renderPanel, resolveRefreshSeconds } from './page';

function snapshot(overrides: Partial<SessionSnapshot> = {}): SessionSnapshot {
  return {
    messages: [],
    listing: { raw: '', records: [], updatedAt: null },
    listingStatus: 'pending',
    ...overrides
  };
}

describe('resolveRefreshSeconds', () => {
  it('rounds up to whole seconds with a one second floor', () => {
    expect(resolveRefreshSeconds(500)).toBe(1);
    expect(resolveRefreshSeconds(2500)).toBe(3);
  });
});

describe('renderPanel', () => {
  it('refreshes itself and shows the empty state', () => {
    const html = renderPanel({ snapshot: snapshot(), refreshSeconds: 2 });

    expect(html).toContain('<meta http-equiv="refresh" content="2">');
    expect(html).toContain('<p>No active transfers</p>');
    expect(html).toContain('<textarea class="log" readonly>Ready to download...</textarea>');
  });

  it('renders a card with control forms for each transfer', () => {
    const html = renderPanel({
      refreshSeconds: 1,
      snapshot: snapshot({
        listingStatus: 'ready',
        listing: {
          raw: 'rows',
          updatedAt: 1,
          records: [{
            tag: '1234',
            state: 'ACTIVE',
            progressPercent: 45.2,
            path: '/Downloads/ubuntu-22.04.iso',
            filename: 'ubuntu-22.04.iso',
            sizeDisplay: '3.54 GB',
            direction: 'download'
          }]
        }
      })
    });

    expect(html).toContain('<article class="card" data-tag="1234">');
    expect(html).toContain('<div class="progress-text">45% of 3.54 GB</div>');
    expect(html).toContain('action="/v1/transfers/1234/pause"');
    expect(html).toContain('action="/v1/transfers/all/resume"');
  });

  it('escapes log lines and raw output', () => {
    const html = renderPanel({
      refreshSeconds: 1,
      snapshot: snapshot({
        messages: ['<script>'],
        listingStatus: 'unparsed',
        listing: { raw: 'a & b', records: [], updatedAt: 1 }
      })
    });

    expect(html).toContain('<textarea class="log" readonly>&lt;script&gt;</textarea>');
    expect(html).toContain('<pre class="raw">a &amp; b</pre>');
  });
});

describe('renderPage', () => {
  it('omits the history section when there is none', () => {
    const html = renderPage({ appVersion: '0.1.0', downloadDir: '/data/', history: [] });

    expect(html).not.toContain('Clear history');
    expect(html).toContain('<small>Saving to /data/</small>');
    expect(html).toContain('<iframe class="panel" src="/panel" title="Transfers"></iframe>');
  });

  it('lists history with shortened labels', () => {
    const url = `https://mega.nz/file/${'b'.repeat(50)}`;
    const html = renderPage({ appVersion: '0.1.0', downloadDir: '/data/', history: [url] });

    expect(html).toContain(`<li title="${url}">${url.slice(0, 60)}...</li>`);
    expect(html).toContain(`<option value="${url}"></option>`);
    expect(html).toContain('action="/v1/history/clear"');
  });
});
