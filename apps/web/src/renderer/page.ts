import type { SessionSnapshot } from '../shared/types';
import {
  describeListing,
  escapeHtml,
  formatLogText,
  getHistoryItems,
  type ListingView,
  type TransferCardView
} from './transfer-view';

export const PANEL_PATH = '/panel';

export interface PageModel {
  appVersion: string;
  downloadDir: string;
  history: readonly string[];
}

export interface PanelModel {
  snapshot: SessionSnapshot;
  refreshSeconds: number;
}

const STYLES = `
  :root { color-scheme: dark; font-family: system-ui, sans-serif; }
  body { margin: 0; background: #121212; color: #e0e0e0; }
  header { display: flex; gap: 10px; align-items: center; padding: 14px 20px; background: #2a2a2a; }
  header h1 { margin: 0; font-size: 20px; }
  header small { color: #9e9e9e; }
  main { padding: 20px; display: grid; gap: 16px; }
  section { background: #1e1e1e; border-radius: 8px; padding: 16px; }
  h2 { margin: 0 0 12px; font-size: 18px; font-weight: 500; }
  form.inline { display: inline; margin: 0; }
  .row { display: flex; gap: 12px; align-items: center; }
  .row input[type=url], .row input[type=text] { flex: 1; padding: 12px; border-radius: 8px; border: 1px solid #333; background: #2a2a2a; color: inherit; }
  button { padding: 8px 16px; border-radius: 8px; border: 0; background: #42a5f5; color: #121212; cursor: pointer; }
  button.ghost { background: transparent; color: #9e9e9e; border: 1px solid #333; }
  ul.history { list-style: none; padding: 0; margin: 0; font-size: 11px; }
  ul.history li { padding: 4px 0; }
  iframe.panel { width: 100%; height: 70vh; border: 0; }
  .card { background: #1e1e1e; border-radius: 8px; padding: 14px; margin-bottom: 12px; }
  .card .title { display: flex; gap: 8px; align-items: center; justify-content: space-between; }
  .card .filename { flex: 1; overflow: hidden; text-overflow: ellipsis; white-space: nowrap; font-weight: 500; }
  .badge { font-size: 11px; font-weight: bold; padding: 4px 8px; border-radius: 4px; }
  .progress-text { font-size: 12px; color: #bdbdbd; margin: 8px 0 4px; }
  .track { height: 10px; border-radius: 5px; background: #2e2e2e; overflow: hidden; }
  .fill { height: 100%; }
  .actions { display: flex; gap: 8px; align-items: center; margin-top: 8px; font-size: 10px; color: #9e9e9e; }
  .spacer { flex: 1; }
  .notice { text-align: center; padding: 40px; color: #757575; }
  .notice.warning { color: #ffa726; }
  pre.raw { text-align: left; font-size: 10px; background: #1a1a1a; border: 1px solid #333; border-radius: 5px; padding: 10px; white-space: pre-wrap; color: #757575; }
  textarea.log { width: 100%; min-height: 9em; box-sizing: border-box; border-radius: 8px; border: 0; background: #2a2a2a; color: inherit; padding: 10px; }
`;

const ICONS: Record<TransferCardView['icon'], string> = {
  download: '&#x2B07;',
  done: '&#x2714;'
};

function renderDocument(title: string, body: string, head = ''): string {
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
${head}<title>${escapeHtml(title)}</title>
<style>${STYLES}</style>
</head>
<body>
${body}
</body>
</html>
`;
}

function transferActionPath(tag: string | null, action: string): string {
  return `/v1/transfers/${tag === null ? 'all' : encodeURIComponent(tag)}/${action}`;
}

function renderActionButton(tag: string | null, action: string, label: string): string {
  return `<form class="inline" method="post" action="${escapeHtml(transferActionPath(tag, action))}" target="_top">`
    + `<button class="ghost" type="submit">${label}</button></form>`;
}

function renderCard(card: TransferCardView): string {
  const color = escapeHtml(card.stateColor);

  return `<article class="card" data-tag="${escapeHtml(card.tag)}">
  <div class="title">
    <span style="color: ${color}">${ICONS[card.icon]}</span>
    <span class="filename" title="${escapeHtml(card.filename)}">${escapeHtml(card.filename)}</span>
    <span class="badge" style="color: ${color}; background: ${color}1a">${escapeHtml(card.state)}</span>
  </div>
  <div class="progress-text">${escapeHtml(card.progressText)}</div>
  <div class="track"><div class="fill" style="width: ${card.progressPercent}%; background: ${escapeHtml(card.progressColor)}"></div></div>
  <div class="actions">
    <span>Tag: ${escapeHtml(card.tag)}</span>
    <span class="spacer"></span>
    ${renderActionButton(card.tag, 'resume', 'Resume')}
    ${renderActionButton(card.tag, 'pause', 'Pause')}
    ${renderActionButton(card.tag, 'cancel', 'Cancel')}
  </div>
</article>`;
}

function renderListing(view: ListingView): string {
  if (view.kind === 'ready') {
    return view.cards.map(renderCard).join('\n');
  }

  if (view.kind === 'unparsed') {
    return `<div class="notice warning">
  <p>${escapeHtml(view.title)}</p>
  <p><small>${escapeHtml(view.hint)}</small></p>
  <pre class="raw">${escapeHtml(view.preview)}</pre>
</div>`;
  }

  return `<div class="notice">
  <p>${escapeHtml(view.title)}</p>
  <p><small>${escapeHtml(view.hint)}</small></p>
</div>`;
}

/** Live part of the UI; reloads itself so the URL field on the outer page keeps its input. */
export function renderPanel(model: PanelModel): string {
  const body = `<section>
  <div class="row">
    <h2>Transfers</h2>
    <span class="spacer"></span>
    ${renderActionButton(null, 'resume', 'Resume all')}
  </div>
  ${renderListing(describeListing(model.snapshot))}
</section>
<section>
  <h2>Log</h2>
  <textarea class="log" readonly>${escapeHtml(formatLogText(model.snapshot.messages))}</textarea>
</section>`;

  return renderDocument('Transfers', body, `<meta http-equiv="refresh" content="${model.refreshSeconds}">\n`);
}

export function renderPage(model: PageModel): string {
  const items = getHistoryItems(model.history);

  const historyMarkup = items.length === 0
    ? ''
    : `<section>
  <h2>Recent URLs</h2>
  <ul class="history">
    ${items.map((item) => `<li title="${escapeHtml(item.url)}">${escapeHtml(item.label)}</li>`).join('\n    ')}
  </ul>
  <form method="post" action="/v1/history/clear"><button class="ghost" type="submit">Clear history</button></form>
</section>`;

  const body = `<header>
  <h1>MEGA Get</h1>
  <small>v${escapeHtml(model.appVersion)}</small>
</header>
<main>
  <section>
    <h2>Add Download</h2>
    <form class="row" method="post" action="/v1/downloads">
      <input type="text" name="url" list="url-history" placeholder="https://mega.nz/file/..." autocomplete="off">
      <button type="submit">Download</button>
    </form>
    <p><small>Saving to ${escapeHtml(model.downloadDir)}</small></p>
    <datalist id="url-history">
      ${items.map((item) => `<option value="${escapeHtml(item.url)}"></option>`).join('')}
    </datalist>
  </section>
  ${historyMarkup}
  <iframe class="panel" src="${PANEL_PATH}" title="Transfers"></iframe>
</main>`;

  return renderDocument('MEGA Get', body);
}

export function resolveRefreshSeconds(pollIntervalMs: number): number {
  return Math.max(1, Math.ceil(pollIntervalMs / 1000));
}
