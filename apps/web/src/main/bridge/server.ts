import type http from 'http';

import type { RunMode, SessionSnapshot } from '../../shared/types';
import { PANEL_PATH, renderPage, renderPanel } from '../../renderer/page';
import { serverLog } from '../logger';
import { formatCommandError } from '../megacmd/errors';
import type { TransferActions } from '../session/actions';
import { isFormContentType, parseDownloadPayload, parseRequestBody } from './payload';

export const HEALTH_PATH = '/v1/health';
export const SESSION_PATH = '/v1/session';
export const DOWNLOADS_PATH = '/v1/downloads';
export const HISTORY_PATH = '/v1/history';
export const HISTORY_CLEAR_PATH = '/v1/history/clear';
export const DEFAULT_MAX_BODY_BYTES = 32 * 1024;

const TRANSFER_ROUTE_PATTERN = /^\/v1\/transfers\/([^/]+)\/([^/]+)$/;

export interface WebServerConfig {
  host: string;
  port: number;
  maxBodyBytes: number;
  refreshSeconds: number;
  downloadDir: string;
  runMode: RunMode;
  getAppVersion: () => string;
  isServerReady: () => boolean;
  getSnapshot: () => SessionSnapshot;
  actions: Pick<TransferActions, 'submitUrl' | 'controlTransfer' | 'clearHistory' | 'listHistory'>;
}

export interface TransferRoute {
  tag: string | null;
  action: string;
}

export function parseTransferRoute(pathname: string): TransferRoute | null {
  const match = TRANSFER_ROUTE_PATTERN.exec(pathname);
  if (!match) {
    return null;
  }

  let tag: string;
  try {
    tag = decodeURIComponent(match[1]);
  } catch {
    return null;
  }

  return {
    tag: tag === 'all' ? null : tag,
    action: match[2]
  };
}

function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error && error.message ? error.message : fallback;
}

function setCommonHeaders(response: http.ServerResponse): void {
  response.setHeader('Cache-Control', 'no-store');
  response.setHeader('X-Content-Type-Options', 'nosniff');
}

function sendJson(response: http.ServerResponse, statusCode: number, payload: object): void {
  setCommonHeaders(response);
  response.setHeader('Content-Type', 'application/json; charset=utf-8');
  response.statusCode = statusCode;
  response.end(JSON.stringify(payload));
}

function sendHtml(response: http.ServerResponse, html: string): void {
  setCommonHeaders(response);
  response.setHeader('Content-Type', 'text/html; charset=utf-8');
  response.statusCode = 200;
  response.end(html);
}

function redirectHome(response: http.ServerResponse): void {
  setCommonHeaders(response);
  response.statusCode = 303;
  response.setHeader('Location', '/');
  response.end();
}

function readRequestBody(request: http.IncomingMessage, maxBodyBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    let size = 0;
    let overflow = false;
    let body = '';

    request.setEncoding('utf8');

    request.on('data', (chunk: string) => {
      if (overflow) {
        return;
      }

      size += Buffer.byteLength(chunk, 'utf8');
      if (size > maxBodyBytes) {
        overflow = true;
        return;
      }

      body += chunk;
    });

    request.on('end', () => {
      if (overflow) {
        reject(new Error('Payload too large.'));
        return;
      }

      resolve(body);
    });

    request.on('error', reject);
  });
}

export function createWebRequestHandler(config: WebServerConfig) {
  const { actions } = config;

  return async (request: http.IncomingMessage, response: http.ServerResponse): Promise<void> => {
    let requestUrl: URL;
    try {
      requestUrl = new URL(request.url || '/', `http://${config.host}:${config.port}`);
    } catch {
      sendJson(response, 400, { accepted: false, error: 'Invalid request URL.' });
      return;
    }

    const method = request.method || 'GET';
    const { pathname } = requestUrl;

    if (method === 'GET') {
      try {
        if (pathname === '/') {
          sendHtml(response, renderPage({
            appVersion: config.getAppVersion(),
            downloadDir: config.downloadDir,
            history: actions.listHistory()
          }));
          return;
        }

        if (pathname === PANEL_PATH) {
          sendHtml(response, renderPanel({
            snapshot: config.getSnapshot(),
            refreshSeconds: config.refreshSeconds
          }));
          return;
        }

        if (pathname === HEALTH_PATH) {
          sendJson(response, 200, {
            ok: true,
            appVersion: config.getAppVersion(),
            runMode: config.runMode,
            serverReady: config.isServerReady()
          });
          return;
        }

        if (pathname === SESSION_PATH) {
          sendJson(response, 200, {
            ...config.getSnapshot(),
            history: actions.listHistory()
          });
          return;
        }
      } catch (error) {
        serverLog.error(`GET ${pathname} failed: ${formatCommandError(error)}`);
        sendJson(response, 500, { accepted: false, error: formatCommandError(error) });
        return;
      }
    }

    const transferRoute = method === 'POST' ? parseTransferRoute(pathname) : null;
    const isClearRoute = (method === 'DELETE' && pathname === HISTORY_PATH)
      || (method === 'POST' && pathname === HISTORY_CLEAR_PATH);
    const isDownloadRoute = method === 'POST' && pathname === DOWNLOADS_PATH;

    if (!transferRoute && !isClearRoute && !isDownloadRoute) {
      sendJson(response, 404, { accepted: false, error: 'Not found.' });
      return;
    }

    let rawBody = '';
    try {
      rawBody = await readRequestBody(request, config.maxBodyBytes);
    } catch (error) {
      sendJson(response, 413, { accepted: false, error: errorMessage(error, 'Payload too large.') });
      return;
    }

    const contentType = request.headers['content-type'];
    const fromForm = isFormContentType(contentType);

    let body: object;
    try {
      body = parseRequestBody(rawBody, contentType);
    } catch (error) {
      sendJson(response, 400, { accepted: false, error: errorMessage(error, 'Invalid payload.') });
      return;
    }

    try {
      if (isDownloadRoute) {
        const payload = parseDownloadPayload(body);
        const result = await actions.submitUrl(payload.url);

        if (fromForm) {
          redirectHome(response);
          return;
        }

        sendJson(response, result.accepted ? 202 : 400, result.accepted
          ? result
          : { ...result, error: 'Please enter a MEGA URL.' });
        return;
      }

      if (isClearRoute) {
        await actions.clearHistory();

        if (fromForm) {
          redirectHome(response);
          return;
        }

        sendJson(response, 200, { cleared: true });
        return;
      }

      if (transferRoute) {
        const result = await actions.controlTransfer(transferRoute.action, transferRoute.tag);

        if (fromForm) {
          redirectHome(response);
          return;
        }

        sendJson(response, result.accepted ? 200 : 400, result.accepted
          ? result
          : { ...result, error: 'Unknown transfer action or tag.' });
      }
    } catch (error) {
      const message = formatCommandError(error);
      serverLog.error(`${method} ${pathname} failed: ${message}`);
      sendJson(response, 500, { accepted: false, error: message });
    }
  };
}
