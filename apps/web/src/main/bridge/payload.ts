export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

export interface DownloadPayload {
  url: string;
}

export function isFormContentType(contentType: string | undefined): boolean {
  if (typeof contentType !== 'string') {
    return false;
  }

  return contentType.split(';')[0].trim().toLowerCase() === FORM_CONTENT_TYPE;
}

/**
 * Decodes a request body into a plain object. Form posts come from the
 * HTML page; everything else is read as JSON, with an empty body meaning `{}`.
 */
export function parseRequestBody(rawBody: string, contentType: string | undefined): object {
  if (isFormContentType(contentType)) {
    return Object.fromEntries(new URLSearchParams(rawBody));
  }

  if (!rawBody.trim()) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch {
    throw new Error('Invalid JSON payload.');
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Invalid payload.');
  }

  return parsed;
}

export function parseDownloadPayload(payload: unknown): DownloadPayload {
  if (!payload || typeof payload !== 'object') {
    throw new Error('Invalid payload.');
  }

  const url = 'url' in payload && typeof payload.url === 'string' ? payload.url.trim() : '';
  return { url };
}
