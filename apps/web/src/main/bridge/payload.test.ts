import { describe, expect, it } from 'vitest';

import { isFormContentType, parseDownloadPayload, parseRequestBody } from './payload';

describe('isFormContentType', () => {
  it('matches urlencoded forms with or without a charset', () => {
    expect(isFormContentType('application/x-www-form-urlencoded')).toBe(true);
    expect(isFormContentType('Application/X-WWW-Form-Urlencoded; charset=UTF-8')).toBe(true);
    expect(isFormContentType('application/json')).toBe(false);
    expect(isFormContentType(undefined)).toBe(false);
  });
});

describe('parseRequestBody', () => {
  it('decodes form fields', () => {
    const body = parseRequestBody('url=https%3A%2F%2Fmega.nz%2Ffile%2Fabc%23test-key', 'application/x-www-form-urlencoded');
    expect(body).toEqual({ url: 'https://mega.nz/file/abc#test-key' });
  });

  it('treats an empty JSON body as an empty object', () => {
    expect(parseRequestBody('  ', 'application/json')).toEqual({});
  });

  it('parses JSON objects', () => {
    expect(parseRequestBody('{"url":"https://mega.nz/folder/x"}', undefined)).toEqual({
      url: 'https://mega.nz/folder/x'
    });
  });

  it('throws for malformed JSON', () => {
    expect(() => parseRequestBody('{invalid json', 'application/json')).toThrow('Invalid JSON payload.');
  });

  it('throws for JSON that is not an object', () => {
    expect(() => parseRequestBody('["a"]', 'application/json')).toThrow('Invalid payload.');
    expect(() => parseRequestBody('42', 'application/json')).toThrow('Invalid payload.');
  });
});

describe('parseDownloadPayload', () => {
  it('trims the url', () => {
    expect(parseDownloadPayload({ url: '  https://mega.nz/file/abc  ' })).toEqual({ url: 'https://mega.nz/file/abc' });
  });

  it('defaults a missing or non-string url to blank', () => {
    expect(parseDownloadPayload({})).toEqual({ url: '' });
    expect(parseDownloadPayload({ url: 7 })).toEqual({ url: '' });
  });

  it('throws for invalid payload objects', () => {
    expect(() => parseDownloadPayload(null)).toThrow('Invalid payload.');
  });
});
