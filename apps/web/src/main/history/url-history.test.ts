import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { addUrlToHistory, normalizeUrlHistory, UrlHistoryStore } from './url-history';

describe('addUrlToHistory', () => {
  it('moves repeated URLs to the front without duplicates', () => {
    let history: string[] = [];
    history = addUrlToHistory(history, 'A');
    history = addUrlToHistory(history, 'B');
    history = addUrlToHistory(history, 'A');

    expect(history).toEqual(['A', 'B']);
  });

  it('drops the oldest entries past the cap', () => {
    const history = addUrlToHistory(['c', 'b', 'a'], 'd', 3);
    expect(history).toEqual(['d', 'c', 'b']);
  });

  it('trims input and ignores blanks', () => {
    expect(addUrlToHistory(['x'], '  y  ')).toEqual(['y', 'x']);
    expect(addUrlToHistory(['x'], '   ')).toEqual(['x']);
  });
});

describe('normalizeUrlHistory', () => {
  it('keeps unique strings only', () => {
    expect(normalizeUrlHistory(['a', 3, null, 'a', ' b ', ''])).toEqual(['a', 'b']);
  });

  it('rejects non-array payloads', () => {
    expect(normalizeUrlHistory({ urls: ['a'] })).toEqual([]);
  });
});

describe('UrlHistoryStore', () => {
  let directory = '';

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'url-history-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    const store = new UrlHistoryStore(path.join(directory, 'history.json'));
    await expect(store.load()).resolves.toEqual([]);
  });

  it('persists a flat JSON array newest first', async () => {
    const filePath = path.join(directory, 'nested', 'history.json');
    const store = new UrlHistoryStore(filePath);

    await store.add('https://mega.nz/file/one');
    await store.add('https://mega.nz/file/two');

    const saved = JSON.parse(await fs.readFile(filePath, 'utf8'));
    expect(saved).toEqual(['https://mega.nz/file/two', 'https://mega.nz/file/one']);

    const reloaded = new UrlHistoryStore(filePath);
    await expect(reloaded.load()).resolves.toEqual(saved);
  });

  it('clears and rewrites the file', async () => {
    const filePath = path.join(directory, 'history.json');
    const store = new UrlHistoryStore(filePath);

    await store.add('https://mega.nz/file/one');
    await store.clear();

    expect(store.list()).toEqual([]);
    expect(await fs.readFile(filePath, 'utf8')).toBe('[]');
  });

  it('ignores corrupt files', async () => {
    const filePath = path.join(directory, 'history.json');
    await fs.writeFile(filePath, '{not json', 'utf8');

    const store = new UrlHistoryStore(filePath);
    await expect(store.load()).resolves.toEqual([]);
  });

  it('caps loaded history', async () => {
    const filePath = path.join(directory, 'history.json');
    await fs.writeFile(filePath, JSON.stringify(['a', 'b', 'c']), 'utf8');

    const store = new UrlHistoryStore(filePath, 2);
    await expect(store.load()).resolves.toEqual(['a', 'b']);
  });
});
