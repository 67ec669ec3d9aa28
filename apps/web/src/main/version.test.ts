import fs from 'fs';
import path from 'path';

import { describe, expect, it } from 'vitest';

import { APP_VERSION } from './version';

describe('APP_VERSION', () => {
  it('matches the package manifest', () => {
    const manifest: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '../../package.json'), 'utf8'));

    expect(manifest).toMatchObject({ version: APP_VERSION });
    expect(APP_VERSION).toMatch(/^\d+\.\d+\.\d+/);
  });
});
