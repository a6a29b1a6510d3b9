import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { FileCache } from './fileCache.js';

describe('FileCache', () => {
  let dir: string;
  let clock: number;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'review-radar-cache-'));
    clock = Date.parse('2026-10-18T00:00:00.000Z');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('returns what was written', async () => {
    const cache = new FileCache({ baseDir: dir, now: () => clock });

    await cache.write('dcard-posts', { checksum: 'abc', body: '[1,2]', metadata: { status: 200 } });

    expect(await cache.read('dcard-posts', 'abc')).toEqual({
      checksum: 'abc',
      body: '[1,2]',
      storedAt: '2026-10-18T00:00:00.000Z',
      metadata: { status: '200' },
    });
  });

  test('misses unknown entries', async () => {
    const cache = new FileCache({ baseDir: dir });
    expect(await cache.read('dcard-posts', 'missing')).toBeNull();
  });

  test('treats entries older than maxAgeMs as misses', async () => {
    const cache = new FileCache({ baseDir: dir, now: () => clock });
    await cache.write('serpapi-search', { checksum: 'q1', body: '{}' });

    clock += 60_000;

    expect(await cache.read('serpapi-search', 'q1', 60_000)).not.toBeNull();
    expect(await cache.read('serpapi-search', 'q1', 59_999)).toBeNull();
    expect(await cache.read('serpapi-search', 'q1')).not.toBeNull();
  });
});
