import { promises as fs } from 'node:fs';
import path from 'node:path';
import { jot } from '../jot.js';
import { isErrnoException } from '../errors.js';
import type { CacheClient, CacheEntry, CacheWriteInput } from './cache.js';

const metadataFileNode = jot.object({
  storedAt: jot.string(),
  metadata: jot.optional(jot.record(jot.string())),
});

export interface FileCacheOptions {
  baseDir?: string;
  now?: () => number;
}

export class FileCache implements CacheClient {
  private readonly baseDir: string;
  private readonly now: () => number;

  constructor(options: FileCacheOptions = {}) {
    this.baseDir = options.baseDir ?? '.cache';
    this.now = options.now ?? Date.now;
  }

  async read(namespace: string, checksum: string, maxAgeMs?: number): Promise<CacheEntry | null> {
    const { bodyPath, metaPath } = this.paths(namespace, checksum);

    let body: string;
    let metaRaw: string;
    try {
      [body, metaRaw] = await Promise.all([fs.readFile(bodyPath, 'utf8'), fs.readFile(metaPath, 'utf8')]);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    const meta = metadataFileNode.parse(JSON.parse(metaRaw), metaPath);
    if (maxAgeMs !== undefined) {
      const storedAt = Date.parse(meta.storedAt);
      if (Number.isNaN(storedAt) || this.now() - storedAt > maxAgeMs) {
        return null;
      }
    }

    return {
      checksum,
      body,
      storedAt: meta.storedAt,
      ...(meta.metadata ? { metadata: meta.metadata } : {}),
    };
  }

  async write(namespace: string, entry: CacheWriteInput): Promise<void> {
    const { dir, bodyPath, metaPath } = this.paths(namespace, entry.checksum);
    await fs.mkdir(dir, { recursive: true });

    const metadata: { storedAt: string; metadata?: Record<string, string> } = {
      storedAt: new Date(this.now()).toISOString(),
    };
    if (entry.metadata) {
      metadata.metadata = Object.fromEntries(
        Object.entries(entry.metadata).map(([key, value]) => [key, String(value)]),
      );
    }

    await Promise.all([
      fs.writeFile(bodyPath, entry.body, 'utf8'),
      fs.writeFile(metaPath, JSON.stringify(metadata, null, 2), 'utf8'),
    ]);
  }

  private paths(namespace: string, checksum: string) {
    const dir = path.join(this.baseDir, namespace);
    return {
      dir,
      bodyPath: path.join(dir, `${checksum}.body`),
      metaPath: path.join(dir, `${checksum}.meta.json`),
    };
  }
}
