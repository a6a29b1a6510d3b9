import type { CacheClient } from '../cache/cache.js';
import { checksumFrom } from '../utils/hash.js';

export const USER_AGENT = 'Mozilla/5.0 (compatible; review-radar/0.1.0)';

export interface CachedFetchOptions {
  signal: AbortSignal;
  cache?: CacheClient;
  namespace: string;
  maxAgeMs?: number;
  headers?: Record<string, string>;
  /** Request fields left out of the cache key, such as API keys. */
  redactedParams?: readonly string[];
}

export class HttpStatusError extends Error {
  constructor(readonly status: number, readonly url: string) {
    super(`Request to ${url} failed with status ${status}`);
    this.name = 'HttpStatusError';
  }
}

/** Single-attempt GET that returns the parsed JSON body, reading and filling `cache` when one is given. */
export async function fetchJson(url: URL, options: CachedFetchOptions): Promise<unknown> {
  const checksum = checksumFrom({ url: cacheKeyUrl(url, options.redactedParams ?? []), method: 'GET' });

  const cached = await options.cache?.read(options.namespace, checksum, options.maxAgeMs);
  if (cached) {
    return JSON.parse(cached.body);
  }

  const response = await fetch(url, {
    signal: options.signal,
    headers: { 'User-Agent': USER_AGENT, Accept: 'application/json', ...options.headers },
  });
  if (!response.ok) {
    throw new HttpStatusError(response.status, cacheKeyUrl(url, options.redactedParams ?? []));
  }

  const text = await response.text();
  const payload: unknown = JSON.parse(text);
  await options.cache?.write(options.namespace, {
    checksum,
    body: text,
    metadata: { url: cacheKeyUrl(url, options.redactedParams ?? []), status: response.status },
  });
  return payload;
}

function cacheKeyUrl(url: URL, redacted: readonly string[]): string {
  if (redacted.length === 0) {
    return url.toString();
  }
  const copy = new URL(url);
  for (const param of redacted) {
    copy.searchParams.delete(param);
  }
  return copy.toString();
}
