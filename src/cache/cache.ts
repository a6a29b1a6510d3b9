export interface CacheEntry {
  checksum: string;
  storedAt: string;
  metadata?: Record<string, unknown>;
  body: string;
}

export interface CacheWriteInput {
  checksum: string;
  body: string;
  metadata?: Record<string, unknown>;
}

/** Response cache shared by the collectors, keyed by namespace and request checksum. */
export interface CacheClient {
  /** Resolves to `null` on a miss or when the entry is older than `maxAgeMs`. */
  read(namespace: string, checksum: string, maxAgeMs?: number): Promise<CacheEntry | null>;
  write(namespace: string, entry: CacheWriteInput): Promise<void>;
}
