/**
 * Query-result cache.
 *
 * Not a source of truth: losing an entry only costs latency. Expiry is lazy,
 * so an entry read at or after `expiresAt` is a miss even when the backend
 * still holds it. Concurrent puts for one key resolve last-write-wins.
 */
export interface CachedSource {
  chunkId: string;
  documentId: string;
  score: number;
}

export interface CacheEntry {
  cacheKey: string;
  queryTextNormalized: string;
  topK: number;
  answer: string;
  sources: CachedSource[];
  retrievedChunkIds: string[];
  unsupportedByContext: boolean;
  /** Epoch milliseconds. */
  createdAt: number;
  /** Epoch milliseconds. */
  expiresAt: number;
}

export interface CacheStore {
  get(cacheKey: string): Promise<CacheEntry | undefined>;

  /** Stores the entry; `ttlMs` sets how long the backend keeps it. */
  put(entry: CacheEntry, ttlMs: number): Promise<void>;

  close(): Promise<void>;
}

export function isLive(entry: CacheEntry, now: number): boolean {
  return now < entry.expiresAt;
}
