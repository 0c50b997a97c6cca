import { isLive, type CacheEntry, type CacheStore } from "@domain/cache/ports";

/** Process-local cache with lazy expiry. */
export class InMemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(cacheKey: string): Promise<CacheEntry | undefined> {
    const entry = this.entries.get(cacheKey);
    if (!entry) {
      return undefined;
    }
    if (!isLive(entry, this.now())) {
      this.entries.delete(cacheKey);
      return undefined;
    }
    return structuredClone(entry);
  }

  async put(entry: CacheEntry, _ttlMs: number): Promise<void> {
    this.entries.set(entry.cacheKey, structuredClone(entry));
  }

  /** Number of entries physically held, expired ones included. */
  get size(): number {
    return this.entries.size;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
