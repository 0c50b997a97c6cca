/**
 * Redis-backed query cache.
 *
 * Entries are JSON values written with SET ... PX so Redis evicts them on its
 * own; reads still check `expiresAt` because eviction timing is not
 * guaranteed. A plain SET is last-write-wins.
 */
import { isLive, type CacheEntry, type CacheStore } from "@domain/cache/ports";
import { z } from "zod";

const CacheEntrySchema = z.object({
  cacheKey: z.string(),
  queryTextNormalized: z.string(),
  topK: z.number().int(),
  answer: z.string(),
  sources: z.array(
    z.object({ chunkId: z.string(), documentId: z.string(), score: z.number() })
  ),
  retrievedChunkIds: z.array(z.string()),
  unsupportedByContext: z.boolean(),
  createdAt: z.number(),
  expiresAt: z.number(),
});

/** The slice of an ioredis client the cache uses. */
export interface RedisKeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "PX", ttlMs: number): Promise<unknown>;
  quit(): Promise<unknown>;
}

export class RedisCacheStore implements CacheStore {
  constructor(
    private readonly redis: RedisKeyValueClient,
    private readonly keyPrefix: string,
    private readonly now: () => number = Date.now
  ) {}

  async get(cacheKey: string): Promise<CacheEntry | undefined> {
    const raw = await this.redis.get(this.keyPrefix + cacheKey);
    if (raw === null) {
      return undefined;
    }

    const parsed = CacheEntrySchema.safeParse(JSON.parse(raw));
    if (!parsed.success || !isLive(parsed.data, this.now())) {
      return undefined;
    }
    return parsed.data;
  }

  async put(entry: CacheEntry, ttlMs: number): Promise<void> {
    await this.redis.set(
      this.keyPrefix + entry.cacheKey,
      JSON.stringify(entry),
      "PX",
      Math.max(1, Math.ceil(ttlMs))
    );
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
