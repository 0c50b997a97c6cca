import type { CacheEntry } from "@domain/cache/ports";
import { describe, expect, it } from "vitest";

import { InMemoryCacheStore } from "../InMemoryCacheStore";
import { RedisCacheStore, type RedisKeyValueClient } from "../RedisCacheStore";

function entry(overrides: Partial<CacheEntry> = {}): CacheEntry {
  return {
    cacheKey: "k1",
    queryTextNormalized: "what is alpha?",
    topK: 5,
    answer: "Alpha is the first letter.",
    sources: [{ chunkId: "c1", documentId: "greek.txt", score: 0.9 }],
    retrievedChunkIds: ["c1"],
    unsupportedByContext: false,
    createdAt: 1_000,
    expiresAt: 2_000,
    ...overrides,
  };
}

class FakeRedis implements RedisKeyValueClient {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  quitCalled = false;

  async get(key: string) {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, _mode: "PX", ttlMs: number) {
    this.values.set(key, value);
    this.ttls.set(key, ttlMs);
    return "OK";
  }

  async quit() {
    this.quitCalled = true;
    return "OK";
  }
}

describe("InMemoryCacheStore", () => {
  it("serves an entry only while now < expiresAt", async () => {
    let now = 1_500;
    const cache = new InMemoryCacheStore(() => now);
    await cache.put(entry(), 500);

    expect(await cache.get("k1")).toEqual(entry());

    now = 2_000;
    expect(await cache.get("k1")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("keeps the last write for a key", async () => {
    const cache = new InMemoryCacheStore(() => 1_500);
    await cache.put(entry({ answer: "first" }), 500);
    await cache.put(entry({ answer: "second" }), 500);

    expect((await cache.get("k1"))?.answer).toBe("second");
  });
});

describe("RedisCacheStore", () => {
  it("writes prefixed JSON with a millisecond expiry", async () => {
    const redis = new FakeRedis();
    const cache = new RedisCacheStore(redis, "rag:cache:", () => 1_500);

    await cache.put(entry(), 1_000.2);

    expect(redis.ttls.get("rag:cache:k1")).toBe(1_001);
    expect(JSON.parse(redis.values.get("rag:cache:k1") ?? "null")).toEqual(entry());
    expect(await cache.get("k1")).toEqual(entry());
  });

  it("treats expired and malformed entries as misses", async () => {
    const redis = new FakeRedis();
    let now = 1_500;
    const cache = new RedisCacheStore(redis, "p:", () => now);
    await cache.put(entry(), 500);

    now = 2_500;
    expect(await cache.get("k1")).toBeUndefined();

    redis.values.set("p:k2", JSON.stringify({ cacheKey: "k2" }));
    expect(await cache.get("k2")).toBeUndefined();
  });

  it("quits the client on close", async () => {
    const redis = new FakeRedis();
    await new RedisCacheStore(redis, "p:").close();

    expect(redis.quitCalled).toBe(true);
  });
});
