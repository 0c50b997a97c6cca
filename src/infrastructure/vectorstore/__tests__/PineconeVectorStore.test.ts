import { DimensionMismatch, VectorStoreUnavailable } from "@typesLocal/AppError";
import { describe, expect, it, vi } from "vitest";

import { PineconeVectorStore, type PineconeIndexClient } from "../PineconeVectorStore";

function fakeIndex() {
  return {
    upsert: vi.fn<PineconeIndexClient["upsert"]>(async () => undefined),
    query: vi.fn<PineconeIndexClient["query"]>(async () => ({ matches: [] })),
    deleteMany: vi.fn<PineconeIndexClient["deleteMany"]>(async () => undefined),
    describeIndexStats: vi.fn<PineconeIndexClient["describeIndexStats"]>(async () => ({})),
  };
}

describe("PineconeVectorStore", () => {
  it("upserts in batches", async () => {
    const index = fakeIndex();
    const store = new PineconeVectorStore(index, { dimension: 2, namespace: "docs", batchSize: 2 });

    await store.upsert([
      { id: "a", vector: [1, 0], metadata: { document_id: "x" } },
      { id: "b", vector: [0, 1], metadata: {} },
      { id: "c", vector: [1, 1], metadata: {} },
    ]);

    expect(index.upsert).toHaveBeenCalledTimes(2);
    expect(index.upsert.mock.calls[1]?.[0]).toEqual([
      { id: "c", values: [1, 1], metadata: {} },
    ]);
  });

  it("translates filters and re-ranks ties by id", async () => {
    const index = fakeIndex();
    index.query.mockResolvedValue({
      matches: [
        { id: "b", score: 0.8, metadata: { document_id: "x" } },
        { id: "a", score: 0.8, metadata: { document_id: "x" } },
        { id: "c", score: 0.9 },
      ],
    });
    const store = new PineconeVectorStore(index, { dimension: 2, namespace: "docs" });

    const matches = await store.search([1, 0], 3, { document_id: "x" });

    expect(index.query).toHaveBeenCalledWith({
      vector: [1, 0],
      topK: 13,
      includeMetadata: true,
      includeValues: false,
      filter: { document_id: { $eq: "x" } },
    });
    expect(matches.map((match) => match.id)).toEqual(["c", "a", "b"]);
  });

  it("over-fetches so a tie at the cut-off keeps the lowest id", async () => {
    const index = fakeIndex();
    const pool = [
      { id: "b", score: 0.9 },
      { id: "a", score: 0.9 },
      { id: "c", score: 0.5 },
    ];
    index.query.mockImplementation(async ({ topK }) => ({ matches: pool.slice(0, topK) }));
    const store = new PineconeVectorStore(index, { dimension: 2, namespace: "docs" });

    const matches = await store.search([1, 0], 1);

    expect(matches.map((match) => match.id)).toEqual(["a"]);
    expect(index.query.mock.calls.map(([options]) => options.topK)).toEqual([11]);
  });

  it("keeps widening the query while the cut-off score runs past the last match", async () => {
    const index = fakeIndex();
    const pool = [
      { id: "d", score: 0.9 },
      { id: "c", score: 0.9 },
      { id: "b", score: 0.9 },
      { id: "a", score: 0.9 },
      { id: "e", score: 0.1 },
    ];
    index.query.mockImplementation(async ({ topK }) => ({ matches: pool.slice(0, topK) }));
    const store = new PineconeVectorStore(index, { dimension: 2, namespace: "docs", tieMargin: 1 });

    const matches = await store.search([1, 0], 1);

    expect(matches.map((match) => match.id)).toEqual(["a"]);
    expect(index.query.mock.calls.map(([options]) => options.topK)).toEqual([2, 4, 8]);
  });

  it("reports the namespace record count", async () => {
    const index = fakeIndex();
    index.describeIndexStats.mockResolvedValue({
      dimension: 2,
      totalRecordCount: 10,
      namespaces: { docs: { recordCount: 4 } },
    });
    const store = new PineconeVectorStore(index, { dimension: 2, namespace: "docs" });

    expect(await store.stats()).toEqual({
      backend: "pinecone",
      metric: "cosine",
      dimension: 2,
      recordCount: 4,
    });
  });

  it("maps auth and server failures to VectorStoreUnavailable", async () => {
    const index = fakeIndex();
    index.query.mockRejectedValue(Object.assign(new Error("unauthorized"), { status: 401 }));
    const store = new PineconeVectorStore(index, { dimension: 2, namespace: "docs" });

    await expect(store.search([1, 0], 1)).rejects.toBeInstanceOf(VectorStoreUnavailable);
  });

  it("checks dimensions before calling the index", async () => {
    const index = fakeIndex();
    const store = new PineconeVectorStore(index, { dimension: 2, namespace: "docs" });

    await expect(store.search([1, 0, 0], 1)).rejects.toBeInstanceOf(DimensionMismatch);
    expect(index.query).not.toHaveBeenCalled();
  });
});
