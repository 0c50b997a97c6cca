import type {
  VectorFilters,
  VectorMatch,
  VectorRecord,
  VectorStore,
  VectorStoreStats,
} from "@domain/rag/ports";
import {
  assertDimension,
  cosineSimilarity,
  matchesFilters,
  rankMatches,
} from "@domain/rag/ranking";

/**
 * Process-local vector store with exact cosine search. Used for local runs
 * and as the stand-in for managed backends in tests.
 */
export class InMemoryVectorStore implements VectorStore {
  readonly metric = "cosine" as const;
  private readonly records = new Map<string, VectorRecord>();

  constructor(readonly dimension: number) {}

  async upsert(records: VectorRecord[]): Promise<void> {
    records.forEach((record) => assertDimension(record.vector, this.dimension));

    for (const record of records) {
      this.records.set(record.id, {
        id: record.id,
        vector: [...record.vector],
        metadata: { ...record.metadata },
      });
    }
  }

  async search(
    vector: number[],
    topK: number,
    filters?: VectorFilters
  ): Promise<VectorMatch[]> {
    assertDimension(vector, this.dimension);

    const matches: VectorMatch[] = [];
    for (const record of this.records.values()) {
      if (!matchesFilters(record.metadata, filters)) {
        continue;
      }
      matches.push({
        id: record.id,
        score: cosineSimilarity(vector, record.vector),
        metadata: { ...record.metadata },
      });
    }

    return rankMatches(matches, topK);
  }

  async delete(ids: string[]): Promise<void> {
    ids.forEach((id) => this.records.delete(id));
  }

  async stats(): Promise<VectorStoreStats> {
    return {
      backend: "memory",
      metric: this.metric,
      dimension: this.dimension,
      recordCount: this.records.size,
    };
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
