/**
 * Pinecone (managed index) implementation of the VectorStore port.
 *
 * The index must be created with metric "cosine" and the configured
 * dimension. Pinecone orders matches by score only and may cut a run of equal
 * scores anywhere, so searches over-fetch until the score at the top-k cut-off
 * is strictly above the last returned one, then re-rank with the shared
 * tie-break.
 */
import type {
  VectorFilters,
  VectorMatch,
  VectorMetadata,
  VectorRecord,
  VectorStore,
  VectorStoreStats,
} from "@domain/rag/ports";
import {
  assertDimension,
  rankMatches,
  toVectorMetadata,
} from "@domain/rag/ranking";
import { logEvent } from "@infra/logging/Logger";
import { VectorStoreUnavailable, errorMessage } from "@typesLocal/AppError";
import { isRetryableError } from "@utils/retry";
import { Pinecone } from "@pinecone-database/pinecone";

interface PineconeUpsertRecord {
  id: string;
  values: number[];
  metadata?: VectorMetadata;
}

interface PineconeQueryOptions {
  vector: number[];
  topK: number;
  includeMetadata: boolean;
  includeValues: boolean;
  filter?: Record<string, { $eq: string | number | boolean }>;
}

/** The slice of a Pinecone index namespace the adapter uses. */
export interface PineconeIndexClient {
  upsert(records: PineconeUpsertRecord[]): Promise<void>;
  query(options: PineconeQueryOptions): Promise<{
    matches?: Array<{ id: string; score?: number; metadata?: object }>;
  }>;
  deleteMany(ids: string[]): Promise<void>;
  describeIndexStats(): Promise<{
    dimension?: number;
    totalRecordCount?: number;
    namespaces?: Record<string, { recordCount?: number }>;
  }>;
}

export interface PineconeVectorStoreOptions {
  dimension: number;
  namespace: string;
  /** Records per upsert request (Pinecone accepts up to 1000; 100 is recommended). */
  batchSize?: number;
  /** Extra matches requested beyond top_k so ties at the cut-off can be ranked. */
  tieMargin?: number;
}

/** Largest top_k a Pinecone query accepts. */
const MAX_QUERY_TOP_K = 10_000;

export function createPineconeIndex(config: {
  apiKey: string;
  indexName: string;
  namespace: string;
}): PineconeIndexClient {
  const client = new Pinecone({ apiKey: config.apiKey });
  return client.index<VectorMetadata>(config.indexName).namespace(config.namespace);
}

const AUTH_STATUSES = new Set([401, 403]);

export class PineconeVectorStore implements VectorStore {
  readonly metric = "cosine" as const;
  readonly dimension: number;
  private readonly namespace: string;
  private readonly batchSize: number;
  private readonly tieMargin: number;

  constructor(
    private readonly index: PineconeIndexClient,
    options: PineconeVectorStoreOptions
  ) {
    this.dimension = options.dimension;
    this.namespace = options.namespace;
    this.batchSize = options.batchSize ?? 100;
    this.tieMargin = options.tieMargin ?? 10;
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    records.forEach((record) => assertDimension(record.vector, this.dimension));

    await this.run("upsert", async () => {
      for (let i = 0; i < records.length; i += this.batchSize) {
        await this.index.upsert(
          records.slice(i, i + this.batchSize).map((record) => ({
            id: record.id,
            values: record.vector,
            metadata: record.metadata,
          }))
        );
      }
    });

    logEvent("VECTOR_UPSERT", { backend: "pinecone", count: records.length });
  }

  async search(
    vector: number[],
    topK: number,
    filters?: VectorFilters
  ): Promise<VectorMatch[]> {
    assertDimension(vector, this.dimension);

    const filter =
      filters && Object.keys(filters).length > 0
        ? Object.fromEntries(
            Object.entries(filters).map(([field, value]) => [field, { $eq: value }])
          )
        : undefined;

    let requested = Math.min(topK + this.tieMargin, MAX_QUERY_TOP_K);
    for (;;) {
      const options: PineconeQueryOptions = {
        vector,
        topK: requested,
        includeMetadata: true,
        includeValues: false,
        ...(filter ? { filter } : {}),
      };
      const response = await this.run("search", () => this.index.query(options));
      const matches: VectorMatch[] = (response.matches ?? []).map((match) => ({
        id: match.id,
        score: match.score ?? 0,
        metadata: toVectorMetadata(match.metadata),
      }));

      const ranked = rankMatches(matches, topK);
      const cutoff = ranked.at(-1)?.score;
      const lowest = Math.min(...matches.map((match) => match.score));
      const exhausted = matches.length < requested || requested >= MAX_QUERY_TOP_K;

      if (exhausted || cutoff === undefined || lowest < cutoff) {
        return ranked;
      }
      requested = Math.min(requested * 2, MAX_QUERY_TOP_K);
    }
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }
    await this.run("delete", () => this.index.deleteMany(ids));
  }

  async stats(): Promise<VectorStoreStats> {
    const stats = await this.run("stats", () => this.index.describeIndexStats());

    return {
      backend: "pinecone",
      metric: this.metric,
      dimension: stats.dimension ?? this.dimension,
      recordCount:
        stats.namespaces?.[this.namespace]?.recordCount ?? stats.totalRecordCount ?? 0,
    };
  }

  async close(): Promise<void> {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      const status =
        error !== null && typeof error === "object" && "status" in error
          ? Number(error.status)
          : undefined;

      if (
        isRetryableError(error) ||
        (status !== undefined && AUTH_STATUSES.has(status)) ||
        (error instanceof Error && error.name.startsWith("PineconeConnection"))
      ) {
        throw new VectorStoreUnavailable(
          `pinecone ${operation} failed: ${errorMessage(error)}`,
          { backend: "pinecone", operation },
          error
        );
      }
      throw error;
    }
  }
}
