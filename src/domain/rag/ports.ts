/**
 * Vector-store capability shared by every backend.
 *
 * Callers never branch on backend identity: the composition root picks an
 * implementation from configuration. Every backend scores with cosine
 * similarity and returns matches ranked by `rankMatches`.
 */
export type MetadataValue = string | number | boolean | string[];

export type VectorMetadata = Record<string, MetadataValue>;

/** Equality filter over metadata fields. */
export type VectorFilters = Record<string, string | number | boolean>;

export interface VectorRecord {
  id: string;
  vector: number[];
  metadata: VectorMetadata;
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: VectorMetadata;
}

export type SimilarityMetric = "cosine";

export interface VectorStoreStats {
  backend: string;
  metric: SimilarityMetric;
  dimension: number;
  recordCount: number;
}

export interface VectorStore {
  readonly dimension: number;
  readonly metric: SimilarityMetric;

  /** Overwrites records that share an id. */
  upsert(records: VectorRecord[]): Promise<void>;

  /** At most `topK` matches; fewer when the index holds fewer. */
  search(
    vector: number[],
    topK: number,
    filters?: VectorFilters
  ): Promise<VectorMatch[]>;

  delete(ids: string[]): Promise<void>;

  stats(): Promise<VectorStoreStats>;

  close(): Promise<void>;
}
