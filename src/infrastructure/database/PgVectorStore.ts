/**
 * Postgres + pgvector implementation of the VectorStore port.
 *
 * One row per vector keyed by id; upsert is INSERT ... ON CONFLICT DO UPDATE.
 * Search scores with cosine similarity (1 - cosine distance). Rows are ordered
 * by the distance expression itself so the HNSW index serves the scan, then by
 * id so ties rank the same way as every other backend.
 */
import type {
  VectorFilters,
  VectorMatch,
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
import {
  DimensionMismatch,
  VectorStoreUnavailable,
  errorMessage,
} from "@typesLocal/AppError";
import { toPgVectorLiteral } from "@utils/vector";

import { isConnectionError, type SqlClient } from "./db";

export interface PgVectorStoreOptions {
  table: string;
  dimension: number;
  /** Rows per INSERT statement. */
  batchSize?: number;
}

export class PgVectorStore implements VectorStore {
  readonly metric = "cosine" as const;
  readonly dimension: number;
  private readonly table: string;
  private readonly batchSize: number;

  constructor(
    private readonly db: SqlClient,
    options: PgVectorStoreOptions
  ) {
    this.table = options.table;
    this.dimension = options.dimension;
    this.batchSize = options.batchSize ?? 100;
  }

  /** Creates the extension, table and indexes when missing. */
  async ensureSchema(): Promise<void> {
    await this.run("ensureSchema", async () => {
      await this.db.query("CREATE EXTENSION IF NOT EXISTS vector");
      await this.db.query(`
        CREATE TABLE IF NOT EXISTS ${this.table} (
          id TEXT PRIMARY KEY,
          embedding vector(${this.dimension}) NOT NULL,
          metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
          updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
        )
      `);
      await this.db.query(`
        CREATE INDEX IF NOT EXISTS ${this.table}_embedding_hnsw
        ON ${this.table} USING hnsw (embedding vector_cosine_ops)
      `);
      await this.db.query(`
        CREATE INDEX IF NOT EXISTS ${this.table}_metadata_gin
        ON ${this.table} USING gin (metadata jsonb_path_ops)
      `);
    });
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    records.forEach((record) => assertDimension(record.vector, this.dimension));

    await this.run("upsert", async () => {
      for (let i = 0; i < records.length; i += this.batchSize) {
        const batch = records.slice(i, i + this.batchSize);
        const values: unknown[] = [];
        const placeholders = batch.map((record, row) => {
          const base = row * 3;
          values.push(record.id, toPgVectorLiteral(record.vector), JSON.stringify(record.metadata));
          return `($${base + 1}, $${base + 2}::vector, $${base + 3}::jsonb, now())`;
        });

        await this.db.query(
          `
          INSERT INTO ${this.table} (id, embedding, metadata, updated_at)
          VALUES ${placeholders.join(", ")}
          ON CONFLICT (id) DO UPDATE SET
            embedding = EXCLUDED.embedding,
            metadata = EXCLUDED.metadata,
            updated_at = EXCLUDED.updated_at
          `,
          values
        );
      }
    });

    logEvent("VECTOR_UPSERT", { backend: "pgvector", count: records.length });
  }

  async search(
    vector: number[],
    topK: number,
    filters?: VectorFilters
  ): Promise<VectorMatch[]> {
    assertDimension(vector, this.dimension);

    const hasFilters = filters !== undefined && Object.keys(filters).length > 0;
    const values: unknown[] = [toPgVectorLiteral(vector), topK];
    if (hasFilters) {
      values.push(JSON.stringify(filters));
    }

    const result = await this.run("search", () =>
      this.db.query(
        `
        SELECT
          id,
          metadata,
          1 - (embedding <=> $1::vector) AS score
        FROM ${this.table}
        ${hasFilters ? "WHERE metadata @> $3::jsonb" : ""}
        ORDER BY embedding <=> $1::vector ASC, id ASC
        LIMIT $2
        `,
        values
      )
    );

    return rankMatches(
      result.rows.map((row) => ({
        id: String(row.id),
        score: Number(row.score),
        metadata: toVectorMetadata(row.metadata),
      })),
      topK
    );
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }
    await this.run("delete", () =>
      this.db.query(`DELETE FROM ${this.table} WHERE id = ANY($1::text[])`, [ids])
    );
  }

  async stats(): Promise<VectorStoreStats> {
    const result = await this.run("stats", () =>
      this.db.query(`SELECT COUNT(*) AS count FROM ${this.table}`)
    );

    return {
      backend: "pgvector",
      metric: this.metric,
      dimension: this.dimension,
      recordCount: Number(result.rows[0]?.count ?? 0),
    };
  }

  /** The pool is owned by the composition root. */
  async close(): Promise<void> {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      const message = errorMessage(error);
      const dimensions = /expected (\d+) dimensions, not (\d+)/.exec(message);

      if (dimensions) {
        throw new DimensionMismatch(Number(dimensions[1]), Number(dimensions[2]), "retrieval");
      }
      if (isConnectionError(error)) {
        throw new VectorStoreUnavailable(`pgvector ${operation} failed: ${message}`, {
          backend: "pgvector",
          operation,
        }, error);
      }
      throw error;
    }
  }
}
