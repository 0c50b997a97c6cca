/**
 * Postgres-backed ingestion state. One row per (document_id, version).
 *
 * Status changes are conditional UPDATEs (`status = ANY($expected)`) so two
 * consumers racing on the same version cannot both win a transition, and
 * indexed chunk ids are merged with an array union so concurrent batches never
 * drop each other's progress.
 */
import {
  INGESTION_STATUSES,
  type DocumentVersionPatch,
  type DocumentVersionRecord,
  type IngestionStateRepository,
  type IngestionStatus,
} from "@domain/ingestion/state";
import { isConnectionError, type SqlClient, type SqlRow } from "@infra/database/db";
import { InfrastructureError, errorMessage } from "@typesLocal/AppError";
import { z } from "zod";

const StatusSchema = z.enum(INGESTION_STATUSES);

const PATCH_FIELDS = [
  "status",
  "chunkIds",
  "failedChunkIds",
  "lastError",
  "supersededBy",
] as const satisfies ReadonlyArray<keyof DocumentVersionPatch>;

const PATCH_COLUMNS: Record<(typeof PATCH_FIELDS)[number], string> = {
  status: "status",
  chunkIds: "chunk_ids",
  failedChunkIds: "failed_chunk_ids",
  lastError: "last_error",
  supersededBy: "superseded_by",
};

function textArray(value: unknown): string[] {
  return Array.isArray(value) ? value.map(String) : [];
}

function optionalText(value: unknown): string | undefined {
  return value === null || value === undefined ? undefined : String(value);
}

function toRecord(row: SqlRow): DocumentVersionRecord {
  return {
    documentId: String(row.document_id),
    version: String(row.version),
    sourceUri: String(row.source_uri),
    contentType: String(row.content_type),
    status: StatusSchema.parse(row.status),
    chunkIds: textArray(row.chunk_ids),
    indexedChunkIds: textArray(row.indexed_chunk_ids),
    failedChunkIds: textArray(row.failed_chunk_ids),
    lastError: optionalText(row.last_error),
    supersededBy: optionalText(row.superseded_by),
    createdAt: Number(row.created_at),
    updatedAt: Number(row.updated_at),
  };
}

export class PgIngestionStateRepository implements IngestionStateRepository {
  constructor(
    private readonly db: SqlClient,
    private readonly table = "ingestion_state",
    private readonly now: () => number = Date.now
  ) {}

  async ensureSchema(): Promise<void> {
    await this.run("ensureSchema", () =>
      this.db.query(`
        CREATE TABLE IF NOT EXISTS ${this.table} (
          document_id TEXT NOT NULL,
          version TEXT NOT NULL,
          source_uri TEXT NOT NULL,
          content_type TEXT NOT NULL,
          status TEXT NOT NULL,
          chunk_ids TEXT[] NOT NULL DEFAULT '{}',
          indexed_chunk_ids TEXT[] NOT NULL DEFAULT '{}',
          failed_chunk_ids TEXT[] NOT NULL DEFAULT '{}',
          last_error TEXT,
          superseded_by TEXT,
          created_at BIGINT NOT NULL,
          updated_at BIGINT NOT NULL,
          PRIMARY KEY (document_id, version)
        )
      `)
    );
  }

  async create(record: DocumentVersionRecord): Promise<DocumentVersionRecord> {
    await this.run("create", () =>
      this.db.query(
        `
        INSERT INTO ${this.table} (
          document_id, version, source_uri, content_type, status,
          chunk_ids, indexed_chunk_ids, failed_chunk_ids,
          last_error, superseded_by, created_at, updated_at
        )
        VALUES ($1, $2, $3, $4, $5, $6::text[], $7::text[], $8::text[], $9, $10, $11, $12)
        ON CONFLICT (document_id, version) DO NOTHING
        `,
        [
          record.documentId,
          record.version,
          record.sourceUri,
          record.contentType,
          record.status,
          record.chunkIds,
          record.indexedChunkIds,
          record.failedChunkIds,
          record.lastError ?? null,
          record.supersededBy ?? null,
          record.createdAt,
          record.updatedAt,
        ]
      )
    );

    const stored = await this.get(record.documentId, record.version);
    return stored ?? record;
  }

  async get(documentId: string, version: string): Promise<DocumentVersionRecord | undefined> {
    const result = await this.run("get", () =>
      this.db.query(
        `SELECT * FROM ${this.table} WHERE document_id = $1 AND version = $2`,
        [documentId, version]
      )
    );
    const row = result.rows[0];
    return row ? toRecord(row) : undefined;
  }

  async list(documentId: string): Promise<DocumentVersionRecord[]> {
    const result = await this.run("list", () =>
      this.db.query(
        `SELECT * FROM ${this.table} WHERE document_id = $1 ORDER BY created_at ASC, version ASC`,
        [documentId]
      )
    );
    return result.rows.map(toRecord);
  }

  async update(
    documentId: string,
    version: string,
    patch: DocumentVersionPatch,
    expected?: readonly IngestionStatus[]
  ): Promise<DocumentVersionRecord | undefined> {
    const values: unknown[] = [documentId, version, this.now()];
    const assignments = ["updated_at = $3"];

    for (const field of PATCH_FIELDS) {
      if (!(field in patch)) {
        continue;
      }
      const value = patch[field];
      values.push(value ?? null);
      const cast = Array.isArray(value) ? "::text[]" : "";
      assignments.push(`${PATCH_COLUMNS[field]} = $${values.length}${cast}`);
    }

    let guard = "";
    if (expected) {
      values.push([...expected]);
      guard = ` AND status = ANY($${values.length}::text[])`;
    }

    const result = await this.run("update", () =>
      this.db.query(
        `
        UPDATE ${this.table}
        SET ${assignments.join(", ")}
        WHERE document_id = $1 AND version = $2${guard}
        RETURNING *
        `,
        values
      )
    );
    const row = result.rows[0];
    return row ? toRecord(row) : undefined;
  }

  async addIndexedChunks(
    documentId: string,
    version: string,
    chunkIds: string[]
  ): Promise<DocumentVersionRecord | undefined> {
    const result = await this.run("addIndexedChunks", () =>
      this.db.query(
        `
        UPDATE ${this.table}
        SET
          indexed_chunk_ids = ARRAY(
            SELECT DISTINCT id FROM unnest(indexed_chunk_ids || $3::text[]) AS id
          ),
          failed_chunk_ids = ARRAY(
            SELECT id FROM unnest(failed_chunk_ids) AS id WHERE id <> ALL($3::text[])
          ),
          updated_at = $4
        WHERE document_id = $1 AND version = $2
        RETURNING *
        `,
        [documentId, version, chunkIds, this.now()]
      )
    );
    const row = result.rows[0];
    return row ? toRecord(row) : undefined;
  }

  /** The pool is owned by the composition root. */
  async close(): Promise<void> {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      throw new InfrastructureError(
        `ingestion state ${operation} failed: ${errorMessage(error)}`,
        503,
        { operation },
        { stage: "ingestion", retryable: isConnectionError(error), cause: error }
      );
    }
  }
}
