import type { DocumentVersionRecord } from "@domain/ingestion/state";
import type { SqlClient, SqlRow } from "@infra/database/db";
import { InfrastructureError } from "@typesLocal/AppError";
import { describe, expect, it } from "vitest";

import { InMemoryIngestionStateRepository } from "../InMemoryIngestionStateRepository";
import { PgIngestionStateRepository } from "../PgIngestionStateRepository";

function record(overrides: Partial<DocumentVersionRecord> = {}): DocumentVersionRecord {
  return {
    documentId: "notes.txt",
    version: "v1",
    sourceUri: "docs/uploads/notes.txt",
    contentType: "text/plain",
    status: "RECEIVED",
    chunkIds: [],
    indexedChunkIds: [],
    failedChunkIds: [],
    createdAt: 1_000,
    updatedAt: 1_000,
    ...overrides,
  };
}

describe("InMemoryIngestionStateRepository", () => {
  it("keeps the first record created for a version", async () => {
    const repo = new InMemoryIngestionStateRepository(() => 2_000);

    await repo.create(record());
    const second = await repo.create(record({ status: "CHUNKED" }));

    expect(second.status).toBe("RECEIVED");
  });

  it("applies an update only from an expected status", async () => {
    const repo = new InMemoryIngestionStateRepository(() => 2_000);
    await repo.create(record());

    expect(await repo.update("notes.txt", "v1", { status: "QUEUED" }, ["CHUNKED"])).toBeUndefined();

    const updated = await repo.update(
      "notes.txt",
      "v1",
      { status: "CHUNKED", chunkIds: ["c1", "c2"] },
      ["RECEIVED"]
    );
    expect(updated).toMatchObject({ status: "CHUNKED", chunkIds: ["c1", "c2"], updatedAt: 2_000 });
  });

  it("unions indexed chunk ids and clears them from the failed set", async () => {
    const repo = new InMemoryIngestionStateRepository(() => 2_000);
    await repo.create(record({ indexedChunkIds: ["c1"], failedChunkIds: ["c2", "c3"] }));

    const updated = await repo.addIndexedChunks("notes.txt", "v1", ["c1", "c2"]);

    expect(updated?.indexedChunkIds).toEqual(["c1", "c2"]);
    expect(updated?.failedChunkIds).toEqual(["c3"]);
  });

  it("lists versions oldest first and hands out copies", async () => {
    const repo = new InMemoryIngestionStateRepository();
    await repo.create(record({ version: "v2", createdAt: 3_000 }));
    await repo.create(record({ version: "v1", createdAt: 1_000 }));
    await repo.create(record({ documentId: "other.txt" }));

    const versions = await repo.list("notes.txt");
    versions[0]?.chunkIds.push("mutated");

    expect(versions.map((v) => v.version)).toEqual(["v1", "v2"]);
    expect((await repo.get("notes.txt", "v1"))?.chunkIds).toEqual([]);
  });
});

class RecordingClient implements SqlClient {
  readonly queries: Array<{ text: string; values: unknown[] | undefined }> = [];

  constructor(private readonly respond: () => SqlRow[] | Error) {}

  async query(text: string, values?: unknown[]) {
    this.queries.push({ text: text.replace(/\s+/g, " ").trim(), values });
    const rows = this.respond();
    if (rows instanceof Error) {
      throw rows;
    }
    return { rows, rowCount: rows.length };
  }
}

const storedRow: SqlRow = {
  document_id: "notes.txt",
  version: "v1",
  source_uri: "docs/uploads/notes.txt",
  content_type: "text/plain",
  status: "QUEUED",
  chunk_ids: ["c1"],
  indexed_chunk_ids: [],
  failed_chunk_ids: [],
  last_error: null,
  superseded_by: null,
  created_at: "1000",
  updated_at: "5000",
};

describe("PgIngestionStateRepository", () => {
  it("builds a guarded UPDATE from the patch", async () => {
    const db = new RecordingClient(() => [storedRow]);
    const repo = new PgIngestionStateRepository(db, "ingestion_state", () => 5_000);

    const updated = await repo.update(
      "notes.txt",
      "v1",
      { status: "QUEUED", failedChunkIds: [], lastError: undefined },
      ["FAILED"]
    );

    expect(db.queries[0]).toEqual({
      text:
        "UPDATE ingestion_state SET updated_at = $3, status = $4, failed_chunk_ids = $5::text[], last_error = $6 " +
        "WHERE document_id = $1 AND version = $2 AND status = ANY($7::text[]) RETURNING *",
      values: ["notes.txt", "v1", 5_000, "QUEUED", [], null, ["FAILED"]],
    });
    expect(updated).toEqual({
      documentId: "notes.txt",
      version: "v1",
      sourceUri: "docs/uploads/notes.txt",
      contentType: "text/plain",
      status: "QUEUED",
      chunkIds: ["c1"],
      indexedChunkIds: [],
      failedChunkIds: [],
      lastError: undefined,
      supersededBy: undefined,
      createdAt: 1_000,
      updatedAt: 5_000,
    });
  });

  it("returns undefined when the guard matches no row", async () => {
    const repo = new PgIngestionStateRepository(new RecordingClient(() => []));

    expect(await repo.update("notes.txt", "v1", { status: "INDEXED" }, ["EMBEDDING"])).toBeUndefined();
  });

  it("wraps connection failures as retryable infrastructure errors", async () => {
    const repo = new PgIngestionStateRepository(
      new RecordingClient(() =>
        Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" })
      )
    );

    const error = await repo.get("notes.txt", "v1").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InfrastructureError);
    expect(error).toMatchObject({ statusCode: 503, retryable: true });
  });
});
