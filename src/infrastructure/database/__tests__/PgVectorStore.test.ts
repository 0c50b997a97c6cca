import { DimensionMismatch, VectorStoreUnavailable } from "@typesLocal/AppError";
import { describe, expect, it } from "vitest";

import type { SqlClient, SqlRow } from "../db";
import { PgVectorStore } from "../PgVectorStore";

class RecordingClient implements SqlClient {
  readonly queries: Array<{ text: string; values: unknown[] | undefined }> = [];

  constructor(private readonly respond: (text: string) => SqlRow[] | Error = () => []) {}

  async query(text: string, values?: unknown[]) {
    this.queries.push({ text: text.replace(/\s+/g, " ").trim(), values });
    const rows = this.respond(text);
    if (rows instanceof Error) {
      throw rows;
    }
    return { rows, rowCount: rows.length };
  }
}

describe("PgVectorStore", () => {
  it("upserts every record in one INSERT ... ON CONFLICT statement", async () => {
    const db = new RecordingClient();
    const store = new PgVectorStore(db, { table: "rag_vectors", dimension: 2 });

    await store.upsert([
      { id: "a", vector: [1, 0], metadata: { document_id: "x" } },
      { id: "b", vector: [0.5, 0.25], metadata: {} },
    ]);

    expect(db.queries).toHaveLength(1);
    const [query] = db.queries;
    expect(query?.text).toContain(
      "VALUES ($1, $2::vector, $3::jsonb, now()), ($4, $5::vector, $6::jsonb, now())"
    );
    expect(query?.text).toContain("ON CONFLICT (id) DO UPDATE SET");
    expect(query?.values).toEqual(["a", "[1,0]", '{"document_id":"x"}', "b", "[0.5,0.25]", "{}"]);
  });

  it("searches by cosine score with filters and ranks ties by id", async () => {
    const db = new RecordingClient(() => [
      { id: "b", score: "0.5", metadata: { document_id: "x" } },
      { id: "a", score: 0.5, metadata: { document_id: "x" } },
    ]);
    const store = new PgVectorStore(db, { table: "rag_vectors", dimension: 2 });

    const matches = await store.search([1, 0], 5, { document_id: "x" });

    expect(db.queries[0]?.text).toContain(
      "WHERE metadata @> $3::jsonb ORDER BY embedding <=> $1::vector ASC, id ASC LIMIT $2"
    );
    expect(db.queries[0]?.values).toEqual(["[1,0]", 5, '{"document_id":"x"}']);
    expect(matches).toEqual([
      { id: "a", score: 0.5, metadata: { document_id: "x" } },
      { id: "b", score: 0.5, metadata: { document_id: "x" } },
    ]);
  });

  it("maps pgvector dimension errors to DimensionMismatch", async () => {
    const db = new RecordingClient(() => new Error("expected 3 dimensions, not 2"));
    const store = new PgVectorStore(db, { table: "rag_vectors", dimension: 2 });

    await expect(store.search([1, 0], 1)).rejects.toBeInstanceOf(DimensionMismatch);
  });

  it("maps connection failures to VectorStoreUnavailable", async () => {
    const db = new RecordingClient(() =>
      Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:5432"), { code: "ECONNREFUSED" })
    );
    const store = new PgVectorStore(db, { table: "rag_vectors", dimension: 2 });

    const error = await store.stats().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(VectorStoreUnavailable);
    expect(error).toMatchObject({ retryable: true, stage: "retrieval" });
  });

  it("deletes by id array and counts rows", async () => {
    const db = new RecordingClient((text) => (text.includes("COUNT") ? [{ count: "7" }] : []));
    const store = new PgVectorStore(db, { table: "rag_vectors", dimension: 2 });

    await store.delete(["a", "b"]);
    const stats = await store.stats();

    expect(db.queries[0]).toEqual({
      text: "DELETE FROM rag_vectors WHERE id = ANY($1::text[])",
      values: [["a", "b"]],
    });
    expect(stats.recordCount).toBe(7);
  });
});
