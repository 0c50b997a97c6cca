import { describe, expect, it } from "vitest";

import { Chunker, chunkIdFor } from "../Chunker";
import type { Document } from "../types";

function doc(rawText: string, version = "v1"): Document {
  return {
    documentId: "notes/a.txt",
    sourceUri: "bucket/uploads/notes/a.txt",
    contentType: "text/plain",
    rawText,
    version,
  };
}

const LONG_TEXT = Array.from(
  { length: 40 },
  (_, i) => `Sentence number ${i} talks about topic ${i % 7}.`
).join(" ");

describe("Chunker", () => {
  it("splits 'A. B. C.' into overlapping chunks no longer than the limit", () => {
    const text = "A. B. C.";
    const chunks = new Chunker({ maxChunkSize: 5, overlap: 2 }).chunk(doc(text));

    expect(chunks.length).toBeGreaterThanOrEqual(2);
    for (const chunk of chunks) {
      expect(chunk.text.length).toBeLessThanOrEqual(5);
      expect(chunk.text).toBe(text.slice(chunk.charStart, chunk.charEnd));
    }
    for (let i = 1; i < chunks.length; i++) {
      const previous = chunks[i - 1];
      const current = chunks[i];
      if (!previous || !current) throw new Error("missing chunk");
      const shared = previous.charEnd - current.charStart;
      expect(shared).toBeGreaterThan(0);
      expect(shared).toBeLessThanOrEqual(2);
    }
    expect(chunks.at(-1)?.charEnd).toBe(text.length);
  });

  it("packs whole sentences and starts the next window on a sentence", () => {
    const text = "First sentence here. Second one. Third.";
    const chunks = new Chunker({ maxChunkSize: 25, overlap: 0 }).chunk(doc(text));

    expect(chunks.map((chunk) => chunk.text)).toEqual([
      "First sentence here. ",
      "Second one. Third.",
    ]);
    expect(chunks.map((chunk) => [chunk.charStart, chunk.charEnd])).toEqual([
      [0, 21],
      [21, 39],
    ]);
  });

  it("hard-splits a sentence longer than the limit", () => {
    const text = "x".repeat(25);
    const chunks = new Chunker({ maxChunkSize: 10, overlap: 0 }).chunk(doc(text));

    expect(chunks.map((chunk) => [chunk.charStart, chunk.charEnd])).toEqual([
      [0, 10],
      [10, 20],
      [20, 25],
    ]);
  });

  it("is deterministic for identical text", () => {
    const chunker = new Chunker({ maxChunkSize: 120, overlap: 30 });

    expect(chunker.chunk(doc(LONG_TEXT))).toEqual(chunker.chunk(doc(LONG_TEXT)));
  });

  it("numbers chunks contiguously from zero and keeps offsets exact", () => {
    const chunks = new Chunker({ maxChunkSize: 120, overlap: 30 }).chunk(doc(LONG_TEXT));

    expect(chunks.length).toBeGreaterThan(5);
    chunks.forEach((chunk, index) => {
      expect(chunk.sequenceIndex).toBe(index);
      expect(chunk.text).toBe(LONG_TEXT.slice(chunk.charStart, chunk.charEnd));
      expect(chunk.text.length).toBeLessThanOrEqual(120);
    });
    for (let i = 1; i < chunks.length; i++) {
      expect(chunks[i]?.charStart).toBeGreaterThan(chunks[i - 1]?.charStart ?? Infinity);
    }
  });

  it("derives chunk ids from document, version, content and position", () => {
    const [chunk] = new Chunker().chunk(doc("Only one sentence."));
    if (!chunk) throw new Error("expected a chunk");

    expect(chunk.chunkId).toBe(
      chunkIdFor("notes/a.txt", "v1", chunk.contentHash, 0)
    );
    expect(chunk.chunkId).toHaveLength(32);

    const [other] = new Chunker().chunk(doc("Only one sentence.", "v2"));
    expect(other?.chunkId).not.toBe(chunk.chunkId);
  });

  it("produces no chunks for whitespace-only text", () => {
    expect(new Chunker().chunk(doc("   \n\n  "))).toEqual([]);
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => new Chunker({ maxChunkSize: 10, overlap: 10 })).toThrow(RangeError);
    expect(() => new Chunker({ maxChunkSize: 0, overlap: 0 })).toThrow(RangeError);
  });
});
