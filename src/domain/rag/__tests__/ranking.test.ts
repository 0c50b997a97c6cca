import { DimensionMismatch } from "@typesLocal/AppError";
import { describe, expect, it } from "vitest";

import {
  assertDimension,
  cosineSimilarity,
  matchesFilters,
  rankMatches,
  toVectorMetadata,
} from "../ranking";

describe("rankMatches", () => {
  it("orders by score descending and breaks ties by id ascending", () => {
    const ranked = rankMatches(
      [
        { id: "c", score: 0.5, metadata: {} },
        { id: "a", score: 0.9, metadata: {} },
        { id: "b", score: 0.5, metadata: {} },
      ],
      10
    );

    expect(ranked.map((match) => match.id)).toEqual(["a", "b", "c"]);
  });

  it("cuts to topK", () => {
    const ranked = rankMatches(
      [
        { id: "a", score: 0.1, metadata: {} },
        { id: "b", score: 0.2, metadata: {} },
      ],
      1
    );

    expect(ranked.map((match) => match.id)).toEqual(["b"]);
  });
});

describe("cosineSimilarity", () => {
  it("scores parallel, orthogonal and zero vectors", () => {
    expect(cosineSimilarity([1, 0], [3, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 2])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe("assertDimension", () => {
  it("throws DimensionMismatch for wrong-length vectors", () => {
    expect(() => assertDimension([1, 2, 3], 4)).toThrow(DimensionMismatch);
    expect(() => assertDimension([1, 2, 3, 4], 4)).not.toThrow();
  });
});

describe("matchesFilters", () => {
  it("matches scalar equality and array membership", () => {
    const metadata = { document_id: "a.txt", tags: ["hr", "policy"], sequence_index: 2 };

    expect(matchesFilters(metadata, { document_id: "a.txt", sequence_index: 2 })).toBe(true);
    expect(matchesFilters(metadata, { tags: "hr" })).toBe(true);
    expect(matchesFilters(metadata, { document_id: "b.txt" })).toBe(false);
    expect(matchesFilters(metadata, undefined)).toBe(true);
  });
});

describe("toVectorMetadata", () => {
  it("keeps storable values from objects and JSON strings", () => {
    expect(toVectorMetadata('{"a":"x","n":1,"nested":{"b":1},"tags":["t"]}')).toEqual({
      a: "x",
      n: 1,
      tags: ["t"],
    });
    expect(toVectorMetadata(null)).toEqual({});
  });
});
