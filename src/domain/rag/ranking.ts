import { DimensionMismatch } from "@typesLocal/AppError";

import type { VectorFilters, VectorMatch, VectorMetadata } from "./ports";

/** Score descending, ties broken by id ascending. */
export function compareMatches(a: VectorMatch, b: VectorMatch): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

export function rankMatches(matches: VectorMatch[], topK: number): VectorMatch[] {
  return [...matches].sort(compareMatches).slice(0, Math.max(0, topK));
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function assertDimension(
  vector: number[],
  dimension: number,
  stage: "embedding" | "retrieval" = "retrieval"
): void {
  if (vector.length !== dimension) {
    throw new DimensionMismatch(dimension, vector.length, stage);
  }
}

export function matchesFilters(
  metadata: VectorMetadata,
  filters: VectorFilters | undefined
): boolean {
  if (!filters) {
    return true;
  }
  return Object.entries(filters).every(([field, expected]) => {
    const actual = metadata[field];
    return Array.isArray(actual) ? actual.includes(String(expected)) : actual === expected;
  });
}

/** Keeps only metadata values a vector store can hold. */
export function toVectorMetadata(value: unknown): VectorMetadata {
  const source: unknown = typeof value === "string" ? JSON.parse(value) : value;
  const metadata: VectorMetadata = {};

  if (source === null || typeof source !== "object" || Array.isArray(source)) {
    return metadata;
  }

  for (const [key, field] of Object.entries(source)) {
    if (
      typeof field === "string" ||
      typeof field === "number" ||
      typeof field === "boolean"
    ) {
      metadata[key] = field;
    } else if (Array.isArray(field) && field.every((v) => typeof v === "string")) {
      metadata[key] = field.map(String);
    }
  }

  return metadata;
}
