/**
 * Vector literal conversion for PostgreSQL pgvector parameters.
 */
export function toPgVectorLiteral(vector: number[]): string {
  if (vector.length === 0) {
    throw new Error("toPgVectorLiteral received an empty vector");
  }

  if (!vector.every((v) => Number.isFinite(v))) {
    throw new Error("toPgVectorLiteral received a non-finite value");
  }

  return `[${vector.join(",")}]`;
}
