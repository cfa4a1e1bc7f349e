import { ConfigurationError, SearchHit } from '@docqa/core';

export function vectorNorm(vector: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    sum += vector[i] * vector[i];
  }
  return Math.sqrt(sum);
}

/**
 * Cosine similarity with both norms supplied; a zero vector scores 0.
 */
export function cosineSimilarity(
  a: ArrayLike<number>,
  aNorm: number,
  b: ArrayLike<number>,
  bNorm: number
): number {
  if (aNorm === 0 || bNorm === 0) {
    return 0;
  }
  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
  }
  return dot / (aNorm * bNorm);
}

/** Score descending, then chunk index, then document id. */
export function compareHits(a: SearchHit, b: SearchHit): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.chunkIndex !== b.chunkIndex) {
    return a.chunkIndex - b.chunkIndex;
  }
  if (a.documentId === b.documentId) {
    return 0;
  }
  return a.documentId < b.documentId ? -1 : 1;
}

export function assertValidK(k: number): void {
  if (!Number.isInteger(k) || k <= 0) {
    throw new ConfigurationError(`k must be a positive integer, got ${k}`, {
      k,
    });
  }
}

export function assertFiniteVector(vector: number[], label: string): void {
  if (vector.length === 0) {
    throw new ConfigurationError(`${label} is empty`);
  }
  if (!vector.every((value) => Number.isFinite(value))) {
    throw new ConfigurationError(`${label} contains non-finite values`);
  }
}
