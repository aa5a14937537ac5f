/**
 * Vector similarity functions for exact-scan vector search.
 *
 * All functions return "higher is more similar".
 */

import type { SimilarityMetric } from './types.js';

export function dotProduct(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has zero norm.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const normA = Math.sqrt(dotProduct(a, a));
  const normB = Math.sqrt(dotProduct(b, b));
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dotProduct(a, b) / (normA * normB);
}

/**
 * Euclidean distance mapped to a similarity in (0, 1]: 1 / (1 + distance).
 */
export function euclideanSimilarity(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return 1 / (1 + Math.sqrt(sum));
}

export function similarity(
  metric: SimilarityMetric,
  a: readonly number[],
  b: readonly number[]
): number {
  switch (metric) {
    case 'cosine':
      return cosineSimilarity(a, b);
    case 'euclidean':
      return euclideanSimilarity(a, b);
    case 'dot':
      return dotProduct(a, b);
  }
}
