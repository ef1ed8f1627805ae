/**
 * Similarity functions used by the in-memory store
 */

import type { SparseVector } from './types';

export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Dot product over shared indices; undefined when the vectors share none
 */
export function sparseDot(a: SparseVector, b: SparseVector): number | undefined {
  const weights = new Map<number, number>();
  a.indices.forEach((index, i) => weights.set(index, a.values[i]));
  let score = 0;
  let overlaps = false;
  b.indices.forEach((index, i) => {
    const weight = weights.get(index);
    if (weight !== undefined) {
      score += weight * b.values[i];
      overlaps = true;
    }
  });
  return overlaps ? score : undefined;
}

/**
 * Late-interaction MaxSim: for every query token take the best cosine
 * against the document tokens, then sum
 */
export function maxSim(query: number[][], document: number[][]): number {
  if (document.length === 0) return 0;
  let total = 0;
  for (const queryToken of query) {
    let best = -Infinity;
    for (const documentToken of document) {
      best = Math.max(best, cosineSimilarity(queryToken, documentToken));
    }
    total += best;
  }
  return total;
}
