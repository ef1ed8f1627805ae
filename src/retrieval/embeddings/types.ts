/**
 * Embedding Provider Contract
 * One provider yields every query-side vector kind the strategies need
 */

import type { SparseVector } from '../store/types';

export const EMBEDDING_PROVIDER = 'EMBEDDING_PROVIDER';

export const SMALL_EMBEDDING_DIMS = 128;
export const LARGE_EMBEDDING_DIMS = 1024;

/**
 * Deterministic for identical input and model
 */
export interface EmbeddingProvider {
  embedDense(text: string): Promise<number[]>;
  embedSparse(text: string): Promise<SparseVector>;
  /** One row per token, all rows of the same width */
  embedMultivector(text: string): Promise<number[][]>;
  /** Vector of exactly `dims` components */
  embedTruncated(text: string, dims: number): Promise<number[]>;
}
