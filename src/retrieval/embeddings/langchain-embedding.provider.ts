/**
 * LangChain Embedding Provider
 * Dense, multivector and truncated vectors from LangChain models; sparse vectors from term hashing
 */

import { Logger } from '@nestjs/common';
import { EmbeddingError, errorMessage, toError } from '../errors/retrieval-errors';
import type { SparseVector } from '../store/types';
import type { EmbeddingModels } from './embedding-provider.factory';
import { SparseEmbeddingService } from './sparse-embedding.service';
import type { EmbeddingProvider } from './types';

/** Tokens beyond this are not embedded */
export const MAX_MULTIVECTOR_TOKENS = 256;

/**
 * First `dims` components, rescaled to unit length
 */
export function truncateAndNormalize(vector: number[], dims: number): number[] {
  if (vector.length < dims) {
    throw new EmbeddingError(
      `model returned ${vector.length} dimensions, ${dims} requested`,
    );
  }
  const head = vector.slice(0, dims);
  const norm = Math.sqrt(head.reduce((sum, value) => sum + value * value, 0));
  return norm === 0 ? head : head.map((value) => value / norm);
}

export function multivectorTokens(text: string): string[] {
  return text
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .slice(0, MAX_MULTIVECTOR_TOKENS);
}

export class LangChainEmbeddingProvider implements EmbeddingProvider {
  private readonly logger = new Logger(LangChainEmbeddingProvider.name);

  constructor(
    private readonly models: EmbeddingModels,
    private readonly sparse: SparseEmbeddingService,
  ) {}

  async embedDense(text: string): Promise<number[]> {
    return this.run('dense', () => this.models.dense.embedQuery(text));
  }

  async embedSparse(text: string): Promise<SparseVector> {
    return this.sparse.generateSparseEmbedding(text);
  }

  async embedMultivector(text: string): Promise<number[][]> {
    const tokens = multivectorTokens(text);
    if (tokens.length === 0) {
      throw new EmbeddingError('no tokens to embed for multivector query');
    }
    return this.run('multivector', () => this.models.colbert.embedDocuments(tokens));
  }

  async embedTruncated(text: string, dims: number): Promise<number[]> {
    const vector = await this.run(`truncated(${dims})`, () =>
      this.models.truncated(dims).embedQuery(text),
    );
    return truncateAndNormalize(vector, dims);
  }

  private async run<T>(kind: string, embed: () => Promise<T>): Promise<T> {
    try {
      return await embed();
    } catch (error) {
      if (error instanceof EmbeddingError) throw error;
      this.logger.error(`[Embedding] kind=${kind} status=failed error=${errorMessage(error)}`);
      throw new EmbeddingError(`${kind}: ${errorMessage(error)}`, toError(error));
    }
  }
}
