/**
 * Matryoshka Strategy
 * Coarse search on the 128-d embedding, rerank of those candidates on the 1024-d one
 */

import { rerankStage, vectorStage, type RerankStage, type StagedQuery } from '../store/staged-query';
import { LARGE_EMBEDDING_DIMS, SMALL_EMBEDDING_DIMS } from '../embeddings/types';
import { BaseRetrievalStrategy, type PlanLimits, type StrategyTag } from './retrieval-strategy';

export const MATRYOSHKA_LIMIT_SMALL = 100;
export const MATRYOSHKA_LIMIT_LARGE = 50;

/**
 * small-embedding top `limitSmall`, reranked on large-embedding to `limitLarge`
 */
export function matryoshkaStage(
  small: number[],
  large: number[],
  limitSmall: number,
  limitLarge: number,
): RerankStage {
  return rerankStage(
    vectorStage({ field: 'small-embedding', vector: small }, limitSmall),
    { field: 'large-embedding', vector: large },
    limitLarge,
  );
}

export class MatryoshkaStrategy extends BaseRetrievalStrategy {
  readonly tag: StrategyTag = 'matrioska';

  async buildPlan(queryText: string, { limit, prefetchLimit }: PlanLimits): Promise<StagedQuery> {
    const [small, large] = await Promise.all([
      this.embed('small', () => this.embeddings.embedTruncated(queryText, SMALL_EMBEDDING_DIMS)),
      this.embed('large', () => this.embeddings.embedTruncated(queryText, LARGE_EMBEDDING_DIMS)),
    ]);

    return matryoshkaStage(
      small,
      large,
      prefetchLimit ?? MATRYOSHKA_LIMIT_SMALL,
      Math.min(limit, MATRYOSHKA_LIMIT_LARGE),
    );
  }
}
