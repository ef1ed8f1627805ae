/**
 * Fusion Strategy
 *
 * Branch A: matryoshka small (100) -> large (50)
 * Branch B: RRF of dense (100) and sparse (25)
 * Both branches pooled and reranked by late interaction on colbert
 */

import {
  fusionStage,
  rerankStage,
  unionStage,
  vectorStage,
  type StagedQuery,
} from '../store/staged-query';
import { LARGE_EMBEDDING_DIMS, SMALL_EMBEDDING_DIMS } from '../embeddings/types';
import {
  MATRYOSHKA_LIMIT_LARGE,
  MATRYOSHKA_LIMIT_SMALL,
  matryoshkaStage,
} from './matryoshka.strategy';
import { BaseRetrievalStrategy, type PlanLimits, type StrategyTag } from './retrieval-strategy';

export const FUSION_DENSE_LIMIT = 100;
export const FUSION_SPARSE_LIMIT = 25;
export const FUSION_PREFETCH_LIMIT = 50;

export class FusionStrategy extends BaseRetrievalStrategy {
  readonly tag: StrategyTag = 'fusion';

  async buildPlan(queryText: string, { limit, prefetchLimit }: PlanLimits): Promise<StagedQuery> {
    const [small, large, dense, sparse, multivector] = await Promise.all([
      this.embed('small', () => this.embeddings.embedTruncated(queryText, SMALL_EMBEDDING_DIMS)),
      this.embed('large', () => this.embeddings.embedTruncated(queryText, LARGE_EMBEDDING_DIMS)),
      this.embed('dense', () => this.embeddings.embedDense(queryText)),
      this.embed('sparse', () => this.embeddings.embedSparse(queryText)),
      this.embed('multivector', () => this.embeddings.embedMultivector(queryText)),
    ]);

    const matryoshkaBranch = matryoshkaStage(
      small,
      large,
      MATRYOSHKA_LIMIT_SMALL,
      MATRYOSHKA_LIMIT_LARGE,
    );
    const keywordBranch = fusionStage(
      [
        vectorStage({ field: 'dense', vector: dense }, FUSION_DENSE_LIMIT),
        vectorStage({ field: 'sparse', vector: sparse }, FUSION_SPARSE_LIMIT),
      ],
      prefetchLimit ?? FUSION_PREFETCH_LIMIT,
    );

    return rerankStage(
      unionStage([matryoshkaBranch, keywordBranch]),
      { field: 'colbert', vector: multivector },
      limit,
    );
  }
}
