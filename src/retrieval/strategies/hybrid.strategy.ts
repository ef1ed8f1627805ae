/**
 * Hybrid Strategy
 * Dense and sparse candidates pooled side by side, then reranked by late interaction.
 * The two branches are not fused; the multivector rerank decides the order.
 */

import {
  rerankStage,
  unionStage,
  vectorStage,
  type StagedQuery,
} from '../store/staged-query';
import { BaseRetrievalStrategy, type PlanLimits, type StrategyTag } from './retrieval-strategy';

export const HYBRID_PREFETCH_LIMIT = 20;

export class HybridStrategy extends BaseRetrievalStrategy {
  readonly tag: StrategyTag = 'hybrid';

  async buildPlan(queryText: string, { limit, prefetchLimit }: PlanLimits): Promise<StagedQuery> {
    const [dense, sparse, multivector] = await Promise.all([
      this.embed('dense', () => this.embeddings.embedDense(queryText)),
      this.embed('sparse', () => this.embeddings.embedSparse(queryText)),
      this.embed('multivector', () => this.embeddings.embedMultivector(queryText)),
    ]);
    const branchLimit = prefetchLimit ?? HYBRID_PREFETCH_LIMIT;

    return rerankStage(
      unionStage([
        vectorStage({ field: 'dense', vector: dense }, branchLimit),
        vectorStage({ field: 'sparse', vector: sparse }, branchLimit),
      ]),
      { field: 'colbert', vector: multivector },
      limit,
    );
  }
}
