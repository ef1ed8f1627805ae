/**
 * ColBERT Strategy
 * Single late-interaction search on the multivector field
 */

import { vectorStage, type StagedQuery } from '../store/staged-query';
import { BaseRetrievalStrategy, type PlanLimits, type StrategyTag } from './retrieval-strategy';

export class ColbertStrategy extends BaseRetrievalStrategy {
  readonly tag: StrategyTag = 'colbert';

  async buildPlan(queryText: string, { limit }: PlanLimits): Promise<StagedQuery> {
    const multivector = await this.embed('multivector', () =>
      this.embeddings.embedMultivector(queryText),
    );
    return vectorStage({ field: 'colbert', vector: multivector }, limit);
  }
}
