/**
 * Retrieval Strategy Factory
 * Maps a configured tag onto one of the four strategies
 */

import { ConfigError } from '../errors/retrieval-errors';
import type { EmbeddingProvider } from '../embeddings/types';
import type { VectorStore } from '../store/types';
import { ColbertStrategy } from './colbert.strategy';
import { FusionStrategy } from './fusion.strategy';
import { HybridStrategy } from './hybrid.strategy';
import { MatryoshkaStrategy } from './matryoshka.strategy';
import { STRATEGY_TAGS, type RetrievalStrategy, type StrategyTag } from './retrieval-strategy';

export function isStrategyTag(value: string): value is StrategyTag {
  return STRATEGY_TAGS.some((tag) => tag === value);
}

export function createRetrievalStrategy(
  tag: string,
  store: VectorStore,
  embeddings: EmbeddingProvider,
): RetrievalStrategy {
  if (!isStrategyTag(tag)) {
    throw new ConfigError(
      `unknown retrieval strategy "${tag}", expected one of ${STRATEGY_TAGS.join(', ')}`,
    );
  }

  switch (tag) {
    case 'colbert':
      return new ColbertStrategy(store, embeddings);
    case 'hybrid':
      return new HybridStrategy(store, embeddings);
    case 'matrioska':
      return new MatryoshkaStrategy(store, embeddings);
    case 'fusion':
      return new FusionStrategy(store, embeddings);
  }
}
