/**
 * Retrieval Module
 * Store, embeddings, strategy and the question answering pipeline
 */

import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  RETRIEVAL_SETTINGS,
  loadRetrievalSettings,
  type RetrievalSettings,
} from '../config/retrieval.config';
import { AnswerSynthesisService } from './answer/answer-synthesis.service';
import { MANUAL_STRUCTURE, loadManualStructure } from './decomposition/manual-structure';
import { QueryDecompositionService } from './decomposition/query-decomposition.service';
import { EmbeddingProviderFactory } from './embeddings/embedding-provider.factory';
import { LangChainEmbeddingProvider } from './embeddings/langchain-embedding.provider';
import { SparseEmbeddingService } from './embeddings/sparse-embedding.service';
import { EMBEDDING_PROVIDER, type EmbeddingProvider } from './embeddings/types';
import { LLMProviderFactory } from './providers/llm-provider.factory';
import { ReferenceExtractionService } from './references/reference-extraction.service';
import { RetrievalController } from './retrieval.controller';
import { RetrievalService } from './retrieval.service';
import { createRetrievalStrategy } from './strategies/retrieval-strategy.factory';
import { RETRIEVAL_STRATEGY } from './strategies/retrieval-strategy';
import { InMemoryVectorStore } from './store/in-memory-vector-store';
import { QdrantConnection } from './store/qdrant-connection';
import { QdrantVectorStore } from './store/qdrant-vector-store';
import { VECTOR_STORE, type VectorStore } from './store/types';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: RETRIEVAL_SETTINGS,
      useFactory: (configService: ConfigService) => loadRetrievalSettings(configService),
      inject: [ConfigService],
    },
    QdrantConnection,
    {
      provide: VECTOR_STORE,
      useFactory: (settings: RetrievalSettings, connection: QdrantConnection): VectorStore => {
        if (settings.storeBackend === 'memory') {
          new Logger('VectorStore').warn('Using in-memory vector store; points are lost on restart');
          return new InMemoryVectorStore();
        }
        return new QdrantVectorStore(connection);
      },
      inject: [RETRIEVAL_SETTINGS, QdrantConnection],
    },
    // Provider factories
    EmbeddingProviderFactory,
    LLMProviderFactory,
    SparseEmbeddingService,
    {
      provide: EMBEDDING_PROVIDER,
      useFactory: (factory: EmbeddingProviderFactory, sparse: SparseEmbeddingService) =>
        new LangChainEmbeddingProvider(factory.createEmbeddingModels(), sparse),
      inject: [EmbeddingProviderFactory, SparseEmbeddingService],
    },
    {
      provide: RETRIEVAL_STRATEGY,
      useFactory: (settings: RetrievalSettings, store: VectorStore, embeddings: EmbeddingProvider) =>
        createRetrievalStrategy(settings.strategy, store, embeddings),
      inject: [RETRIEVAL_SETTINGS, VECTOR_STORE, EMBEDDING_PROVIDER],
    },
    {
      provide: MANUAL_STRUCTURE,
      useFactory: (settings: RetrievalSettings) => loadManualStructure(settings.manualStructurePath),
      inject: [RETRIEVAL_SETTINGS],
    },
    // Services
    QueryDecompositionService,
    ReferenceExtractionService,
    AnswerSynthesisService,
    RetrievalService,
  ],
  controllers: [RetrievalController],
  exports: [RETRIEVAL_SETTINGS, VECTOR_STORE, EMBEDDING_PROVIDER, QdrantConnection],
})
export class RetrievalModule {}
