/**
 * Embedding Provider Factory
 * Multi-provider support: Ollama, OpenAI, Google
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import { ConfigError } from '../errors/retrieval-errors';
import type { EmbeddingBackend } from '../providers/types';
import { SMALL_EMBEDDING_DIMS } from './types';

/**
 * LangChain models behind the query-side vector kinds
 */
export interface EmbeddingModels {
  dense: Embeddings;
  /** Embeds query tokens one by one for late interaction */
  colbert: Embeddings;
  /** Model whose output is cut to `dims` components */
  truncated(dims: number): Embeddings;
}

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  createEmbeddingModels(): EmbeddingModels {
    const backend = this.getBackend();
    const denseModel = this.getModel(backend);
    const colbertModel = this.configService.get<string>(
      'COLBERT_EMBEDDING_MODEL',
      denseModel,
    );

    this.logger.log(
      `Creating embedding models: backend=${backend} dense=${denseModel} colbert=${colbertModel}`,
    );

    const truncatedCache = new Map<number, Embeddings>();

    return {
      dense: this.createModel(backend, denseModel),
      colbert: this.createModel(backend, colbertModel),
      truncated: (dims: number) => {
        const cached = truncatedCache.get(dims);
        if (cached) return cached;
        const model = this.createTruncatedModel(backend, denseModel, dims);
        truncatedCache.set(dims, model);
        return model;
      },
    };
  }

  /**
   * Get backend from config (default: ollama)
   */
  private getBackend(): EmbeddingBackend {
    const backend = this.configService.get<string>('EMBEDDING_PROVIDER', 'ollama');

    if (backend === 'ollama' || backend === 'openai' || backend === 'google') {
      return backend;
    }

    this.logger.warn(`Invalid embedding provider: ${backend}, defaulting to ollama`);
    return 'ollama';
  }

  private getModel(backend: EmbeddingBackend): string {
    const defaultModels: Record<EmbeddingBackend, string> = {
      ollama: 'bge-m3:567m',
      openai: 'text-embedding-3-small',
      google: 'text-embedding-004',
    };

    // Backend-specific env vars
    const envVars: Record<EmbeddingBackend, string> = {
      ollama: 'OLLAMA_EMBEDDING_MODEL',
      openai: 'OPENAI_EMBEDDING_MODEL',
      google: 'GOOGLE_EMBEDDING_MODEL',
    };

    return this.configService.get<string>(envVars[backend], defaultModels[backend]);
  }

  /**
   * OpenAI text-embedding-3 models shorten natively through `dimensions`;
   * other backends return full vectors that the provider cuts down
   */
  private createTruncatedModel(
    backend: EmbeddingBackend,
    denseModel: string,
    dims: number,
  ): Embeddings {
    if (backend === 'openai') {
      const model =
        dims <= SMALL_EMBEDDING_DIMS
          ? this.configService.get<string>('MATRYOSHKA_SMALL_MODEL', 'text-embedding-3-small')
          : this.configService.get<string>('MATRYOSHKA_LARGE_MODEL', 'text-embedding-3-large');
      return this.createOpenAIEmbeddings(model, dims);
    }

    const key = dims <= SMALL_EMBEDDING_DIMS ? 'MATRYOSHKA_SMALL_MODEL' : 'MATRYOSHKA_LARGE_MODEL';
    return this.createModel(backend, this.configService.get<string>(key, denseModel));
  }

  private createModel(backend: EmbeddingBackend, model: string): Embeddings {
    switch (backend) {
      case 'ollama':
        return this.createOllamaEmbeddings(model);
      case 'openai':
        return this.createOpenAIEmbeddings(model);
      case 'google':
        return this.createGoogleEmbeddings(model);
    }
  }

  private createOllamaEmbeddings(model: string): OllamaEmbeddings {
    const baseUrl = this.configService.get<string>(
      'OLLAMA_BASE_URL',
      'http://localhost:11434',
    );

    return new OllamaEmbeddings({ model, baseUrl });
  }

  private createOpenAIEmbeddings(model: string, dimensions?: number): OpenAIEmbeddings {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');

    if (!apiKey) {
      throw new ConfigError('OPENAI_API_KEY is required for OpenAI embeddings');
    }

    return new OpenAIEmbeddings({
      model,
      openAIApiKey: apiKey,
      ...(dimensions !== undefined && { dimensions }),
    });
  }

  private createGoogleEmbeddings(model: string): GoogleGenerativeAIEmbeddings {
    const apiKey = this.configService.get<string>('GOOGLE_API_KEY');

    if (!apiKey) {
      throw new ConfigError('GOOGLE_API_KEY is required for Google embeddings');
    }

    return new GoogleGenerativeAIEmbeddings({ model, apiKey });
  }
}
