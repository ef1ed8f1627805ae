/**
 * LLM Provider Factory
 *
 * Chat models for the two LLM stages of answering a question: query
 * decomposition and answer synthesis. Each stage picks its own provider,
 * model, temperature and token budget (see llm-stage.ts). Stage models never
 * retry, so a failed call fails the request with the stage that raised it.
 *
 * Provider keys and default models:
 *   openai     OPENAI_API_KEY, OPENAI_CHAT_MODEL, OPENAI_BASE_URL
 *   google     GOOGLE_API_KEY, GOOGLE_CHAT_MODEL
 *   anthropic  ANTHROPIC_API_KEY, ANTHROPIC_CHAT_MODEL
 *   ollama     OLLAMA_CHAT_MODEL, OLLAMA_BASE_URL (no key)
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ConfigError } from '../errors/retrieval-errors';
import type { LLMStage, LLMStageConfig } from './llm-stage';
import { isLLMProvider, type ChatModelOptions, type LLMProvider } from './types';

const DEFAULT_TEMPERATURE = 0.3;
const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_MAX_RETRIES = 2;

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Provider named by LLM_PROVIDER, or ollama when unset or unknown
   */
  getDefaultProvider(): LLMProvider {
    const value = this.configService.get<string>('LLM_PROVIDER');
    if (value && isLLMProvider(value)) return value;
    if (value) {
      this.logger.warn(`Invalid LLM provider: ${value}, defaulting to ollama`);
    }
    return 'ollama';
  }

  /**
   * Model for one answering stage, built from that stage's settings with retries off
   */
  createStageModel(stage: LLMStage, config: LLMStageConfig): BaseChatModel {
    this.logger.log(
      `[LLM] stage=${stage} provider=${config.provider} model=${config.model ?? 'default'} maxTokens=${config.maxTokens}`,
    );
    return this.createChatModel(config.provider, {
      model: config.model,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      maxRetries: 0,
    });
  }

  /**
   * @param provider - Falls back to LLM_PROVIDER
   */
  createChatModel(
    provider?: LLMProvider,
    options?: ChatModelOptions,
  ): BaseChatModel {
    const selectedProvider = provider ?? this.getDefaultProvider();

    switch (selectedProvider) {
      case 'openai':
        return this.createOpenAIModel(options);
      case 'google':
        return this.createGoogleModel(options);
      case 'anthropic':
        return this.createAnthropicModel(options) as unknown as BaseChatModel;
      case 'ollama':
        return this.createOllamaModel(options);
    }
  }

  /**
   * Hosted providers fail at model creation, before any request is sent
   */
  private requireKey(key: string, provider: string): string {
    const apiKey = this.configService.get<string>(key);
    if (!apiKey) {
      throw new ConfigError(`${key} is required for ${provider} provider`);
    }
    return apiKey;
  }

  private createOpenAIModel(options?: ChatModelOptions): ChatOpenAI {
    const model =
      options?.model ||
      this.configService.get<string>('OPENAI_CHAT_MODEL') ||
      'gpt-4o-mini';
    const apiKey = this.requireKey('OPENAI_API_KEY', 'OpenAI');

    return new ChatOpenAI({
      model,
      temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
      maxRetries: options?.maxRetries ?? DEFAULT_MAX_RETRIES,
      configuration: {
        baseURL:
          this.configService.get<string>('OPENAI_BASE_URL') ||
          'https://api.openai.com/v1',
        apiKey,
      },
    });
  }

  private createGoogleModel(options?: ChatModelOptions): ChatGoogleGenerativeAI {
    const model =
      options?.model ||
      this.configService.get<string>('GOOGLE_CHAT_MODEL') ||
      'gemini-2.5-flash-lite';
    const apiKey = this.requireKey('GOOGLE_API_KEY', 'Google');

    return new ChatGoogleGenerativeAI({
      model,
      temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
      maxOutputTokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
      maxRetries: options?.maxRetries ?? DEFAULT_MAX_RETRIES,
      apiKey,
    });
  }

  private createAnthropicModel(options?: ChatModelOptions): ChatAnthropic {
    const model =
      options?.model ||
      this.configService.get<string>('ANTHROPIC_CHAT_MODEL') ||
      'claude-3-5-haiku-20241022';
    const apiKey = this.requireKey('ANTHROPIC_API_KEY', 'Anthropic');

    return new ChatAnthropic({
      model,
      temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
      maxRetries: options?.maxRetries ?? DEFAULT_MAX_RETRIES,
      apiKey,
    });
  }

  /**
   * Local model, no key required
   */
  private createOllamaModel(options?: ChatModelOptions): ChatOllama {
    const model =
      options?.model ||
      this.configService.get<string>('OLLAMA_CHAT_MODEL') ||
      'gemma3:1b';

    return new ChatOllama({
      model,
      temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
      numPredict: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
      baseUrl:
        this.configService.get<string>('OLLAMA_BASE_URL') ||
        'http://localhost:11434',
    });
  }
}
