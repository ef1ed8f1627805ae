import { ConfigService } from '@nestjs/config';
import { FakeListChatModel } from '@langchain/core/utils/testing';
import { ChatOllama } from '@langchain/ollama';
import { ConfigError } from '../errors/retrieval-errors';
import { LLMProviderFactory } from './llm-provider.factory';

describe('LLMProviderFactory', () => {
  it('builds a stage model from its settings with retries off', () => {
    const factory = new LLMProviderFactory(new ConfigService({}));
    const createChatModel = jest
      .spyOn(factory, 'createChatModel')
      .mockReturnValue(new FakeListChatModel({ responses: ['ok'] }));

    factory.createStageModel('ANSWER', {
      provider: 'google',
      model: 'test-model',
      temperature: 0.2,
      maxTokens: 2048,
      timeoutMs: 1000,
    });

    expect(createChatModel).toHaveBeenCalledWith('google', {
      model: 'test-model',
      temperature: 0.2,
      maxTokens: 2048,
      maxRetries: 0,
    });
  });

  it('requires a key for hosted providers', () => {
    const factory = new LLMProviderFactory(new ConfigService({}));

    expect(() => factory.createChatModel('openai')).toThrow(
      new ConfigError('OPENAI_API_KEY is required for OpenAI provider'),
    );
  });

  it('builds a local model without a key', () => {
    const factory = new LLMProviderFactory(new ConfigService({}));

    const model = factory.createChatModel('ollama', { model: 'test-model' });

    expect(model).toBeInstanceOf(ChatOllama);
  });

  it('falls back to ollama for an unknown provider', () => {
    const factory = new LLMProviderFactory(new ConfigService({ LLM_PROVIDER: 'unknown' }));

    expect(factory.getDefaultProvider()).toBe('ollama');
  });
});
