/**
 * Provider Types and Configurations
 */

/**
 * Embedding backend
 */
export type EmbeddingBackend = 'ollama' | 'openai' | 'google';

/**
 * LLM Provider Type
 */
export type LLMProvider = 'openai' | 'google' | 'anthropic' | 'ollama';

export const LLM_PROVIDERS: readonly LLMProvider[] = [
  'openai',
  'google',
  'anthropic',
  'ollama',
];

export function isLLMProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

/**
 * Chat Model Options
 */
export interface ChatModelOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
}
