/**
 * Per-stage LLM settings
 *
 * Keys per stage prefix (DECOMPOSITION, ANSWER):
 *   {PREFIX}_PROVIDER, {PREFIX}_MODEL, {PREFIX}_TEMPERATURE,
 *   {PREFIX}_MAX_TOKENS, {PREFIX}_TIMEOUT_MS
 */

import { ConfigService } from '@nestjs/config';
import { ConfigError } from '../errors/retrieval-errors';
import { isLLMProvider, type LLMProvider } from './types';

export type LLMStage = 'DECOMPOSITION' | 'ANSWER';

export interface LLMStageConfig {
  provider: LLMProvider;
  model?: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

function readPositiveInt(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  const raw = configService.get<string>(key);
  if (raw === undefined || raw === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`${key} must be a positive integer, got ${raw}`);
  }
  return n;
}

function readTemperature(configService: ConfigService, key: string): number {
  const raw = configService.get<string>(key);
  if (raw === undefined || raw === '') return 0;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) {
    throw new ConfigError(`${key} must be a non-negative number, got ${raw}`);
  }
  return n;
}

export function loadLLMStageConfig(
  configService: ConfigService,
  stage: LLMStage,
  defaults: { maxTokens: number; timeoutMs: number },
): LLMStageConfig {
  const providerValue =
    configService.get<string>(`${stage}_PROVIDER`) ||
    configService.get<string>('LLM_PROVIDER') ||
    'ollama';

  return {
    provider: isLLMProvider(providerValue) ? providerValue : 'ollama',
    model: configService.get<string>(`${stage}_MODEL`) || undefined,
    temperature: readTemperature(configService, `${stage}_TEMPERATURE`),
    maxTokens: readPositiveInt(configService, `${stage}_MAX_TOKENS`, defaults.maxTokens),
    timeoutMs: readPositiveInt(configService, `${stage}_TIMEOUT_MS`, defaults.timeoutMs),
  };
}
