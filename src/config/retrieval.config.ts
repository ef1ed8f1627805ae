/**
 * Retrieval Settings
 * Folds environment configuration into one immutable settings object at startup
 */

import { ConfigService } from '@nestjs/config';
import { ConfigError } from '../retrieval/errors/retrieval-errors';

export const RETRIEVAL_SETTINGS = 'RETRIEVAL_SETTINGS';

/**
 * Vector store connection settings (endpoint, credential, timeout)
 */
export interface RetrievalConfig {
  readonly endpoint: string;
  readonly credential?: string;
  readonly timeoutMs: number;
}

export type VectorStoreBackend = 'qdrant' | 'memory';

export interface RetrievalSettings {
  readonly store: RetrievalConfig;
  /** memory keeps points in process, for local runs */
  readonly storeBackend: VectorStoreBackend;
  readonly collectionName: string;
  readonly strategy: string;
  readonly limit: number;
  readonly prefetchLimit?: number;
  readonly scoreThreshold?: number;
  readonly concurrency: number;
  readonly subQuestionTimeoutMs: number;
  readonly referenceAssetsDir: string;
  readonly manualStructurePath?: string;
}

// Helper to coerce config values to finite numbers
function toNumber(value: unknown, defaultValue: number): number {
  if (value === undefined || value === null || value === '') {
    return defaultValue;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : defaultValue;
}

function toOptionalNumber(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function toPositiveInt(value: unknown, defaultValue: number, key: string): number {
  const n = Math.floor(toNumber(value, defaultValue));
  if (n < 1) {
    throw new ConfigError(`${key} must be a positive integer, got ${String(value)}`);
  }
  return n;
}

export function loadRetrievalSettings(
  configService: ConfigService,
): RetrievalSettings {
  const endpoint = configService.get<string>('QDRANT_URL');
  if (!endpoint) {
    throw new ConfigError('QDRANT_URL is required');
  }

  const backend = configService.get<string>('VECTOR_STORE_BACKEND', 'qdrant');
  if (backend !== 'qdrant' && backend !== 'memory') {
    throw new ConfigError(`VECTOR_STORE_BACKEND must be qdrant or memory, got ${backend}`);
  }

  const prefetchLimit = toOptionalNumber(
    configService.get('RETRIEVAL_PREFETCH_LIMIT'),
  );

  const settings: RetrievalSettings = {
    store: Object.freeze({
      endpoint,
      credential: configService.get<string>('QDRANT_API_KEY') || undefined,
      timeoutMs: toPositiveInt(
        configService.get('QDRANT_TIMEOUT_MS'),
        30000,
        'QDRANT_TIMEOUT_MS',
      ),
    }),
    storeBackend: backend,
    collectionName: configService.get<string>(
      'QDRANT_COLLECTION_NAME',
      'hybrid_collection',
    ),
    strategy: configService.get<string>('RETRIEVAL_STRATEGY', 'hybrid'),
    limit: toPositiveInt(configService.get('RETRIEVAL_LIMIT'), 10, 'RETRIEVAL_LIMIT'),
    prefetchLimit:
      prefetchLimit === undefined
        ? undefined
        : toPositiveInt(prefetchLimit, 1, 'RETRIEVAL_PREFETCH_LIMIT'),
    scoreThreshold: toOptionalNumber(
      configService.get('RETRIEVAL_SCORE_THRESHOLD'),
    ),
    concurrency: toPositiveInt(
      configService.get('RETRIEVAL_CONCURRENCY'),
      4,
      'RETRIEVAL_CONCURRENCY',
    ),
    subQuestionTimeoutMs: toPositiveInt(
      configService.get('RETRIEVAL_TIMEOUT_MS'),
      60000,
      'RETRIEVAL_TIMEOUT_MS',
    ),
    referenceAssetsDir: configService.get<string>(
      'REFERENCE_ASSETS_DIR',
      'scratch/service_manual_long',
    ),
    manualStructurePath:
      configService.get<string>('MANUAL_STRUCTURE_PATH') || undefined,
  };

  return Object.freeze(settings);
}
