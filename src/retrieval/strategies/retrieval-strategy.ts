/**
 * Retrieval Strategy
 * Shared contract and base class. Strategies differ only in the staged plan
 * they send to the store; every one formats results the same way.
 */

import { Logger } from '@nestjs/common';
import {
  EmbeddingError,
  RetrievalError,
  StoreError,
  errorMessage,
  toError,
} from '../errors/retrieval-errors';
import type { EmbeddingProvider } from '../embeddings/types';
import { formatResults, type FormattedResult } from '../formatting/result-formatter';
import type { StagedQuery } from '../store/staged-query';
import type { RawResult, VectorStore } from '../store/types';

export const RETRIEVAL_STRATEGY = 'RETRIEVAL_STRATEGY';

export const DEFAULT_RESULT_LIMIT = 10;

export type StrategyTag = 'colbert' | 'hybrid' | 'matrioska' | 'fusion';

export const STRATEGY_TAGS: readonly StrategyTag[] = [
  'colbert',
  'hybrid',
  'matrioska',
  'fusion',
];

export interface RetrieveOptions {
  collection: string;
  /** Defaults to 10; must be >= 1 */
  limit?: number;
  prefetchLimit?: number;
  scoreThreshold?: number;
}

export interface RetrievalStrategy {
  readonly tag: StrategyTag;
  /** Results in descending score order, at most `limit` of them */
  retrieve(queryText: string, options: RetrieveOptions): Promise<FormattedResult[]>;
  format(raw: readonly RawResult[]): FormattedResult[];
}

export interface PlanLimits {
  limit: number;
  prefetchLimit?: number;
}

export abstract class BaseRetrievalStrategy implements RetrievalStrategy {
  abstract readonly tag: StrategyTag;
  protected readonly logger = new Logger(this.constructor.name);

  constructor(
    protected readonly store: VectorStore,
    protected readonly embeddings: EmbeddingProvider,
  ) {}

  /**
   * Staged plan whose root limit is the number of results requested
   */
  abstract buildPlan(queryText: string, limits: PlanLimits): Promise<StagedQuery>;

  async retrieve(
    queryText: string,
    options: RetrieveOptions,
  ): Promise<FormattedResult[]> {
    const limit = options.limit ?? DEFAULT_RESULT_LIMIT;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RetrievalError(`limit must be a positive integer, got ${limit}`, 'retrieval');
    }
    const startTime = Date.now();

    const plan = await this.buildPlan(queryText, {
      limit,
      prefetchLimit: options.prefetchLimit,
    });

    let raw: RawResult[];
    try {
      raw = await this.store.query(options.collection, {
        plan,
        withPayload: true,
        scoreThreshold: options.scoreThreshold,
      });
    } catch (error) {
      this.logger.error(
        `[Retrieval] strategy=${this.tag} collection=${options.collection} status=failed error=${errorMessage(error)}`,
      );
      throw error instanceof StoreError
        ? error
        : new StoreError(errorMessage(error), toError(error));
    }

    const results = this.format(raw);
    this.logger.log(
      `[Retrieval] strategy=${this.tag} collection=${options.collection} limit=${limit} results=${results.length} duration=${Date.now() - startTime}ms`,
    );
    return results;
  }

  format(raw: readonly RawResult[]): FormattedResult[] {
    return formatResults(raw);
  }

  /**
   * Runs an embedding call, surfacing any failure as EmbeddingError
   */
  protected async embed<T>(kind: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      this.logger.error(
        `[Retrieval] strategy=${this.tag} embedding=${kind} status=failed error=${errorMessage(error)}`,
      );
      throw error instanceof EmbeddingError
        ? error
        : new EmbeddingError(`${kind}: ${errorMessage(error)}`, toError(error));
    }
  }
}
