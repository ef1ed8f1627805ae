/**
 * Retrieval Service
 *
 * Flow:
 * 1. Decompose the question into at most four sub-questions
 * 2. Retrieve each distinct sub-question (bounded concurrency, per-sub-question timeout)
 * 3. Extract, correlate and deduplicate table and figure references
 * 4. Synthesise the answer from the retrieved pages
 *
 * Any sub-question failure fails the whole request.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import pLimit from 'p-limit';
import {
  RETRIEVAL_SETTINGS,
  type RetrievalSettings,
} from '../config/retrieval.config';
import { TimeoutError, withTimeout } from '../shared/utils/with-timeout';
import { AnswerSynthesisService } from './answer/answer-synthesis.service';
import {
  QueryDecompositionService,
  type SubQuestionMapping,
} from './decomposition/query-decomposition.service';
import {
  RetrievalError,
  SubQuestionRetrievalError,
  errorMessage,
  toError,
} from './errors/retrieval-errors';
import type { FormattedResult } from './formatting/result-formatter';
import { ReferenceExtractionService } from './references/reference-extraction.service';
import type { References } from './references/types';
import {
  RETRIEVAL_STRATEGY,
  type RetrievalStrategy,
} from './strategies/retrieval-strategy';

export interface RetrievalOverrides {
  limit?: number;
  prefetchLimit?: number;
  scoreThreshold?: number;
}

export interface AnswerResult {
  answer: string;
  references: References;
  subQuestions: SubQuestionMapping[];
}

@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);

  constructor(
    @Inject(RETRIEVAL_SETTINGS) private readonly settings: RetrievalSettings,
    @Inject(RETRIEVAL_STRATEGY) private readonly strategy: RetrievalStrategy,
    private readonly decomposer: QueryDecompositionService,
    private readonly referenceExtraction: ReferenceExtractionService,
    private readonly answerSynthesis: AnswerSynthesisService,
  ) {}

  async answer(question: string, overrides: RetrievalOverrides = {}): Promise<AnswerResult> {
    const startTime = Date.now();

    const subQuestions = await this.decomposer.decompose(question);
    const resultsBySubQuestion = await this.retrieveAll(
      subQuestions.map((mapping) => mapping.subQuestion),
      overrides,
    );
    const references = await this.referenceExtraction.extract(resultsBySubQuestion);
    const answer = await this.answerSynthesis.synthesize(question, resultsBySubQuestion);

    this.logger.log(
      `[Answer] strategy=${this.strategy.tag} subQuestions=${subQuestions.length} tables=${references.tables.length} figures=${references.figures.length} duration=${Date.now() - startTime}ms`,
    );
    return { answer, references, subQuestions };
  }

  /**
   * Results per distinct sub-question, keyed in the order given
   */
  async retrieveAll(
    subQuestions: readonly string[],
    overrides: RetrievalOverrides = {},
  ): Promise<Map<string, FormattedResult[]>> {
    const distinct = Array.from(new Set(subQuestions));
    const limit = pLimit(this.settings.concurrency);

    const results = await Promise.all(
      distinct.map((subQuestion) =>
        limit(async () => {
          try {
            return await this.retrieveOne(subQuestion, overrides);
          } catch (error) {
            // Sub-questions still waiting for a slot never start
            limit.clearQueue();
            throw error;
          }
        }),
      ),
    );

    return new Map(distinct.map((subQuestion, index) => [subQuestion, results[index]]));
  }

  private async retrieveOne(
    subQuestion: string,
    overrides: RetrievalOverrides,
  ): Promise<FormattedResult[]> {
    try {
      return await withTimeout(
        this.strategy.retrieve(subQuestion, {
          collection: this.settings.collectionName,
          limit: overrides.limit ?? this.settings.limit,
          prefetchLimit: overrides.prefetchLimit ?? this.settings.prefetchLimit,
          scoreThreshold: overrides.scoreThreshold ?? this.settings.scoreThreshold,
        }),
        this.settings.subQuestionTimeoutMs,
      );
    } catch (error) {
      const stage =
        error instanceof TimeoutError
          ? 'timeout'
          : error instanceof RetrievalError
            ? error.stage
            : 'retrieval';
      this.logger.error(
        `[Retrieval] subQuestion="${subQuestion}" stage=${stage} status=failed error=${errorMessage(error)}`,
      );
      throw new SubQuestionRetrievalError(subQuestion, stage, errorMessage(error), toError(error));
    }
  }
}
