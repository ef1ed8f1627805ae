/**
 * Answer Synthesis Service
 * Writes the final answer from the pages retrieved for every sub-question
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { AnswerSynthesisError, errorMessage, toError } from '../errors/retrieval-errors';
import type { FormattedResult } from '../formatting/result-formatter';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import { loadLLMStageConfig } from '../providers/llm-stage';
import { withTimeout } from '../../shared/utils/with-timeout';
import type { ResultsBySubQuestion } from '../references/reference-extraction.service';
import { ANSWER_PROMPT } from './answer.prompt';

function toContextPoint(result: FormattedResult): Record<string, unknown> {
  return {
    page_number: result.pageNumber,
    document_title: result.documentTitle,
    section_title: result.sectionTitle,
    subsection_title: result.subsectionTitle,
    models_covered: result.modelsCovered,
    warnings: result.warnings,
    text: result.text,
    ...(result.pageVisualDescription && {
      page_visual_description: result.pageVisualDescription,
    }),
  };
}

/**
 * Pages grouped by sub-question, in decomposition order
 */
export function buildRelevantPoints(resultsBySubQuestion: ResultsBySubQuestion): string {
  const grouped: Record<string, Array<Record<string, unknown>>> = {};
  for (const [subQuestion, results] of resultsBySubQuestion) {
    grouped[subQuestion] = results.map(toContextPoint);
  }
  return JSON.stringify(grouped, null, 2);
}

@Injectable()
export class AnswerSynthesisService {
  private readonly logger = new Logger(AnswerSynthesisService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly llmFactory: LLMProviderFactory,
  ) {}

  async synthesize(
    question: string,
    resultsBySubQuestion: ResultsBySubQuestion,
  ): Promise<string> {
    const config = loadLLMStageConfig(this.configService, 'ANSWER', {
      maxTokens: 4096,
      timeoutMs: 120000,
    });
    const startTime = Date.now();

    const chat = this.llmFactory.createStageModel('ANSWER', config);
    const chain = ANSWER_PROMPT.pipe(chat).pipe(new StringOutputParser());

    let answer: string;
    try {
      answer = await withTimeout(
        chain.invoke({
          question,
          relevant_points: buildRelevantPoints(resultsBySubQuestion),
        }),
        config.timeoutMs,
      );
    } catch (error) {
      this.logger.error(
        `[AnswerSynthesis] provider=${config.provider} status=failed duration=${Date.now() - startTime}ms error=${errorMessage(error)}`,
      );
      throw new AnswerSynthesisError(errorMessage(error), toError(error));
    }

    const trimmed = answer.trim();
    if (trimmed.length === 0) {
      throw new AnswerSynthesisError('model returned an empty answer');
    }

    this.logger.log(
      `[AnswerSynthesis] provider=${config.provider} status=success duration=${Date.now() - startTime}ms chars=${trimmed.length}`,
    );
    return trimmed;
  }
}
