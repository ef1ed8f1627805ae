/**
 * Query Decomposition Service
 * Splits a question into at most four sub-questions anchored to the manual structure
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { z } from 'zod';
import {
  QueryDecompositionError,
  errorMessage,
  toError,
} from '../errors/retrieval-errors';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import { loadLLMStageConfig } from '../providers/llm-stage';
import { withTimeout } from '../../shared/utils/with-timeout';
import { DECOMPOSITION_PROMPT } from './decomposition.prompt';
import { MANUAL_STRUCTURE, type ManualStructure } from './manual-structure';

export const MAX_SUB_QUESTIONS = 4;

export type SubQuestionMapping = {
  subQuestion: string;
  sectionNumber: number;
  sectionTitle: string;
  matchedChapters: string[];
};

const rawMappingSchema = z.object({
  sub_question: z.string().trim().min(1),
  section_number: z.coerce.number().int(),
  section_title: z.string().optional(),
  matched_chapters: z.array(z.string()).default([]),
});

const rawResponseSchema = z.union([
  z.array(z.unknown()),
  z
    .object({ decomposed_questions: z.array(z.unknown()) })
    .transform((response) => response.decomposed_questions),
]);

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

export interface ParsedDecomposition {
  mappings: SubQuestionMapping[];
  dropped: string[];
}

/**
 * Validates model output against the structure.
 * Unknown sections drop the entry; unknown chapters drop only the chapter.
 */
export function parseDecomposition(
  text: string,
  structure: ManualStructure,
): ParsedDecomposition {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(text));
  } catch (error) {
    throw new QueryDecompositionError(
      `response is not valid JSON: ${errorMessage(error)}`,
      toError(error),
    );
  }

  const entries = rawResponseSchema.safeParse(json);
  if (!entries.success) {
    throw new QueryDecompositionError('response is not a JSON array of sub-questions');
  }

  const sections = new Map(structure.map((section) => [section.section, section]));
  const mappings: SubQuestionMapping[] = [];
  const dropped: string[] = [];

  entries.data.forEach((entry, index) => {
    const parsed = rawMappingSchema.safeParse(entry);
    if (!parsed.success) {
      dropped.push(`entry ${index}: malformed`);
      return;
    }
    const section = sections.get(parsed.data.section_number);
    if (!section) {
      dropped.push(`entry ${index}: unknown section ${parsed.data.section_number}`);
      return;
    }
    const chapters = new Set(section.chapters);
    mappings.push({
      subQuestion: parsed.data.sub_question,
      sectionNumber: section.section,
      sectionTitle: section.title,
      matchedChapters: parsed.data.matched_chapters.filter((chapter) => chapters.has(chapter)),
    });
  });

  if (mappings.length > MAX_SUB_QUESTIONS) {
    dropped.push(`${mappings.length - MAX_SUB_QUESTIONS} entries over the limit`);
  }

  return { mappings: mappings.slice(0, MAX_SUB_QUESTIONS), dropped };
}

@Injectable()
export class QueryDecompositionService {
  private readonly logger = new Logger(QueryDecompositionService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly llmFactory: LLMProviderFactory,
    @Inject(MANUAL_STRUCTURE) private readonly structure: ManualStructure,
  ) {}

  async decompose(question: string): Promise<SubQuestionMapping[]> {
    const config = loadLLMStageConfig(this.configService, 'DECOMPOSITION', {
      maxTokens: 1024,
      timeoutMs: 30000,
    });
    const startTime = Date.now();

    this.logger.log(
      `[QueryDecomposition] provider=${config.provider} model=${config.model ?? 'default'} status=starting`,
    );

    const chat = this.llmFactory.createStageModel('DECOMPOSITION', config);
    const chain = DECOMPOSITION_PROMPT.pipe(chat).pipe(new StringOutputParser());

    let text: string;
    try {
      text = await withTimeout(
        chain.invoke({
          manual_structure: JSON.stringify(this.structure, null, 2),
          max_sub_questions: String(MAX_SUB_QUESTIONS),
          question,
        }),
        config.timeoutMs,
      );
    } catch (error) {
      this.logger.error(
        `[QueryDecomposition] provider=${config.provider} status=failed duration=${Date.now() - startTime}ms error=${errorMessage(error)}`,
      );
      throw new QueryDecompositionError(errorMessage(error), toError(error));
    }

    const { mappings, dropped } = parseDecomposition(text, this.structure);
    for (const reason of dropped) {
      this.logger.warn(`[QueryDecomposition] dropped ${reason}`);
    }
    if (mappings.length === 0) {
      throw new QueryDecompositionError('no valid sub-questions in response');
    }

    this.logger.log(
      `[QueryDecomposition] provider=${config.provider} status=success duration=${Date.now() - startTime}ms subQuestions=${mappings.length}`,
    );
    return mappings;
  }
}
