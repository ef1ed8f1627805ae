/**
 * Reference Extraction Pipeline
 *
 * Flow:
 * 1. Run every extractor over every result of every sub-question
 * 2. Correlate the references with asset files on disk
 * 3. Deduplicate across sub-questions
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  RETRIEVAL_SETTINGS,
  type RetrievalSettings,
} from '../../config/retrieval.config';
import { ReferenceValidationError } from '../errors/retrieval-errors';
import type { FormattedResult } from '../formatting/result-formatter';
import { defaultExtractors, type ReferenceExtractor } from './extractors';
import { ReferenceCorrelator } from './reference-correlator';
import { deduplicateReferences } from './reference-deduplicator';
import type { References } from './types';

export type ResultsBySubQuestion = ReadonlyMap<string, readonly FormattedResult[]>;

@Injectable()
export class ReferenceExtractionService {
  private readonly logger = new Logger(ReferenceExtractionService.name);
  private readonly extractors: ReferenceExtractor[] = defaultExtractors();
  private readonly correlator: ReferenceCorrelator;

  constructor(@Inject(RETRIEVAL_SETTINGS) settings: RetrievalSettings) {
    this.correlator = new ReferenceCorrelator(settings.referenceAssetsDir);
  }

  /**
   * Raw references in extraction order, before correlation and dedup
   */
  collect(resultsBySubQuestion: ResultsBySubQuestion): References {
    const collected: References = { tables: [], figures: [] };

    for (const [subQuestion, results] of resultsBySubQuestion) {
      for (const result of results) {
        for (const extractor of this.extractors) {
          try {
            const { tables, figures } = extractor.extract(result, subQuestion);
            collected.tables.push(...tables);
            collected.figures.push(...figures);
          } catch (error) {
            if (!(error instanceof ReferenceValidationError)) throw error;
            this.logger.warn(
              `[References] extractor=${extractor.name} point=${result.id} status=skipped error=${error.message}`,
            );
          }
        }
      }
    }

    return collected;
  }

  async extract(resultsBySubQuestion: ResultsBySubQuestion): Promise<References> {
    const collected = this.collect(resultsBySubQuestion);
    const correlated = await this.correlator.correlate(collected);
    const references = deduplicateReferences(correlated);

    this.logger.log(
      `[References] collected_tables=${collected.tables.length} collected_figures=${collected.figures.length} tables=${references.tables.length} figures=${references.figures.length}`,
    );
    return references;
  }
}
