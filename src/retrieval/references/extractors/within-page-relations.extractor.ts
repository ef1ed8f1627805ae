/**
 * Figures that content elements point at on the same page
 */

import { Logger } from '@nestjs/common';
import { ReferenceValidationError, errorMessage } from '../../errors/retrieval-errors';
import type { FormattedResult } from '../../formatting/result-formatter';
import { isRecord } from '../../formatting/payload';
import type { FigureReference, References } from '../types';
import {
  expectList,
  expectObject,
  figureReference,
  isValidId,
  readLocation,
  type ReferenceExtractor,
} from './reference-extractor';

export class WithinPageRelationsExtractor implements ReferenceExtractor {
  readonly name = 'within_page_relations';
  private readonly logger = new Logger(WithinPageRelationsExtractor.name);

  extract(result: FormattedResult, subQuestion: string): References {
    const figures: FigureReference[] = [];
    const elements = expectList(readLocation(result, 'content_elements'), 'content_elements');

    elements.forEach((element, index) => {
      if (!isRecord(element)) return;
      let related: unknown[];
      try {
        const relations = expectObject(element.within_page_relations, 'within_page_relations');
        related = expectList(relations.related_figures, 'within_page_relations.related_figures');
      } catch (error) {
        if (!(error instanceof ReferenceValidationError)) throw error;
        // Only this element is skipped; its siblings still contribute
        this.logger.warn(
          `[References] extractor=${this.name} point=${result.id} element=${index} status=skipped error=${errorMessage(error)}`,
        );
        return;
      }

      for (const figure of related) {
        const label = isRecord(figure) ? figure.label : undefined;
        if (isValidId(label)) {
          figures.push(figureReference(result, subQuestion, label));
        }
      }
    });

    return { tables: [], figures };
  }
}
