/**
 * Figure labels listed in the page content summary
 */

import type { FormattedResult } from '../../formatting/result-formatter';
import type { References } from '../types';
import {
  expectList,
  expectObject,
  figureReference,
  isValidId,
  readLocation,
  type ReferenceExtractor,
} from './reference-extractor';

export class ContentSummaryExtractor implements ReferenceExtractor {
  readonly name = 'content_summary';

  extract(result: FormattedResult, subQuestion: string): References {
    const summary = expectObject(readLocation(result, 'content_summary'), 'content_summary');
    const figures = expectList(summary.figures, 'content_summary.figures')
      .filter(isValidId)
      .map((label) => figureReference(result, subQuestion, label));

    return { tables: [], figures };
  }
}
