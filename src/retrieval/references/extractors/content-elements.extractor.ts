/**
 * Tables and figures listed as page content elements
 */

import type { FormattedResult } from '../../formatting/result-formatter';
import { isRecord } from '../../formatting/payload';
import type { References } from '../types';
import {
  expectList,
  figureReference,
  isValidId,
  readLocation,
  tableReference,
  type ReferenceExtractor,
} from './reference-extractor';

export class ContentElementsExtractor implements ReferenceExtractor {
  readonly name = 'content_elements';

  extract(result: FormattedResult, subQuestion: string): References {
    const references: References = { tables: [], figures: [] };
    const elements = expectList(readLocation(result, 'content_elements'), 'content_elements');

    for (const element of elements) {
      if (!isRecord(element)) continue;

      const elementId = element.element_id;
      const figureId = element.figure_id;
      if (element.type === 'table' && isValidId(elementId)) {
        references.tables.push(tableReference(result, subQuestion, elementId));
      } else if (element.type === 'figure' && isValidId(figureId)) {
        references.figures.push(figureReference(result, subQuestion, figureId));
      }
    }

    return references;
  }
}
