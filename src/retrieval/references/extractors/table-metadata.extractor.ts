/**
 * Tables described by the per-page table metadata list
 */

import type { FormattedResult } from '../../formatting/result-formatter';
import { isRecord } from '../../formatting/payload';
import type { References } from '../types';
import {
  expectList,
  isValidId,
  readLocation,
  tableReference,
  type ReferenceExtractor,
} from './reference-extractor';

export class TableMetadataExtractor implements ReferenceExtractor {
  readonly name = 'table_metadata';

  extract(result: FormattedResult, subQuestion: string): References {
    const tables = expectList(readLocation(result, 'table_metadata'), 'table_metadata')
      .filter(isRecord)
      .map((table) => table.table_id)
      .filter(isValidId)
      .map((tableId) => tableReference(result, subQuestion, tableId));

    return { tables, figures: [] };
  }
}
