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

export class FlattenedTablesExtractor implements ReferenceExtractor {
  readonly name = 'flattened_tables';

  extract(result: FormattedResult, subQuestion: string): References {
    const tables = expectList(readLocation(result, 'flattened_tables'), 'flattened_tables')
      .filter(isRecord)
      .map((table) => table.table_id)
      .filter(isValidId)
      .map((tableId) => tableReference(result, subQuestion, tableId));

    return { tables, figures: [] };
  }
}
