/**
 * Reference Extractor
 * Each extractor scans one payload location of a formatted result
 */

import { ReferenceValidationError } from '../../errors/retrieval-errors';
import type { FormattedResult } from '../../formatting/result-formatter';
import { isRecord, readRecord } from '../../formatting/payload';
import type { PayloadMap } from '../../store/types';
import type { FigureReference, References, TableReference } from '../types';

export interface ReferenceExtractor {
  readonly name: string;
  /** Throws ReferenceValidationError when the scanned location has the wrong shape */
  extract(result: FormattedResult, subQuestion: string): References;
}

/**
 * Value stored under `key`, looked up in full_page_metadata first, then the top-level payload
 */
export function readLocation(result: FormattedResult, key: string): unknown {
  const fullPage = readRecord(result.payload, 'full_page_metadata');
  if (fullPage && fullPage[key] !== undefined && fullPage[key] !== null) {
    return fullPage[key];
  }
  return result.payload[key];
}

/**
 * Absent reads as empty; any other non-array is malformed
 */
export function expectList(value: unknown, field: string): unknown[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ReferenceValidationError(`expected a list, got ${typeof value}`, field);
  }
  return value;
}

export function expectObject(value: unknown, field: string): PayloadMap {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ReferenceValidationError(`expected an object, got ${typeof value}`, field);
  }
  return value;
}

/**
 * Non-empty string that is not the literal "None"
 */
export function isValidId(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0 && value !== 'None';
}

export function tableReference(
  result: FormattedResult,
  subQuestion: string,
  elementId: string,
): TableReference {
  return {
    subQuestion,
    elementId,
    ...(result.pageNumber !== null && { pageNumber: result.pageNumber }),
  };
}

export function figureReference(
  result: FormattedResult,
  subQuestion: string,
  label: string,
): FigureReference {
  return {
    subQuestion,
    label,
    ...(result.pageNumber !== null && { pageNumber: result.pageNumber }),
  };
}
