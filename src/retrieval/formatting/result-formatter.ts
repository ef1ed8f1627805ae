/**
 * Result Formatter
 * Flattens raw store points into the record shape shared by every strategy
 */

import type { PayloadMap, PointId, RawResult } from '../store/types';
import {
  readBoolean,
  readNumber,
  readOptionalNumber,
  readRecord,
  readRecordArray,
  readString,
  readStringArray,
} from './payload';

export type FormattedResult = {
  score: number;
  id: PointId;
  payload: PayloadMap;
  /** Text the page was embedded from */
  text: string;
  pageNumber: number | null;
  documentTitle: string;
  documentId: string;
  sectionTitle: string;
  subsectionTitle: string;
  manufacturer: string;
  modelsCovered: string[];
  entities: string[];
  keywords: string[];
  warnings: string[];
  hasTables: boolean;
  hasFigures: boolean;
  tableCount: number;
  figureCount: number;
  // Present only when the payload carries full_page_metadata
  pageVisualDescription?: string;
  contentElements?: PayloadMap[];
  textContent?: string;
  textFile?: string;
};

export function formatResult(raw: RawResult): FormattedResult {
  const payload = raw.payload;

  const formatted: FormattedResult = {
    score: raw.score,
    id: raw.id,
    payload,
    text: readString(payload, 'embedding_text'),
    pageNumber: readOptionalNumber(payload, 'page_number') ?? null,
    documentTitle: readString(payload, 'document_title'),
    documentId: readString(payload, 'document_id'),
    sectionTitle: readString(payload, 'section_title'),
    subsectionTitle: readString(payload, 'subsection_title'),
    manufacturer: readString(payload, 'manufacturer'),
    modelsCovered: readStringArray(payload, 'models_covered'),
    entities: readStringArray(payload, 'entities'),
    keywords: readStringArray(payload, 'keywords'),
    warnings: readStringArray(payload, 'warnings'),
    hasTables: readBoolean(payload, 'has_tables'),
    hasFigures: readBoolean(payload, 'has_figures'),
    tableCount: readNumber(payload, 'table_count'),
    figureCount: readNumber(payload, 'figure_count'),
  };

  const fullPage = readRecord(payload, 'full_page_metadata');
  if (fullPage) {
    formatted.pageVisualDescription = readString(fullPage, 'page_visual_description');
    formatted.contentElements = readRecordArray(fullPage, 'content_elements');
    formatted.textContent = readString(fullPage, 'text_content');
    formatted.textFile = readString(fullPage, 'text_file');
  }

  return formatted;
}

/**
 * Pure and total: never throws on missing or mistyped payload fields
 */
export function formatResults(raw: readonly RawResult[]): FormattedResult[] {
  return raw.map(formatResult);
}
