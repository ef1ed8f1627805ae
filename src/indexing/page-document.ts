/**
 * Page Document
 * Embedding text and store payload built from already-extracted page metadata
 */

import {
  readBoolean,
  readNumber,
  readRecord,
  readRecordArray,
  readStringArray,
} from '../retrieval/formatting/payload';
import type { PayloadMap } from '../retrieval/store/types';

/**
 * Ingestion-side page document: document_metadata, section, page_number,
 * content_elements, counts, text_content, ...
 */
export type PageMetadata = PayloadMap;

function show(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function orNull(value: unknown): unknown {
  return value === undefined ? null : value;
}

interface ElementAggregates {
  entities: string[];
  keywords: string[];
  warnings: string[];
  contexts: string[];
  models: string[];
  componentTypes: string[];
}

function sortedUnique(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}

export function aggregateElements(elements: readonly PayloadMap[]): ElementAggregates {
  const componentTypes = elements
    .map((element) => element.component_type)
    .filter((type): type is string => typeof type === 'string' && type.length > 0);

  return {
    entities: sortedUnique(elements.flatMap((element) => readStringArray(element, 'entities'))),
    keywords: sortedUnique(elements.flatMap((element) => readStringArray(element, 'keywords'))),
    warnings: sortedUnique(elements.flatMap((element) => readStringArray(element, 'warnings'))),
    contexts: sortedUnique(
      elements.flatMap((element) => readStringArray(element, 'application_context')),
    ),
    models: sortedUnique(
      elements.flatMap((element) => readStringArray(element, 'model_applicability')),
    ),
    componentTypes: sortedUnique(componentTypes),
  };
}

function describeElement(element: PayloadMap): string {
  const title = show(element.title);
  const summary = show(element.summary);
  switch (element.type) {
    case 'text_block':
      return `Text Block: ${title}\nSummary: ${summary}`;
    case 'figure':
      return `Figure: ${title} - ${summary}`;
    case 'table':
      return `Table: ${title} - ${summary}`;
    default:
      return '';
  }
}

function listLine(label: string, values: string[]): string {
  return values.length > 0 ? `${label}: ${values.join(', ')}` : '';
}

/**
 * Header, one line per content element, full text, then aggregated tags;
 * non-empty parts joined by blank lines
 */
export function buildEmbeddingText(page: PageMetadata): string {
  const doc = readRecord(page, 'document_metadata') ?? {};
  const section = readRecord(page, 'section') ?? {};
  const elements = readRecordArray(page, 'content_elements');

  const header = [
    `Document: ${show(doc.document_title)} (${show(doc.manufacturer)}, Revision ${show(doc.document_revision)})`,
    `Section: ${show(section.section_number)} ${show(section.section_title)}`,
    `Subsection: ${show(section.subsection_number)} ${show(section.subsection_title)}`,
    `Page: ${show(page.page_number)}`,
  ];

  const body = elements.map(describeElement);
  const textContent = show(page.text_content);
  if (textContent) {
    body.push(`Full Text Content:\n${textContent}`);
  }

  const aggregates = aggregateElements(elements);
  const tail = [
    listLine('Entities', aggregates.entities),
    listLine('Warnings', aggregates.warnings),
    listLine('Keywords', aggregates.keywords),
    listLine('Model Applicability', aggregates.models),
    listLine('Context', aggregates.contexts),
  ];

  return [...header, ...body, ...tail].filter((part) => part.length > 0).join('\n\n');
}

/**
 * Flat filterable fields plus the full page document
 */
export function buildPointPayload(page: PageMetadata, embeddingText: string): PayloadMap {
  const doc = readRecord(page, 'document_metadata') ?? {};
  const section = readRecord(page, 'section') ?? {};
  const aggregates = aggregateElements(readRecordArray(page, 'content_elements'));

  return {
    embedding_text: embeddingText,
    page_number: orNull(page.page_number),
    document_id: orNull(doc.document_id),
    document_title: orNull(doc.document_title),
    document_type: orNull(doc.document_type),
    manufacturer: orNull(doc.manufacturer),
    models_covered: readStringArray(doc, 'models_covered'),
    section_number: orNull(section.section_number),
    section_title: orNull(section.section_title),
    subsection_number: orNull(section.subsection_number),
    subsection_title: orNull(section.subsection_title),
    has_tables: readBoolean(page, 'has_tables'),
    has_figures: readBoolean(page, 'has_figures'),
    table_count: readNumber(page, 'table_count'),
    figure_count: readNumber(page, 'figure_count'),
    text_block_count: readNumber(page, 'text_block_count'),
    page_visual_description: orNull(page.page_visual_description),
    entities: aggregates.entities,
    keywords: aggregates.keywords,
    warnings: aggregates.warnings,
    application_contexts: aggregates.contexts,
    applicable_models: aggregates.models,
    component_types: aggregates.componentTypes,
    full_page_metadata: page,
  };
}
