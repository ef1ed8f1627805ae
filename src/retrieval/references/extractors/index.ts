import { ContentElementsExtractor } from './content-elements.extractor';
import { ContentSummaryExtractor } from './content-summary.extractor';
import { FlattenedTablesExtractor } from './flattened-tables.extractor';
import type { ReferenceExtractor } from './reference-extractor';
import { TableMetadataExtractor } from './table-metadata.extractor';
import { WithinPageRelationsExtractor } from './within-page-relations.extractor';

export type { ReferenceExtractor } from './reference-extractor';

/**
 * Fixed extraction order
 */
export function defaultExtractors(): ReferenceExtractor[] {
  return [
    new ContentElementsExtractor(),
    new FlattenedTablesExtractor(),
    new TableMetadataExtractor(),
    new ContentSummaryExtractor(),
    new WithinPageRelationsExtractor(),
  ];
}
