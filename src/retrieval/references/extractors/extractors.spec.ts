import { ReferenceValidationError } from '../../errors/retrieval-errors';
import { formatResult } from '../../formatting/result-formatter';
import type { PayloadMap } from '../../store/types';
import { ContentElementsExtractor } from './content-elements.extractor';
import { ContentSummaryExtractor } from './content-summary.extractor';
import { FlattenedTablesExtractor } from './flattened-tables.extractor';
import { defaultExtractors } from './index';
import { isValidId } from './reference-extractor';
import { TableMetadataExtractor } from './table-metadata.extractor';
import { WithinPageRelationsExtractor } from './within-page-relations.extractor';

function page(payload: PayloadMap) {
  return formatResult({ id: 1, score: 1, payload });
}

describe('ContentElementsExtractor', () => {
  const extractor = new ContentElementsExtractor();

  it('collects tables and figures from full page metadata', () => {
    const result = page({
      page_number: 2,
      full_page_metadata: {
        content_elements: [
          { type: 'table', element_id: 'table-2-1' },
          { type: 'figure', figure_id: 'figure-2-3' },
          { type: 'table', element_id: 'None' },
          { type: 'text_block' },
          'stray',
        ],
      },
    });

    expect(extractor.extract(result, 'q')).toEqual({
      tables: [{ subQuestion: 'q', elementId: 'table-2-1', pageNumber: 2 }],
      figures: [{ subQuestion: 'q', label: 'figure-2-3', pageNumber: 2 }],
    });
  });

  it('falls back to the top-level payload', () => {
    const result = page({
      page_number: 4,
      content_elements: [{ type: 'table', element_id: 'table-4-2' }],
    });

    expect(extractor.extract(result, 'q').tables).toEqual([
      { subQuestion: 'q', elementId: 'table-4-2', pageNumber: 4 },
    ]);
  });

  it('omits the page number when the page has none', () => {
    const result = page({ content_elements: [{ type: 'figure', figure_id: 'figure-1-1' }] });

    expect(extractor.extract(result, 'q').figures).toEqual([
      { subQuestion: 'q', label: 'figure-1-1' },
    ]);
  });

  it('rejects a location that is not a list', () => {
    expect(() => extractor.extract(page({ content_elements: 'oops' }), 'q')).toThrow(
      ReferenceValidationError,
    );
  });
});

describe('FlattenedTablesExtractor', () => {
  it('reads table ids and skips empty ones', () => {
    const result = page({
      page_number: 5,
      flattened_tables: [{ table_id: 'table-5-1' }, { table_id: '' }, 'x'],
    });

    expect(new FlattenedTablesExtractor().extract(result, 'q')).toEqual({
      tables: [{ subQuestion: 'q', elementId: 'table-5-1', pageNumber: 5 }],
      figures: [],
    });
  });
});

describe('TableMetadataExtractor', () => {
  it('reads table ids from the metadata list', () => {
    const result = page({
      page_number: 6,
      full_page_metadata: { table_metadata: [{ table_id: 'table-6-1', rows: 4 }] },
    });

    expect(new TableMetadataExtractor().extract(result, 'q').tables).toEqual([
      { subQuestion: 'q', elementId: 'table-6-1', pageNumber: 6 },
    ]);
  });
});

describe('ContentSummaryExtractor', () => {
  const extractor = new ContentSummaryExtractor();

  it('reads figure labels from the summary', () => {
    const result = page({
      page_number: 9,
      content_summary: { figures: ['figure-9-2', 'None', 7] },
    });

    expect(extractor.extract(result, 'q')).toEqual({
      tables: [],
      figures: [{ subQuestion: 'q', label: 'figure-9-2', pageNumber: 9 }],
    });
  });

  it('rejects a summary that is not an object', () => {
    expect(() => extractor.extract(page({ content_summary: [] }), 'q')).toThrow(
      ReferenceValidationError,
    );
  });
});

describe('WithinPageRelationsExtractor', () => {
  it('reads related figure labels', () => {
    const result = page({
      page_number: 4,
      content_elements: [
        {
          type: 'text_block',
          within_page_relations: {
            related_figures: [{ label: 'figure-4-1' }, { label: 'None' }, 'figure-4-9'],
          },
        },
        { type: 'table' },
      ],
    });

    expect(new WithinPageRelationsExtractor().extract(result, 'q').figures).toEqual([
      { subQuestion: 'q', label: 'figure-4-1', pageNumber: 4 },
    ]);
  });

  it('skips a malformed element and keeps its siblings', () => {
    const result = page({
      page_number: 4,
      content_elements: [
        { within_page_relations: { related_figures: [{ label: 'figure-4-1' }] } },
        { within_page_relations: 'None' },
        { within_page_relations: { related_figures: { label: 'figure-4-2' } } },
        { within_page_relations: { related_figures: [{ label: 'figure-4-3' }] } },
      ],
    });

    expect(new WithinPageRelationsExtractor().extract(result, 'q').figures).toEqual([
      { subQuestion: 'q', label: 'figure-4-1', pageNumber: 4 },
      { subQuestion: 'q', label: 'figure-4-3', pageNumber: 4 },
    ]);
  });
});

describe('defaultExtractors', () => {
  it('runs in a fixed order', () => {
    expect(defaultExtractors().map((extractor) => extractor.name)).toEqual([
      'content_elements',
      'flattened_tables',
      'table_metadata',
      'content_summary',
      'within_page_relations',
    ]);
  });
});

describe('isValidId', () => {
  it.each([
    ['table-1-1', true],
    ['', false],
    ['None', false],
    [3, false],
    [null, false],
  ])('%p -> %p', (value, expected) => {
    expect(isValidId(value)).toBe(expected);
  });
});
