/**
 * Reference Deduplicator
 * Identity is (elementId | label) + pageNumber; first occurrence wins, order is kept
 */

import type { References } from './types';

function uniqueBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const identity = key(item);
    if (seen.has(identity)) return false;
    seen.add(identity);
    return true;
  });
}

export function deduplicateReferences(references: References): References {
  return {
    tables: uniqueBy(references.tables, (table) =>
      JSON.stringify([table.elementId, table.pageNumber ?? null]),
    ),
    figures: uniqueBy(references.figures, (figure) =>
      JSON.stringify([figure.label, figure.pageNumber ?? null]),
    ),
  };
}
