/**
 * Reference Types
 * Tables and figures cited by the results of one sub-question
 */

export type TableReference = {
  subQuestion: string;
  elementId: string;
  pageNumber?: number;
  pngFile?: string;
  htmlFile?: string;
};

export type FigureReference = {
  subQuestion: string;
  label: string;
  pageNumber?: number;
  pngFile?: string;
};

export interface References {
  tables: TableReference[];
  figures: FigureReference[];
}
