/**
 * Answer Response DTO
 * Wire shape of POST /query (snake_case keys)
 */

import type { AnswerResult } from '../retrieval.service';
import type { FigureReference, TableReference } from '../references/types';

export interface TableReferenceDto {
  sub_question: string;
  element_id: string;
  page_number: number | null;
  png_file: string | null;
  html_file: string | null;
}

export interface FigureReferenceDto {
  sub_question: string;
  label: string;
  page_number: number | null;
  png_file: string | null;
}

export interface AnswerResponseDto {
  answer: string;
  references: {
    tables: TableReferenceDto[];
    figures: FigureReferenceDto[];
  };
}

function toTableDto(table: TableReference): TableReferenceDto {
  return {
    sub_question: table.subQuestion,
    element_id: table.elementId,
    page_number: table.pageNumber ?? null,
    png_file: table.pngFile ?? null,
    html_file: table.htmlFile ?? null,
  };
}

function toFigureDto(figure: FigureReference): FigureReferenceDto {
  return {
    sub_question: figure.subQuestion,
    label: figure.label,
    page_number: figure.pageNumber ?? null,
    png_file: figure.pngFile ?? null,
  };
}

export function toAnswerResponse(result: AnswerResult): AnswerResponseDto {
  return {
    answer: result.answer,
    references: {
      tables: result.references.tables.map(toTableDto),
      figures: result.references.figures.map(toFigureDto),
    },
  };
}
