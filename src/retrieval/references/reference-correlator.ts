/**
 * Reference Correlator
 * Attaches asset files found on disk to table and figure references
 *
 * Layout under the assets root:
 *   page_{P}/tables/{elementId}.png | .html
 *   page_{P}/images/{label}.png, or page_{P}/images/image-{P}-{suffix}.png
 */

import { Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { errorMessage } from '../errors/retrieval-errors';
import type { FigureReference, References, TableReference } from './types';

const MISSING_FILE_CODES = new Set(['ENOENT', 'ENOTDIR']);

/**
 * Identifiers that could leave the page directory are never probed
 */
export function isSafePathSegment(identifier: string): boolean {
  return !identifier.includes('/') && !identifier.includes('\\') && !identifier.includes('..');
}

/**
 * Text after the last "-" of a figure label, or the whole label
 */
export function figureSuffix(label: string): string {
  return label.slice(label.lastIndexOf('-') + 1);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export class ReferenceCorrelator {
  private readonly logger = new Logger(ReferenceCorrelator.name);

  constructor(private readonly assetsDir: string) {}

  /**
   * Returns new reference objects; probes run in parallel
   */
  async correlate(references: References): Promise<References> {
    const [tables, figures] = await Promise.all([
      Promise.all(references.tables.map((table) => this.correlateTable(table))),
      Promise.all(references.figures.map((figure) => this.correlateFigure(figure))),
    ]);
    return { tables, figures };
  }

  private async correlateTable(table: TableReference): Promise<TableReference> {
    if (!table.pageNumber || !isSafePathSegment(table.elementId)) {
      return { ...table };
    }

    const tablesDir = path.join(this.assetsDir, `page_${table.pageNumber}`, 'tables');
    const pngPath = path.join(tablesDir, `${table.elementId}.png`);
    const htmlPath = path.join(tablesDir, `${table.elementId}.html`);
    const [hasPng, hasHtml] = await Promise.all([
      this.fileExists(pngPath),
      this.fileExists(htmlPath),
    ]);

    if (!hasPng && !hasHtml) {
      this.logger.debug(`[References] table=${table.elementId} page=${table.pageNumber} files=none`);
    }

    return {
      ...table,
      ...(hasPng && { pngFile: pngPath }),
      ...(hasHtml && { htmlFile: htmlPath }),
    };
  }

  private async correlateFigure(figure: FigureReference): Promise<FigureReference> {
    if (!figure.pageNumber || !isSafePathSegment(figure.label)) {
      return { ...figure };
    }

    const imagesDir = path.join(this.assetsDir, `page_${figure.pageNumber}`, 'images');
    const candidates = [
      path.join(imagesDir, `${figure.label}.png`),
      path.join(imagesDir, `image-${figure.pageNumber}-${figureSuffix(figure.label)}.png`),
    ];
    const found = await Promise.all(candidates.map((candidate) => this.fileExists(candidate)));
    const index = found.indexOf(true);

    if (index === -1) {
      this.logger.debug(`[References] figure=${figure.label} page=${figure.pageNumber} files=none`);
      return { ...figure };
    }
    return { ...figure, pngFile: candidates[index] };
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch (error) {
      if (!MISSING_FILE_CODES.has(errorCode(error) ?? '')) {
        this.logger.warn(`[References] probe=${filePath} error=${errorMessage(error)}`);
      }
      return false;
    }
  }
}
