/**
 * Indexing HTTP Controller
 */

import { Body, Controller, Logger, Post, ValidationPipe } from '@nestjs/common';
import { toHttpException } from '../retrieval/retrieval-http-error';
import { IndexPagesDto } from './dto/index-pages.dto';
import { PageIndexer, type IndexPagesResult } from './page-indexer.service';

@Controller('index')
export class IndexingController {
  private readonly logger = new Logger(IndexingController.name);

  constructor(private readonly pageIndexer: PageIndexer) {}

  /**
   * POST /index/pages
   * Body: { "pages": [ {page metadata}, ... ], "collection"?: string, "batchSize"?: number }
   */
  @Post('pages')
  async indexPages(
    @Body(new ValidationPipe({ whitelist: true })) body: IndexPagesDto,
  ): Promise<IndexPagesResult> {
    this.logger.log(`Index request: ${body.pages.length} pages`);

    try {
      return await this.pageIndexer.indexPages(body.pages, {
        collection: body.collection,
        batchSize: body.batchSize,
      });
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
