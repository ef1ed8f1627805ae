/**
 * Page Indexer
 *
 * Flow:
 * 1. Build embedding text and payload for every page
 * 2. Ensure the collection exists (sized from the first page)
 * 3. Embed each batch with all five vector kinds and upsert it
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  RETRIEVAL_SETTINGS,
  type RetrievalSettings,
} from '../config/retrieval.config';
import {
  EMBEDDING_PROVIDER,
  LARGE_EMBEDDING_DIMS,
  SMALL_EMBEDDING_DIMS,
  type EmbeddingProvider,
} from '../retrieval/embeddings/types';
import { pagePointKey, pointIdFromKey } from '../retrieval/store/point-id';
import { VECTOR_STORE, type PointStruct, type VectorStore } from '../retrieval/store/types';
import { readRecord, readString } from '../retrieval/formatting/payload';
import { CollectionInitializer } from './collection-init.service';
import { buildEmbeddingText, buildPointPayload, type PageMetadata } from './page-document';

export const DEFAULT_INDEX_BATCH_SIZE = 4;

export interface IndexPagesOptions {
  collection?: string;
  batchSize?: number;
}

export interface IndexPagesResult {
  indexed: number;
  collection: string;
}

interface PreparedPage {
  id: number;
  text: string;
  payload: PointStruct['payload'];
}

@Injectable()
export class PageIndexer {
  private readonly logger = new Logger(PageIndexer.name);

  constructor(
    @Inject(RETRIEVAL_SETTINGS) private readonly settings: RetrievalSettings,
    @Inject(VECTOR_STORE) private readonly store: VectorStore,
    @Inject(EMBEDDING_PROVIDER) private readonly embeddings: EmbeddingProvider,
    private readonly collectionInitializer: CollectionInitializer,
  ) {}

  /**
   * Id from "{document_id}_page_{page}"; the position stands in for a missing page number
   */
  pointIdForPage(page: PageMetadata, index: number): number {
    const documentId = readString(readRecord(page, 'document_metadata') ?? {}, 'document_id', 'unknown');
    const pageNumber = page.page_number;
    const pageKey =
      typeof pageNumber === 'number' || typeof pageNumber === 'string' ? pageNumber : index;
    return pointIdFromKey(pagePointKey(documentId, pageKey));
  }

  async indexPages(
    pages: readonly PageMetadata[],
    options: IndexPagesOptions = {},
  ): Promise<IndexPagesResult> {
    const collection = options.collection ?? this.settings.collectionName;
    const batchSize = options.batchSize ?? DEFAULT_INDEX_BATCH_SIZE;
    const startTime = Date.now();

    const prepared: PreparedPage[] = pages.map((page, index) => {
      const text = buildEmbeddingText(page);
      return { id: this.pointIdForPage(page, index), text, payload: buildPointPayload(page, text) };
    });

    await this.collectionInitializer.ensureCollection(
      collection,
      prepared.length > 0 ? prepared[0].text : 'Sample text',
    );

    let indexed = 0;
    for (let start = 0; start < prepared.length; start += batchSize) {
      const batch = prepared.slice(start, start + batchSize);
      const points = await Promise.all(batch.map((page) => this.toPoint(page)));
      await this.store.upsert(collection, points);
      indexed += points.length;
      this.logger.log(`[Indexing] collection=${collection} progress=${indexed}/${prepared.length}`);
    }

    this.logger.log(
      `[Indexing] collection=${collection} status=success pages=${indexed} duration=${Date.now() - startTime}ms`,
    );
    return { indexed, collection };
  }

  private async toPoint(page: PreparedPage): Promise<PointStruct> {
    const [dense, sparse, colbert, small, large] = await Promise.all([
      this.embeddings.embedDense(page.text),
      this.embeddings.embedSparse(page.text),
      this.embeddings.embedMultivector(page.text),
      this.embeddings.embedTruncated(page.text, SMALL_EMBEDDING_DIMS),
      this.embeddings.embedTruncated(page.text, LARGE_EMBEDDING_DIMS),
    ]);

    return {
      id: page.id,
      vector: { dense, sparse, colbert, 'small-embedding': small, 'large-embedding': large },
      payload: page.payload,
    };
  }
}
