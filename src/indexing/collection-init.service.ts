/**
 * Collection Initializer
 * Creates the five-field collection when it is missing
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  EMBEDDING_PROVIDER,
  LARGE_EMBEDDING_DIMS,
  SMALL_EMBEDDING_DIMS,
  type EmbeddingProvider,
} from '../retrieval/embeddings/types';
import { EmbeddingError } from '../retrieval/errors/retrieval-errors';
import { VECTOR_STORE, type CollectionSchema, type VectorStore } from '../retrieval/store/types';

@Injectable()
export class CollectionInitializer {
  private readonly logger = new Logger(CollectionInitializer.name);

  constructor(
    @Inject(VECTOR_STORE) private readonly store: VectorStore,
    @Inject(EMBEDDING_PROVIDER) private readonly embeddings: EmbeddingProvider,
  ) {}

  /**
   * Dense and multivector sizes come from embedding `sampleText`.
   * Returns true when the collection was created.
   */
  async ensureCollection(name: string, sampleText: string): Promise<boolean> {
    if (await this.store.collectionExists(name)) {
      this.logger.log(`Collection "${name}" already exists`);
      return false;
    }

    const [dense, multivector] = await Promise.all([
      this.embeddings.embedDense(sampleText),
      this.embeddings.embedMultivector(sampleText),
    ]);
    if (multivector.length === 0) {
      throw new EmbeddingError('sample multivector has no rows');
    }

    await this.store.createCollection(name, buildCollectionSchema(dense.length, multivector[0].length));
    return true;
  }
}

export function buildCollectionSchema(denseSize: number, colbertSize: number): CollectionSchema {
  return {
    vectors: {
      dense: { size: denseSize, distance: 'Cosine' },
      colbert: { size: colbertSize, distance: 'Cosine', multivector: true },
      'small-embedding': { size: SMALL_EMBEDDING_DIMS, distance: 'Cosine', datatype: 'float16' },
      'large-embedding': { size: LARGE_EMBEDDING_DIMS, distance: 'Cosine', datatype: 'float16' },
    },
    sparseVectors: ['sparse'],
  };
}
