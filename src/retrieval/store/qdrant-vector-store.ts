/**
 * Qdrant Vector Store
 * Translates staged query plans into Qdrant Query API requests
 */

import { Injectable, Logger } from '@nestjs/common';
import type { Schemas } from '@qdrant/js-client-rest';
import { StoreError, errorMessage, toError } from '../errors/retrieval-errors';
import { QdrantConnection } from './qdrant-connection';
import {
  InvalidPlanError,
  validateStagedQuery,
  type StagedQuery,
  type VectorQuery,
} from './staged-query';
import type {
  CollectionSchema,
  PointStruct,
  PointVectors,
  RawResult,
  SparseVector,
  StoreQueryRequest,
  VectorStore,
} from './types';

type QdrantVector = number[] | number[][] | SparseVector;

const UPSERT_BATCH_SIZE = 64;

/**
 * Prefetch list feeding a stage: a union contributes its branches as siblings
 */
function toPrefetchList(source: StagedQuery): Schemas['Prefetch'][] {
  if (source.kind === 'union') {
    return source.branches.map(toPrefetch);
  }
  return [toPrefetch(source)];
}

function toQueryVector(query: VectorQuery): QdrantVector {
  if (query.field === 'sparse') {
    return { indices: query.vector.indices, values: query.vector.values };
  }
  return query.vector;
}

export function toPrefetch(stage: StagedQuery): Schemas['Prefetch'] {
  switch (stage.kind) {
    case 'vector':
      return { query: toQueryVector(stage), using: stage.field, limit: stage.limit };
    case 'rerank':
      return {
        prefetch: toPrefetchList(stage.source),
        query: toQueryVector(stage),
        using: stage.field,
        limit: stage.limit,
      };
    case 'fusion':
      return {
        prefetch: stage.branches.map(toPrefetch),
        query: { fusion: 'rrf' },
        limit: stage.limit,
      };
    case 'union':
      throw new InvalidPlanError('union is only valid as a rerank source');
  }
}

/**
 * Builds the top-level request; the root stage becomes the request itself
 */
export function toQueryRequest(request: StoreQueryRequest): Schemas['QueryRequest'] {
  const root = toPrefetch(request.plan);
  return {
    ...root,
    with_payload: request.withPayload,
    ...(request.scoreThreshold !== undefined && {
      score_threshold: request.scoreThreshold,
    }),
  };
}

function toQdrantVectors(vectors: PointVectors): Record<string, QdrantVector> {
  const named: Record<string, QdrantVector> = {};
  if (vectors.dense) named['dense'] = vectors.dense;
  if (vectors.sparse) named['sparse'] = vectors.sparse;
  if (vectors.colbert) named['colbert'] = vectors.colbert;
  if (vectors['small-embedding']) named['small-embedding'] = vectors['small-embedding'];
  if (vectors['large-embedding']) named['large-embedding'] = vectors['large-embedding'];
  return named;
}

@Injectable()
export class QdrantVectorStore implements VectorStore {
  private readonly logger = new Logger(QdrantVectorStore.name);

  constructor(private readonly connection: QdrantConnection) {}

  async collectionExists(name: string): Promise<boolean> {
    try {
      const { exists } = await this.connection.getClient().collectionExists(name);
      return exists;
    } catch (error) {
      throw this.toStoreError(`collectionExists(${name})`, error);
    }
  }

  async createCollection(name: string, schema: CollectionSchema): Promise<void> {
    const vectors: Record<string, Schemas['VectorParams']> = {};
    for (const [field, config] of Object.entries(schema.vectors)) {
      if (!config) continue;
      vectors[field] = {
        size: config.size,
        distance: config.distance,
        ...(config.datatype && { datatype: config.datatype }),
        ...(config.multivector && {
          multivector_config: { comparator: 'max_sim' },
        }),
      };
    }

    const sparseVectors: Record<string, Schemas['SparseVectorParams']> = {};
    for (const field of schema.sparseVectors) {
      sparseVectors[field] = { index: { on_disk: false } };
    }

    try {
      await this.connection.getClient().createCollection(name, {
        vectors,
        sparse_vectors: sparseVectors,
      });
      this.logger.log(
        `Created collection "${name}" with vectors [${Object.keys(vectors).join(', ')}] and sparse [${Object.keys(sparseVectors).join(', ')}]`,
      );
    } catch (error) {
      throw this.toStoreError(`createCollection(${name})`, error);
    }
  }

  async query(collection: string, request: StoreQueryRequest): Promise<RawResult[]> {
    let body: Schemas['QueryRequest'];
    try {
      validateStagedQuery(request.plan);
      body = toQueryRequest(request);
    } catch (error) {
      throw this.toStoreError('invalid query plan', error);
    }

    try {
      const response = await this.connection.getClient().query(collection, body);
      return response.points.map((point) => ({
        id: point.id,
        score: point.score,
        payload: point.payload ?? {},
      }));
    } catch (error) {
      throw this.toStoreError(`query(${collection})`, error);
    }
  }

  async upsert(collection: string, points: PointStruct[]): Promise<void> {
    for (let i = 0; i < points.length; i += UPSERT_BATCH_SIZE) {
      const batch = points.slice(i, i + UPSERT_BATCH_SIZE);
      try {
        await this.connection.getClient().upsert(collection, {
          wait: true,
          points: batch.map((point) => ({
            id: point.id,
            vector: toQdrantVectors(point.vector),
            payload: point.payload,
          })),
        });
      } catch (error) {
        throw this.toStoreError(`upsert(${collection})`, error);
      }
      this.logger.debug(`Upserted ${batch.length} points to "${collection}"`);
    }
  }

  private toStoreError(operation: string, error: unknown): StoreError {
    if (error instanceof StoreError) return error;
    this.logger.error(`[VectorStore] operation=${operation} status=failed error=${errorMessage(error)}`);
    return new StoreError(`${operation}: ${errorMessage(error)}`, toError(error));
  }
}
