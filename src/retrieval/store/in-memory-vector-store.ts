/**
 * In-Memory Vector Store
 * Evaluates staged query plans locally over points held in memory.
 * Used for local runs without a Qdrant instance and as the test double.
 */

import { Logger } from '@nestjs/common';
import { reciprocalRankFusion, type RankedPoint } from '../fusion/rrf';
import { StoreError } from '../errors/retrieval-errors';
import { validateStagedQuery, InvalidPlanError } from './staged-query';
import type { StagedQuery, VectorQuery } from './staged-query';
import type {
  CollectionSchema,
  PointId,
  PointStruct,
  RawResult,
  StoreQueryRequest,
  VectorStore,
} from './types';
import { cosineSimilarity, maxSim, sparseDot } from './vector-math';

interface Collection {
  schema: CollectionSchema;
  points: Map<PointId, PointStruct>;
}

export class InMemoryVectorStore implements VectorStore {
  private readonly logger = new Logger(InMemoryVectorStore.name);
  private readonly collections = new Map<string, Collection>();

  async collectionExists(name: string): Promise<boolean> {
    return this.collections.has(name);
  }

  async createCollection(name: string, schema: CollectionSchema): Promise<void> {
    if (this.collections.has(name)) {
      throw new StoreError(`collection "${name}" already exists`);
    }
    this.collections.set(name, { schema, points: new Map() });
    this.logger.log(`Created in-memory collection "${name}"`);
  }

  async upsert(collection: string, points: PointStruct[]): Promise<void> {
    const target = this.getCollection(collection);
    for (const point of points) {
      target.points.set(point.id, point);
    }
  }

  async query(collection: string, request: StoreQueryRequest): Promise<RawResult[]> {
    const target = this.getCollection(collection);
    try {
      validateStagedQuery(request.plan);
    } catch (error) {
      if (error instanceof InvalidPlanError) {
        throw new StoreError(error.message, error);
      }
      throw error;
    }

    let ranked = this.evaluate(request.plan, target);
    const threshold = request.scoreThreshold;
    if (threshold !== undefined) {
      ranked = ranked.filter((point) => point.score >= threshold);
    }

    return ranked.map((point) => {
      const stored = target.points.get(point.id);
      return {
        id: point.id,
        score: point.score,
        payload: request.withPayload && stored ? stored.payload : {},
      };
    });
  }

  private getCollection(name: string): Collection {
    const collection = this.collections.get(name);
    if (!collection) {
      throw new StoreError(`collection "${name}" not found`);
    }
    return collection;
  }

  private evaluate(plan: StagedQuery, collection: Collection): RankedPoint<PointId>[] {
    switch (plan.kind) {
      case 'vector':
        return this.score(plan, collection.points.values()).slice(0, plan.limit);
      case 'rerank': {
        const candidates = this.evaluate(plan.source, collection)
          .map((candidate) => collection.points.get(candidate.id))
          .filter((point): point is PointStruct => point !== undefined);
        return this.score(plan, candidates).slice(0, plan.limit);
      }
      case 'fusion':
        return reciprocalRankFusion(
          plan.branches.map((branch) => this.evaluate(branch, collection)),
        ).slice(0, plan.limit);
      case 'union': {
        const pooled = new Map<PointId, RankedPoint<PointId>>();
        for (const branch of plan.branches) {
          for (const point of this.evaluate(branch, collection)) {
            const existing = pooled.get(point.id);
            if (!existing || point.score > existing.score) {
              pooled.set(point.id, point);
            }
          }
        }
        return Array.from(pooled.values());
      }
    }
  }

  private score(
    query: VectorQuery,
    points: Iterable<PointStruct>,
  ): RankedPoint<PointId>[] {
    const scored: RankedPoint<PointId>[] = [];
    for (const point of points) {
      const score = this.similarity(query, point);
      if (score !== undefined) {
        scored.push({ id: point.id, score });
      }
    }
    return scored.sort((a, b) => b.score - a.score);
  }

  private similarity(query: VectorQuery, point: PointStruct): number | undefined {
    switch (query.field) {
      case 'sparse': {
        const stored = point.vector.sparse;
        return stored ? sparseDot(query.vector, stored) : undefined;
      }
      case 'colbert': {
        const stored = point.vector.colbert;
        return stored ? maxSim(query.vector, stored) : undefined;
      }
      default: {
        const stored = point.vector[query.field];
        return stored ? cosineSimilarity(query.vector, stored) : undefined;
      }
    }
  }
}
