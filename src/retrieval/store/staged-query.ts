/**
 * Staged Query Plans
 *
 * A plan is a tree evaluated bottom-up by the store:
 * - vector:  leaf search on one named field
 * - rerank:  re-scores the candidates of exactly one source stage with another field
 * - fusion:  merges >= 2 sibling stages by reciprocal rank fusion
 * - union:   pools >= 2 sibling stages without scoring; only valid as a rerank source
 */

import type { DenseVectorField, SparseVector, VectorField } from './types';

export type VectorQuery =
  | { field: DenseVectorField; vector: number[] }
  | { field: 'sparse'; vector: SparseVector }
  | { field: 'colbert'; vector: number[][] };

export type VectorStage = VectorQuery & {
  kind: 'vector';
  limit: number;
};

export type RerankStage = VectorQuery & {
  kind: 'rerank';
  source: StagedQuery;
  limit: number;
};

export interface FusionStage {
  kind: 'fusion';
  method: 'rrf';
  branches: StagedQuery[];
  limit: number;
}

export interface UnionStage {
  kind: 'union';
  branches: StagedQuery[];
}

export type StagedQuery = VectorStage | RerankStage | FusionStage | UnionStage;

export function vectorStage(query: VectorQuery, limit: number): VectorStage {
  return { ...query, kind: 'vector', limit };
}

export function rerankStage(
  source: StagedQuery,
  query: VectorQuery,
  limit: number,
): RerankStage {
  return { ...query, kind: 'rerank', source, limit };
}

export function fusionStage(branches: StagedQuery[], limit: number): FusionStage {
  return { kind: 'fusion', method: 'rrf', branches, limit };
}

export function unionStage(branches: StagedQuery[]): UnionStage {
  return { kind: 'union', branches };
}

export class InvalidPlanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPlanError';
  }
}

const FIELDS: ReadonlySet<VectorField> = new Set<VectorField>([
  'dense',
  'sparse',
  'colbert',
  'small-embedding',
  'large-embedding',
]);

function assertLimit(limit: number, path: string): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidPlanError(`${path}: limit must be a positive integer, got ${limit}`);
  }
}

function assertVectorQuery(query: VectorQuery, path: string): void {
  if (!FIELDS.has(query.field)) {
    throw new InvalidPlanError(`${path}: unknown vector field "${String(query.field)}"`);
  }
  if (query.field === 'sparse') {
    if (query.vector.indices.length !== query.vector.values.length) {
      throw new InvalidPlanError(`${path}: sparse indices and values differ in length`);
    }
    return;
  }
  if (query.vector.length === 0) {
    throw new InvalidPlanError(`${path}: empty ${query.field} vector`);
  }
}

/**
 * Checks the plan invariants; throws InvalidPlanError on the first violation
 */
export function validateStagedQuery(plan: StagedQuery, path = 'root'): void {
  switch (plan.kind) {
    case 'vector':
      assertVectorQuery(plan, path);
      assertLimit(plan.limit, path);
      return;
    case 'rerank':
      assertVectorQuery(plan, path);
      assertLimit(plan.limit, path);
      validateSource(plan.source, `${path}.source`);
      return;
    case 'fusion':
      assertLimit(plan.limit, path);
      validateBranches(plan.branches, path);
      return;
    case 'union':
      throw new InvalidPlanError(`${path}: union is only valid as a rerank source`);
  }
}

function validateSource(source: StagedQuery, path: string): void {
  if (source.kind === 'union') {
    validateBranches(source.branches, path);
    return;
  }
  validateStagedQuery(source, path);
}

function validateBranches(branches: StagedQuery[], path: string): void {
  if (branches.length < 2) {
    throw new InvalidPlanError(`${path}: needs at least 2 branches, got ${branches.length}`);
  }
  branches.forEach((branch, index) =>
    validateStagedQuery(branch, `${path}.branches[${index}]`),
  );
}

/**
 * Upper bound on the number of candidates a stage can produce
 */
export function stageCapacity(plan: StagedQuery): number {
  switch (plan.kind) {
    case 'vector':
      return plan.limit;
    case 'rerank':
      return Math.min(plan.limit, stageCapacity(plan.source));
    case 'fusion':
      return Math.min(
        plan.limit,
        plan.branches.reduce((sum, branch) => sum + stageCapacity(branch), 0),
      );
    case 'union':
      return plan.branches.reduce((sum, branch) => sum + stageCapacity(branch), 0);
  }
}
