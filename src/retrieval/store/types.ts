/**
 * Vector Store Types
 * Conceptual contract of a point store with named vector fields and staged queries
 */

import type { StagedQuery } from './staged-query';

export const VECTOR_STORE = 'VECTOR_STORE';

/**
 * Open-ended payload bag attached to every point
 */
export type PayloadMap = Record<string, unknown>;

export type PointId = number | string;

export interface SparseVector {
  indices: number[];
  values: number[];
}

export type DenseVectorField = 'dense' | 'small-embedding' | 'large-embedding';
export type VectorField = DenseVectorField | 'sparse' | 'colbert';

/**
 * All vectors stored on one point, keyed by field name
 */
export interface PointVectors {
  dense?: number[];
  sparse?: SparseVector;
  colbert?: number[][];
  'small-embedding'?: number[];
  'large-embedding'?: number[];
}

export interface PointStruct {
  id: PointId;
  vector: PointVectors;
  payload: PayloadMap;
}

/**
 * One point returned by a store query
 */
export interface RawResult {
  id: PointId;
  score: number;
  payload: PayloadMap;
}

export interface DenseFieldSchema {
  size: number;
  distance: 'Cosine' | 'Dot' | 'Euclid';
  multivector?: boolean;
  datatype?: 'float32' | 'float16';
}

export interface CollectionSchema {
  vectors: Partial<Record<DenseVectorField | 'colbert', DenseFieldSchema>>;
  sparseVectors: Array<'sparse'>;
}

export interface StoreQueryRequest {
  /** Root stage; its limit is the number of results requested */
  plan: StagedQuery;
  withPayload: boolean;
  /** Lower bound applied by the store to root-stage scores */
  scoreThreshold?: number;
}

export interface VectorStore {
  collectionExists(name: string): Promise<boolean>;
  createCollection(name: string, schema: CollectionSchema): Promise<void>;
  query(collection: string, request: StoreQueryRequest): Promise<RawResult[]>;
  upsert(collection: string, points: PointStruct[]): Promise<void>;
}
