import type {
  CollectionSchema,
  PointStruct,
  RawResult,
  StoreQueryRequest,
  VectorStore,
} from '../store/types';

/**
 * Captures query requests and answers them with canned results
 */
export class RecordingVectorStore implements VectorStore {
  readonly queries: Array<{ collection: string; request: StoreQueryRequest }> = [];

  constructor(
    private readonly results: RawResult[] = [],
    private readonly failure?: Error,
  ) {}

  async collectionExists(): Promise<boolean> {
    return true;
  }

  async createCollection(_name: string, _schema: CollectionSchema): Promise<void> {}

  async upsert(_collection: string, _points: PointStruct[]): Promise<void> {}

  async query(collection: string, request: StoreQueryRequest): Promise<RawResult[]> {
    this.queries.push({ collection, request });
    if (this.failure) throw this.failure;
    return this.results;
  }
}
