import {
  InvalidPlanError,
  fusionStage,
  rerankStage,
  stageCapacity,
  unionStage,
  validateStagedQuery,
  vectorStage,
} from './staged-query';

const dense = (limit: number) => vectorStage({ field: 'dense', vector: [0.1, 0.2] }, limit);
const sparse = (limit: number) =>
  vectorStage({ field: 'sparse', vector: { indices: [3], values: [1] } }, limit);

describe('validateStagedQuery', () => {
  it('accepts a rerank over a union of prefetches', () => {
    const plan = rerankStage(
      unionStage([dense(20), sparse(20)]),
      { field: 'colbert', vector: [[1, 0]] },
      10,
    );
    expect(() => validateStagedQuery(plan)).not.toThrow();
  });

  it('accepts a fusion nested under a union', () => {
    const plan = rerankStage(
      unionStage([dense(100), fusionStage([dense(100), sparse(25)], 50)]),
      { field: 'colbert', vector: [[1, 0]] },
      10,
    );
    expect(() => validateStagedQuery(plan)).not.toThrow();
  });

  it('rejects a union at the root', () => {
    expect(() => validateStagedQuery(unionStage([dense(1), sparse(1)]))).toThrow(
      new InvalidPlanError('root: union is only valid as a rerank source'),
    );
  });

  it('rejects a union nested directly in a fusion', () => {
    const plan = fusionStage([unionStage([dense(1), sparse(1)]), dense(1)], 5);
    expect(() => validateStagedQuery(plan)).toThrow(
      'root.branches[0]: union is only valid as a rerank source',
    );
  });

  it('rejects a fusion with a single branch', () => {
    expect(() => validateStagedQuery(fusionStage([dense(5)], 5))).toThrow(
      'root: needs at least 2 branches, got 1',
    );
  });

  it('rejects non-positive limits anywhere in the tree', () => {
    const plan = rerankStage(dense(0), { field: 'colbert', vector: [[1]] }, 10);
    expect(() => validateStagedQuery(plan)).toThrow(
      'root.source: limit must be a positive integer, got 0',
    );
  });

  it('rejects sparse vectors whose indices and values differ in length', () => {
    const plan = vectorStage({ field: 'sparse', vector: { indices: [1, 2], values: [1] } }, 5);
    expect(() => validateStagedQuery(plan)).toThrow(
      'root: sparse indices and values differ in length',
    );
  });

  it('rejects empty dense vectors', () => {
    const plan = vectorStage({ field: 'small-embedding', vector: [] }, 5);
    expect(() => validateStagedQuery(plan)).toThrow('root: empty small-embedding vector');
  });
});

describe('stageCapacity', () => {
  it('caps a rerank by its own limit', () => {
    const plan = rerankStage(
      unionStage([dense(20), sparse(20)]),
      { field: 'colbert', vector: [[1]] },
      10,
    );
    expect(stageCapacity(plan)).toBe(10);
  });

  it('caps a fusion by the candidates its branches can supply', () => {
    expect(stageCapacity(fusionStage([dense(3), sparse(2)], 50))).toBe(5);
    expect(stageCapacity(fusionStage([dense(100), sparse(25)], 50))).toBe(50);
  });

  it('sums union branches', () => {
    expect(stageCapacity(unionStage([dense(20), sparse(7)]))).toBe(27);
  });
});
