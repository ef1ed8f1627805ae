import { RRF_K, reciprocalRankFusion } from './rrf';

describe('reciprocalRankFusion', () => {
  it('sums contributions of points found by several branches', () => {
    const fused = reciprocalRankFusion([
      [
        { id: 'a', score: 0.9 },
        { id: 'b', score: 0.8 },
        { id: 'c', score: 0.7 },
      ],
      [
        { id: 'c', score: 12 },
        { id: 'a', score: 3 },
      ],
    ]);

    expect(fused.map((point) => point.id)).toEqual(['a', 'c', 'b']);
    expect(fused[0].score).toBeCloseTo(1 / 61 + 1 / 62, 12);
    expect(fused[1].score).toBeCloseTo(1 / 63 + 1 / 61, 12);
    expect(fused[2].score).toBeCloseTo(1 / 62, 12);
  });

  it('ignores branch score scales', () => {
    const fused = reciprocalRankFusion([
      [{ id: 1, score: 1000 }],
      [{ id: 2, score: 0.001 }],
    ]);

    expect(fused).toEqual([
      { id: 1, score: 1 / (RRF_K + 1) },
      { id: 2, score: 1 / (RRF_K + 1) },
    ]);
  });

  it('breaks ties by first appearance', () => {
    const fused = reciprocalRankFusion([
      [{ id: 'late', score: 1 }],
      [{ id: 'early', score: 1 }],
    ]);

    expect(fused.map((point) => point.id)).toEqual(['late', 'early']);
  });

  it('honours a custom k', () => {
    const fused = reciprocalRankFusion([[{ id: 'x', score: 1 }]], 1);
    expect(fused).toEqual([{ id: 'x', score: 0.5 }]);
  });

  it('returns nothing for empty branches', () => {
    expect(reciprocalRankFusion([[], []])).toEqual([]);
  });
});
