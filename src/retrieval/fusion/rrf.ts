/**
 * Reciprocal Rank Fusion (RRF)
 *
 * RRF Formula: score(point) = Σ 1 / (k + rank_i) where k=60
 * - Only ranks matter; branch score scales are ignored
 * - Points found by several branches add their contributions
 * - Points found by one branch still receive a score
 */

export const RRF_K = 60;

export interface RankedPoint<TId> {
  id: TId;
  score: number;
}

export function reciprocalRankFusion<TId>(
  branches: ReadonlyArray<ReadonlyArray<RankedPoint<TId>>>,
  k: number = RRF_K,
): RankedPoint<TId>[] {
  const fused = new Map<TId, { score: number; firstSeen: number }>();
  let order = 0;

  for (const branch of branches) {
    branch.forEach((point, index) => {
      const rank = index + 1;
      const contribution = 1 / (k + rank);
      const existing = fused.get(point.id);
      if (existing) {
        existing.score += contribution;
      } else {
        fused.set(point.id, { score: contribution, firstSeen: order++ });
      }
    });
  }

  return Array.from(fused.entries())
    .sort((a, b) => b[1].score - a[1].score || a[1].firstSeen - b[1].firstSeen)
    .map(([id, { score }]) => ({ id, score }));
}
