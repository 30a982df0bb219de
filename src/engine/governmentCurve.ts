import { GovernmentCurvePoint } from '../domain/market';
import { CurveLookupError } from '../domain/errors';

export interface CurveLookup {
  minMaturity: number;
  maxMaturity: number;
  yieldAt: (maturityYears: number) => number;
}

/**
 * Purpose: Build a yield lookup over the government (JGB) curve.
 * Parameters:
 * - `points: GovernmentCurvePoint[]`: curve nodes, any order. Nodes sharing a maturity are averaged.
 * Returns: `CurveLookup` that interpolates linearly between adjacent nodes and hits nodes exactly.
 * Side effects: none (the lookup closes over a sorted copy of the nodes).
 * Errors:
 * - Throws `CurveLookupError` when fewer than 2 distinct maturities remain.
 * - `yieldAt` throws `CurveLookupError` for a maturity outside `[minMaturity, maxMaturity]`;
 *   the long end is never extrapolated.
 *
 * Linear interpolation keeps the looked-up yield between its two neighbouring nodes, so a monotone
 * stretch of the curve stays monotone.
 */
export const createCurveLookup = (points: GovernmentCurvePoint[]): CurveLookup => {
  const nodes = averageByMaturity(points);
  if (nodes.length < 2) {
    throw new CurveLookupError('Government curve needs at least 2 distinct maturities', {
      nodeCount: nodes.length,
    });
  }

  const minMaturity = nodes[0].maturityYears;
  const maxMaturity = nodes[nodes.length - 1].maturityYears;

  const yieldAt = (maturityYears: number): number => {
    if (!Number.isFinite(maturityYears) || maturityYears < minMaturity || maturityYears > maxMaturity) {
      throw new CurveLookupError(`No government yield for maturity ${maturityYears}y`, {
        maturityYears,
        minMaturity,
        maxMaturity,
      });
    }

    // First node at or beyond the requested maturity. The range check guarantees one exists, and
    // anything strictly inside the range has a left neighbour.
    const hi = nodes.findIndex((n) => n.maturityYears >= maturityYears);
    if (nodes[hi].maturityYears === maturityYears) return nodes[hi].yield;
    const left = nodes[hi - 1];
    const right = nodes[hi];
    const w = (maturityYears - left.maturityYears) / (right.maturityYears - left.maturityYears);
    return left.yield + w * (right.yield - left.yield);
  };

  return { minMaturity, maxMaturity, yieldAt };
};

export const averageByMaturity = (points: GovernmentCurvePoint[]): GovernmentCurvePoint[] => {
  const buckets = new Map<number, { sum: number; n: number }>();
  points.forEach(({ maturityYears, yield: y }) => {
    const bucket = buckets.get(maturityYears) ?? { sum: 0, n: 0 };
    bucket.sum += y;
    bucket.n += 1;
    buckets.set(maturityYears, bucket);
  });
  return [...buckets.entries()]
    .map(([maturityYears, { sum, n }]) => ({ maturityYears, yield: sum / n }))
    .sort((a, b) => a.maturityYears - b.maturityYears);
};
