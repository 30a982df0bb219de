import { describe, expect, it } from 'vitest';
import { CurveLookupError } from '../domain/errors';
import { averageByMaturity, createCurveLookup } from './governmentCurve';

describe('government curve lookup', () => {
  const curve = createCurveLookup([
    { maturityYears: 5, yield: 0.009 },
    { maturityYears: 1, yield: 0.001 },
    { maturityYears: 2, yield: 0.003 },
  ]);

  it('hits nodes exactly and interpolates linearly between them', () => {
    expect(curve.minMaturity).toBe(1);
    expect(curve.maxMaturity).toBe(5);
    expect(curve.yieldAt(2)).toBe(0.003);
    expect(curve.yieldAt(1.5)).toBeCloseTo(0.002, 12);
    expect(curve.yieldAt(3.5)).toBeCloseTo(0.006, 12);
  });

  it('keeps a rising curve rising between nodes', () => {
    let prev = -Infinity;
    for (let m = 1; m <= 5; m += 0.25) {
      const y = curve.yieldAt(m);
      expect(y).toBeGreaterThan(prev);
      prev = y;
    }
  });

  it('refuses to extrapolate past either end', () => {
    expect(() => curve.yieldAt(5.01)).toThrow(CurveLookupError);
    expect(() => curve.yieldAt(0.5)).toThrow(CurveLookupError);
    expect(() => curve.yieldAt(Number.NaN)).toThrow(CurveLookupError);
  });

  it('needs two distinct maturities', () => {
    expect(() => createCurveLookup([])).toThrow(CurveLookupError);
    expect(() =>
      createCurveLookup([
        { maturityYears: 1, yield: 0.001 },
        { maturityYears: 1, yield: 0.002 },
      ])
    ).toThrow(CurveLookupError);
  });

  it('averages nodes that share a maturity', () => {
    const nodes = averageByMaturity([
      { maturityYears: 2, yield: 0.004 },
      { maturityYears: 1, yield: 0.001 },
      { maturityYears: 1, yield: 0.003 },
    ]);
    expect(nodes.map((n) => n.maturityYears)).toEqual([1, 2]);
    expect(nodes[0].yield).toBeCloseTo(0.002, 12);
    expect(createCurveLookup(nodes).yieldAt(1)).toBeCloseTo(0.002, 12);
  });
});
