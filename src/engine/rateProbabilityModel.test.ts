import { describe, expect, it } from 'vitest';
import { BoundaryHit } from '../domain/enums';
import { InvalidStepSizeError, InvalidTenorError } from '../domain/errors';
import { OISQuote, PolicyMeeting } from '../domain/market';
import {
  clipProbability,
  computeRateProbabilities,
  impliedPostMeetingRate,
  impliedStepProbability,
} from './rateProbabilityModel';

const steps = { hike: 0.0025, cut: -0.0025 };
const meeting: PolicyMeeting = { date: '2025-12-21', daysUntil: 30, expectedStep: 0.0025 };

const curveWithPost = (rPost: number): OISQuote[] => [
  { tenorDays: 1, rate: 0.001 },
  { tenorDays: 7, rate: 0.0011 },
  { tenorDays: 90, rate: rPost },
  { tenorDays: 180, rate: 0.002 },
];

describe('implied post-meeting rate', () => {
  it('reproduces the 30% hike example', () => {
    const inputs = { rPre: 0.001, rPost: 0.0015, dPre: 30, dPost: 60 };
    expect(impliedPostMeetingRate(inputs)).toBeCloseTo(0.00175, 12);

    const p = impliedStepProbability(inputs, 0.0025);
    expect(p.value).toBeCloseTo(0.3, 12);
    expect(p.boundary).toBe(BoundaryHit.None);
  });

  it('matches the closed form p = (rPost(dPre+dPost) - rPre dPre) / (step dPost)', () => {
    const cases = [
      { rPre: 0.001, rPost: 0.0015, dPre: 30, dPost: 60, step: 0.0025 },
      { rPre: 0.0048, rPost: 0.0051, dPre: 12, dPost: 79, step: 0.0025 },
      { rPre: 0.0048, rPost: 0.0046, dPre: 45, dPost: 45, step: -0.0025 },
      { rPre: 0.0, rPost: 0.0002, dPre: 0, dPost: 30, step: 0.001 },
    ];
    cases.forEach(({ step, ...inputs }) => {
      const expected = (inputs.rPost * (inputs.dPre + inputs.dPost) - inputs.rPre * inputs.dPre) / (step * inputs.dPost);
      expect(impliedStepProbability(inputs, step).raw).toBeCloseTo(expected, 12);
    });
  });

  it('rises strictly with rPost', () => {
    let prevRate = -Infinity;
    let prevP = -Infinity;
    for (let bp = 10; bp <= 20; bp++) {
      const inputs = { rPre: 0.001, rPost: bp / 10_000, dPre: 30, dPost: 60 };
      const rate = impliedPostMeetingRate(inputs);
      const p = impliedStepProbability(inputs, 0.0025).raw;
      expect(rate).toBeGreaterThan(prevRate);
      expect(p).toBeGreaterThan(prevP);
      prevRate = rate;
      prevP = p;
    }
  });

  it('clips out-of-range probabilities and flags the boundary', () => {
    const high = impliedStepProbability({ rPre: 0.001, rPost: 0.005, dPre: 30, dPost: 60 }, 0.0025);
    expect(high.raw).toBeCloseTo(2.4, 12);
    expect(high.value).toBe(1);
    expect(high.boundary).toBe(BoundaryHit.Cap);

    const low = impliedStepProbability({ rPre: 0.001, rPost: 0.0005, dPre: 30, dPost: 60 }, 0.0025);
    expect(low.raw).toBeCloseTo(-0.3, 12);
    expect(low.value).toBe(0);
    expect(low.boundary).toBe(BoundaryHit.Floor);

    expect(clipProbability(Number.NaN)).toEqual({ raw: Number.NaN, value: 0, boundary: BoundaryHit.Floor });
  });

  it('rejects a post tenor that does not extend past the meeting', () => {
    expect(() => impliedPostMeetingRate({ rPre: 0.001, rPost: 0.0015, dPre: 30, dPost: 0 })).toThrow(InvalidTenorError);
  });

  it('rejects a zero step size', () => {
    expect(() => impliedStepProbability({ rPre: 0.001, rPost: 0.0015, dPre: 30, dPost: 60 }, 0)).toThrow(
      InvalidStepSizeError
    );
  });
});

describe('computeRateProbabilities', () => {
  it('splits a hike-leaning curve into hike and no-change', () => {
    const result = computeRateProbabilities(curveWithPost(0.0015), meeting, steps);

    expect(result.currentRate).toBe(0.001);
    expect(result.postRate).toBe(0.0015);
    expect(result.postTenorDays).toBe(90);
    expect(result.daysToMeeting).toBe(30);
    expect(result.impliedRate).toBeCloseTo(0.00175, 12);

    expect(result.pHike).toBeCloseTo(0.3, 12);
    expect(result.pCut).toBe(0);
    expect(result.pNoChange).toBeCloseTo(0.7, 12);
    expect(result.boundary).toEqual({
      pNoChange: BoundaryHit.None,
      pHike: BoundaryHit.None,
      pCut: BoundaryHit.Floor,
    });
    expect(result.raw.pCut).toBeCloseTo(-0.3, 12);
  });

  it('splits a cut-leaning curve into cut and no-change', () => {
    const result = computeRateProbabilities(curveWithPost(0.0005), meeting, steps);
    expect(result.impliedRate).toBeCloseTo(0.00025, 12);
    expect(result.pCut).toBeCloseTo(0.3, 12);
    expect(result.pHike).toBe(0);
    expect(result.pNoChange).toBeCloseTo(0.7, 12);
  });

  it('finds no-change consistent when the next tenor implies the same post-meeting rate', () => {
    [0.0005, 0.001, 0.0015, 0.004].forEach((rPost) => {
      const expected = (rPost * 90 - 0.001 * 30) / 60;
      const curve = curveWithPost(rPost).map((q) =>
        q.tenorDays === 180 ? { ...q, rate: (0.001 * 30 + expected * 150) / 180 } : q
      );
      const { consistency, pNoChange } = computeRateProbabilities(curve, meeting, steps);
      expect(consistency.derived).toBe(pNoChange);
      expect(consistency.independent).toBeCloseTo(consistency.derived, 9);
      expect(consistency.checkTenorDays).toBe(180);
      expect(consistency.consistent).toBe(true);
    });
  });

  it('flags no-change as inconsistent when the next tenor prices a larger move', () => {
    const { consistency, pNoChange } = computeRateProbabilities(curveWithPost(0.0015), meeting, steps);
    expect(pNoChange).toBeCloseTo(0.7, 12);
    expect(consistency.independent).toBeCloseTo(0.52, 12);
    expect(consistency.discrepancy).toBeCloseTo(0.18, 12);
    expect(consistency.checkTenorDays).toBe(180);
    expect(consistency.consistent).toBe(false);
  });

  it('skips the no-change check when no tenor follows the post-meeting one', () => {
    const curve: OISQuote[] = [
      { tenorDays: 1, rate: 0.001 },
      { tenorDays: 90, rate: 0.0015 },
    ];
    const { consistency } = computeRateProbabilities(curve, meeting, steps);
    expect(consistency).toEqual({
      derived: consistency.derived,
      independent: consistency.derived,
      discrepancy: 0,
      consistent: true,
      checkTenorDays: null,
    });
  });

  it('caps a curve that prices more than a full step', () => {
    const result = computeRateProbabilities(curveWithPost(0.005), meeting, steps);
    expect(result.pHike).toBe(1);
    expect(result.boundary.pHike).toBe(BoundaryHit.Cap);
    expect(result.pNoChange).toBe(0);
  });

  it('falls back to the shortest tenor when there is no overnight quote', () => {
    const result = computeRateProbabilities(
      [
        { tenorDays: 7, rate: 0.001 },
        { tenorDays: 90, rate: 0.0015 },
      ],
      meeting,
      steps
    );
    expect(result.currentRate).toBe(0.001);
    expect(result.pHike).toBeCloseTo(0.3, 12);
  });

  it('skips a tenor that ends exactly on the meeting date', () => {
    const result = computeRateProbabilities(
      [
        { tenorDays: 1, rate: 0.001 },
        { tenorDays: 30, rate: 0.0012 },
        { tenorDays: 90, rate: 0.0015 },
      ],
      meeting,
      steps
    );
    expect(result.postTenorDays).toBe(90);
  });

  it('fails when no tenor reaches past the meeting', () => {
    expect(() => computeRateProbabilities(curveWithPost(0.0015), { ...meeting, daysUntil: 200 }, steps)).toThrow(
      InvalidTenorError
    );
  });

  it('rejects step sizes with the wrong sign', () => {
    expect(() => computeRateProbabilities(curveWithPost(0.0015), meeting, { hike: -0.0025, cut: -0.0025 })).toThrow(
      InvalidStepSizeError
    );
    expect(() => computeRateProbabilities(curveWithPost(0.0015), meeting, { hike: 0.0025, cut: 0 })).toThrow(
      InvalidStepSizeError
    );
  });
});
