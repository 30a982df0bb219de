import { IssuerCreditProfile } from '../domain/credit';
import { BoundaryHit } from '../domain/enums';
import { RateProbabilityResult } from '../domain/rates';

const EPS = 1e-9;

const inUnitInterval = (v: number): boolean => Number.isFinite(v) && v >= 0 && v <= 1;

export function checkRateInvariants(result: RateProbabilityResult): string[] {
  const errors: string[] = [];

  const probabilities = [
    { name: 'pNoChange', value: result.pNoChange },
    { name: 'pHike', value: result.pHike },
    { name: 'pCut', value: result.pCut },
  ];
  probabilities.forEach((p) => {
    if (!inUnitInterval(p.value)) errors.push(`${p.name} is outside [0, 1] (${p.value})`);
  });

  const total = result.pNoChange + result.pHike + result.pCut;
  if (result.boundary.pNoChange === BoundaryHit.None && Math.abs(total - 1) > EPS) {
    errors.push(`Scenario probabilities sum to ${total}`);
  }

  if (!result.consistency.consistent) {
    errors.push(
      `No-change estimates disagree by ${result.consistency.discrepancy} ` +
        `(derived ${result.consistency.derived}, independent ${result.consistency.independent})`
    );
  }

  return errors;
}

export function checkCreditInvariants(profiles: IssuerCreditProfile[]): string[] {
  const errors: string[] = [];

  profiles.forEach((p) => {
    if (!(p.hazardRate >= 0)) errors.push(`Negative hazard rate on ${p.issuerId}: ${p.hazardRate}`);
    if (!inUnitInterval(p.pd5y)) errors.push(`pd5y outside [0, 1] on ${p.issuerId}: ${p.pd5y}`);
    p.pdCurve.forEach((point, i) => {
      const prev = p.pdCurve[i - 1];
      if (prev && point.pd < prev.pd) {
        errors.push(`PD curve of ${p.issuerId} decreases between ${prev.horizonYears}y and ${point.horizonYears}y`);
      }
    });
  });

  profiles.forEach((p, i) => {
    const prev = profiles[i - 1];
    if (!prev) return;
    if (prev.pd5y < p.pd5y || (prev.pd5y === p.pd5y && prev.issuerId > p.issuerId)) {
      errors.push(`Issuers out of order at ${prev.issuerId} / ${p.issuerId}`);
    }
  });

  return errors;
}
