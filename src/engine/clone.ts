import { IssuerCreditProfile } from '../domain/credit';
import { RateProbabilityResult } from '../domain/rates';
import { MetricsSnapshot, SnapshotFlags } from '../domain/snapshot';

export const cloneRateResult = (r: RateProbabilityResult): RateProbabilityResult => ({
  ...r,
  raw: { ...r.raw },
  boundary: { ...r.boundary },
  stepSizes: { ...r.stepSizes },
  consistency: { ...r.consistency },
});

export const cloneIssuerProfile = (p: IssuerCreditProfile): IssuerCreditProfile => ({
  ...p,
  pdCurve: p.pdCurve.map((point) => ({ ...point })),
});

const cloneFlags = (f: SnapshotFlags): SnapshotFlags => ({
  ...f,
  clampedIssuers: [...f.clampedIssuers],
  warnings: [...f.warnings],
});

export const cloneMetricsSnapshot = (s: MetricsSnapshot): MetricsSnapshot => ({
  ...s,
  rateResult: cloneRateResult(s.rateResult),
  creditProfiles: s.creditProfiles.map(cloneIssuerProfile),
  flags: cloneFlags(s.flags),
});

// Freezes every nested object and array so a published snapshot cannot be edited by its readers.
export const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.values(value).forEach((child: unknown) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};
