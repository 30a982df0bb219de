import { IssuerCreditProfile } from './credit';
import { RateProbabilityResult } from './rates';

export interface SnapshotFlags {
  rateBoundaryHit: boolean;
  clampedIssuers: string[];
  warnings: string[];
}

export interface MetricsSnapshot {
  asOf: string;
  version?: string;
  rateResult: RateProbabilityResult;
  creditProfiles: IssuerCreditProfile[];
  flags: SnapshotFlags;
}
