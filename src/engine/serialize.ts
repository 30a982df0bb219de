import { IssuerCreditProfile } from '../domain/credit';
import { BoundaryHit } from '../domain/enums';
import { RateProbabilityResult } from '../domain/rates';
import { MetricsSnapshot } from '../domain/snapshot';

// Wire shape consumed by the web layer; field names are part of its template contract.
export interface SerializedRateResult {
  p_no_change: number;
  p_hike: number;
  p_cut: number;
  boundary_hit: {
    p_no_change: BoundaryHit;
    p_hike: BoundaryHit;
    p_cut: BoundaryHit;
  };
  meeting_date: string;
  days_to_meeting: number;
  post_tenor_days: number;
  current_rate: number;
  post_rate: number;
  implied_rate: number;
  no_change_discrepancy: number;
  no_change_check_tenor_days: number | null;
}

export interface SerializedCreditProfile {
  issuer_id: string;
  bond_count: number;
  avg_maturity_years: number;
  spread: number;
  hazard_rate: number;
  hazard_clamped: boolean;
  pd_5y: number;
  pd_curve: Record<string, number>;
}

export interface SerializedSnapshot {
  as_of: string;
  version: string | null;
  rate_result: SerializedRateResult;
  credit_profiles: SerializedCreditProfile[];
  rate_boundary_hit: boolean;
  clamped_issuers: string[];
  warnings: string[];
}

const serializeRateResult = (r: RateProbabilityResult): SerializedRateResult => ({
  p_no_change: r.pNoChange,
  p_hike: r.pHike,
  p_cut: r.pCut,
  boundary_hit: {
    p_no_change: r.boundary.pNoChange,
    p_hike: r.boundary.pHike,
    p_cut: r.boundary.pCut,
  },
  meeting_date: r.meetingDate,
  days_to_meeting: r.daysToMeeting,
  post_tenor_days: r.postTenorDays,
  current_rate: r.currentRate,
  post_rate: r.postRate,
  implied_rate: r.impliedRate,
  no_change_discrepancy: r.consistency.discrepancy,
  no_change_check_tenor_days: r.consistency.checkTenorDays,
});

const serializeProfile = (p: IssuerCreditProfile): SerializedCreditProfile => ({
  issuer_id: p.issuerId,
  bond_count: p.bondCount,
  avg_maturity_years: p.avgMaturityYears,
  spread: p.spread,
  hazard_rate: p.hazardRate,
  hazard_clamped: p.hazardClamped,
  pd_5y: p.pd5y,
  pd_curve: Object.fromEntries(p.pdCurve.map((point) => [String(point.horizonYears), point.pd])),
});

export const serializeSnapshot = (s: MetricsSnapshot): SerializedSnapshot => ({
  as_of: s.asOf,
  version: s.version ?? null,
  rate_result: serializeRateResult(s.rateResult),
  credit_profiles: s.creditProfiles.map(serializeProfile),
  rate_boundary_hit: s.flags.rateBoundaryHit,
  clamped_issuers: [...s.flags.clampedIssuers],
  warnings: [...s.flags.warnings],
});
