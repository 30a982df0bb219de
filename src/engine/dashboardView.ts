/**
 * Dashboard payload: the snapshot plus the curves, rounded and unit-converted the way the web
 * templates print them (percent, basis points, years).
 */
import { NormalisedMarketData } from '../domain/market';
import { MetricsSnapshot } from '../domain/snapshot';
import { roundTo, toBps, toPercent } from '../utils/formatters';
import { createCurveLookup } from './governmentCurve';
import { parseTenor, tenorToYears } from './tenors';

export const STANDARD_CURVE_TENORS = [
  '1D', '1W', '2W', '1M', '2M', '3M', '6M', '9M',
  '1Y', '2Y', '3Y', '4Y', '5Y', '7Y', '10Y', '15Y', '20Y', '30Y', '40Y',
];

export interface CurveRow {
  tenor: string;
  years: number;
  rate: number;
}

export interface IssuerRow {
  issuer: string;
  nBonds: number;
  avgSpreadBps: number;
  avgYears: number;
  pd: Record<string, number>;
  hazardClamped: boolean;
}

export interface DashboardView {
  latestDate: string;
  updatedAt: string;
  oisCurve: CurveRow[];
  jgbCurve: CurveRow[];
  ratePolicy: {
    nextMeetingDate: string;
    daysToMeeting: number;
    currentRate: number;
    impliedRate: number;
    probabilities: { noChange: number; hike: number; cut: number };
    boundaryHit: boolean;
  };
  credit: IssuerRow[];
}

/** Samples the government curve at the standard tenors that fall inside its maturity range. */
export const sampleGovernmentCurve = (market: NormalisedMarketData, tenors: string[] = STANDARD_CURVE_TENORS): CurveRow[] => {
  if (market.governmentCurve.length < 2) return [];
  const curve = createCurveLookup(market.governmentCurve);

  const rows: CurveRow[] = [];
  tenors.forEach((label) => {
    const tenor = parseTenor(label);
    if (!tenor) return;
    const years = tenorToYears(tenor);
    if (years < curve.minMaturity || years > curve.maxMaturity) return;
    rows.push({ tenor: label, years, rate: toPercent(curve.yieldAt(years), 3) });
  });
  return rows;
};

export const buildDashboardView = (snapshot: MetricsSnapshot, market: NormalisedMarketData): DashboardView => {
  const r = snapshot.rateResult;
  return {
    latestDate: market.asOf,
    updatedAt: snapshot.asOf,
    oisCurve: market.oisCurve.map((q) => {
      const tenor = q.tenor ? parseTenor(q.tenor) : null;
      return {
        tenor: q.tenor ?? `${q.tenorDays}D`,
        years: tenor ? tenorToYears(tenor) : q.tenorDays / 365,
        rate: toPercent(q.rate, 3),
      };
    }),
    jgbCurve: sampleGovernmentCurve(market),
    ratePolicy: {
      nextMeetingDate: r.meetingDate,
      daysToMeeting: r.daysToMeeting,
      currentRate: toPercent(r.currentRate, 3),
      impliedRate: toPercent(r.impliedRate, 3),
      probabilities: {
        noChange: toPercent(r.pNoChange, 1),
        hike: toPercent(r.pHike, 1),
        cut: toPercent(r.pCut, 1),
      },
      boundaryHit: snapshot.flags.rateBoundaryHit,
    },
    credit: snapshot.creditProfiles.map((p) => ({
      issuer: p.issuerId,
      nBonds: p.bondCount,
      avgSpreadBps: toBps(p.spread, 1),
      avgYears: roundTo(p.avgMaturityYears, 1),
      pd: Object.fromEntries(p.pdCurve.map((point) => [`${point.horizonYears}y`, toPercent(point.pd, 2)])),
      hazardClamped: p.hazardClamped,
    })),
  };
};
