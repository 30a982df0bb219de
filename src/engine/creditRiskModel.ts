/**
 * Issuer credit model (spread-implied hazard rates)
 *
 * Each issuer is approximated by ONE flat hazard rate backed out of its average spread over the
 * JGB curve: `spread ≈ LGD * λ`, so `λ = s / (1 - R)` and `PD(T) = 1 - exp(-λT)`. Sparse quotes do
 * not support a hazard term structure, so none is built.
 */
import { HazardRate, IssuerCreditProfile, PdCurvePoint } from '../domain/credit';
import { ConfigurationError, UnknownIssuerError } from '../domain/errors';
import { BondQuote, GovernmentCurvePoint } from '../domain/market';
import { createCurveLookup, CurveLookup } from './governmentCurve';
import { RANKING_HORIZON_YEARS } from './normalise';

export interface CreditModelOptions {
  pdHorizonsYears?: number[];
  /** Issuers that must be present; each one without quotes fails the evaluation. */
  issuers?: string[];
}

const DEFAULT_HORIZONS = [1, 3, 5, 10];

const assertRecoveryRate = (recoveryRate: number): void => {
  if (!Number.isFinite(recoveryRate) || recoveryRate < 0 || recoveryRate >= 1) {
    throw new ConfigurationError(`Recovery rate must be in [0, 1), got ${recoveryRate}`, { recoveryRate });
  }
};

/** `λ = s / (1 - R)`; a negative spread is a data anomaly and gives `λ = 0` with `clamped` set. */
export const hazardRate = (spread: number, recoveryRate: number): HazardRate => {
  assertRecoveryRate(recoveryRate);
  const lambda = spread / (1 - recoveryRate);
  return lambda < 0 ? { value: 0, clamped: true } : { value: lambda, clamped: false };
};

export const defaultProbability = (lambda: number, horizonYears: number): number =>
  1 - Math.exp(-lambda * horizonYears);

export const pdCurve = (lambda: number, horizonsYears: number[]): PdCurvePoint[] =>
  horizonsYears.map((horizonYears) => ({ horizonYears, pd: defaultProbability(lambda, horizonYears) }));

const mean = (values: number[]): number => values.reduce((a, v) => a + v, 0) / values.length;

const withRankingHorizon = (horizons: number[]): number[] =>
  [...new Set([...horizons, RANKING_HORIZON_YEARS])].sort((a, b) => a - b);

export const buildIssuerProfile = (
  issuerId: string,
  quotes: BondQuote[],
  curve: CurveLookup,
  recoveryRate: number,
  horizonsYears: number[] = DEFAULT_HORIZONS
): IssuerCreditProfile => {
  if (quotes.length === 0) throw new UnknownIssuerError(issuerId);

  const spread = mean(quotes.map((q) => q.yield - curve.yieldAt(q.maturityYears)));
  const hazard = hazardRate(spread, recoveryRate);

  return {
    issuerId,
    bondCount: quotes.length,
    avgMaturityYears: mean(quotes.map((q) => q.maturityYears)),
    spread,
    hazardRate: hazard.value,
    hazardClamped: hazard.clamped,
    pd5y: defaultProbability(hazard.value, RANKING_HORIZON_YEARS),
    pdCurve: pdCurve(hazard.value, withRankingHorizon(horizonsYears)),
  };
};

/** Riskiest first: `pd5y` descending, then `issuerId` ascending. Returns a new array. */
export const rankIssuers = (profiles: IssuerCreditProfile[]): IssuerCreditProfile[] =>
  [...profiles].sort((a, b) => {
    if (a.pd5y !== b.pd5y) return b.pd5y - a.pd5y;
    if (a.issuerId === b.issuerId) return 0;
    return a.issuerId < b.issuerId ? -1 : 1;
  });

/**
 * Groups quotes by issuer, prices each bond's spread against the government curve and returns the
 * ranked issuer profiles.
 *
 * Throws `CurveLookupError` when a bond matures outside the curve, `UnknownIssuerError` when an
 * issuer listed in `options.issuers` has no quotes, `ConfigurationError` for a bad recovery rate.
 */
export const computeCreditProfiles = (
  bondQuotes: BondQuote[],
  governmentCurve: GovernmentCurvePoint[],
  recoveryRate: number,
  options: CreditModelOptions = {}
): IssuerCreditProfile[] => {
  assertRecoveryRate(recoveryRate);

  const byIssuer = new Map<string, BondQuote[]>();
  (options.issuers ?? []).forEach((issuerId) => byIssuer.set(issuerId, []));
  bondQuotes.forEach((q) => {
    const quotes = byIssuer.get(q.issuerId) ?? [];
    quotes.push(q);
    byIssuer.set(q.issuerId, quotes);
  });
  if (byIssuer.size === 0) return [];
  const missing = [...byIssuer.entries()].find(([, quotes]) => quotes.length === 0);
  if (missing) throw new UnknownIssuerError(missing[0], { watchList: options.issuers });

  const curve = createCurveLookup(governmentCurve);
  const profiles = [...byIssuer.entries()].map(([issuerId, quotes]) =>
    buildIssuerProfile(issuerId, quotes, curve, recoveryRate, options.pdHorizonsYears)
  );
  return rankIssuers(profiles);
};
