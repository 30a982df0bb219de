/**
 * Market data adapter.
 *
 * Turns the loosely-typed documents produced by the data-loading job (JPX OIS rate sheet, BoJ
 * meeting calendar, bond yields, JGB curve, JSDA reference prices) into the validated value types
 * the two models consume. Every function here is a pure transformation; bad input fails with a
 * `DataValidationError` whose `details.issues` lists each offending field.
 */
import { z } from 'zod';
import { EngineConfig } from '../domain/config';
import { RateUnit } from '../domain/enums';
import { DataValidationError, MissingMeetingError } from '../domain/errors';
import {
  BondQuote,
  GovernmentCurvePoint,
  JsdaClassification,
  JsdaRecord,
  NormalisedMarketData,
  OISQuote,
  PolicyMeeting,
  RawBondQuote,
  RawCurvePoint,
  RawMarketData,
  RawOisQuote,
} from '../domain/market';
import { averageByMaturity } from './governmentCurve';
import { daysBetween, formatIsoDate, parseIsoDate, parseTenor, tenorToDays } from './tenors';

const RawOisQuoteSchema = z.object({
  tenor: z.string().optional(),
  tenor_days: z.number().optional(),
  rate: z.number(),
});

const RawBondQuoteSchema = z.object({
  issuer_id: z.string(),
  maturity_years: z.number(),
  yield: z.number(),
  bond_id: z.string().optional(),
});

const RawCurvePointSchema = z.object({
  maturity_years: z.number(),
  yield: z.number(),
});

export const RawMarketDataSchema = z.object({
  source_date: z.string(),
  updated_at: z.string().optional(),
  source_url: z.string().optional(),
  rate_unit: z.nativeEnum(RateUnit).optional(),
  rates: z.array(RawOisQuoteSchema),
  boj_meetings: z.array(z.string()),
  bond_quotes: z.array(RawBondQuoteSchema).optional(),
  jgb_curve: z.array(RawCurvePointSchema).optional(),
});

export interface UnitOptions {
  rateUnit: RateUnit;
}

export interface OisCurveOptions extends UnitOptions {
  asOf: Date;
}

const GOVERNMENT_NAME_PATTERN = /国庫短期証券|国債/;
const CORPORATE_CATEGORY = 40;
const DAYS_PER_YEAR = 365;
const JSDA_MISSING_YIELD = 999;

const toDecimal = (value: number, unit: RateUnit): number => (unit === RateUnit.Percent ? value / 100 : value);

const fail = (what: string, issues: string[]): never => {
  throw new DataValidationError(`Invalid ${what}: ${issues.join('; ')}`, { issues });
};

export const parseRawMarketData = (raw: unknown): RawMarketData => {
  const result = RawMarketDataSchema.safeParse(raw);
  if (result.success) return result.data;
  return fail(
    'market data document',
    result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
  );
};

export const normaliseOisCurve = (raw: RawOisQuote[], options: OisCurveOptions): OISQuote[] => {
  const issues: string[] = [];
  const quotes: OISQuote[] = [];

  raw.forEach((q, i) => {
    let tenorDays: number | null = null;
    if (q.tenor_days !== undefined) {
      if (!Number.isInteger(q.tenor_days) || q.tenor_days < 0) {
        issues.push(`rates.${i}.tenor_days: must be a non-negative integer, got ${q.tenor_days}`);
      } else {
        tenorDays = q.tenor_days;
      }
    } else if (q.tenor !== undefined) {
      const tenor = parseTenor(q.tenor);
      if (tenor) {
        tenorDays = tenorToDays(tenor, options.asOf);
      } else {
        issues.push(`rates.${i}.tenor: unrecognised tenor "${q.tenor}"`);
      }
    } else {
      issues.push(`rates.${i}: needs tenor or tenor_days`);
    }

    if (!Number.isFinite(q.rate)) {
      issues.push(`rates.${i}.rate: must be finite, got ${q.rate}`);
    }
    if (tenorDays !== null && Number.isFinite(q.rate)) {
      quotes.push({ tenorDays, rate: toDecimal(q.rate, options.rateUnit), ...(q.tenor ? { tenor: q.tenor } : {}) });
    }
  });

  const seen = new Set<number>();
  quotes.forEach((q) => {
    if (seen.has(q.tenorDays)) issues.push(`rates: duplicate tenor of ${q.tenorDays} days`);
    seen.add(q.tenorDays);
  });
  if (raw.length === 0) issues.push('rates: curve is empty');

  if (issues.length > 0) fail('OIS curve', issues);
  return quotes.sort((a, b) => a.tenorDays - b.tenorDays);
};

export const normaliseBondQuotes = (raw: RawBondQuote[], options: UnitOptions): BondQuote[] => {
  const issues: string[] = [];
  const quotes: BondQuote[] = [];

  raw.forEach((q, i) => {
    const issuerId = q.issuer_id.trim();
    const before = issues.length;
    if (issuerId === '') issues.push(`bond_quotes.${i}.issuer_id: must not be blank`);
    if (!Number.isFinite(q.maturity_years) || q.maturity_years <= 0) {
      issues.push(`bond_quotes.${i}.maturity_years: must be positive, got ${q.maturity_years}`);
    }
    if (!Number.isFinite(q.yield)) issues.push(`bond_quotes.${i}.yield: must be finite, got ${q.yield}`);
    if (issues.length > before) return;

    quotes.push({
      issuerId,
      maturityYears: q.maturity_years,
      yield: toDecimal(q.yield, options.rateUnit),
      ...(q.bond_id ? { bondId: q.bond_id } : {}),
    });
  });

  if (issues.length > 0) fail('bond quotes', issues);
  return quotes;
};

export const normaliseGovernmentCurve = (raw: RawCurvePoint[], options: UnitOptions): GovernmentCurvePoint[] => {
  const issues: string[] = [];
  raw.forEach((p, i) => {
    if (!Number.isFinite(p.maturity_years) || p.maturity_years <= 0) {
      issues.push(`jgb_curve.${i}.maturity_years: must be positive, got ${p.maturity_years}`);
    }
    if (!Number.isFinite(p.yield)) issues.push(`jgb_curve.${i}.yield: must be finite, got ${p.yield}`);
  });
  if (issues.length > 0) fail('government curve', issues);

  return averageByMaturity(
    raw.map((p) => ({ maturityYears: p.maturity_years, yield: toDecimal(p.yield, options.rateUnit) }))
  );
};

/** Earliest meeting on or after `asOf`; a meeting on the as-of date itself has `daysUntil = 0`. */
export const selectNextMeeting = (meetingDates: string[], asOf: Date, expectedStep: number): PolicyMeeting => {
  const issues: string[] = [];
  const upcoming: Array<{ date: Date; daysUntil: number }> = [];

  meetingDates.forEach((value, i) => {
    const date = parseIsoDate(value);
    if (!date) {
      issues.push(`boj_meetings.${i}: not a calendar date "${value}"`);
      return;
    }
    const daysUntil = daysBetween(asOf, date);
    if (daysUntil >= 0) upcoming.push({ date, daysUntil });
  });
  if (issues.length > 0) fail('meeting calendar', issues);

  if (upcoming.length === 0) {
    throw new MissingMeetingError(`No policy meeting on or after ${formatIsoDate(asOf)}`, {
      asOf: formatIsoDate(asOf),
      configuredMeetings: meetingDates.length,
    });
  }
  const next = upcoming.reduce((best, m) => (m.daysUntil < best.daysUntil ? m : best));
  return { date: formatIsoDate(next.date), daysUntil: next.daysUntil, expectedStep };
};

export const normaliseMarketData = (raw: unknown, config: EngineConfig): NormalisedMarketData => {
  const doc = parseRawMarketData(raw);
  const asOf = parseIsoDate(doc.source_date);
  if (!asOf) {
    return fail('market data document', [`source_date: not a calendar date "${doc.source_date}"`]);
  }
  const rateUnit = doc.rate_unit ?? config.rateUnit;

  return {
    asOf: formatIsoDate(asOf),
    oisCurve: normaliseOisCurve(doc.rates, { asOf, rateUnit }),
    meeting: selectNextMeeting(doc.boj_meetings, asOf, config.stepSizes.hike),
    bondQuotes: normaliseBondQuotes(doc.bond_quotes ?? [], { rateUnit }),
    governmentCurve: normaliseGovernmentCurve(doc.jgb_curve ?? [], { rateUnit }),
  };
};

/**
 * Strips the series number and subordination marker from a JSDA bond name so every bond of one
 * issuer groups together, e.g. `ソフトバンクグループ 55` -> `ソフトバンクグループ`.
 */
export const extractIssuer = (bondName: string): string =>
  bondName
    .replace(/[\s　]*[0-9０-９]+$/, '')
    .replace(/(?<=[^0-9A-Za-z])-/g, 'ー')
    .replace(/劣$/, '')
    .trim()
    .normalize('NFKC');

const parseYmd = (value: string | number): Date | null => {
  const digits = String(value).trim();
  if (!/^\d{8}$/.test(digits)) return null;
  return parseIsoDate(`${digits.slice(0, 4)}-${digits.slice(4, 6)}-${digits.slice(6, 8)}`);
};

export interface JsdaOptions {
  /** Yields at or above this are the "no price" sentinel. */
  missingYield?: number;
}

/**
 * Splits JSDA reference-price rows into the JGB curve and corporate bond quotes. Rows without a
 * usable yield (blank, or the `999.999` "no price" sentinel), with unparseable dates or with a
 * maturity on or before the trade date are skipped
 * and counted rather than rejected; the table routinely carries them.
 */
export const classifyJsdaRecords = (records: JsdaRecord[], options: JsdaOptions = {}): JsdaClassification => {
  const missingYield = options.missingYield ?? JSDA_MISSING_YIELD;
  const government: GovernmentCurvePoint[] = [];
  const bondQuotes: BondQuote[] = [];
  let skippedRecords = 0;

  records.forEach((r) => {
    const tradeDate = parseYmd(r.tradeDate);
    const maturity = parseYmd(r.maturity);
    if (!tradeDate || !maturity || r.yield === null || !Number.isFinite(r.yield) || r.yield >= missingYield) {
      skippedRecords += 1;
      return;
    }

    const maturityYears = daysBetween(tradeDate, maturity) / DAYS_PER_YEAR;
    if (maturityYears <= 0) {
      skippedRecords += 1;
      return;
    }
    const y = toDecimal(r.yield, RateUnit.Percent);

    if (GOVERNMENT_NAME_PATTERN.test(r.name)) {
      government.push({ maturityYears, yield: y });
    } else if (r.category === CORPORATE_CATEGORY) {
      bondQuotes.push({ issuerId: extractIssuer(r.name), maturityYears, yield: y, bondId: r.issueCode });
    }
  });

  return { governmentCurve: averageByMaturity(government), bondQuotes, skippedRecords };
};
