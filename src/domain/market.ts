import { RateUnit } from './enums';

export interface OISQuote {
  tenorDays: number;
  rate: number;
  tenor?: string;
}

export interface PolicyMeeting {
  date: string;
  daysUntil: number;
  expectedStep: number;
}

export interface BondQuote {
  issuerId: string;
  maturityYears: number;
  yield: number;
  bondId?: string;
}

export interface GovernmentCurvePoint {
  maturityYears: number;
  yield: number;
}

export interface RawOisQuote {
  tenor?: string;
  tenor_days?: number;
  rate: number;
}

export interface RawBondQuote {
  issuer_id: string;
  maturity_years: number;
  yield: number;
  bond_id?: string;
}

export interface RawCurvePoint {
  maturity_years: number;
  yield: number;
}

/** The document the data-loading job writes (rates and yields in `rate_unit`, percent by default). */
export interface RawMarketData {
  source_date: string;
  updated_at?: string;
  source_url?: string;
  rate_unit?: RateUnit;
  rates: RawOisQuote[];
  boj_meetings: string[];
  bond_quotes?: RawBondQuote[];
  jgb_curve?: RawCurvePoint[];
}

export interface NormalisedMarketData {
  asOf: string;
  oisCurve: OISQuote[];
  meeting: PolicyMeeting;
  bondQuotes: BondQuote[];
  governmentCurve: GovernmentCurvePoint[];
}

/** One row of the JSDA reference statistical prices table. */
export interface JsdaRecord {
  tradeDate: string | number;
  category: number;
  issueCode: string;
  name: string;
  maturity: string | number;
  coupon: number | null;
  yield: number | null;
}

export interface JsdaClassification {
  governmentCurve: GovernmentCurvePoint[];
  bondQuotes: BondQuote[];
  skippedRecords: number;
}
