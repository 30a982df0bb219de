/**
 * Tenor and calendar helpers shared by the adapter and the dashboard view.
 *
 * Dates are plain `YYYY-MM-DD` (or `YYYY/MM/DD`, as printed on the JPX rate sheet) strings and are
 * handled in UTC so day counts never depend on the host timezone.
 */
import { TenorUnit } from '../domain/enums';

export interface ParsedTenor {
  count: number;
  unit: TenorUnit;
}

const TENOR_PATTERN = /^(\d+)\s*([DWMY])$/;
const UNIT_BY_LETTER: Partial<Record<string, TenorUnit>> = {
  D: TenorUnit.Day,
  W: TenorUnit.Week,
  M: TenorUnit.Month,
  Y: TenorUnit.Year,
};
const DATE_PATTERN = /^(\d{4})[-/](\d{2})[-/](\d{2})$/;
const MS_PER_DAY = 86_400_000;

export const parseTenor = (label: string): ParsedTenor | null => {
  const match = TENOR_PATTERN.exec(label.trim().toUpperCase());
  if (!match) return null;
  const unit = UNIT_BY_LETTER[match[2]];
  return unit ? { count: Number(match[1]), unit } : null;
};

export const parseIsoDate = (value: string): Date | null => {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) return null;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC rolls 2025-02-30 over into March; reject instead.
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
};

export const formatIsoDate = (date: Date): string => date.toISOString().slice(0, 10);

export const daysBetween = (from: Date, to: Date): number => Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);

/** Calendar month offset, clamped to the last day of the target month (Jan 31 + 1M = Feb 28/29). */
export const addMonths = (date: Date, months: number): Date => {
  const target = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + months, 1));
  const lastDay = new Date(Date.UTC(target.getUTCFullYear(), target.getUTCMonth() + 1, 0)).getUTCDate();
  target.setUTCDate(Math.min(date.getUTCDate(), lastDay));
  return target;
};

export const tenorToDays = (tenor: ParsedTenor, asOf: Date): number => {
  switch (tenor.unit) {
    case TenorUnit.Day:
      return tenor.count;
    case TenorUnit.Week:
      return tenor.count * 7;
    case TenorUnit.Month:
      return daysBetween(asOf, addMonths(asOf, tenor.count));
    case TenorUnit.Year:
      return daysBetween(asOf, addMonths(asOf, tenor.count * 12));
  }
};

/** Fixed-convention year fraction used for charting (D/365, W/52, M/12). */
export const tenorToYears = (tenor: ParsedTenor): number => {
  switch (tenor.unit) {
    case TenorUnit.Day:
      return tenor.count / 365;
    case TenorUnit.Week:
      return tenor.count / 52;
    case TenorUnit.Month:
      return tenor.count / 12;
    case TenorUnit.Year:
      return tenor.count;
  }
};
