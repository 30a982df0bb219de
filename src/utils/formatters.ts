/**
 * Rounding and display helpers for rates, spreads and probabilities.
 *
 * String formatters return the fallback for non-finite values (NaN, Infinity).
 */

/**
 * Round to a fixed number of decimal places.
 * @param v - Value to round
 * @param digits - Decimal places to keep
 */
export const roundTo = (v: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(v * factor) / factor;
};

/**
 * Decimal to percentage points, rounded (0.0541 -> 5.41 with 2 digits).
 */
export const toPercent = (v: number, digits: number): number => roundTo(v * 100, digits);

/**
 * Decimal to basis points, rounded (0.0123 -> 123.0).
 */
export const toBps = (v: number, digits: number): number => roundTo(v * 10_000, digits);

/**
 * Format a decimal as a percentage.
 * @param v - Decimal value (e.g., 0.05 for 5%)
 * @param digits - Number of decimal places
 * @param fallback - String to return if value is not finite
 */
export const formatPct = (v: number, digits = 2, fallback = 'N/A'): string =>
  Number.isFinite(v) ? `${(v * 100).toFixed(digits)}%` : fallback;

/**
 * Format a decimal spread in basis points.
 * @param v - Decimal value (e.g., 0.0125 for 125bp)
 */
export const formatBps = (v: number, digits = 1, fallback = 'N/A'): string =>
  Number.isFinite(v) ? `${(v * 10_000).toFixed(digits)}bp` : fallback;
