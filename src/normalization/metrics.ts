/**
 * Numeric coercion for Graph API metrics
 * The insights endpoint returns numbers as strings ("12.34"); absent values count as zero
 */

/**
 * Safely convert to number
 */
export function toNumber(value: number | string | null | undefined): number {
  if (value === undefined || value === null) {
    return 0;
  }

  const num = typeof value === 'string' ? parseFloat(value) : value;

  return Number.isFinite(num) ? num : 0;
}

/**
 * Whole-number counts (impressions, clicks, conversions); fractional parts are dropped
 */
export function toCount(value: number | string | null | undefined): number {
  return Math.trunc(toNumber(value));
}

/**
 * Calculate CPA (Cost Per Acquisition/Conversion)
 * Formula: spend / conversions
 */
export function calculateCPA(spend: number, conversions: number): number {
  if (conversions === 0) {
    return 0;
  }

  return spend / conversions;
}

/**
 * Round metric to specified decimal places
 */
export function roundMetric(value: number, decimals: number = 2): number {
  const multiplier = Math.pow(10, decimals);
  return Math.round(value * multiplier) / multiplier;
}
