/**
 * Formatting of counts, metric values and round durations for reports.
 */

const COUNT_FORMAT = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** Decimal places shown for fractional metric values. */
const METRIC_DECIMALS = 3;

/** Row counts and integer matrix cells: `1,234`. */
export function renderCount(value: number): string {
  return COUNT_FORMAT.format(value);
}

/**
 * Precision values and matrix cells. Integers render as counts; anything else
 * (normalized or weighted cells) to a fixed three decimals.
 */
export function renderMetric(value: number): string {
  return Number.isInteger(value) ? renderCount(value) : value.toFixed(METRIC_DECIMALS);
}

/** A fraction as a percentage: `0.75` renders as `75.0%`. */
export function renderPercentage(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/** Round durations, given in seconds. */
export function renderDuration(seconds: number): string {
  return seconds < 1 ? `${(seconds * 1000).toFixed(1)}ms` : `${seconds.toFixed(2)}s`;
}
