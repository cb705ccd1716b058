/**
 * Format Helpers
 * Number formatting for report output
 */

/**
 * Format a monetary amount with thousands separators and two decimals
 *
 * @example
 * ```typescript
 * formatCurrency(-1234.5); // "-$1,234.50"
 * ```
 */
export function formatCurrency(value: number): string {
  const sign = value < 0 ? '-' : '';
  const amount = Math.abs(value).toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  return `${sign}$${amount}`;
}

/**
 * Format a decimal fraction as a percentage (0.05 → "5.00%")
 */
export function formatPercentage(fraction: number, decimals = 2): string {
  return `${(fraction * 100).toFixed(decimals)}%`;
}

/**
 * Format a value that is already a percentage (5 → "5.00%")
 */
export function formatPercentValue(percent: number, decimals = 2): string {
  return `${percent.toFixed(decimals)}%`;
}

/**
 * Format a plain number with thousands separators
 */
export function formatNumber(value: number, maxDecimals = 4): string {
  return value.toLocaleString('en-US', { maximumFractionDigits: maxDecimals });
}

export function formatRatio(value: number): string {
  return value.toFixed(2);
}

export function formatPeriods(value: number, unit = 'years'): string {
  return `${value.toFixed(2)} ${unit}`;
}

/**
 * Format a comma-separated preview of a series
 */
export function formatSeries(values: readonly number[], maxItems = 10): string {
  const shown = values.slice(0, maxItems).map((value) => formatNumber(value));
  const rest = values.length - shown.length;
  return rest > 0 ? `${shown.join(', ')}, … (+${rest} more)` : shown.join(', ');
}
