/**
 * Central tendency
 */

import { InvalidInputError } from '../errors/index.js';
import { ensureFinite, validateFiniteSeries } from '../safety/index.js';

/**
 * Decimal places used to group values in calculateMode.
 * Values that agree to this many places count as the same value.
 */
export const MODE_KEY_DECIMALS = 10;

function validateDataset(values: readonly number[], statistic: string): void {
  if (values.length === 0) {
    throw new InvalidInputError(`Cannot calculate ${statistic} of empty dataset`, 'Values');
  }
  validateFiniteSeries(values, 'Value');
}

/**
 * Arithmetic mean
 */
export function calculateMean(values: readonly number[]): number {
  validateDataset(values, 'mean');

  const sum = values.reduce((acc, value) => ensureFinite(acc + value, 'mean'), 0);
  return sum / values.length;
}

/**
 * Middle value of the sorted data; the average of the two middle values
 * for an even count
 */
export function calculateMedian(values: readonly number[]): number {
  validateDataset(values, 'median');

  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;

  if (sorted.length % 2 === 0) {
    const lower = sorted[middle - 1] ?? 0;
    return ensureFinite((lower + upper) / 2, 'median');
  }
  return upper;
}

/**
 * Most frequent value
 *
 * Returns null for an empty dataset or when no value repeats. Ties resolve
 * to the smallest tied value.
 *
 * @example
 * ```typescript
 * calculateMode([1, 2, 2, 3, 4]); // 2
 * calculateMode([1, 2, 3, 4]);    // null
 * ```
 */
export function calculateMode(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  validateFiniteSeries(values, 'Value');

  const frequencies = new Map<string, number>();
  let maxFrequency = 0;
  for (const value of values) {
    const key = value.toFixed(MODE_KEY_DECIMALS);
    const frequency = (frequencies.get(key) ?? 0) + 1;
    frequencies.set(key, frequency);
    maxFrequency = Math.max(maxFrequency, frequency);
  }

  if (maxFrequency === 1) {
    return null;
  }

  let mode: number | null = null;
  for (const [key, frequency] of frequencies) {
    if (frequency !== maxFrequency) continue;
    const candidate = Number(key);
    if (mode === null || candidate < mode) {
      mode = candidate;
    }
  }
  return mode;
}
