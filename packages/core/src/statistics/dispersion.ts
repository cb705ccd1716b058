/**
 * Variance and standard deviation
 *
 * Both the population and sample forms need at least two observations.
 */

import { InvalidInputError } from '../errors/index.js';
import { ensureFinite } from '../safety/index.js';
import { calculateMean } from './descriptive.js';

function sumOfSquaredDeviations(values: readonly number[], statistic: string): number {
  if (values.length < 2) {
    throw new InvalidInputError(`At least two numbers are required to calculate ${statistic}`, 'Values', values.length);
  }
  const mean = calculateMean(values);
  return values.reduce((acc, value) => ensureFinite(acc + (value - mean) ** 2, statistic), 0);
}

/**
 * Population variance: Σ(x − μ)² / N
 */
export function calculateVariance(values: readonly number[]): number {
  return sumOfSquaredDeviations(values, 'variance') / values.length;
}

/**
 * Sample variance: Σ(x − x̄)² / (N − 1)
 */
export function calculateSampleVariance(values: readonly number[]): number {
  return sumOfSquaredDeviations(values, 'sample variance') / (values.length - 1);
}

export function calculateStandardDeviation(values: readonly number[]): number {
  return Math.sqrt(calculateVariance(values));
}

export function calculateSampleStandardDeviation(values: readonly number[]): number {
  return Math.sqrt(calculateSampleVariance(values));
}
