import { DivisionByZeroError, InvalidInputError } from '../errors/index.js';
import { ensureFinite, validateInteger, validateNonNegative } from '../safety/index.js';

/**
 * Weighted average: Σ(value × weight) / Σweight
 *
 * @throws DivisionByZeroError when every weight is zero
 */
export function calculateWeightedAverage(values: readonly number[], weights: readonly number[]): number {
  if (values.length === 0 || weights.length === 0) {
    throw new InvalidInputError('Values and weights cannot be empty', 'Values');
  }
  if (values.length !== weights.length) {
    throw new InvalidInputError(
      `Values and weights must have the same length: ${values.length} vs ${weights.length}`,
      'Weights',
      weights.length
    );
  }

  let weightedSum = 0;
  let totalWeight = 0;
  values.forEach((value, i) => {
    const weight = weights[i] ?? Number.NaN;
    if (!Number.isFinite(value)) {
      throw new InvalidInputError(`Value at index ${i} is invalid: ${value}`, 'Values', value);
    }
    if (!Number.isFinite(weight) || weight < 0) {
      throw new InvalidInputError(`Weight at index ${i} is invalid: ${weight}`, 'Weights', weight);
    }
    weightedSum = ensureFinite(weightedSum + value * weight, 'weighted average');
    totalWeight = ensureFinite(totalWeight + weight, 'weighted average');
  });

  if (totalWeight === 0) {
    throw new DivisionByZeroError('weighted average');
  }
  return weightedSum / totalWeight;
}

/**
 * Empirical probability: successes / trials
 *
 * @throws DivisionByZeroError when trials is 0
 */
export function calculateProbability(successes: number, trials: number): number {
  validateInteger(successes, 'Successes');
  validateNonNegative(successes, 'Successes');
  validateInteger(trials, 'Trials');
  validateNonNegative(trials, 'Trials');

  if (trials === 0) {
    throw new DivisionByZeroError('probability');
  }
  if (successes > trials) {
    throw new InvalidInputError(`Successes cannot exceed trials: ${successes} > ${trials}`, 'Successes', successes);
  }
  return successes / trials;
}
