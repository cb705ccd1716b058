/**
 * Input validators
 *
 * Each validator returns nothing on success and throws InvalidInputError
 * naming the field and the offending value.
 */

import { InvalidInputError } from '../errors/index.js';
import { DEFAULT_NUMERIC_POLICY, type NumericPolicy } from './policy.js';

/**
 * Validates that a number is finite (not NaN, not ±Infinity)
 */
export function validateFinite(value: number, name: string): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${name} must be a valid number: ${value}`, name, value);
  }
}

/**
 * Validates that a number is finite and strictly positive
 */
export function validatePositive(value: number, name: string): void {
  validateFinite(value, name);
  if (value <= 0) {
    throw new InvalidInputError(`${name} must be positive: ${value}`, name, value);
  }
}

/**
 * Validates that a number is finite and non-negative
 */
export function validateNonNegative(value: number, name: string): void {
  validateFinite(value, name);
  if (value < 0) {
    throw new InvalidInputError(`${name} must be non-negative: ${value}`, name, value);
  }
}

/**
 * Validates that a number's magnitude stays within the policy range
 */
export function validateCalculationRange(
  value: number,
  name: string,
  policy: NumericPolicy = DEFAULT_NUMERIC_POLICY
): void {
  if (Math.abs(value) > policy.maxMagnitude) {
    throw new InvalidInputError(
      `${name} is too large for safe calculation: ${value} (limit ${policy.maxMagnitude})`,
      name,
      value
    );
  }
}

/**
 * Validates that a number is a safe integer
 */
export function validateInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidInputError(`${name} must be a whole number: ${value}`, name, value);
  }
}

/**
 * Validates that a series has at least one element
 */
export function validateNonEmpty(values: readonly number[], name: string): void {
  if (values.length === 0) {
    throw new InvalidInputError(`${name} cannot be empty`, name);
  }
}

/**
 * Validates that every element of a series is finite.
 *
 * `label` controls how the offending position is reported: cash-flow series
 * are reported by 1-based year, plain data sets by 0-based index.
 */
export function validateFiniteSeries(values: readonly number[], name: string, label: 'year' | 'index' = 'index'): void {
  values.forEach((value, i) => {
    if (!Number.isFinite(value)) {
      const position = label === 'year' ? `year ${i + 1}` : `index ${i}`;
      throw new InvalidInputError(`${name} at ${position} is invalid: ${value}`, name, value);
    }
  });
}
