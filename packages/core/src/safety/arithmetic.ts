/**
 * Guarded arithmetic
 *
 * Raw arithmetic silently propagates Infinity and NaN. These wrappers turn
 * those outcomes into typed errors: operands are validated first, then the
 * result is checked before it is returned.
 */

import { DivisionByZeroError, InvalidInputError, OverflowError } from '../errors/index.js';
import { DEFAULT_NUMERIC_POLICY, type NumericPolicy } from './policy.js';
import { validateFinite } from './validators.js';

/**
 * Throws OverflowError when a computed value is not finite
 */
export function ensureFinite(value: number, operation: string): number {
  if (!Number.isFinite(value)) {
    throw new OverflowError(operation);
  }
  return value;
}

/**
 * a × b
 */
export function safeMultiply(a: number, b: number): number {
  validateFinite(a, 'Multiplicand');
  validateFinite(b, 'Multiplier');
  return ensureFinite(a * b, 'multiplication');
}

/**
 * a ÷ b, rejecting a zero divisor
 */
export function safeDivide(a: number, b: number): number {
  validateFinite(a, 'Dividend');
  validateFinite(b, 'Divisor');
  if (b === 0) {
    throw new DivisionByZeroError('division');
  }
  return ensureFinite(a / b, 'division');
}

/**
 * base ^ exponent, rejecting exponents beyond the policy cutoff
 */
export function safePower(base: number, exponent: number, policy: NumericPolicy = DEFAULT_NUMERIC_POLICY): number {
  validateFinite(base, 'Base');
  validateFinite(exponent, 'Exponent');
  if (Math.abs(exponent) > policy.maxExponent) {
    throw new InvalidInputError(
      `Exponent too large for safe calculation: ${exponent} (limit ${policy.maxExponent})`,
      'Exponent',
      exponent
    );
  }
  return ensureFinite(base ** exponent, 'exponentiation');
}
