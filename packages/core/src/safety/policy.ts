/**
 * Numeric policy limits
 *
 * These are policy cutoffs, not IEEE-754 limits: a monetary amount above
 * `maxMagnitude` could still be multiplied safely once, but chained
 * multiplications would approach overflow; an exponent above `maxExponent`
 * is too large to be a meaningful financial exponent.
 */

/** Largest monetary magnitude accepted by range-checked inputs */
export const DEFAULT_MAX_MAGNITUDE = 1e15;

/** Largest absolute exponent accepted by safePower */
export const DEFAULT_MAX_EXPONENT = 100;

export interface NumericPolicy {
  maxMagnitude: number;
  maxExponent: number;
}

export const DEFAULT_NUMERIC_POLICY: Readonly<NumericPolicy> = Object.freeze({
  maxMagnitude: DEFAULT_MAX_MAGNITUDE,
  maxExponent: DEFAULT_MAX_EXPONENT,
});

/**
 * Build a policy from partial overrides, falling back to the defaults
 * for missing or non-positive values
 */
export function createNumericPolicy(overrides: Partial<NumericPolicy> = {}): NumericPolicy {
  return {
    maxMagnitude: pickLimit(overrides.maxMagnitude, DEFAULT_MAX_MAGNITUDE),
    maxExponent: pickLimit(overrides.maxExponent, DEFAULT_MAX_EXPONENT),
  };
}

function pickLimit(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) return fallback;
  return value;
}
