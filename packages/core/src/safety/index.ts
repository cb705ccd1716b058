// Numeric Safety Layer
// Policy limits, input validators, and guarded arithmetic used by every calculation

export { ensureFinite, safeDivide, safeMultiply, safePower } from './arithmetic.js';
export type { NumericPolicy } from './policy.js';
export {
  createNumericPolicy,
  DEFAULT_MAX_EXPONENT,
  DEFAULT_MAX_MAGNITUDE,
  DEFAULT_NUMERIC_POLICY,
} from './policy.js';
export {
  validateCalculationRange,
  validateFinite,
  validateFiniteSeries,
  validateInteger,
  validateNonEmpty,
  validateNonNegative,
  validatePositive,
} from './validators.js';
