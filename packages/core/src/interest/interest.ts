/**
 * Interest & Time-Value Functions
 *
 * Simple and compound interest, present and future value.
 * Rates are decimal fractions (0.05 = 5%); callers convert percentages.
 */

import { InvalidInputError } from '../errors/index.js';
import {
  DEFAULT_NUMERIC_POLICY,
  type NumericPolicy,
  safeDivide,
  safeMultiply,
  safePower,
  validateCalculationRange,
  validateInteger,
  validateNonNegative,
  validatePositive,
} from '../safety/index.js';

/**
 * Balance at the end of one year of compound growth
 */
export interface CompoundGrowthPoint {
  year: number;
  amount: number;
}

/**
 * Calculates simple interest
 *
 * Interest = Principal × Rate × Time
 *
 * @example
 * ```typescript
 * calculateSimpleInterest(1000, 0.05, 2); // 100
 * ```
 */
export function calculateSimpleInterest(
  principal: number,
  rate: number,
  time: number,
  policy: NumericPolicy = DEFAULT_NUMERIC_POLICY
): number {
  validatePositive(principal, 'Principal');
  validateNonNegative(rate, 'Interest rate');
  validateNonNegative(time, 'Time');
  validateCalculationRange(principal, 'Principal', policy);

  const principalTimesRate = safeMultiply(principal, rate);
  return safeMultiply(principalTimesRate, time);
}

/**
 * Calculates the compounded amount
 *
 * A = P × (1 + r/n)^(n·t)
 *
 * The exponent n·t is subject to the policy exponent cutoff, so monthly
 * compounding over long horizons needs a raised `maxExponent`.
 *
 * @param compoundFrequency - compounding periods per year (whole number > 0)
 * @param years - whole number of years (≥ 0)
 */
export function calculateCompoundInterest(
  principal: number,
  rate: number,
  compoundFrequency: number,
  years: number,
  policy: NumericPolicy = DEFAULT_NUMERIC_POLICY
): number {
  validatePositive(principal, 'Principal');
  validateNonNegative(rate, 'Interest rate');
  validateCalculationRange(principal, 'Principal', policy);
  validateInteger(compoundFrequency, 'Compound frequency');
  validateInteger(years, 'Years');

  if (compoundFrequency <= 0) {
    throw new InvalidInputError(
      `Compound frequency must be positive: ${compoundFrequency}`,
      'Compound frequency',
      compoundFrequency
    );
  }
  if (years < 0) {
    throw new InvalidInputError(`Years must be non-negative: ${years}`, 'Years', years);
  }

  const ratePerPeriod = rate / compoundFrequency;
  const totalPeriods = compoundFrequency * years;

  const growthFactor = safePower(1 + ratePerPeriod, totalPeriods, policy);
  return safeMultiply(principal, growthFactor);
}

/**
 * Compound balance at the end of each year 1..years
 */
export function calculateCompoundGrowth(
  principal: number,
  rate: number,
  compoundFrequency: number,
  years: number,
  policy: NumericPolicy = DEFAULT_NUMERIC_POLICY
): CompoundGrowthPoint[] {
  // Validates every argument once, including years = 0
  calculateCompoundInterest(principal, rate, compoundFrequency, 0, policy);
  validateInteger(years, 'Years');
  if (years < 0) {
    throw new InvalidInputError(`Years must be non-negative: ${years}`, 'Years', years);
  }

  const points: CompoundGrowthPoint[] = [];
  for (let year = 1; year <= years; year++) {
    points.push({ year, amount: calculateCompoundInterest(principal, rate, compoundFrequency, year, policy) });
  }
  return points;
}

/**
 * Calculates the present value of a future amount
 *
 * PV = FV / (1 + r)^t
 *
 * Discount rates of 100% or more are rejected as invalid input.
 */
export function calculatePresentValue(
  futureValue: number,
  rate: number,
  time: number,
  policy: NumericPolicy = DEFAULT_NUMERIC_POLICY
): number {
  validatePositive(futureValue, 'Future value');
  validateNonNegative(rate, 'Discount rate');
  validateNonNegative(time, 'Time');
  validateCalculationRange(futureValue, 'Future value', policy);

  if (rate >= 1) {
    throw new InvalidInputError(`Discount rate should be less than 100%: ${rate}`, 'Discount rate', rate);
  }

  const discountFactor = safePower(1 + rate, time, policy);
  return safeDivide(futureValue, discountFactor);
}

/**
 * Calculates the future value of a present amount
 *
 * FV = PV × (1 + r)^t
 */
export function calculateFutureValue(
  presentValue: number,
  rate: number,
  time: number,
  policy: NumericPolicy = DEFAULT_NUMERIC_POLICY
): number {
  validatePositive(presentValue, 'Present value');
  validateNonNegative(rate, 'Interest rate');
  validateNonNegative(time, 'Time');
  validateCalculationRange(presentValue, 'Present value', policy);

  const growthFactor = safePower(1 + rate, time, policy);
  return safeMultiply(presentValue, growthFactor);
}
