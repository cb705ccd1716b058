/**
 * Discounted cash-flow analysis
 *
 * Cash-flow series start at the first future period: `cashFlows[0]` is
 * discounted by one period.
 */

import {
  ensureFinite,
  validateFinite,
  validateFiniteSeries,
  validateNonEmpty,
  validateNonNegative,
  validatePositive,
} from '../safety/index.js';
import { InvalidInputError } from '../errors/index.js';

function discountedSum(cashFlows: readonly number[], rate: number, operation: string): number {
  let total = 0;
  cashFlows.forEach((cashFlow, i) => {
    const discountFactor = (1 + rate) ** (i + 1);
    total += ensureFinite(cashFlow / discountFactor, operation);
  });
  return ensureFinite(total, operation);
}

/**
 * Net present value of an investment
 *
 * NPV = −investment + Σ CF_i / (1 + r)^i, i = 1..N
 *
 * @example
 * ```typescript
 * calculateNpv(2000, [1000, 1000, 1000], 0.05); // ≈ 723.25
 * ```
 */
export function calculateNpv(initialInvestment: number, cashFlows: readonly number[], discountRate: number): number {
  validatePositive(initialInvestment, 'Initial investment');
  validateNonNegative(discountRate, 'Discount rate');
  validateNonEmpty(cashFlows, 'Cash flows');
  validateFiniteSeries(cashFlows, 'Cash flow', 'year');

  return discountedSum(cashFlows, discountRate, 'NPV calculation') - initialInvestment;
}

/**
 * Discounted cash-flow value: Σ CF_i / (1 + r)^i
 *
 * Negative rates are accepted as long as they stay above −100%.
 */
export function calculateDcf(cashFlows: readonly number[], discountRate: number): number {
  validateFinite(discountRate, 'Discount rate');
  if (discountRate <= -1) {
    throw new InvalidInputError(`Discount rate must be greater than -100%: ${discountRate}`, 'Discount rate', discountRate);
  }
  validateNonEmpty(cashFlows, 'Cash flows');
  validateFiniteSeries(cashFlows, 'Cash flow', 'year');

  return discountedSum(cashFlows, discountRate, 'DCF calculation');
}

/**
 * Payback period in periods, interpolated linearly within the crossing period
 *
 * @returns the fractional period, or null if the flows never recover the cost
 */
export function calculatePaybackPeriod(initialCost: number, cashFlows: readonly number[]): number | null {
  validatePositive(initialCost, 'Initial cost');
  validateNonEmpty(cashFlows, 'Cash flows');
  validateFiniteSeries(cashFlows, 'Cash flow', 'year');

  let cumulative = 0;
  for (const [index, cashFlow] of cashFlows.entries()) {
    const previous = cumulative;
    cumulative += cashFlow;

    if (cumulative >= initialCost) {
      const remaining = initialCost - previous;
      return index + remaining / cashFlow + 1;
    }
  }

  return null;
}
