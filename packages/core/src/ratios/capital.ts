/**
 * Capital structure ratios
 */

import { DivisionByZeroError, InvalidInputError } from '../errors/index.js';
import { ensureFinite, safeDivide, validateNonNegative, validatePositive } from '../safety/index.js';

/**
 * Total debt / total equity
 */
export function calculateDebtToEquity(totalDebt: number, totalEquity: number): number {
  validateNonNegative(totalDebt, 'Total debt');
  validatePositive(totalEquity, 'Total equity');

  return safeDivide(totalDebt, totalEquity);
}

/**
 * Weighted average cost of capital
 *
 * WACC = E/V × Re + D/V × Rd × (1 − Tc), V = E + D
 *
 * Costs and tax rate are decimal fractions; the tax rate must lie in [0, 1].
 *
 * @throws DivisionByZeroError when both market values are zero
 */
export function calculateWacc(
  costOfEquity: number,
  costOfDebt: number,
  taxRate: number,
  marketValueEquity: number,
  marketValueDebt: number
): number {
  validateNonNegative(costOfEquity, 'Cost of equity');
  validateNonNegative(costOfDebt, 'Cost of debt');
  validateNonNegative(taxRate, 'Tax rate');
  validateNonNegative(marketValueEquity, 'Market value of equity');
  validateNonNegative(marketValueDebt, 'Market value of debt');

  if (taxRate > 1) {
    throw new InvalidInputError(`Tax rate should be expressed as a decimal (0-1): ${taxRate}`, 'Tax rate', taxRate);
  }

  const totalValue = ensureFinite(marketValueEquity + marketValueDebt, 'WACC calculation');
  if (totalValue === 0) {
    throw new DivisionByZeroError('WACC calculation');
  }

  const equityWeight = marketValueEquity / totalValue;
  const debtWeight = marketValueDebt / totalValue;

  return equityWeight * costOfEquity + debtWeight * costOfDebt * (1 - taxRate);
}
