/**
 * Return measures
 */

import { safeDivide, safeMultiply, validateFinite, validateNonNegative, validatePositive } from '../safety/index.js';

/**
 * Return on investment as a percentage
 *
 * ROI = (net profit / cost) × 100; a loss gives a negative ROI
 */
export function calculateRoi(netProfit: number, cost: number): number {
  validateFinite(netProfit, 'Net profit');
  validatePositive(cost, 'Investment cost');

  return safeMultiply(safeDivide(netProfit, cost), 100);
}

/**
 * Expected return under the Capital Asset Pricing Model
 *
 * E(R) = rf + β × (rm − rf)
 */
export function calculateCapm(riskFreeRate: number, beta: number, marketReturn: number): number {
  validateNonNegative(riskFreeRate, 'Risk-free rate');
  validateFinite(beta, 'Beta');
  validateFinite(marketReturn, 'Market return');

  const marketPremium = marketReturn - riskFreeRate;
  return riskFreeRate + safeMultiply(beta, marketPremium);
}
