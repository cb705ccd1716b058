import { safeDivide, safeMultiply, validateNonNegative, validatePositive } from '../safety/index.js';

/**
 * Price-to-earnings ratio
 */
export function calculatePeRatio(stockPrice: number, earningsPerShare: number): number {
  validatePositive(stockPrice, 'Stock price');
  validatePositive(earningsPerShare, 'Earnings per share');

  return safeDivide(stockPrice, earningsPerShare);
}

/**
 * Dividend yield as a percentage of the share price
 */
export function calculateDividendYield(annualDividend: number, stockPrice: number): number {
  validatePositive(stockPrice, 'Stock price');
  validateNonNegative(annualDividend, 'Annual dividend');

  return safeMultiply(safeDivide(annualDividend, stockPrice), 100);
}
