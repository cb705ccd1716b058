/**
 * Profitability ratios
 *
 * Both are returned as percentages. Net income may be negative (a loss).
 */

import { safeDivide, safeMultiply, validateFinite, validatePositive } from '../safety/index.js';

/**
 * Return on equity: (net income / shareholders' equity) × 100
 *
 * @example
 * ```typescript
 * calculateRoe(1_000_000, 5_000_000); // 20
 * ```
 */
export function calculateRoe(netIncome: number, shareholdersEquity: number): number {
  validatePositive(shareholdersEquity, "Shareholders' equity");
  validateFinite(netIncome, 'Net income');

  return safeMultiply(safeDivide(netIncome, shareholdersEquity), 100);
}

/**
 * Return on assets: (net income / total assets) × 100
 */
export function calculateRoa(netIncome: number, totalAssets: number): number {
  validatePositive(totalAssets, 'Total assets');
  validateFinite(netIncome, 'Net income');

  return safeMultiply(safeDivide(netIncome, totalAssets), 100);
}
