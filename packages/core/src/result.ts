/**
 * Result wrapper for calculations
 *
 * Mirrors the `{ success, data } | { success, error }` shape used by the
 * validation helpers, for callers that prefer branching over try/catch.
 */

import { type FinanceError, isFinanceError } from './errors/index.js';

export type CalculationResult<T> = { success: true; data: T } | { success: false; error: FinanceError };

/**
 * Run a calculation, capturing a thrown FinanceError as a failure value.
 * Any other error is rethrown unchanged.
 *
 * @example
 * ```typescript
 * const result = tryCalculate(() => calculateRoe(income, equity));
 * if (!result.success) console.error(result.error.kind);
 * ```
 */
export function tryCalculate<T>(calculation: () => T): CalculationResult<T> {
  try {
    return { success: true, data: calculation() };
  } catch (error) {
    if (isFinanceError(error)) {
      return { success: false, error };
    }
    throw error;
  }
}
