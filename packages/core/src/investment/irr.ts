/**
 * Internal rate of return
 *
 * Solves NPV(r) = Σ CF_t / (1 + r)^t = 0 by Newton-Raphson, where
 * `cashFlows[0]` is the time-zero flow (usually the negative outlay).
 */

import { ConvergenceFailedError, InvalidInputError } from '../errors/index.js';
import { validateFiniteSeries } from '../safety/index.js';
import { DEFAULT_IRR_OPTIONS, type IrrOptions } from './types.js';

function npvAt(cashFlows: readonly number[], rate: number): number {
  let total = 0;
  for (let t = 0; t < cashFlows.length; t++) {
    total += (cashFlows[t] ?? 0) / (1 + rate) ** t;
  }
  return total;
}

function npvDerivativeAt(cashFlows: readonly number[], rate: number): number {
  let total = 0;
  for (let t = 1; t < cashFlows.length; t++) {
    total -= (t * (cashFlows[t] ?? 0)) / (1 + rate) ** (t + 1);
  }
  return total;
}

function validateIrrOptions(options: Required<IrrOptions>): void {
  const { guess, maxIterations, tolerance } = options;
  if (!Number.isFinite(guess) || guess <= -1) {
    throw new InvalidInputError(`Guess must be greater than -100%: ${guess}`, 'Guess', guess);
  }
  if (!Number.isSafeInteger(maxIterations) || maxIterations <= 0) {
    throw new InvalidInputError(
      `Max iterations must be a positive whole number: ${maxIterations}`,
      'Max iterations',
      maxIterations
    );
  }
  if (!Number.isFinite(tolerance) || tolerance <= 0) {
    throw new InvalidInputError(`Tolerance must be positive: ${tolerance}`, 'Tolerance', tolerance);
  }
}

/**
 * Calculates the internal rate of return of a cash-flow series
 *
 * @example
 * ```typescript
 * calculateIrr([-100, 110]); // 0.1
 * ```
 * @throws ConvergenceFailedError when the derivative vanishes, the estimate
 *   leaves (−1, ∞), or the iteration budget runs out
 */
export function calculateIrr(cashFlows: readonly number[], options: IrrOptions = {}): number {
  const settings: Required<IrrOptions> = {
    guess: options.guess ?? DEFAULT_IRR_OPTIONS.guess,
    maxIterations: options.maxIterations ?? DEFAULT_IRR_OPTIONS.maxIterations,
    tolerance: options.tolerance ?? DEFAULT_IRR_OPTIONS.tolerance,
  };
  validateIrrOptions(settings);

  if (cashFlows.length < 2) {
    throw new InvalidInputError('IRR requires at least two cash flows', 'Cash flows', cashFlows.length);
  }
  validateFiniteSeries(cashFlows, 'Cash flow', 'index');
  if (!cashFlows.some((cf) => cf > 0) || !cashFlows.some((cf) => cf < 0)) {
    throw new InvalidInputError('IRR requires at least one positive and one negative cash flow', 'Cash flows');
  }

  let rate = settings.guess;
  for (let iteration = 1; iteration <= settings.maxIterations; iteration++) {
    const value = npvAt(cashFlows, rate);
    const derivative = npvDerivativeAt(cashFlows, rate);

    if (derivative === 0 || !Number.isFinite(derivative)) {
      throw new ConvergenceFailedError(`IRR derivative vanished at rate ${rate}`, iteration, rate);
    }

    const next = rate - value / derivative;
    if (!Number.isFinite(next) || next <= -1) {
      throw new ConvergenceFailedError(`IRR estimate left the valid range: ${next}`, iteration, rate);
    }

    if (Math.abs(next - rate) < settings.tolerance) {
      return next;
    }
    rate = next;
  }

  throw new ConvergenceFailedError(
    `IRR did not converge within ${settings.maxIterations} iterations`,
    settings.maxIterations,
    rate
  );
}
