/**
 * Unified Error Hierarchy for fincalc
 *
 * Every calculation failure is one of four kinds:
 * - InvalidInput: an argument precondition was violated
 * - DivisionByZero: a denominator evaluated to exactly zero
 * - Overflow: finite inputs produced a non-finite result
 * - ConvergenceFailed: an iterative solver ran out of iterations
 */

export type FinanceErrorKind = 'InvalidInput' | 'DivisionByZero' | 'Overflow' | 'ConvergenceFailed';

/**
 * Abstract base class for all calculation errors.
 * Callers branch on `kind`; `code` is the stable machine-readable form.
 */
export abstract class FinanceError extends Error {
  abstract readonly kind: FinanceErrorKind;
  abstract readonly code: string;

  constructor(
    message: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A precondition on one or more arguments was violated
 */
export class InvalidInputError extends FinanceError {
  readonly kind = 'InvalidInput' as const;
  readonly code = 'INVALID_INPUT';

  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: number
  ) {
    super(message);
  }
}

/**
 * An operation's denominator evaluated to exactly zero
 */
export class DivisionByZeroError extends FinanceError {
  readonly kind = 'DivisionByZero' as const;
  readonly code = 'DIVISION_BY_ZERO';

  constructor(public readonly operation: string) {
    super(`Division by zero in ${operation}`);
  }
}

/**
 * A computed result is NaN or ±Infinity despite finite inputs
 */
export class OverflowError extends FinanceError {
  readonly kind = 'Overflow' as const;
  readonly code = 'OVERFLOW';

  constructor(public readonly operation: string) {
    super(`Calculation overflow in ${operation}`);
  }
}

/**
 * An iterative solver did not reach its precision target
 */
export class ConvergenceFailedError extends FinanceError {
  readonly kind = 'ConvergenceFailed' as const;
  readonly code = 'CONVERGENCE_FAILED';

  constructor(
    message: string,
    public readonly iterations: number,
    public readonly lastEstimate: number
  ) {
    super(message);
  }
}

/**
 * Type guard to check if an error is a FinanceError
 */
export function isFinanceError(error: unknown): error is FinanceError {
  return error instanceof FinanceError;
}

/**
 * Get a safe error message from an unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
