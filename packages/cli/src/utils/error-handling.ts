/**
 * Error Handling Utilities
 * Maps calculation errors to CLI errors with exit codes
 */

import { type FinanceErrorKind, getErrorMessage, isFinanceError } from '@fincalc/core';
import chalk from 'chalk';

/**
 * Base error class for CLI operations
 * Provides structured error handling with exit codes
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    public readonly silent: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CLIError';
  }
}

/**
 * Error thrown when argument validation fails
 */
export class CLIValidationError extends CLIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 1, false, options);
    this.name = 'CLIValidationError';
  }
}

/**
 * Exit code for each calculation error kind.
 * Bad input exits with 1, failures during computation with 2.
 */
export const EXIT_CODES: Record<FinanceErrorKind, number> = {
  InvalidInput: 1,
  DivisionByZero: 2,
  Overflow: 2,
  ConvergenceFailed: 2,
};

/**
 * Error thrown after a calculation error has been reported to the user
 */
export class CLICalculationError extends CLIError {
  constructor(
    message: string,
    public readonly kind: FinanceErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, EXIT_CODES[kind], true, options);
    this.name = 'CLICalculationError';
  }
}

/**
 * Troubleshooting tips per calculation error kind
 */
export const CALCULATION_TIPS: Record<FinanceErrorKind, string[]> = {
  InvalidInput: [
    'Rates are decimals (0.05 = 5%), except loan commands which take a percentage (5 = 5%)',
    'Amounts must be positive and no larger than FINCALC_MAX_MAGNITUDE (default 1e15)',
    'Use --help to see the expected arguments',
  ],
  DivisionByZero: ['Check that denominators such as total weight, trials or E + D are not zero'],
  Overflow: [
    'The result is too large to represent; try smaller amounts or shorter horizons',
    'Raise FINCALC_MAX_EXPONENT only if the exponent limit is the cause',
  ],
  ConvergenceFailed: [
    'Try a different starting point with --guess',
    'Increase --max-iterations',
    'Check that the cash flows change sign at least once',
  ],
};

/**
 * Display troubleshooting tips
 */
export function displayTroubleshootingTips(tips: string[]): void {
  console.error(chalk.gray('\n💡 Troubleshooting tips:'));
  for (const tip of tips) {
    console.error(chalk.gray(`   • ${tip}`));
  }
}

/**
 * Report a failed calculation and convert it into a silent CLIError
 *
 * CLIErrors are rethrown unchanged so their exit codes survive.
 */
export function handleCalculationError(error: unknown, options: { debug?: boolean } = {}): never {
  if (error instanceof CLIError) {
    throw error;
  }

  const errorMessage = getErrorMessage(error);
  console.error(chalk.red(`\nError: ${errorMessage}`));

  if (options.debug && error instanceof Error && error.stack) {
    console.error(chalk.gray(`\n[DEBUG] Stack trace:\n${error.stack}`));
  }

  if (isFinanceError(error)) {
    displayTroubleshootingTips(CALCULATION_TIPS[error.kind]);
    throw new CLICalculationError(errorMessage, error.kind, { cause: error });
  }

  throw new CLIError(errorMessage, 1, true, { cause: error });
}
