import { ConvergenceFailedError, DivisionByZeroError, InvalidInputError, OverflowError } from '@fincalc/core';
import chalk from 'chalk';
import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import {
  CALCULATION_TIPS,
  CLICalculationError,
  CLIError,
  CLIValidationError,
  displayTroubleshootingTips,
  handleCalculationError,
} from './error-handling.js';

function captureThrown(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('error-handling utilities', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('provides structured CLI error classes', () => {
    const base = new CLIError('base');
    expect(base.name).toBe('CLIError');
    expect(base.exitCode).toBe(1);
    expect(base.silent).toBe(false);

    const validation = new CLIValidationError('invalid input');
    expect(validation.name).toBe('CLIValidationError');
    expect(validation.exitCode).toBe(1);

    const calculation = new CLICalculationError('overflow', 'Overflow');
    expect(calculation.name).toBe('CLICalculationError');
    expect(calculation.exitCode).toBe(2);
    expect(calculation.silent).toBe(true);
  });

  it('prints troubleshooting tips in consistent format', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    displayTroubleshootingTips(['Tip A', 'Tip B']);

    const lines = errorSpy.mock.calls.map((call) => String(call[0] ?? ''));
    expect(lines).toEqual(['\n💡 Troubleshooting tips:', '   • Tip A', '   • Tip B']);
  });

  it('rethrows existing CLIError without wrapping', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const original = new CLIValidationError('invalid');

    expect(captureThrown(() => handleCalculationError(original))).toBe(original);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it.each([
    [new InvalidInputError('Principal must be positive: 0', 'Principal', 0), 1],
    [new DivisionByZeroError('probability'), 2],
    [new OverflowError('compound interest'), 2],
    [new ConvergenceFailedError('IRR did not converge', 100, 0.5), 2],
  ])('maps %s to exit code %i', (error, exitCode) => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const thrown = captureThrown(() => handleCalculationError(error));

    expect(thrown).toBeInstanceOf(CLICalculationError);
    if (thrown instanceof CLICalculationError) {
      expect(thrown.exitCode).toBe(exitCode);
      expect(thrown.kind).toBe(error.kind);
      expect(thrown.message).toBe(error.message);
      expect(thrown.cause).toBe(error);
    }
  });

  it('prints the message and the tips for the error kind', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    captureThrown(() => handleCalculationError(new DivisionByZeroError('probability')));

    const lines = errorSpy.mock.calls.map((call) => String(call[0] ?? ''));
    expect(lines[0]).toBe('\nError: Division by zero in probability');
    expect(lines).toContain(`   • ${CALCULATION_TIPS.DivisionByZero[0]}`);
  });

  it('prints the stack trace in debug mode', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    captureThrown(() => handleCalculationError(new OverflowError('loan payment'), { debug: true }));

    const lines = errorSpy.mock.calls.map((call) => String(call[0] ?? ''));
    expect(lines[1]?.startsWith('\n[DEBUG] Stack trace:\n')).toBe(true);
  });

  it('wraps unexpected errors as a silent CLIError with exit code 1', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const thrown = captureThrown(() => handleCalculationError(new Error('boom')));

    expect(thrown).toBeInstanceOf(CLIError);
    expect(thrown).not.toBeInstanceOf(CLICalculationError);
    if (thrown instanceof CLIError) {
      expect(thrown.message).toBe('boom');
      expect(thrown.exitCode).toBe(1);
      expect(thrown.silent).toBe(true);
    }
  });
});
