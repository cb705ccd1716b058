/**
 * Loan payment, amortization and mortgage calculations
 *
 * Loan functions take the annual rate as a percentage (5 = 5%) and work
 * with a monthly rate of annualPct / 100 / 12.
 */

import { InvalidInputError } from '../errors/index.js';
import { ensureFinite, safeMultiply, validateInteger, validateNonNegative, validatePositive } from '../safety/index.js';
import { addMonthsUTC, systemClock, toISODateString } from './clock.js';
import { type AmortizationPayment, type Clock, DEFAULT_MAX_TERM_YEARS, type MortgageDetails } from './types.js';

const MONTHS_PER_YEAR = 12;

function toMonthlyRate(annualPercentage: number): number {
  return annualPercentage / 100 / MONTHS_PER_YEAR;
}

function validateTermYears(termYears: number): void {
  validateInteger(termYears, 'Term');
  if (termYears <= 0) {
    throw new InvalidInputError(`Term must be positive: ${termYears}`, 'Term', termYears);
  }
}

/**
 * Monthly payment of a fully amortizing loan
 *
 * M = P·r / (1 − (1 + r)^(−n)); a zero rate degenerates to P / n
 *
 * @example
 * ```typescript
 * calculateLoanPayment(100000, 5, 30); // ≈ 536.82
 * ```
 */
export function calculateLoanPayment(principal: number, annualPercentage: number, termYears: number): number {
  validatePositive(principal, 'Principal');
  validateNonNegative(annualPercentage, 'Annual interest rate');
  validatePositive(termYears, 'Loan term');

  const monthlyRate = toMonthlyRate(annualPercentage);
  const numberOfPayments = termYears * MONTHS_PER_YEAR;

  if (monthlyRate === 0) {
    return principal / numberOfPayments;
  }

  const payment = (principal * monthlyRate) / (1 - (1 + monthlyRate) ** -numberOfPayments);
  return ensureFinite(payment, 'loan payment');
}

/**
 * Full month-by-month amortization schedule
 *
 * The final month's remaining balance is set to exactly 0 to drop the
 * floating-point residue accumulated over the schedule. Terms longer than
 * `maxTermYears` are rejected before any month is built.
 */
export function generateAmortizationSchedule(
  principal: number,
  annualPercentage: number,
  termYears: number,
  maxTermYears: number = DEFAULT_MAX_TERM_YEARS
): AmortizationPayment[] {
  validateTermYears(termYears);
  if (termYears > maxTermYears) {
    throw new InvalidInputError(`Term exceeds the maximum of ${maxTermYears} years: ${termYears}`, 'Term', termYears);
  }
  const monthlyPayment = calculateLoanPayment(principal, annualPercentage, termYears);
  const monthlyRate = toMonthlyRate(annualPercentage);
  const totalPayments = termYears * MONTHS_PER_YEAR;

  const schedule: AmortizationPayment[] = [];
  let remainingBalance = principal;

  for (let month = 1; month <= totalPayments; month++) {
    const interestPayment = remainingBalance * monthlyRate;
    const principalPayment = monthlyPayment - interestPayment;
    remainingBalance -= principalPayment;

    if (month === totalPayments) {
      remainingBalance = 0;
    }

    schedule.push({ month, principalPayment, interestPayment, remainingBalance });
  }

  return schedule;
}

/**
 * Mortgage summary with total interest and payoff date
 *
 * The payoff date is today's UTC date (per `clock`) plus the term in months.
 */
export function calculateMortgageDetails(
  loanAmount: number,
  annualPercentage: number,
  termYears: number,
  clock: Clock = systemClock
): MortgageDetails {
  validatePositive(loanAmount, 'Loan amount');
  validateTermYears(termYears);

  const monthlyPayment = calculateLoanPayment(loanAmount, annualPercentage, termYears);
  const numberOfPayments = termYears * MONTHS_PER_YEAR;
  const totalPaid = safeMultiply(monthlyPayment, numberOfPayments);

  return {
    monthlyPayment,
    totalPaid,
    totalInterest: totalPaid - loanAmount,
    numberOfPayments,
    payoffDate: toISODateString(addMonthsUTC(clock.now(), numberOfPayments)),
  };
}
