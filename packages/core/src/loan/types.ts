/**
 * Loan & Amortization Types
 */

/**
 * One month of an amortization schedule
 */
export interface AmortizationPayment {
  /** 1-based month number */
  month: number;
  principalPayment: number;
  interestPayment: number;
  remainingBalance: number;
}

/**
 * Mortgage summary
 */
export interface MortgageDetails {
  monthlyPayment: number;
  totalPaid: number;
  totalInterest: number;
  numberOfPayments: number;
  /** Final payment date (YYYY-MM-DD) */
  payoffDate: string;
}

export interface BreakEvenAnalysis {
  units: number;
  revenue: number;
}

/**
 * Longest term, in years, an amortization schedule is built for
 */
export const DEFAULT_MAX_TERM_YEARS = 100;

export const DEPRECIATION_METHODS = ['straight-line', 'double-declining-balance'] as const;

export type DepreciationMethod = (typeof DEPRECIATION_METHODS)[number];

/**
 * One year of a depreciation schedule
 */
export interface DepreciationEntry {
  year: number;
  depreciation: number;
  accumulatedDepreciation: number;
  bookValue: number;
}

/**
 * Source of the current date, injected so payoff dates are deterministic in tests
 */
export interface Clock {
  now(): Date;
}
