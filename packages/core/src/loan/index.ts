// Loan & Amortization Module

export { calculateBreakEvenAnalysis, calculateBreakEvenUnits } from './break-even.js';
export { addMonthsUTC, systemClock, toISODateString } from './clock.js';
export { calculateDepreciationSchedule } from './depreciation.js';
export { calculateLoanPayment, calculateMortgageDetails, generateAmortizationSchedule } from './payment.js';
export type {
  AmortizationPayment,
  BreakEvenAnalysis,
  Clock,
  DepreciationEntry,
  DepreciationMethod,
  MortgageDetails,
} from './types.js';
export { DEFAULT_MAX_TERM_YEARS, DEPRECIATION_METHODS } from './types.js';
