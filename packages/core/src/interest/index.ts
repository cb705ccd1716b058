// Interest & Time-Value Module

export type { CompoundGrowthPoint } from './interest.js';
export {
  calculateCompoundGrowth,
  calculateCompoundInterest,
  calculateFutureValue,
  calculatePresentValue,
  calculateSimpleInterest,
} from './interest.js';
