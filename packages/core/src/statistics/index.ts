// Statistics Module

export { calculateMean, calculateMedian, calculateMode, MODE_KEY_DECIMALS } from './descriptive.js';
export {
  calculateSampleStandardDeviation,
  calculateSampleVariance,
  calculateStandardDeviation,
  calculateVariance,
} from './dispersion.js';
export { calculateProbability, calculateWeightedAverage } from './weighting.js';
