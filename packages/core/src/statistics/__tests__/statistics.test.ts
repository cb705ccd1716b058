import { describe, expect, it } from 'vitest';
import { DivisionByZeroError, InvalidInputError, OverflowError } from '../../errors/index.js';
import {
  calculateMean,
  calculateMedian,
  calculateMode,
  calculateProbability,
  calculateSampleStandardDeviation,
  calculateSampleVariance,
  calculateStandardDeviation,
  calculateVariance,
  calculateWeightedAverage,
} from '../index.js';

describe('calculateMean', () => {
  it('averages the values', () => {
    expect(calculateMean([1, 2, 3, 4, 5])).toBe(3);
  });

  it('rejects an empty dataset', () => {
    expect(() => calculateMean([])).toThrow('Cannot calculate mean of empty dataset');
  });

  it('names the offending index', () => {
    expect(() => calculateMean([1, Number.NaN, 3])).toThrow('Value at index 1 is invalid: NaN');
  });

  it('reports overflow when the sum leaves the finite range', () => {
    expect(() => calculateMean([1.7e308, 1.7e308])).toThrow(OverflowError);
    expect(() => calculateMean([1.7e308, 1.7e308])).toThrow('Calculation overflow in mean');
  });
});

describe('calculateMedian', () => {
  it('returns the middle value for an odd count', () => {
    expect(calculateMedian([5, 1, 4, 2, 3])).toBe(3);
  });

  it('averages the middle values for an even count', () => {
    expect(calculateMedian([4, 1, 3, 2])).toBe(2.5);
  });

  it('does not reorder the input', () => {
    const values = [3, 1, 2];
    calculateMedian(values);
    expect(values).toEqual([3, 1, 2]);
  });

  it('rejects non-finite values before sorting', () => {
    expect(() => calculateMedian([1, Number.POSITIVE_INFINITY])).toThrow(InvalidInputError);
  });

  it('reports overflow when the middle values sum past the finite range', () => {
    expect(() => calculateMedian([1.7e308, 1.7e308])).toThrow('Calculation overflow in median');
  });
});

describe('calculateMode', () => {
  it('returns the most frequent value', () => {
    expect(calculateMode([1, 2, 2, 3, 4])).toBe(2);
  });

  it('returns null when no value repeats', () => {
    expect(calculateMode([1, 2, 3, 4])).toBeNull();
  });

  it('returns null for an empty dataset', () => {
    expect(calculateMode([])).toBeNull();
  });

  it('returns the smallest value of a three-way tie', () => {
    expect(calculateMode([3, 3, 1, 1, 2, 2])).toBe(1);
  });

  it('merges values that agree to ten decimal places', () => {
    expect(calculateMode([0.1 + 0.2, 0.3, 5])).toBe(0.3);
  });

  it('handles negative values', () => {
    expect(calculateMode([-1.5, -1.5, 2])).toBe(-1.5);
  });

  it('handles datasets with hundreds of thousands of distinct values', () => {
    const values = Array.from({ length: 300_000 }, (_, i) => i);
    values.push(5);
    expect(calculateMode(values)).toBe(5);
  });
});

describe('variance and standard deviation', () => {
  const data = [1, 2, 3, 4, 5];

  it('computes population variance', () => {
    expect(calculateVariance(data)).toBe(2);
  });

  it('computes sample variance', () => {
    expect(calculateSampleVariance(data)).toBe(2.5);
  });

  it('computes standard deviations', () => {
    expect(calculateStandardDeviation(data)).toBeCloseTo(1.4142135623730951, 10);
    expect(calculateSampleStandardDeviation(data)).toBeCloseTo(1.5811388300841898, 10);
  });

  it('requires at least two observations', () => {
    expect(() => calculateVariance([1])).toThrow('At least two numbers are required to calculate variance');
    expect(() => calculateSampleVariance([])).toThrow(
      'At least two numbers are required to calculate sample variance'
    );
  });

  it('reports overflow when squared deviations leave the finite range', () => {
    expect(() => calculateVariance([1e200, -1e200])).toThrow(OverflowError);
    expect(() => calculateVariance([1e200, -1e200])).toThrow('Calculation overflow in variance');
    expect(() => calculateSampleStandardDeviation([1e200, -1e200])).toThrow(
      'Calculation overflow in sample variance'
    );
  });
});

describe('calculateWeightedAverage', () => {
  it('weights each value', () => {
    expect(calculateWeightedAverage([10, 20, 30], [0.2, 0.3, 0.5])).toBe(23);
  });

  it('rejects mismatched lengths', () => {
    expect(() => calculateWeightedAverage([1, 2], [1])).toThrow('Values and weights must have the same length: 2 vs 1');
  });

  it('rejects negative weights', () => {
    expect(() => calculateWeightedAverage([1, 2], [1, -1])).toThrow('Weight at index 1 is invalid: -1');
  });

  it('signals division by zero when all weights are zero', () => {
    expect(() => calculateWeightedAverage([1, 2], [0, 0])).toThrow(DivisionByZeroError);
  });

  it('reports overflow when the weighted sum leaves the finite range', () => {
    expect(() => calculateWeightedAverage([1e308, 1e308], [10, 10])).toThrow(OverflowError);
    expect(() => calculateWeightedAverage([1e308, 1e308], [10, 10])).toThrow(
      'Calculation overflow in weighted average'
    );
  });
});

describe('calculateProbability', () => {
  it('divides successes by trials', () => {
    expect(calculateProbability(3, 4)).toBe(0.75);
  });

  it('signals division by zero for zero trials', () => {
    expect(() => calculateProbability(0, 0)).toThrow(DivisionByZeroError);
  });

  it('rejects more successes than trials', () => {
    expect(() => calculateProbability(5, 4)).toThrow('Successes cannot exceed trials: 5 > 4');
  });

  it('requires whole numbers', () => {
    expect(() => calculateProbability(1.5, 4)).toThrow('Successes must be a whole number: 1.5');
  });
});
