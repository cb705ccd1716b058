import { describe, expect, it } from 'vitest';
import { InvalidInputError } from '../../errors/index.js';
import { createNumericPolicy } from '../../safety/index.js';
import {
  calculateCompoundGrowth,
  calculateCompoundInterest,
  calculateFutureValue,
  calculatePresentValue,
  calculateSimpleInterest,
} from '../index.js';

describe('calculateSimpleInterest', () => {
  it('computes principal × rate × time', () => {
    expect(calculateSimpleInterest(1000, 0.05, 2)).toBeCloseTo(100, 10);
  });

  it('returns zero for a zero rate', () => {
    expect(calculateSimpleInterest(1000, 0, 5)).toBe(0);
  });

  it('rejects a non-positive principal', () => {
    expect(() => calculateSimpleInterest(0, 0.05, 2)).toThrow(InvalidInputError);
  });

  it('rejects a principal above the magnitude limit', () => {
    expect(() => calculateSimpleInterest(2e15, 0.05, 1)).toThrow('Principal is too large for safe calculation');
  });
});

describe('calculateCompoundInterest', () => {
  it('compounds monthly over one year', () => {
    expect(calculateCompoundInterest(1000, 0.05, 12, 1)).toBeCloseTo(1051.16, 2);
  });

  it('compounds annually', () => {
    expect(calculateCompoundInterest(1000, 0.05, 1, 2)).toBeCloseTo(1102.5, 10);
  });

  it('returns the principal for zero years', () => {
    expect(calculateCompoundInterest(1000, 0.05, 12, 0)).toBe(1000);
  });

  it('rejects a zero compounding frequency', () => {
    expect(() => calculateCompoundInterest(1000, 0.05, 0, 1)).toThrow('Compound frequency must be positive: 0');
  });

  it('rejects fractional years', () => {
    expect(() => calculateCompoundInterest(1000, 0.05, 12, 1.5)).toThrow('Years must be a whole number: 1.5');
  });

  it('applies the exponent cutoff to the total number of periods', () => {
    // 12 × 9 = 108 periods
    expect(() => calculateCompoundInterest(1000, 0.05, 12, 9)).toThrow(InvalidInputError);
    const relaxed = createNumericPolicy({ maxExponent: 1000 });
    expect(calculateCompoundInterest(1000, 0.05, 12, 9, relaxed)).toBeGreaterThan(1000);
  });
});

describe('calculateCompoundGrowth', () => {
  it('returns one balance per year', () => {
    const points = calculateCompoundGrowth(1000, 0.1, 1, 3);
    expect(points.map((p) => p.year)).toEqual([1, 2, 3]);
    expect(points[0]?.amount).toBeCloseTo(1100, 10);
    expect(points[1]?.amount).toBeCloseTo(1210, 10);
    expect(points[2]?.amount).toBeCloseTo(1331, 10);
  });

  it('returns an empty list for zero years', () => {
    expect(calculateCompoundGrowth(1000, 0.1, 1, 0)).toEqual([]);
  });

  it('rejects invalid inputs even when no year is produced', () => {
    expect(() => calculateCompoundGrowth(-1, 0.1, 1, 0)).toThrow(InvalidInputError);
  });
});

describe('calculatePresentValue', () => {
  it('discounts a future amount', () => {
    expect(calculatePresentValue(1102.5, 0.05, 2)).toBeCloseTo(1000, 10);
  });

  it('rejects discount rates of 100% or more', () => {
    expect(() => calculatePresentValue(1000, 1, 2)).toThrow('Discount rate should be less than 100%: 1');
  });
});

describe('calculateFutureValue', () => {
  it('grows a present amount', () => {
    expect(calculateFutureValue(1000, 0.05, 2)).toBeCloseTo(1102.5, 10);
  });

  it('accepts rates above 100%', () => {
    expect(calculateFutureValue(100, 1.5, 1)).toBeCloseTo(250, 10);
  });

  it('rejects a negative time', () => {
    expect(() => calculateFutureValue(1000, 0.05, -1)).toThrow('Time must be non-negative: -1');
  });
});

describe('present and future value round trip', () => {
  it.each([
    [1102.5, 0.05, 2],
    [5000, 0.08, 3.5],
    [250, 0.99, 1.25],
    [42, 0.999, 0.5],
    [1_000_000, 0.03, 30],
    [750, 0, 12],
  ])('recovers %d at rate %d over %d years', (futureValue, rate, time) => {
    const presentValue = calculatePresentValue(futureValue, rate, time);
    expect(calculateFutureValue(presentValue, rate, time)).toBeCloseTo(futureValue, 6);
  });
});
