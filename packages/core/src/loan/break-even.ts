import { InvalidInputError } from '../errors/index.js';
import { safeDivide, safeMultiply, validatePositive } from '../safety/index.js';
import type { BreakEvenAnalysis } from './types.js';

/**
 * Units needed to cover fixed costs
 *
 * Break-even units = Fixed costs / (Price − Variable cost)
 */
export function calculateBreakEvenUnits(fixedCosts: number, variableCostPerUnit: number, pricePerUnit: number): number {
  validatePositive(fixedCosts, 'Fixed costs');
  validatePositive(variableCostPerUnit, 'Variable cost per unit');
  validatePositive(pricePerUnit, 'Price per unit');

  if (pricePerUnit <= variableCostPerUnit) {
    throw new InvalidInputError(
      'Price per unit must be greater than variable cost per unit',
      'Price per unit',
      pricePerUnit
    );
  }

  return safeDivide(fixedCosts, pricePerUnit - variableCostPerUnit);
}

/**
 * Break-even units and the revenue they bring in
 */
export function calculateBreakEvenAnalysis(
  fixedCosts: number,
  variableCostPerUnit: number,
  pricePerUnit: number
): BreakEvenAnalysis {
  const units = calculateBreakEvenUnits(fixedCosts, variableCostPerUnit, pricePerUnit);
  return { units, revenue: safeMultiply(units, pricePerUnit) };
}
