/**
 * Depreciation schedules
 */

import { InvalidInputError } from '../errors/index.js';
import { validateInteger, validateNonNegative, validatePositive } from '../safety/index.js';
import type { DepreciationEntry, DepreciationMethod } from './types.js';

function validateDepreciationInputs(cost: number, salvageValue: number, usefulLifeYears: number): void {
  validatePositive(cost, 'Asset cost');
  validateNonNegative(salvageValue, 'Salvage value');
  if (salvageValue >= cost) {
    throw new InvalidInputError(
      `Salvage value must be less than asset cost: ${salvageValue}`,
      'Salvage value',
      salvageValue
    );
  }
  validateInteger(usefulLifeYears, 'Useful life');
  if (usefulLifeYears <= 0) {
    throw new InvalidInputError(`Useful life must be positive: ${usefulLifeYears}`, 'Useful life', usefulLifeYears);
  }
}

function yearlyCharge(
  method: DepreciationMethod,
  cost: number,
  salvageValue: number,
  life: number,
  bookValue: number
): number {
  if (method === 'straight-line') {
    return (cost - salvageValue) / life;
  }
  // Declining balance never takes the book value below salvage
  return Math.min(bookValue * (2 / life), bookValue - salvageValue);
}

/**
 * Year-by-year depreciation schedule
 *
 * The final year takes whatever depreciable amount remains, so the final
 * book value equals the salvage value for either method.
 *
 * @example
 * ```typescript
 * calculateDepreciationSchedule(10000, 1000, 5, 'double-declining-balance');
 * // depreciation: 4000, 2400, 1440, 864, 296
 * ```
 */
export function calculateDepreciationSchedule(
  cost: number,
  salvageValue: number,
  usefulLifeYears: number,
  method: DepreciationMethod
): DepreciationEntry[] {
  validateDepreciationInputs(cost, salvageValue, usefulLifeYears);

  const schedule: DepreciationEntry[] = [];
  let bookValue = cost;

  for (let year = 1; year <= usefulLifeYears; year++) {
    const depreciation =
      year === usefulLifeYears
        ? bookValue - salvageValue
        : yearlyCharge(method, cost, salvageValue, usefulLifeYears, bookValue);

    bookValue = year === usefulLifeYears ? salvageValue : bookValue - depreciation;
    schedule.push({
      year,
      depreciation,
      accumulatedDepreciation: cost - bookValue,
      bookValue,
    });
  }

  return schedule;
}
