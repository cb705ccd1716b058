/**
 * Date helpers for payoff-date calculation
 */

import type { Clock } from './types.js';

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Add calendar months in UTC, clamping the day to the end of the target month
 *
 * @example
 * ```typescript
 * addMonthsUTC(new Date('2024-01-31'), 1); // 2024-02-29
 * ```
 */
export function addMonthsUTC(date: Date, months: number): Date {
  const day = date.getUTCDate();
  const target = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + months, 1));
  const year = target.getUTCFullYear();
  const month = target.getUTCMonth();

  const lastDayOfMonth = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  return new Date(Date.UTC(year, month, Math.min(day, lastDayOfMonth)));
}

/**
 * Convert a Date to ISO date string (YYYY-MM-DD format)
 *
 * @throws Error if the date is invalid
 */
export function toISODateString(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new Error('Invalid date: Date object represents an invalid date');
  }
  return date.toISOString().slice(0, 10);
}
