import { generateAmortizationSchedule } from '@fincalc/core';
import chalk from 'chalk';
import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { parseJsonOutput, runWithValues } from '../../test-utils/command-context.js';
import { amortizationCommand, selectScheduleRows } from './amortization.js';
import { breakEvenCommand } from './break-even.js';
import { depreciationCommand } from './depreciation.js';
import { mortgageCommand } from './mortgage.js';
import { paymentCommand } from './payment.js';

const SCHEDULE_ROW = /^\s*\d+ {2}/;

describe('selectScheduleRows', () => {
  it('keeps month 1, every 12th month and the final month', () => {
    const schedule = generateAmortizationSchedule(100000, 5, 30);
    const rows = selectScheduleRows(schedule, false);

    expect(rows).toHaveLength(31);
    expect(rows.slice(0, 3).map((row) => row.month)).toEqual([1, 12, 24]);
    expect(rows.at(-1)?.month).toBe(360);
  });

  it('keeps everything when all rows are requested', () => {
    const schedule = generateAmortizationSchedule(12000, 6, 1);
    expect(selectScheduleRows(schedule, true)).toBe(schedule);
  });
});

describe('loan commands', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('payment prints the monthly payment', async () => {
    const logs = await runWithValues(paymentCommand, { principal: '100000', rate: '5', years: '30', format: 'table' });

    expect(logs).toContain('  Monthly Payment: $536.82');
  });

  it('payment handles a zero rate', async () => {
    const data = parseJsonOutput(
      await runWithValues(paymentCommand, { principal: '12000', rate: '0', years: '1', format: 'json' })
    );

    expect(data.monthlyPayment).toBe(1000);
    expect(data.numberOfPayments).toBe(12);
  });

  it('mortgage reports the payoff date from today', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-01-15T00:00:00Z'));

    const logs = await runWithValues(mortgageCommand, {
      principal: '200000',
      rate: '4.5',
      years: '30',
      format: 'table',
    });
    expect(logs).toContain('  Payoff Date:     2054-01-15');

    const data = parseJsonOutput(
      await runWithValues(mortgageCommand, { principal: '200000', rate: '4.5', years: '30', format: 'json' })
    );
    expect(data.numberOfPayments).toBe(360);
    expect(data.monthlyPayment).toBeCloseTo(1013.37, 2);
    expect(data.payoffDate).toBe('2054-01-15');
  });

  it('mortgage requires a whole number of years', async () => {
    await expect(
      runWithValues(mortgageCommand, { principal: '200000', rate: '4.5', years: '2.5', format: 'json' })
    ).rejects.toThrow('Invalid --years "2.5": expected a whole number');
  });

  it('amortization shows yearly rows unless --all is given', async () => {
    const values = { principal: '12000', rate: '6', years: '1', format: 'table' };

    const yearly = await runWithValues(amortizationCommand, values);
    expect(yearly.filter((line) => SCHEDULE_ROW.test(line))).toHaveLength(2);
    expect(yearly.at(-1)).toBe('Showing month 1, every 12th month and the final month. Use --all for every month.');

    const all = await runWithValues(amortizationCommand, { ...values, all: true });
    expect(all.filter((line) => SCHEDULE_ROW.test(line))).toHaveLength(12);
  });

  it('amortization ends with a zero balance', async () => {
    const data = parseJsonOutput(
      await runWithValues(amortizationCommand, { principal: '12000', rate: '6', years: '1', format: 'json' })
    );

    expect(Array.isArray(data.schedule)).toBe(true);
    expect(data.schedule).toHaveLength(12);
    expect(data.schedule).toEqual(expect.arrayContaining([expect.objectContaining({ month: 12, remainingBalance: 0 })]));
  });

  it('break-even prints units and revenue', async () => {
    const logs = await runWithValues(breakEvenCommand, {
      'fixed-costs': '5000',
      'variable-cost': '10',
      price: '20',
      format: 'table',
    });

    expect(logs).toContain('  Break-Even Units:     500');
    expect(logs).toContain('  Break-Even Revenue:   $10,000.00');
  });

  it('break-even rejects a price at or below the variable cost', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(
      runWithValues(breakEvenCommand, { 'fixed-costs': '5000', 'variable-cost': '20', price: '20', format: 'json' })
    ).rejects.toMatchObject({ exitCode: 1 });
    expect(errorSpy.mock.calls[0]?.[0]).toBe('\nError: Price per unit must be greater than variable cost per unit');
  });

  it('depreciation follows the double-declining-balance method', async () => {
    const data = parseJsonOutput(
      await runWithValues(depreciationCommand, {
        cost: '10000',
        salvage: '1000',
        life: '5',
        method: 'double-declining-balance',
        format: 'json',
      })
    );

    const schedule = Array.isArray(data.schedule) ? data.schedule : [];
    const charges = schedule.map((entry: { depreciation: number }) => entry.depreciation);
    expect(charges).toHaveLength(5);
    [4000, 2400, 1440, 864, 296].forEach((expected, i) => {
      expect(charges[i]).toBeCloseTo(expected, 6);
    });
  });

  it('depreciation spreads cost evenly with straight-line', async () => {
    const logs = await runWithValues(depreciationCommand, {
      cost: '10000',
      salvage: '1000',
      life: '3',
      method: 'straight-line',
      format: 'table',
    });

    expect(logs.slice(-5)).toEqual([
      'Year  Depreciation  Accumulated  Book Value',
      '─'.repeat(43),
      '   1     $3,000.00    $3,000.00   $7,000.00',
      '   2     $3,000.00    $6,000.00   $4,000.00',
      '   3     $3,000.00    $9,000.00   $1,000.00',
    ]);
  });

  it('depreciation rejects an unknown method', async () => {
    await expect(
      runWithValues(depreciationCommand, { cost: '10000', salvage: '1000', life: '5', method: 'sum-of-years' })
    ).rejects.toThrow('--method must be one of: straight-line, double-declining-balance');
  });
});
