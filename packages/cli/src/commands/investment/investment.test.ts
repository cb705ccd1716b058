import chalk from 'chalk';
import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { parseJsonOutput, runWithValues } from '../../test-utils/command-context.js';
import { capmCommand } from './capm.js';
import { parseCashFlows } from './cash-flow-args.js';
import { dcfCommand } from './dcf.js';
import { irrCommand } from './irr.js';
import { npvCommand } from './npv.js';
import { paybackCommand } from './payback.js';
import { roiCommand } from './roi.js';

describe('parseCashFlows', () => {
  it('reads an explicit series', () => {
    expect(parseCashFlows({ 'cash-flows': '100,200,300' })).toEqual([100, 200, 300]);
  });

  it('expands a constant inflow over the lifespan', () => {
    expect(parseCashFlows({ 'cash-inflow': '600', lifespan: '3' })).toEqual([600, 600, 600]);
  });

  it('rejects conflicting or missing inputs', () => {
    expect(() => parseCashFlows({ 'cash-flows': '100', 'cash-inflow': '600' })).toThrow(
      'Use either --cash-flows or --cash-inflow with --lifespan, not both'
    );
    expect(() => parseCashFlows({})).toThrow('--cash-flows is required (or --cash-inflow with --lifespan)');
    expect(() => parseCashFlows({ 'cash-inflow': '600', lifespan: '0' })).toThrow(
      '--lifespan must be a positive whole number'
    );
  });
});

describe('investment commands', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('npv discounts each flow and recommends a decision', async () => {
    const logs = await runWithValues(npvCommand, {
      'initial-investment': '1000',
      'discount-rate': '0.1',
      'cash-flows': '600,600',
      format: 'table',
    });

    expect(logs).toContain('  Decision:           Accept (NPV ≥ 0)');
    expect(logs.slice(-4)).toEqual([
      'Year  Cash Flow  Present Value',
      '─'.repeat(30),
      '   1    $600.00        $545.45',
      '   2    $600.00        $495.87',
    ]);
  });

  it('npv gives the same result for a constant inflow', async () => {
    const data = parseJsonOutput(
      await runWithValues(npvCommand, {
        'initial-investment': '1000',
        'discount-rate': '0.1',
        'cash-inflow': '600',
        lifespan: '2',
        format: 'json',
      })
    );

    expect(data.cashFlows).toEqual([600, 600]);
    expect(data.npv).toBeCloseTo(41.3223, 4);
  });

  it('dcf accepts a negative discount rate above -100%', async () => {
    const data = parseJsonOutput(
      await runWithValues(dcfCommand, { 'discount-rate': '-0.5', 'cash-flows': '100', format: 'json' })
    );

    expect(data.discountedValue).toBeCloseTo(200, 10);
  });

  it('dcf rejects a rate of -100%', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(
      runWithValues(dcfCommand, { 'discount-rate': '-1', 'cash-flows': '100', format: 'json' })
    ).rejects.toMatchObject({ exitCode: 1, kind: 'InvalidInput' });
  });

  it('payback interpolates within the crossing year', async () => {
    const logs = await runWithValues(paybackCommand, {
      'initial-cost': '1000',
      'cash-flows': '400,400,400',
      format: 'table',
    });

    expect(logs).toContain('  Payback Period: 3.50 years');
  });

  it('payback reports a cost that is never recovered', async () => {
    const logs = await runWithValues(paybackCommand, {
      'initial-cost': '1000',
      'cash-flows': '100,100,100',
      format: 'table',
    });

    expect(logs).toContain('  Payback Period: Never (cost not recovered)');
    const data = parseJsonOutput(
      await runWithValues(paybackCommand, { 'initial-cost': '1000', 'cash-flows': '100,100,100', format: 'json' })
    );
    expect(data.paybackPeriod).toBeNull();
  });

  it('roi returns a percentage', async () => {
    const data = parseJsonOutput(await runWithValues(roiCommand, { 'net-profit': '250', cost: '1000', format: 'json' }));

    expect(data.roi).toBe(25);
  });

  it('capm adds the beta-scaled market premium', async () => {
    const data = parseJsonOutput(
      await runWithValues(capmCommand, {
        'risk-free-rate': '0.03',
        beta: '1.2',
        'market-return': '0.08',
        format: 'json',
      })
    );

    expect(data.expectedReturn).toBeCloseTo(0.09, 10);
  });

  it('irr finds the rate that zeroes the NPV', async () => {
    const data = parseJsonOutput(await runWithValues(irrCommand, { 'cash-flows': '-1000,1100', format: 'json' }));

    expect(data.irr).toBeCloseTo(0.1, 8);
  });

  it('irr exits with code 2 when the iteration budget runs out', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(
      runWithValues(irrCommand, { 'cash-flows': '-1000,300,400,500', 'max-iterations': '1', format: 'json' })
    ).rejects.toMatchObject({ exitCode: 2, kind: 'ConvergenceFailed' });
  });

  it('irr rejects a series without a sign change', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(runWithValues(irrCommand, { 'cash-flows': '100,200', format: 'json' })).rejects.toMatchObject({
      exitCode: 1,
      message: 'IRR requires at least one positive and one negative cash flow',
    });
  });
});
