import { calculateDebtToEquity, calculateWacc } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentage, formatRatio } from '../../utils/format-helpers.js';

export const debtToEquityCommand = define({
  name: 'debt-to-equity',
  description: 'Debt-to-equity ratio',
  args: {
    debt: { type: 'string', short: 'd', description: 'Total debt' },
    equity: { type: 'string', short: 'e', description: 'Total equity' },
    ...outputArgs,
  },
  examples: `${CLI_NAME} ratios debt-to-equity --debt 400000 --equity 800000`,
  run: (ctx) => {
    const { debt, equity, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'ratios debt-to-equity', format, debug }, () => {
      const totalDebt = parseNumberArg(debt, 'debt');
      const totalEquity = parseNumberArg(equity, 'equity');

      const debtToEquity = calculateDebtToEquity(totalDebt, totalEquity);

      return {
        title: 'Debt-to-Equity Ratio',
        summary: [
          ['Total Debt', formatCurrency(totalDebt)],
          ['Total Equity', formatCurrency(totalEquity)],
          ['D/E', formatRatio(debtToEquity)],
        ],
        data: { totalDebt, totalEquity, debtToEquity },
      };
    });
  },
});

export const waccCommand = define({
  name: 'wacc',
  description: 'Weighted average cost of capital (rates as decimals)',
  args: {
    'cost-of-equity': { type: 'string', description: 'Cost of equity as a decimal (0.10 = 10%)' },
    'cost-of-debt': { type: 'string', description: 'Pre-tax cost of debt as a decimal' },
    'tax-rate': { type: 'string', description: 'Corporate tax rate as a decimal (0-1)' },
    'equity-value': { type: 'string', description: 'Market value of equity' },
    'debt-value': { type: 'string', description: 'Market value of debt' },
    ...outputArgs,
  },
  examples: `${CLI_NAME} ratios wacc --cost-of-equity 0.10 --cost-of-debt 0.05 --tax-rate 0.2 --equity-value 600000 --debt-value 400000`,
  run: (ctx) => {
    const values = ctx.values;

    runCalculationCommand(ctx, { command: 'ratios wacc', format: values.format, debug: values.debug }, () => {
      const costOfEquity = parseNumberArg(values['cost-of-equity'], 'cost-of-equity');
      const costOfDebt = parseNumberArg(values['cost-of-debt'], 'cost-of-debt');
      const taxRate = parseNumberArg(values['tax-rate'], 'tax-rate');
      const marketValueEquity = parseNumberArg(values['equity-value'], 'equity-value');
      const marketValueDebt = parseNumberArg(values['debt-value'], 'debt-value');

      const wacc = calculateWacc(costOfEquity, costOfDebt, taxRate, marketValueEquity, marketValueDebt);

      return {
        title: 'Weighted Average Cost of Capital',
        summary: [
          ['Cost of Equity', formatPercentage(costOfEquity)],
          ['Cost of Debt', formatPercentage(costOfDebt)],
          ['Tax Rate', formatPercentage(taxRate)],
          ['Equity Value', formatCurrency(marketValueEquity)],
          ['Debt Value', formatCurrency(marketValueDebt)],
          ['WACC', formatPercentage(wacc)],
        ],
        data: { costOfEquity, costOfDebt, taxRate, marketValueEquity, marketValueDebt, wacc },
      };
    });
  },
});
