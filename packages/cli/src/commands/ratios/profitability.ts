import { calculateRoa, calculateRoe } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentValue } from '../../utils/format-helpers.js';

const netIncomeArg = {
  type: 'string',
  short: 'n',
  description: 'Net income (negative for a loss)',
} as const;

export const roeCommand = define({
  name: 'roe',
  description: 'Return on equity',
  args: {
    'net-income': netIncomeArg,
    equity: { type: 'string', short: 'e', description: "Shareholders' equity" },
    ...outputArgs,
  },
  examples: `${CLI_NAME} ratios roe --net-income 1000000 --equity 5000000`,
  run: (ctx) => {
    const { 'net-income': netIncome, equity, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'ratios roe', format, debug }, () => {
      const income = parseNumberArg(netIncome, 'net-income');
      const shareholdersEquity = parseNumberArg(equity, 'equity');

      const roe = calculateRoe(income, shareholdersEquity);

      return {
        title: 'Return on Equity',
        summary: [
          ['Net Income', formatCurrency(income)],
          ["Shareholders' Equity", formatCurrency(shareholdersEquity)],
          ['ROE', formatPercentValue(roe)],
        ],
        data: { netIncome: income, shareholdersEquity, roe },
      };
    });
  },
});

export const roaCommand = define({
  name: 'roa',
  description: 'Return on assets',
  args: {
    'net-income': netIncomeArg,
    assets: { type: 'string', short: 'a', description: 'Total assets' },
    ...outputArgs,
  },
  examples: `${CLI_NAME} ratios roa --net-income 500000 --assets 10000000`,
  run: (ctx) => {
    const { 'net-income': netIncome, assets, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'ratios roa', format, debug }, () => {
      const income = parseNumberArg(netIncome, 'net-income');
      const totalAssets = parseNumberArg(assets, 'assets');

      const roa = calculateRoa(income, totalAssets);

      return {
        title: 'Return on Assets',
        summary: [
          ['Net Income', formatCurrency(income)],
          ['Total Assets', formatCurrency(totalAssets)],
          ['ROA', formatPercentValue(roa)],
        ],
        data: { netIncome: income, totalAssets, roa },
      };
    });
  },
});
