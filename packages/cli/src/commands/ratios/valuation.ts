import { calculateDividendYield, calculatePeRatio } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentValue, formatRatio } from '../../utils/format-helpers.js';

const priceArg = { type: 'string', short: 'p', description: 'Share price' } as const;

export const peCommand = define({
  name: 'pe',
  description: 'Price-to-earnings ratio',
  args: {
    price: priceArg,
    eps: { type: 'string', short: 'e', description: 'Earnings per share' },
    ...outputArgs,
  },
  examples: `${CLI_NAME} ratios pe --price 50 --eps 2.5`,
  run: (ctx) => {
    const { price, eps, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'ratios pe', format, debug }, () => {
      const stockPrice = parseNumberArg(price, 'price');
      const earningsPerShare = parseNumberArg(eps, 'eps');

      const peRatio = calculatePeRatio(stockPrice, earningsPerShare);

      return {
        title: 'Price-to-Earnings Ratio',
        summary: [
          ['Share Price', formatCurrency(stockPrice)],
          ['EPS', formatCurrency(earningsPerShare)],
          ['P/E', formatRatio(peRatio)],
        ],
        data: { stockPrice, earningsPerShare, peRatio },
      };
    });
  },
});

export const dividendYieldCommand = define({
  name: 'dividend-yield',
  description: 'Annual dividend as a percentage of the share price',
  args: {
    dividend: { type: 'string', short: 'd', description: 'Annual dividend per share' },
    price: priceArg,
    ...outputArgs,
  },
  examples: `${CLI_NAME} ratios dividend-yield --dividend 2 --price 50`,
  run: (ctx) => {
    const { dividend, price, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'ratios dividend-yield', format, debug }, () => {
      const annualDividend = parseNumberArg(dividend, 'dividend');
      const stockPrice = parseNumberArg(price, 'price');

      const dividendYield = calculateDividendYield(annualDividend, stockPrice);

      return {
        title: 'Dividend Yield',
        summary: [
          ['Annual Dividend', formatCurrency(annualDividend)],
          ['Share Price', formatCurrency(stockPrice)],
          ['Yield', formatPercentValue(dividendYield)],
        ],
        data: { annualDividend, stockPrice, dividendYield },
      };
    });
  },
});
