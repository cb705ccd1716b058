import { calculateBreakEvenAnalysis } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatNumber } from '../../utils/format-helpers.js';

export const breakEvenCommand = define({
  name: 'break-even',
  description: 'Units and revenue needed to cover fixed costs',
  args: {
    'fixed-costs': { type: 'string', short: 'f', description: 'Total fixed costs' },
    'variable-cost': { type: 'string', short: 'v', description: 'Variable cost per unit' },
    price: { type: 'string', short: 'p', description: 'Selling price per unit' },
    ...outputArgs,
  },
  examples: `${CLI_NAME} loan break-even --fixed-costs 5000 --variable-cost 10 --price 20`,
  run: (ctx) => {
    const { 'fixed-costs': fixedCosts, 'variable-cost': variableCost, price, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'loan break-even', format, debug }, () => {
      const fixed = parseNumberArg(fixedCosts, 'fixed-costs');
      const variable = parseNumberArg(variableCost, 'variable-cost');
      const unitPrice = parseNumberArg(price, 'price');

      const { units, revenue } = calculateBreakEvenAnalysis(fixed, variable, unitPrice);

      return {
        title: 'Break-Even Analysis',
        summary: [
          ['Fixed Costs', formatCurrency(fixed)],
          ['Variable Cost / Unit', formatCurrency(variable)],
          ['Price / Unit', formatCurrency(unitPrice)],
          ['Contribution Margin', formatCurrency(unitPrice - variable)],
          ['Break-Even Units', formatNumber(units, 2)],
          ['Break-Even Revenue', formatCurrency(revenue)],
        ],
        data: { fixedCosts: fixed, variableCostPerUnit: variable, pricePerUnit: unitPrice, units, revenue },
      };
    });
  },
});
