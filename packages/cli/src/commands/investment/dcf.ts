import { calculateDcf } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentage, formatSeries } from '../../utils/format-helpers.js';
import { cashFlowArgs, parseCashFlows } from './cash-flow-args.js';

export const dcfCommand = define({
  name: 'dcf',
  description: 'Calculate the discounted value of a cash-flow series',
  args: {
    'discount-rate': { type: 'string', short: 'r', description: 'Discount rate as a decimal, above -1' },
    ...cashFlowArgs,
    ...outputArgs,
  },
  examples: `${CLI_NAME} investment dcf --cash-flows 1000,2000,3000 --discount-rate 0.1`,
  run: (ctx) => {
    const { 'discount-rate': discountRate, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'investment dcf', format, debug }, () => {
      const rate = parseNumberArg(discountRate, 'discount-rate');
      const cashFlows = parseCashFlows(ctx.values);

      const value = calculateDcf(cashFlows, rate);
      const undiscounted = cashFlows.reduce((sum, cashFlow) => sum + cashFlow, 0);

      return {
        title: 'Discounted Cash Flow',
        summary: [
          ['Cash Flows', formatSeries(cashFlows)],
          ['Discount Rate', formatPercentage(rate)],
          ['Undiscounted Total', formatCurrency(undiscounted)],
          ['Discounted Value', formatCurrency(value)],
        ],
        data: { cashFlows, discountRate: rate, discountedValue: value },
      };
    });
  },
});
