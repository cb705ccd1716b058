import { calculateRoi } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentValue } from '../../utils/format-helpers.js';

export const roiCommand = define({
  name: 'roi',
  description: 'Calculate return on investment',
  args: {
    'net-profit': { type: 'string', short: 'p', description: 'Net profit (negative for a loss)' },
    cost: { type: 'string', short: 'c', description: 'Cost of the investment' },
    ...outputArgs,
  },
  examples: `${CLI_NAME} investment roi --net-profit 250 --cost 1000`,
  run: (ctx) => {
    const { 'net-profit': netProfit, cost, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'investment roi', format, debug }, () => {
      const profit = parseNumberArg(netProfit, 'net-profit');
      const investmentCost = parseNumberArg(cost, 'cost');

      const roi = calculateRoi(profit, investmentCost);

      return {
        title: 'Return on Investment',
        summary: [
          ['Net Profit', formatCurrency(profit)],
          ['Cost', formatCurrency(investmentCost)],
          ['ROI', formatPercentValue(roi)],
        ],
        data: { netProfit: profit, cost: investmentCost, roi },
      };
    });
  },
});
