import { calculatePaybackPeriod } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPeriods } from '../../utils/format-helpers.js';
import { cashFlowArgs, parseCashFlows } from './cash-flow-args.js';

export const paybackCommand = define({
  name: 'payback',
  description: 'Calculate the payback period of an investment',
  args: {
    'initial-cost': { type: 'string', short: 'i', description: 'Initial cost of the investment' },
    ...cashFlowArgs,
    ...outputArgs,
  },
  examples: `${CLI_NAME} investment payback --initial-cost 250 --cash-flows 100,200,300`,
  run: (ctx) => {
    const { 'initial-cost': initialCost, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'investment payback', format, debug }, () => {
      const cost = parseNumberArg(initialCost, 'initial-cost');
      const cashFlows = parseCashFlows(ctx.values);

      const paybackPeriod = calculatePaybackPeriod(cost, cashFlows);

      let cumulative = 0;
      const rows = cashFlows.map((cashFlow, i) => {
        cumulative += cashFlow;
        return [String(i + 1), formatCurrency(cashFlow), formatCurrency(cumulative)];
      });

      return {
        title: 'Payback Period',
        summary: [
          ['Initial Cost', formatCurrency(cost)],
          ['Payback Period', paybackPeriod === null ? 'Never (cost not recovered)' : formatPeriods(paybackPeriod)],
        ],
        table: {
          caption: 'Cumulative Cash Flow',
          columns: [
            { header: 'Year', align: 'right' },
            { header: 'Cash Flow', align: 'right' },
            { header: 'Cumulative', align: 'right' },
          ],
          rows,
        },
        data: { initialCost: cost, cashFlows, paybackPeriod },
      };
    });
  },
});
