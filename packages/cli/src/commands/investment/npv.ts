import { calculateNpv } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentage } from '../../utils/format-helpers.js';
import { cashFlowArgs, parseCashFlows } from './cash-flow-args.js';

export const npvCommand = define({
  name: 'npv',
  description: 'Calculate net present value of an investment',
  args: {
    'initial-investment': { type: 'string', short: 'i', description: 'Initial investment (positive amount)' },
    'discount-rate': { type: 'string', short: 'r', description: 'Discount rate as a decimal (0.05 = 5%)' },
    ...cashFlowArgs,
    ...outputArgs,
  },
  examples: `
${CLI_NAME} investment npv --initial-investment 2000 --cash-flows 1000,1000,1000 --discount-rate 0.05

# Constant inflow over several years
${CLI_NAME} investment npv -i 10000 --cash-inflow 3000 --lifespan 5 -r 0.08
  `.trim(),
  run: (ctx) => {
    const { 'initial-investment': initialInvestment, 'discount-rate': discountRate, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'investment npv', format, debug }, () => {
      const investment = parseNumberArg(initialInvestment, 'initial-investment');
      const rate = parseNumberArg(discountRate, 'discount-rate');
      const cashFlows = parseCashFlows(ctx.values);

      const npv = calculateNpv(investment, cashFlows, rate);
      const discounted = cashFlows.map((cashFlow, i) => cashFlow / (1 + rate) ** (i + 1));

      return {
        title: 'Net Present Value',
        summary: [
          ['Initial Investment', formatCurrency(investment)],
          ['Discount Rate', formatPercentage(rate)],
          ['Periods', String(cashFlows.length)],
          ['NPV', formatCurrency(npv)],
          ['Decision', npv >= 0 ? 'Accept (NPV ≥ 0)' : 'Reject (NPV < 0)'],
        ],
        table: {
          caption: 'Discounted Cash Flows',
          columns: [
            { header: 'Year', align: 'right' },
            { header: 'Cash Flow', align: 'right' },
            { header: 'Present Value', align: 'right' },
          ],
          rows: cashFlows.map((cashFlow, i) => [
            String(i + 1),
            formatCurrency(cashFlow),
            formatCurrency(discounted[i] ?? 0),
          ]),
        },
        data: { initialInvestment: investment, discountRate: rate, cashFlows, npv },
      };
    });
  },
});
