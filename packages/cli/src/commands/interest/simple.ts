import { calculateSimpleInterest } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentage, formatPeriods } from '../../utils/format-helpers.js';

export const simpleCommand = define({
  name: 'simple',
  description: 'Calculate simple interest (P × r × t)',
  args: {
    principal: { type: 'string', short: 'p', description: 'Principal amount' },
    rate: { type: 'string', short: 'r', description: 'Interest rate per year as a decimal (0.05 = 5%)' },
    time: { type: 'string', short: 't', description: 'Time in years' },
    ...outputArgs,
  },
  examples: `
# $1,000 at 5% for 2 years
${CLI_NAME} interest simple --principal 1000 --rate 0.05 --time 2
  `.trim(),
  run: (ctx) => {
    const { principal, rate, time, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'interest simple', format, debug }, ({ numeric }) => {
      const p = parseNumberArg(principal, 'principal');
      const r = parseNumberArg(rate, 'rate');
      const t = parseNumberArg(time, 'time');

      const interest = calculateSimpleInterest(p, r, t, numeric);
      const totalAmount = p + interest;

      return {
        title: 'Simple Interest',
        summary: [
          ['Principal', formatCurrency(p)],
          ['Rate', formatPercentage(r)],
          ['Time', formatPeriods(t)],
          ['Interest', formatCurrency(interest)],
          ['Total Amount', formatCurrency(totalAmount)],
        ],
        data: { principal: p, rate: r, time: t, interest, totalAmount },
      };
    });
  },
});
