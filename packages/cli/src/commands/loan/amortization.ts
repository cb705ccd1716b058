import { type AmortizationPayment, calculateLoanPayment, generateAmortizationSchedule } from '@fincalc/core';
import { define } from 'gunshi';
import { parseIntegerArg, parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentValue } from '../../utils/format-helpers.js';
import { loanArgs } from './loan-args.js';

/**
 * Month 1, every 12th month and the final month
 */
export function selectScheduleRows(schedule: AmortizationPayment[], all: boolean): AmortizationPayment[] {
  if (all) return schedule;
  const last = schedule.length;
  return schedule.filter((payment) => payment.month === 1 || payment.month % 12 === 0 || payment.month === last);
}

export const amortizationCommand = define({
  name: 'amortization',
  description: 'Generate a month-by-month amortization schedule',
  args: {
    ...loanArgs,
    all: { type: 'boolean', short: 'a', description: 'Show every month instead of yearly rows' },
    ...outputArgs,
  },
  examples: `
${CLI_NAME} loan amortization --principal 100000 --rate 5 --years 30
${CLI_NAME} loan amortization -p 12000 -r 6 -t 1 --all
  `.trim(),
  run: (ctx) => {
    const { principal, rate, years, all, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'loan amortization', format, debug }, () => {
      const p = parseNumberArg(principal, 'principal');
      const annualRate = parseNumberArg(rate, 'rate');
      const term = parseIntegerArg(years, 'years');

      const schedule = generateAmortizationSchedule(p, annualRate, term);
      const totalInterest = schedule.reduce((sum, payment) => sum + payment.interestPayment, 0);
      const monthlyPayment = calculateLoanPayment(p, annualRate, term);

      return {
        title: 'Amortization Schedule',
        summary: [
          ['Principal', formatCurrency(p)],
          ['Annual Rate', formatPercentValue(annualRate)],
          ['Payments', String(schedule.length)],
          ['Monthly Payment', formatCurrency(monthlyPayment)],
          ['Total Interest', formatCurrency(totalInterest)],
        ],
        table: {
          columns: [
            { header: 'Month', align: 'right' },
            { header: 'Principal', align: 'right' },
            { header: 'Interest', align: 'right' },
            { header: 'Balance', align: 'right' },
          ],
          rows: selectScheduleRows(schedule, all === true).map((payment) => [
            String(payment.month),
            formatCurrency(payment.principalPayment),
            formatCurrency(payment.interestPayment),
            formatCurrency(payment.remainingBalance),
          ]),
        },
        notes: all ? undefined : ['Showing month 1, every 12th month and the final month. Use --all for every month.'],
        data: { principal: p, annualRate, years: term, monthlyPayment, totalInterest, schedule },
      };
    });
  },
});
