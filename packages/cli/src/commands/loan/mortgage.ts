import { calculateMortgageDetails, systemClock } from '@fincalc/core';
import { define } from 'gunshi';
import { parseIntegerArg, parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentValue } from '../../utils/format-helpers.js';
import { loanArgs } from './loan-args.js';

export const mortgageCommand = define({
  name: 'mortgage',
  description: 'Mortgage payment, total interest and payoff date',
  args: {
    ...loanArgs,
    ...outputArgs,
  },
  examples: `${CLI_NAME} loan mortgage --principal 200000 --rate 4.5 --years 30`,
  run: (ctx) => {
    const { principal, rate, years, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'loan mortgage', format, debug }, () => {
      const p = parseNumberArg(principal, 'principal');
      const annualRate = parseNumberArg(rate, 'rate');
      const term = parseIntegerArg(years, 'years');

      const details = calculateMortgageDetails(p, annualRate, term, systemClock);

      return {
        title: 'Mortgage Details',
        summary: [
          ['Loan Amount', formatCurrency(p)],
          ['Annual Rate', formatPercentValue(annualRate)],
          ['Term', `${term} years (${details.numberOfPayments} payments)`],
          ['Monthly Payment', formatCurrency(details.monthlyPayment)],
          ['Total Paid', formatCurrency(details.totalPaid)],
          ['Total Interest', formatCurrency(details.totalInterest)],
          ['Payoff Date', details.payoffDate],
        ],
        data: { loanAmount: p, annualRate, years: term, ...details },
      };
    });
  },
});
