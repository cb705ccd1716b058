import { calculateLoanPayment } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentValue, formatPeriods } from '../../utils/format-helpers.js';
import { loanArgs } from './loan-args.js';

export const paymentCommand = define({
  name: 'payment',
  description: 'Calculate the monthly payment of a fully amortizing loan',
  args: {
    ...loanArgs,
    ...outputArgs,
  },
  examples: `${CLI_NAME} loan payment --principal 100000 --rate 5 --years 30`,
  run: (ctx) => {
    const { principal, rate, years, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'loan payment', format, debug }, () => {
      const p = parseNumberArg(principal, 'principal');
      const annualRate = parseNumberArg(rate, 'rate');
      const term = parseNumberArg(years, 'years');

      const monthlyPayment = calculateLoanPayment(p, annualRate, term);
      const numberOfPayments = term * 12;
      const totalPaid = monthlyPayment * numberOfPayments;

      return {
        title: 'Loan Payment',
        summary: [
          ['Principal', formatCurrency(p)],
          ['Annual Rate', formatPercentValue(annualRate)],
          ['Term', formatPeriods(term)],
          ['Monthly Payment', formatCurrency(monthlyPayment)],
          ['Total Paid', formatCurrency(totalPaid)],
          ['Total Interest', formatCurrency(totalPaid - p)],
        ],
        data: { principal: p, annualRate, years: term, monthlyPayment, numberOfPayments, totalPaid },
      };
    });
  },
});
