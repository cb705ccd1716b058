import { calculateCompoundGrowth, calculateCompoundInterest } from '@fincalc/core';
import { define } from 'gunshi';
import { parseIntegerArg, parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentage } from '../../utils/format-helpers.js';

export const compoundCommand = define({
  name: 'compound',
  description: 'Calculate compound interest with a year-by-year balance table',
  args: {
    principal: { type: 'string', short: 'p', description: 'Principal amount' },
    rate: { type: 'string', short: 'r', description: 'Annual interest rate as a decimal (0.05 = 5%)' },
    frequency: { type: 'string', short: 'n', description: 'Compounding periods per year (e.g. 12 for monthly)' },
    years: { type: 'string', short: 't', description: 'Whole number of years' },
    ...outputArgs,
  },
  examples: `
# Monthly compounding for one year
${CLI_NAME} interest compound --principal 1000 --rate 0.05 --frequency 12 --years 1

# Long horizons need a higher exponent limit (n × t ≤ FINCALC_MAX_EXPONENT)
FINCALC_MAX_EXPONENT=400 ${CLI_NAME} interest compound -p 1000 -r 0.05 -n 12 -t 30
  `.trim(),
  run: (ctx) => {
    const { principal, rate, frequency, years, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'interest compound', format, debug }, ({ numeric }) => {
      const p = parseNumberArg(principal, 'principal');
      const r = parseNumberArg(rate, 'rate');
      const n = parseIntegerArg(frequency, 'frequency');
      const t = parseIntegerArg(years, 'years');

      const finalAmount = calculateCompoundInterest(p, r, n, t, numeric);
      const growth = calculateCompoundGrowth(p, r, n, t, numeric);
      const interestEarned = finalAmount - p;

      return {
        title: 'Compound Interest',
        summary: [
          ['Principal', formatCurrency(p)],
          ['Annual Rate', formatPercentage(r)],
          ['Periods / Year', String(n)],
          ['Years', String(t)],
          ['Final Amount', formatCurrency(finalAmount)],
          ['Interest Earned', formatCurrency(interestEarned)],
        ],
        table:
          growth.length > 0
            ? {
                caption: 'Balance by Year',
                columns: [{ header: 'Year', align: 'right' }, { header: 'Balance', align: 'right' }],
                rows: growth.map((point) => [String(point.year), formatCurrency(point.amount)]),
              }
            : undefined,
        data: {
          principal: p,
          rate: r,
          compoundFrequency: n,
          years: t,
          finalAmount,
          interestEarned,
          growth,
        },
      };
    });
  },
});
