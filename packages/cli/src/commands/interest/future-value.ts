import { calculateFutureValue } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentage, formatPeriods } from '../../utils/format-helpers.js';

export const futureValueCommand = define({
  name: 'future-value',
  description: 'Grow a present amount to its future value',
  args: {
    'present-value': { type: 'string', short: 'v', description: 'Present amount' },
    rate: { type: 'string', short: 'r', description: 'Interest rate per period as a decimal' },
    time: { type: 'string', short: 't', description: 'Number of periods' },
    ...outputArgs,
  },
  examples: `${CLI_NAME} interest future-value --present-value 1000 --rate 0.05 --time 2`,
  run: (ctx) => {
    const { 'present-value': presentValue, rate, time, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'interest future-value', format, debug }, ({ numeric }) => {
      const pv = parseNumberArg(presentValue, 'present-value');
      const r = parseNumberArg(rate, 'rate');
      const t = parseNumberArg(time, 'time');

      const futureValue = calculateFutureValue(pv, r, t, numeric);

      return {
        title: 'Future Value',
        summary: [
          ['Present Value', formatCurrency(pv)],
          ['Rate', formatPercentage(r)],
          ['Periods', formatPeriods(t, 'periods')],
          ['Future Value', formatCurrency(futureValue)],
          ['Growth', formatCurrency(futureValue - pv)],
        ],
        data: { presentValue: pv, rate: r, time: t, futureValue },
      };
    });
  },
});
