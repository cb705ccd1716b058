import { calculatePresentValue } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatPercentage, formatPeriods } from '../../utils/format-helpers.js';

export const presentValueCommand = define({
  name: 'present-value',
  description: 'Discount a future amount to its present value',
  args: {
    'future-value': { type: 'string', short: 'f', description: 'Future amount' },
    rate: { type: 'string', short: 'r', description: 'Discount rate per period as a decimal, below 1' },
    time: { type: 'string', short: 't', description: 'Number of periods' },
    ...outputArgs,
  },
  examples: `${CLI_NAME} interest present-value --future-value 1102.50 --rate 0.05 --time 2`,
  run: (ctx) => {
    const { 'future-value': futureValue, rate, time, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'interest present-value', format, debug }, ({ numeric }) => {
      const fv = parseNumberArg(futureValue, 'future-value');
      const r = parseNumberArg(rate, 'rate');
      const t = parseNumberArg(time, 'time');

      const presentValue = calculatePresentValue(fv, r, t, numeric);

      return {
        title: 'Present Value',
        summary: [
          ['Future Value', formatCurrency(fv)],
          ['Discount Rate', formatPercentage(r)],
          ['Periods', formatPeriods(t, 'periods')],
          ['Present Value', formatCurrency(presentValue)],
          ['Discount', formatCurrency(fv - presentValue)],
        ],
        data: { futureValue: fv, rate: r, time: t, presentValue },
      };
    });
  },
});
