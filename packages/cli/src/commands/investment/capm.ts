import { calculateCapm } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatPercentage } from '../../utils/format-helpers.js';

export const capmCommand = define({
  name: 'capm',
  description: 'Expected return under the Capital Asset Pricing Model',
  args: {
    'risk-free-rate': { type: 'string', short: 'f', description: 'Risk-free rate as a decimal' },
    beta: { type: 'string', short: 'b', description: 'Asset beta' },
    'market-return': { type: 'string', short: 'm', description: 'Expected market return as a decimal' },
    ...outputArgs,
  },
  examples: `${CLI_NAME} investment capm --risk-free-rate 0.05 --beta 1.2 --market-return 0.10`,
  run: (ctx) => {
    const { 'risk-free-rate': riskFreeRate, beta, 'market-return': marketReturn, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'investment capm', format, debug }, () => {
      const rf = parseNumberArg(riskFreeRate, 'risk-free-rate');
      const b = parseNumberArg(beta, 'beta');
      const rm = parseNumberArg(marketReturn, 'market-return');

      const expectedReturn = calculateCapm(rf, b, rm);

      return {
        title: 'CAPM Expected Return',
        summary: [
          ['Risk-Free Rate', formatPercentage(rf)],
          ['Beta', b.toFixed(2)],
          ['Market Return', formatPercentage(rm)],
          ['Market Premium', formatPercentage(rm - rf)],
          ['Expected Return', formatPercentage(expectedReturn)],
        ],
        data: { riskFreeRate: rf, beta: b, marketReturn: rm, expectedReturn },
      };
    });
  },
});
