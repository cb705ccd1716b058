import { calculateIrr, DEFAULT_IRR_OPTIONS } from '@fincalc/core';
import { define } from 'gunshi';
import {
  parseNumberListArg,
  parseOptionalIntegerArg,
  parseOptionalNumberArg,
} from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatPercentage, formatSeries } from '../../utils/format-helpers.js';

export const irrCommand = define({
  name: 'irr',
  description: 'Calculate the internal rate of return (Newton-Raphson)',
  args: {
    'cash-flows': {
      type: 'string',
      short: 'c',
      description: 'Comma-separated cash flows starting at time zero (e.g. -1000,300,400,500)',
    },
    guess: { type: 'string', short: 'g', description: `Starting estimate (default: ${DEFAULT_IRR_OPTIONS.guess})` },
    'max-iterations': {
      type: 'string',
      description: `Iteration limit (default: ${DEFAULT_IRR_OPTIONS.maxIterations})`,
    },
    tolerance: { type: 'string', description: `Convergence tolerance (default: ${DEFAULT_IRR_OPTIONS.tolerance})` },
    ...outputArgs,
  },
  examples: `
# Use "=" when the first flow is negative
${CLI_NAME} investment irr --cash-flows=-1000,300,400,500
${CLI_NAME} investment irr --cash-flows=-100,230,-132 --guess 0.05
  `.trim(),
  run: (ctx) => {
    const { 'cash-flows': cashFlowsArg, guess, 'max-iterations': maxIterations, tolerance, format, debug } =
      ctx.values;

    runCalculationCommand(ctx, { command: 'investment irr', format, debug }, () => {
      const cashFlows = parseNumberListArg(cashFlowsArg, 'cash-flows');
      const options = {
        guess: parseOptionalNumberArg(guess, 'guess'),
        maxIterations: parseOptionalIntegerArg(maxIterations, 'max-iterations'),
        tolerance: parseOptionalNumberArg(tolerance, 'tolerance'),
      };

      const irr = calculateIrr(cashFlows, options);

      return {
        title: 'Internal Rate of Return',
        summary: [
          ['Cash Flows', formatSeries(cashFlows)],
          ['IRR', formatPercentage(irr, 4)],
        ],
        data: { cashFlows, irr },
      };
    });
  },
});
