import { calculateProbability, calculateWeightedAverage } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg, parseNumberListArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatNumber, formatPercentage, formatSeries } from '../../utils/format-helpers.js';
import { datasetArgs } from './dataset-args.js';

export const weightedAverageCommand = define({
  name: 'weighted-average',
  description: 'Weighted average of values',
  args: {
    ...datasetArgs,
    weights: { type: 'string', short: 'w', description: 'Comma-separated non-negative weights' },
    ...outputArgs,
  },
  examples: `${CLI_NAME} stats weighted-average --values 80,90,70 --weights 0.5,0.3,0.2`,
  run: (ctx) => {
    const { values, weights, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'stats weighted-average', format, debug }, () => {
      const dataset = parseNumberListArg(values, 'values');
      const weightList = parseNumberListArg(weights, 'weights');

      const weightedAverage = calculateWeightedAverage(dataset, weightList);

      return {
        title: 'Weighted Average',
        summary: [
          ['Values', formatSeries(dataset)],
          ['Weights', formatSeries(weightList)],
          ['Weighted Average', formatNumber(weightedAverage)],
        ],
        data: { values: dataset, weights: weightList, weightedAverage },
      };
    });
  },
});

export const probabilityCommand = define({
  name: 'probability',
  description: 'Empirical probability of an outcome',
  args: {
    successes: { type: 'string', short: 's', description: 'Number of favorable outcomes' },
    trials: { type: 'string', short: 'n', description: 'Total number of trials' },
    ...outputArgs,
  },
  examples: `${CLI_NAME} stats probability --successes 3 --trials 10`,
  run: (ctx) => {
    const { successes, trials, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'stats probability', format, debug }, () => {
      const favorable = parseNumberArg(successes, 'successes');
      const total = parseNumberArg(trials, 'trials');

      const probability = calculateProbability(favorable, total);

      return {
        title: 'Probability',
        summary: [
          ['Successes', String(favorable)],
          ['Trials', String(total)],
          ['Probability', formatNumber(probability)],
          ['As Percentage', formatPercentage(probability)],
        ],
        data: { successes: favorable, trials: total, probability },
      };
    });
  },
});
