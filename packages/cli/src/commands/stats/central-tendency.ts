import { calculateMean, calculateMedian, calculateMode } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberListArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatNumber, formatSeries } from '../../utils/format-helpers.js';
import { datasetArgs } from './dataset-args.js';

export const meanCommand = define({
  name: 'mean',
  description: 'Arithmetic mean',
  args: {
    ...datasetArgs,
    ...outputArgs,
  },
  examples: `${CLI_NAME} stats mean --values 1,2,3,4,5`,
  run: (ctx) => {
    const { values, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'stats mean', format, debug }, () => {
      const dataset = parseNumberListArg(values, 'values');
      const mean = calculateMean(dataset);

      return {
        title: 'Mean',
        summary: [
          ['Values', formatSeries(dataset)],
          ['Count', String(dataset.length)],
          ['Mean', formatNumber(mean)],
        ],
        data: { values: dataset, mean },
      };
    });
  },
});

export const medianCommand = define({
  name: 'median',
  description: 'Median (average of the two middle values for an even count)',
  args: {
    ...datasetArgs,
    ...outputArgs,
  },
  examples: `${CLI_NAME} stats median --values 3,1,4,1,5`,
  run: (ctx) => {
    const { values, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'stats median', format, debug }, () => {
      const dataset = parseNumberListArg(values, 'values');
      const median = calculateMedian(dataset);

      return {
        title: 'Median',
        summary: [
          ['Values', formatSeries(dataset)],
          ['Count', String(dataset.length)],
          ['Median', formatNumber(median)],
        ],
        data: { values: dataset, median },
      };
    });
  },
});

export const modeCommand = define({
  name: 'mode',
  description: 'Most frequent value (smallest on a tie)',
  args: {
    ...datasetArgs,
    ...outputArgs,
  },
  examples: `${CLI_NAME} stats mode --values 1,2,2,3`,
  run: (ctx) => {
    const { values, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'stats mode', format, debug }, () => {
      const dataset = parseNumberListArg(values, 'values');
      const mode = calculateMode(dataset);

      return {
        title: 'Mode',
        summary: [
          ['Values', formatSeries(dataset)],
          ['Count', String(dataset.length)],
          ['Mode', mode === null ? 'None (no value repeats)' : formatNumber(mode)],
        ],
        data: { values: dataset, mode },
      };
    });
  },
});
