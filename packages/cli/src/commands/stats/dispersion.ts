import {
  calculateSampleStandardDeviation,
  calculateSampleVariance,
  calculateStandardDeviation,
  calculateVariance,
} from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberListArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatNumber, formatSeries } from '../../utils/format-helpers.js';
import { datasetArgs } from './dataset-args.js';

const sampleArg = {
  sample: { type: 'boolean', short: 's', description: 'Use the sample (N-1) denominator' },
} as const;

export const varianceCommand = define({
  name: 'variance',
  description: 'Population variance, or sample variance with --sample',
  args: {
    ...datasetArgs,
    ...sampleArg,
    ...outputArgs,
  },
  examples: `
${CLI_NAME} stats variance --values 2,4,4,4,5,5,7,9
${CLI_NAME} stats variance --values 2,4,4,4,5,5,7,9 --sample
  `.trim(),
  run: (ctx) => {
    const { values, sample, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'stats variance', format, debug }, () => {
      const dataset = parseNumberListArg(values, 'values');
      const variance = sample ? calculateSampleVariance(dataset) : calculateVariance(dataset);

      return {
        title: sample ? 'Sample Variance' : 'Variance',
        summary: [
          ['Values', formatSeries(dataset)],
          ['Count', String(dataset.length)],
          ['Variance', formatNumber(variance)],
        ],
        data: { values: dataset, sample: sample === true, variance },
      };
    });
  },
});

export const stdDevCommand = define({
  name: 'std-dev',
  description: 'Population standard deviation, or sample with --sample',
  args: {
    ...datasetArgs,
    ...sampleArg,
    ...outputArgs,
  },
  examples: `${CLI_NAME} stats std-dev --values 2,4,4,4,5,5,7,9`,
  run: (ctx) => {
    const { values, sample, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'stats std-dev', format, debug }, () => {
      const dataset = parseNumberListArg(values, 'values');
      const standardDeviation = sample
        ? calculateSampleStandardDeviation(dataset)
        : calculateStandardDeviation(dataset);

      return {
        title: sample ? 'Sample Standard Deviation' : 'Standard Deviation',
        summary: [
          ['Values', formatSeries(dataset)],
          ['Count', String(dataset.length)],
          ['Std Dev', formatNumber(standardDeviation)],
        ],
        data: { values: dataset, sample: sample === true, standardDeviation },
      };
    });
  },
});
