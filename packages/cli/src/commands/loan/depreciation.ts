import { calculateDepreciationSchedule, DEPRECIATION_METHODS } from '@fincalc/core';
import { define } from 'gunshi';
import { parseChoiceArg, parseIntegerArg, parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency } from '../../utils/format-helpers.js';

export const depreciationCommand = define({
  name: 'depreciation',
  description: 'Year-by-year depreciation schedule of an asset',
  args: {
    cost: { type: 'string', short: 'c', description: 'Initial asset cost' },
    salvage: { type: 'string', short: 's', description: 'Salvage value at the end of its life' },
    life: { type: 'string', short: 'l', description: 'Useful life in whole years' },
    method: {
      type: 'string',
      short: 'm',
      description: `Depreciation method (${DEPRECIATION_METHODS.join('|')})`,
      default: 'straight-line',
    },
    ...outputArgs,
  },
  examples: `
${CLI_NAME} loan depreciation --cost 10000 --salvage 1000 --life 5
${CLI_NAME} loan depreciation -c 10000 -s 1000 -l 5 --method double-declining-balance
  `.trim(),
  run: (ctx) => {
    const { cost, salvage, life, method, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'loan depreciation', format, debug }, () => {
      const assetCost = parseNumberArg(cost, 'cost');
      const salvageValue = parseNumberArg(salvage, 'salvage');
      const usefulLife = parseIntegerArg(life, 'life');
      const depreciationMethod = parseChoiceArg(method, 'method', DEPRECIATION_METHODS);

      const schedule = calculateDepreciationSchedule(assetCost, salvageValue, usefulLife, depreciationMethod);

      return {
        title: 'Depreciation Schedule',
        summary: [
          ['Asset Cost', formatCurrency(assetCost)],
          ['Salvage Value', formatCurrency(salvageValue)],
          ['Useful Life', `${usefulLife} years`],
          ['Method', depreciationMethod],
        ],
        table: {
          columns: [
            { header: 'Year', align: 'right' },
            { header: 'Depreciation', align: 'right' },
            { header: 'Accumulated', align: 'right' },
            { header: 'Book Value', align: 'right' },
          ],
          rows: schedule.map((entry) => [
            String(entry.year),
            formatCurrency(entry.depreciation),
            formatCurrency(entry.accumulatedDepreciation),
            formatCurrency(entry.bookValue),
          ]),
        },
        data: { cost: assetCost, salvageValue, usefulLife, method: depreciationMethod, schedule },
      };
    });
  },
});
