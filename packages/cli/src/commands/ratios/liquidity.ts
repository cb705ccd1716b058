import { calculateCurrentRatio, calculateQuickRatio } from '@fincalc/core';
import { define } from 'gunshi';
import { parseNumberArg } from '../../utils/args.js';
import { runCalculationCommand } from '../../utils/command-runner.js';
import { outputArgs } from '../../utils/common-args.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatCurrency, formatRatio } from '../../utils/format-helpers.js';

const liquidityArgs = {
  assets: { type: 'string', short: 'a', description: 'Current assets' },
  liabilities: { type: 'string', short: 'l', description: 'Current liabilities' },
} as const;

export const currentCommand = define({
  name: 'current',
  description: 'Current ratio',
  args: {
    ...liquidityArgs,
    ...outputArgs,
  },
  examples: `${CLI_NAME} ratios current --assets 150000 --liabilities 100000`,
  run: (ctx) => {
    const { assets, liabilities, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'ratios current', format, debug }, () => {
      const currentAssets = parseNumberArg(assets, 'assets');
      const currentLiabilities = parseNumberArg(liabilities, 'liabilities');

      const currentRatio = calculateCurrentRatio(currentAssets, currentLiabilities);

      return {
        title: 'Current Ratio',
        summary: [
          ['Current Assets', formatCurrency(currentAssets)],
          ['Current Liabilities', formatCurrency(currentLiabilities)],
          ['Current Ratio', formatRatio(currentRatio)],
        ],
        data: { currentAssets, currentLiabilities, currentRatio },
      };
    });
  },
});

export const quickCommand = define({
  name: 'quick',
  description: 'Quick (acid-test) ratio',
  args: {
    ...liquidityArgs,
    inventory: { type: 'string', short: 'i', description: 'Inventory' },
    ...outputArgs,
  },
  examples: `${CLI_NAME} ratios quick --assets 150000 --inventory 30000 --liabilities 100000`,
  run: (ctx) => {
    const { assets, inventory, liabilities, format, debug } = ctx.values;

    runCalculationCommand(ctx, { command: 'ratios quick', format, debug }, () => {
      const currentAssets = parseNumberArg(assets, 'assets');
      const inventoryValue = parseNumberArg(inventory, 'inventory');
      const currentLiabilities = parseNumberArg(liabilities, 'liabilities');

      const quickRatio = calculateQuickRatio(currentAssets, inventoryValue, currentLiabilities);

      return {
        title: 'Quick Ratio',
        summary: [
          ['Current Assets', formatCurrency(currentAssets)],
          ['Inventory', formatCurrency(inventoryValue)],
          ['Current Liabilities', formatCurrency(currentLiabilities)],
          ['Quick Ratio', formatRatio(quickRatio)],
        ],
        data: { currentAssets, inventory: inventoryValue, currentLiabilities, quickRatio },
      };
    });
  },
});
