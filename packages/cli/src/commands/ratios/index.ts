/**
 * Ratio Commands - Entry Point
 */

import { cli, define } from 'gunshi';
import { CLI_NAME, CLI_VERSION } from '../../utils/constants.js';
import { debtToEquityCommand, waccCommand } from './capital.js';
import { currentCommand, quickCommand } from './liquidity.js';
import { roaCommand, roeCommand } from './profitability.js';
import { dividendYieldCommand, peCommand } from './valuation.js';

export const ratiosCommand = define({
  name: 'ratios',
  description: 'Financial ratios - profitability, valuation, liquidity, capital structure',
  run: (ctx) => {
    ctx.log('Available commands: roe, roa, pe, dividend-yield, current, quick, debt-to-equity, wacc');
    ctx.log(`Use "${CLI_NAME} ratios <command> --help" for more information`);
  },
});

const subCommands = {
  roe: roeCommand,
  roa: roaCommand,
  pe: peCommand,
  'dividend-yield': dividendYieldCommand,
  current: currentCommand,
  quick: quickCommand,
  'debt-to-equity': debtToEquityCommand,
  wacc: waccCommand,
};

export default async function ratiosCommandRunner(args: string[]): Promise<void> {
  await cli(args, ratiosCommand, {
    name: `${CLI_NAME} ratios`,
    version: CLI_VERSION,
    description: 'Financial ratios - profitability, valuation, liquidity, capital structure',
    subCommands,
  });
}
