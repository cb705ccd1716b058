/**
 * CLI Commands - Main Export
 * Command group registry for Gunshi
 */

import { cli, define, lazy } from 'gunshi';
import { CLI_NAME, CLI_VERSION } from '../utils/constants.js';

const DESCRIPTION = 'Financial calculations - interest, investments, loans, ratios, statistics';

// Main command (shown when no subcommand is provided)
export const mainCommand = define({
  name: CLI_NAME,
  description: DESCRIPTION,
  run: (ctx) => {
    ctx.log('Use --help to see available commands');
  },
});

type GroupRunner = (args: string[]) => Promise<void>;

interface CommandGroup {
  description: string;
  load: () => Promise<GroupRunner>;
}

/**
 * Each group runs its own cli() so nested subcommands get their own help
 */
export const COMMAND_GROUPS: Record<string, CommandGroup> = {
  interest: {
    description: 'Interest and time value of money - simple, compound, PV, FV',
    load: async () => (await import('./interest/index.js')).default,
  },
  investment: {
    description: 'Investment analysis - NPV, DCF, payback, ROI, CAPM, IRR',
    load: async () => (await import('./investment/index.js')).default,
  },
  loan: {
    description: 'Loans, amortization, break-even and depreciation',
    load: async () => (await import('./loan/index.js')).default,
  },
  ratios: {
    description: 'Financial ratios - profitability, valuation, liquidity, capital structure',
    load: async () => (await import('./ratios/index.js')).default,
  },
  stats: {
    description: 'Descriptive statistics and probability',
    load: async () => (await import('./stats/index.js')).default,
  },
};

/**
 * Dispatch to a command group, or show top-level help and version
 */
export async function runCli(args: string[]): Promise<void> {
  const [groupName, ...rest] = args;
  const group = groupName === undefined ? undefined : COMMAND_GROUPS[groupName];
  if (group) {
    const runner = await group.load();
    await runner(rest);
    return;
  }

  // Lazy entries only supply names and descriptions for the help output
  const subCommands = Object.fromEntries(
    Object.entries(COMMAND_GROUPS).map(([name, { description }]) => [
      name,
      lazy(async () => mainCommand, { name, description }),
    ])
  );

  await cli(args, mainCommand, {
    name: CLI_NAME,
    version: CLI_VERSION,
    description: DESCRIPTION,
    subCommands,
  });
}
