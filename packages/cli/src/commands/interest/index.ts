/**
 * Interest Commands - Entry Point
 */

import { cli, define } from 'gunshi';
import { CLI_NAME, CLI_VERSION } from '../../utils/constants.js';
import { compoundCommand } from './compound.js';
import { futureValueCommand } from './future-value.js';
import { presentValueCommand } from './present-value.js';
import { simpleCommand } from './simple.js';

export const interestCommand = define({
  name: 'interest',
  description: 'Interest and time-value calculations',
  run: (ctx) => {
    ctx.log('Available commands: simple, compound, present-value, future-value');
    ctx.log(`Use "${CLI_NAME} interest <command> --help" for more information`);
  },
});

const subCommands = {
  simple: simpleCommand,
  compound: compoundCommand,
  'present-value': presentValueCommand,
  'future-value': futureValueCommand,
};

export default async function interestCommandRunner(args: string[]): Promise<void> {
  await cli(args, interestCommand, {
    name: `${CLI_NAME} interest`,
    version: CLI_VERSION,
    description: 'Interest and time-value calculations',
    subCommands,
  });
}
