/**
 * Statistics Commands - Entry Point
 */

import { cli, define } from 'gunshi';
import { CLI_NAME, CLI_VERSION } from '../../utils/constants.js';
import { meanCommand, medianCommand, modeCommand } from './central-tendency.js';
import { stdDevCommand, varianceCommand } from './dispersion.js';
import { probabilityCommand, weightedAverageCommand } from './weighting.js';

export const statsCommand = define({
  name: 'stats',
  description: 'Descriptive statistics and probability',
  run: (ctx) => {
    ctx.log('Available commands: mean, median, mode, variance, std-dev, weighted-average, probability');
    ctx.log(`Use "${CLI_NAME} stats <command> --help" for more information`);
  },
});

const subCommands = {
  mean: meanCommand,
  median: medianCommand,
  mode: modeCommand,
  variance: varianceCommand,
  'std-dev': stdDevCommand,
  'weighted-average': weightedAverageCommand,
  probability: probabilityCommand,
};

export default async function statsCommandRunner(args: string[]): Promise<void> {
  await cli(args, statsCommand, {
    name: `${CLI_NAME} stats`,
    version: CLI_VERSION,
    description: 'Descriptive statistics and probability',
    subCommands,
  });
}
