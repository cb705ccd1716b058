/**
 * Investment Commands - Entry Point
 */

import { cli, define } from 'gunshi';
import { CLI_NAME, CLI_VERSION } from '../../utils/constants.js';
import { capmCommand } from './capm.js';
import { dcfCommand } from './dcf.js';
import { irrCommand } from './irr.js';
import { npvCommand } from './npv.js';
import { paybackCommand } from './payback.js';
import { roiCommand } from './roi.js';

export const investmentCommand = define({
  name: 'investment',
  description: 'Investment analysis - NPV, DCF, payback, ROI, CAPM, IRR',
  run: (ctx) => {
    ctx.log('Available commands: npv, dcf, payback, roi, capm, irr');
    ctx.log(`Use "${CLI_NAME} investment <command> --help" for more information`);
  },
});

const subCommands = {
  npv: npvCommand,
  dcf: dcfCommand,
  payback: paybackCommand,
  roi: roiCommand,
  capm: capmCommand,
  irr: irrCommand,
};

export default async function investmentCommandRunner(args: string[]): Promise<void> {
  await cli(args, investmentCommand, {
    name: `${CLI_NAME} investment`,
    version: CLI_VERSION,
    description: 'Investment analysis - NPV, DCF, payback, ROI, CAPM, IRR',
    subCommands,
  });
}
