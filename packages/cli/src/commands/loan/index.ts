/**
 * Loan Commands - Entry Point
 */

import { cli, define } from 'gunshi';
import { CLI_NAME, CLI_VERSION } from '../../utils/constants.js';
import { amortizationCommand } from './amortization.js';
import { breakEvenCommand } from './break-even.js';
import { depreciationCommand } from './depreciation.js';
import { mortgageCommand } from './mortgage.js';
import { paymentCommand } from './payment.js';

export const loanCommand = define({
  name: 'loan',
  description: 'Loans, amortization, break-even and depreciation',
  run: (ctx) => {
    ctx.log('Available commands: payment, mortgage, amortization, break-even, depreciation');
    ctx.log(`Use "${CLI_NAME} loan <command> --help" for more information`);
  },
});

const subCommands = {
  payment: paymentCommand,
  mortgage: mortgageCommand,
  amortization: amortizationCommand,
  'break-even': breakEvenCommand,
  depreciation: depreciationCommand,
};

export default async function loanCommandRunner(args: string[]): Promise<void> {
  await cli(args, loanCommand, {
    name: `${CLI_NAME} loan`,
    version: CLI_VERSION,
    description: 'Loans, amortization, break-even and depreciation',
    subCommands,
  });
}
