/**
 * Cash-flow series input shared by the investment commands
 */

import { CLIValidationError } from '../../utils/error-handling.js';
import { parseIntegerArg, parseNumberArg, parseNumberListArg } from '../../utils/args.js';

export const cashFlowArgs = {
  'cash-flows': {
    type: 'string',
    short: 'c',
    description: 'Comma-separated cash flows, first future period first (e.g. 100,200,300)',
  },
  'cash-inflow': {
    type: 'string',
    description: 'Constant cash inflow per year (use with --lifespan instead of --cash-flows)',
  },
  lifespan: {
    type: 'string',
    description: 'Number of years the constant inflow lasts',
  },
} as const;

export interface CashFlowValues {
  'cash-flows'?: string;
  'cash-inflow'?: string;
  lifespan?: string;
}

/**
 * Read the series from --cash-flows, or expand --cash-inflow over --lifespan years
 */
export function parseCashFlows(values: CashFlowValues): number[] {
  if (values['cash-flows'] !== undefined) {
    if (values['cash-inflow'] !== undefined || values.lifespan !== undefined) {
      throw new CLIValidationError('Use either --cash-flows or --cash-inflow with --lifespan, not both');
    }
    return parseNumberListArg(values['cash-flows'], 'cash-flows');
  }

  if (values['cash-inflow'] === undefined) {
    throw new CLIValidationError('--cash-flows is required (or --cash-inflow with --lifespan)');
  }
  const inflow = parseNumberArg(values['cash-inflow'], 'cash-inflow');
  const lifespan = parseIntegerArg(values.lifespan, 'lifespan');
  if (lifespan <= 0) {
    throw new CLIValidationError('--lifespan must be a positive whole number');
  }
  return Array.from({ length: lifespan }, () => inflow);
}
