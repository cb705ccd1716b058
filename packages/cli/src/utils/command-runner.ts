/**
 * Shared runner for calculation commands
 */

import { type CLIConfig, getConfig } from '../config/index.js';
import { parseTableJsonFormat } from './args.js';
import { handleCalculationError } from './error-handling.js';
import { logger } from './logger.js';
import { type Report, renderJson, renderReport } from './report.js';

export interface CommandOutput {
  log: (message: string) => void;
}

export interface CalculationCommandOptions {
  /** e.g. "interest simple", used in log lines */
  command: string;
  format?: string;
  debug?: boolean;
}

/**
 * Build a report from the current configuration and print it
 *
 * Calculation errors are reported with troubleshooting tips and rethrown as a
 * silent CLIError carrying the exit code.
 */
export function runCalculationCommand(
  output: CommandOutput,
  options: CalculationCommandOptions,
  build: (config: CLIConfig) => Report
): void {
  const config = getConfig();
  if (options.debug) {
    logger.setLevel('DEBUG');
  }
  const format = parseTableJsonFormat(options.format ?? config.defaultFormat);
  logger.debug(`Running ${options.command}`, { command: options.command, format, numeric: config.numeric });

  let report: Report;
  try {
    report = build(config);
  } catch (error: unknown) {
    logger.debug(`${options.command} failed`, { command: options.command });
    handleCalculationError(error, { debug: options.debug });
  }

  logger.debug(`${options.command} completed`, { command: options.command });

  if (format === 'json') {
    output.log(renderJson(report));
    return;
  }
  for (const line of renderReport(report)) {
    output.log(line);
  }
}
