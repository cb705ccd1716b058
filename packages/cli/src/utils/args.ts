/**
 * Argument parsers
 * Convert raw flag strings into validated numbers with zod. Domain rules
 * (sign, range) stay with the calculation functions.
 */

import { type ZodIssue, type ZodType, type ZodTypeDef, z } from 'zod';
import type { OutputFormat } from '../config/index.js';
import { CLIValidationError } from './error-handling.js';

export const NumberArgSchema = z
  .string()
  .trim()
  .min(1, 'expected a number')
  .transform((value) => Number(value))
  .pipe(z.number({ invalid_type_error: 'expected a number' }).finite('expected a finite number'));

export const IntegerArgSchema = NumberArgSchema.pipe(z.number().int('expected a whole number'));

export const NumberListArgSchema = z
  .string()
  .trim()
  .min(1, 'expected a comma-separated list of numbers')
  .transform((value) => value.split(','))
  .pipe(z.array(NumberArgSchema));

type ArgSchema<T> = ZodType<T, ZodTypeDef, string>;

function describeIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const [position] = issue.path;
      return typeof position === 'number' ? `item ${position + 1}: ${issue.message}` : issue.message;
    })
    .join(', ');
}

function parseWith<T>(schema: ArgSchema<T>, value: string, flag: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new CLIValidationError(`Invalid --${flag} "${value}": ${describeIssues(result.error.issues)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

function requireArg(value: string | undefined, flag: string): string {
  if (value === undefined) {
    throw new CLIValidationError(`--${flag} is required`);
  }
  return value;
}

export function parseNumberArg(value: string | undefined, flag: string): number {
  return parseWith(NumberArgSchema, requireArg(value, flag), flag);
}

export function parseIntegerArg(value: string | undefined, flag: string): number {
  return parseWith(IntegerArgSchema, requireArg(value, flag), flag);
}

export function parseNumberListArg(value: string | undefined, flag: string): number[] {
  return parseWith(NumberListArgSchema, requireArg(value, flag), flag);
}

export function parseOptionalNumberArg(value: string | undefined, flag: string): number | undefined {
  return value === undefined ? undefined : parseWith(NumberArgSchema, value, flag);
}

export function parseOptionalIntegerArg(value: string | undefined, flag: string): number | undefined {
  return value === undefined ? undefined : parseWith(IntegerArgSchema, value, flag);
}

/**
 * Parse one of a fixed set of string values
 */
export function parseChoiceArg<T extends string>(
  value: string | undefined,
  flag: string,
  choices: readonly [T, ...T[]]
): T {
  const raw = requireArg(value, flag);
  const result = z.enum(choices).safeParse(raw);
  if (!result.success) {
    throw new CLIValidationError(`--${flag} must be one of: ${choices.join(', ')}`, { cause: result.error });
  }
  return result.data;
}

export function parseTableJsonFormat(value: string): OutputFormat {
  if (value === 'table' || value === 'json') {
    return value;
  }
  throw new CLIValidationError('format must be one of: table, json');
}
