/**
 * Logger level and context types
 */

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL' | 'SILENT';

export interface LogContext {
  command?: string;
  [key: string]: unknown;
}

/** Ordered from most to least verbose */
export const LOG_LEVELS: readonly LogLevel[] = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'SILENT'];

export function isValidLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some((candidate) => candidate === level);
}
