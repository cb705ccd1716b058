/**
 * Level-filtered console logger
 *
 * Writes to stderr so that `--format json` output on stdout stays parseable.
 * The level comes from configuration unless overridden with setLevel().
 */

import { getConfig } from '../config/index.js';
import { LOG_LEVELS, type LogContext, type LogLevel } from './logger-interface.js';

const COLOR_MAP: Record<LogLevel, string> = {
  TRACE: '\x1b[37m',
  DEBUG: '\x1b[36m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  FATAL: '\x1b[35m',
  SILENT: '\x1b[0m',
};

const RESET = '\x1b[0m';

export class Logger {
  private levelOverride: LogLevel | null = null;

  get level(): LogLevel {
    return this.levelOverride ?? getConfig().logLevel;
  }

  setLevel(level: LogLevel | null): void {
    this.levelOverride = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    if (getConfig().isProduction) {
      return JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...context,
      });
    }

    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `${COLOR_MAP[level]}[${level}]${RESET} ${message}${suffix}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (level === 'SILENT' || !this.shouldLog(level)) return;

    const formattedMessage = this.formatMessage(level, message, context);
    if (level === 'WARN') {
      console.warn(formattedMessage);
    } else {
      console.error(formattedMessage);
    }
  }

  trace(message: string, context?: LogContext): void {
    this.log('TRACE', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.log('FATAL', message, context);
  }
}

export const logger = new Logger();
