/**
 * CLI configuration with environment variable support
 */

import {
  createNumericPolicy,
  DEFAULT_MAX_EXPONENT,
  DEFAULT_MAX_MAGNITUDE,
  type NumericPolicy,
} from '@fincalc/core';
import { isValidLogLevel, type LogLevel } from '../utils/logger-interface.js';

export type OutputFormat = 'table' | 'json';

export interface CLIConfig {
  /** Limits passed to every calculation */
  numeric: NumericPolicy;
  defaultFormat: OutputFormat;
  logLevel: LogLevel;
  isProduction: boolean;
}

const DEFAULT_CONFIG: CLIConfig = {
  numeric: { maxMagnitude: DEFAULT_MAX_MAGNITUDE, maxExponent: DEFAULT_MAX_EXPONENT },
  defaultFormat: 'table',
  logLevel: 'INFO',
  isProduction: false,
};

/**
 * Parse numeric environment variable with fallback
 */
export function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Parse output format with validation
 */
export function parseFormat(value: string | undefined): OutputFormat {
  const format = value?.toLowerCase();
  if (format === 'table' || format === 'json') {
    return format;
  }
  return DEFAULT_CONFIG.defaultFormat;
}

/**
 * Parse log level, falling back to a level chosen by NODE_ENV
 */
export function parseLogLevel(value: string | undefined, nodeEnv: string | undefined): LogLevel {
  // Accept both 'debug' and 'DEBUG'
  const level = value?.toUpperCase();
  if (level && isValidLogLevel(level)) {
    return level;
  }

  switch (nodeEnv) {
    case 'test':
      return 'SILENT';
    case 'production':
      return 'WARN';
    default:
      return DEFAULT_CONFIG.logLevel;
  }
}

/**
 * Load configuration from environment variables with defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CLIConfig {
  return {
    numeric: createNumericPolicy({
      maxMagnitude: parseNumber(env.FINCALC_MAX_MAGNITUDE, DEFAULT_CONFIG.numeric.maxMagnitude),
      maxExponent: parseNumber(env.FINCALC_MAX_EXPONENT, DEFAULT_CONFIG.numeric.maxExponent),
    }),
    defaultFormat: parseFormat(env.FINCALC_DEFAULT_FORMAT),
    logLevel: parseLogLevel(env.LOG_LEVEL, env.NODE_ENV),
    isProduction: env.NODE_ENV === 'production',
  };
}

/**
 * Singleton configuration instance
 */
let configInstance: CLIConfig | null = null;

/**
 * Get CLI configuration
 */
export function getConfig(): CLIConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (mainly for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Override specific configuration values (mainly for testing)
 */
export function setConfig(overrides: Partial<CLIConfig>): void {
  configInstance = {
    ...getConfig(),
    ...overrides,
  };
}
