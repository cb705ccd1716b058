import { DEFAULT_MAX_EXPONENT, DEFAULT_MAX_MAGNITUDE } from '@fincalc/core';
import { afterEach, describe, expect, it } from 'vitest';
import { getConfig, loadConfig, parseFormat, parseLogLevel, parseNumber, resetConfig, setConfig } from './index.js';

describe('CLI configuration', () => {
  afterEach(() => {
    resetConfig();
  });

  it('uses defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({
      numeric: { maxMagnitude: DEFAULT_MAX_MAGNITUDE, maxExponent: DEFAULT_MAX_EXPONENT },
      defaultFormat: 'table',
      logLevel: 'INFO',
      isProduction: false,
    });
  });

  it('reads limits, format and log level from the environment', () => {
    const config = loadConfig({
      FINCALC_MAX_MAGNITUDE: '1e6',
      FINCALC_MAX_EXPONENT: '600',
      FINCALC_DEFAULT_FORMAT: 'JSON',
      LOG_LEVEL: 'debug',
      NODE_ENV: 'production',
    });

    expect(config.numeric).toEqual({ maxMagnitude: 1e6, maxExponent: 600 });
    expect(config.defaultFormat).toBe('json');
    expect(config.logLevel).toBe('DEBUG');
    expect(config.isProduction).toBe(true);
  });

  it('derives only the production flag from NODE_ENV', () => {
    expect(loadConfig({ NODE_ENV: 'test' })).toEqual({
      numeric: { maxMagnitude: DEFAULT_MAX_MAGNITUDE, maxExponent: DEFAULT_MAX_EXPONENT },
      defaultFormat: 'table',
      logLevel: 'SILENT',
      isProduction: false,
    });
  });

  it('falls back to default limits for invalid values', () => {
    const config = loadConfig({ FINCALC_MAX_MAGNITUDE: 'lots', FINCALC_MAX_EXPONENT: '-5' });

    expect(config.numeric).toEqual({ maxMagnitude: DEFAULT_MAX_MAGNITUDE, maxExponent: DEFAULT_MAX_EXPONENT });
  });

  it('parses numbers with fallback', () => {
    expect(parseNumber('42', 7)).toBe(42);
    expect(parseNumber('abc', 7)).toBe(7);
    expect(parseNumber(undefined, 7)).toBe(7);
    expect(parseNumber('', 7)).toBe(7);
  });

  it('ignores unknown output formats', () => {
    expect(parseFormat('csv')).toBe('table');
    expect(parseFormat(undefined)).toBe('table');
  });

  it('chooses the log level from NODE_ENV when LOG_LEVEL is unset or invalid', () => {
    expect(parseLogLevel(undefined, 'test')).toBe('SILENT');
    expect(parseLogLevel(undefined, 'production')).toBe('WARN');
    expect(parseLogLevel('verbose', 'development')).toBe('INFO');
    expect(parseLogLevel('warn', 'test')).toBe('WARN');
  });

  it('caches the loaded configuration and applies overrides', () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);

    setConfig({ defaultFormat: 'json' });
    expect(getConfig().defaultFormat).toBe('json');
    expect(getConfig().numeric).toEqual(first.numeric);

    resetConfig();
    expect(getConfig().defaultFormat).toBe('table');
  });
});
