import chalk from 'chalk';
import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { COMMAND_GROUPS, runCli } from './index.js';

describe('command registry', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('registers every command group', () => {
    expect(Object.keys(COMMAND_GROUPS)).toEqual(['interest', 'investment', 'loan', 'ratios', 'stats']);
  });

  it('loads a runner for each group', async () => {
    for (const group of Object.values(COMMAND_GROUPS)) {
      expect(typeof (await group.load())).toBe('function');
    }
  });

  it('dispatches a full command line to the group runner', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await runCli(['interest', 'simple', '--principal', '1000', '--rate', '0.05', '--time', '2', '--format', 'json']);

    const output = logSpy.mock.calls.map((call) => String(call[0] ?? '')).find((line) => line.startsWith('{'));
    expect(output).toBeDefined();
    expect(JSON.parse(output ?? '{}')).toMatchObject({ principal: 1000, rate: 0.05, time: 2 });
  });

  it('surfaces the exit code of a failed calculation', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(
      runCli(['stats', 'probability', '--successes', '1', '--trials', '0', '--format', 'json'])
    ).rejects.toMatchObject({ exitCode: 2, kind: 'DivisionByZero' });
  });
});
