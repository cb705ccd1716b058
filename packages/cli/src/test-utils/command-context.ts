/**
 * Helpers for invoking command handlers directly in tests
 */

export interface RunnableCommand {
  run?: (ctx: never) => unknown;
}

/**
 * Run a command with pre-parsed flag values and collect what it logs
 */
export async function runWithValues(command: RunnableCommand, values: Record<string, unknown>): Promise<string[]> {
  const logs: string[] = [];
  const ctx = {
    values,
    log: (message: string) => {
      logs.push(message);
    },
  };
  if (!command.run) {
    throw new Error('Command has no run handler');
  }
  await command.run(ctx as never);
  return logs;
}

/**
 * Parse the single JSON document a command prints under `--format json`
 */
export function parseJsonOutput(logs: string[]): Record<string, unknown> {
  const [output] = logs;
  if (logs.length !== 1 || output === undefined) {
    throw new Error(`Expected one JSON document, got ${logs.length} lines`);
  }
  const parsed: unknown = JSON.parse(output);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Expected a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}
