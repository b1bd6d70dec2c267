export type Command = 'parse' | 'enqueue' | 'listen';

export interface CliArgs {
  command: Command;
  batch?: string;
  limit?: number;
}

const COMMANDS: readonly Command[] = ['parse', 'enqueue', 'listen'];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * `<command> [--batch <id>] [--limit <n>]`; the command defaults to `parse`.
 */
export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { command: 'parse' };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--batch' && argv[i + 1]) {
      result.batch = argv[++i];
    } else if (arg === '--limit' && argv[i + 1]) {
      const limit = parseInt(argv[++i], 10);
      if (Number.isFinite(limit) && limit >= 0) {
        result.limit = limit;
      }
    } else if (isCommand(arg)) {
      result.command = arg;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}
