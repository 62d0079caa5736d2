import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { EXIT_OK, USAGE, runCli, type CliDependencies } from './cli.js';

const QUIT_COMMANDS = new Set(['quit', 'exit', 'q']);

/**
 * Reads commands line by line and runs each one as if it had been given on
 * the command line, until `quit` or the end of input.
 */
export async function runInteractive(input: Readable, deps: CliDependencies): Promise<number> {
  deps.stdout("Order desk interactive mode. Type 'help' for commands or 'quit' to exit.");

  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      const [first, ...rest] = line.trim().split(/\s+/).filter(Boolean);
      if (first === undefined) continue;

      const command = first.toLowerCase();
      if (QUIT_COMMANDS.has(command)) break;
      if (command === 'help') {
        deps.stdout(USAGE);
        continue;
      }
      if (command === 'interactive') {
        deps.stderr('Already in interactive mode');
        continue;
      }
      await runCli([command, ...rest], deps);
    }
  } finally {
    lines.close();
  }

  deps.stdout('Goodbye!');
  return EXIT_OK;
}
