import { Command, CommanderError } from 'commander';
import pc from 'picocolors';
import { AppError, ConfigError, UsageError } from '@recall/shared';
import { version } from '../package.json';
import { registerContextCommand } from './commands/context';
import { registerImportCommand } from './commands/import';
import { registerIndexCommand } from './commands/index';
import { registerSearchCommand } from './commands/search';
import { registerStatusCommand } from './commands/status';
import type { RuntimeOptions } from './runtime';
import type { GlobalOptions } from './types';

export const name = '@recall/cli';

export function createProgram(runtimeOptions: RuntimeOptions = {}): Command {
  const program = new Command();

  program
    .name('recall')
    .description('Semantic search over your message history')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerImportCommand(program, runtimeOptions);
  registerIndexCommand(program, runtimeOptions);
  registerSearchCommand(program, runtimeOptions);
  registerStatusCommand(program, runtimeOptions);
  registerContextCommand(program, runtimeOptions);

  return program;
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) return error.exitCode;
  if (error instanceof ConfigError || error instanceof UsageError) return 2;
  return 1;
}

function reportError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  console.error(pc.red(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`));
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses `argv` (user arguments only) and runs the matching command.
 * Resolves to the process exit code instead of exiting.
 */
export async function runCli(argv: string[], program: Command = createProgram()): Promise<number> {
  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (e) {
    // commander has already printed its own usage message
    if (!(e instanceof CommanderError)) {
      reportError(e, program.opts<GlobalOptions>());
    }
    return exitCodeFor(e);
  }
}
