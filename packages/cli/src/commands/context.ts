import { Command } from 'commander';
import { buildRagContext } from '@recall/memory';
import { UsageError } from '@recall/shared';
import { globalOptions, openRuntime, type RuntimeOptions } from '../runtime';
import { printJson } from '../output';

function positiveInteger(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function registerContextCommand(program: Command, runtimeOptions: RuntimeOptions = {}) {
  program
    .command('context <query>')
    .description('Print the retrieval context a text generator would receive')
    .option('-n, --max-results <n>', 'Messages to include', '3')
    .option('-l, --max-length <chars>', 'Upper bound on context length', '1000')
    .action(async (query: string, options: { maxResults: string; maxLength: string }, command: Command) => {
      const globalOpts = globalOptions(command);
      if (query.trim() === '') {
        throw new UsageError('query must not be blank');
      }
      const maxResults = positiveInteger(options.maxResults, '--max-results');
      const maxContextLength = positiveInteger(options.maxLength, '--max-length');

      const runtime = openRuntime(globalOpts, runtimeOptions);
      try {
        runtime.warmSnapshot();
        const context = await buildRagContext(runtime.search, query, {
          maxResults,
          maxContextLength,
        });

        if (globalOpts.json) {
          printJson({ query, context });
          return;
        }
        console.log(context ?? 'No relevant messages found.');
      } finally {
        runtime.close();
      }
    });
}
