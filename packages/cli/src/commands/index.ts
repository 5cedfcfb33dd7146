import { Command } from 'commander';
import pc from 'picocolors';
import type { IndexingRunResult } from '@recall/memory';
import { globalOptions, openRuntime, type RuntimeOptions } from '../runtime';
import { printJson } from '../output';

function renderResult(result: IndexingRunResult): void {
  const line = `${result.message} (${result.processed}/${result.total} processed, ${result.failed} failed)`;
  switch (result.state) {
    case 'COMPLETED':
      console.log(pc.green(`✅ ${line}`));
      break;
    case 'CANCELLED':
      console.log(pc.yellow(`⏹  ${line}`));
      console.log("Run 'recall index' again to resume.");
      break;
    case 'FAILED':
      console.log(pc.red(`❌ ${line}`));
      break;
  }
}

export function registerIndexCommand(program: Command, runtimeOptions: RuntimeOptions = {}) {
  program
    .command('index')
    .description('Embed every message that has no embedding or an outdated one')
    .action(async (_options: unknown, command: Command) => {
      const globalOpts = globalOptions(command);
      const runtime = openRuntime(globalOpts, runtimeOptions);
      const controller = new AbortController();
      const onSigint = () => {
        controller.abort();
        console.error(pc.yellow('Stopping after the current batch...'));
      };
      process.once('SIGINT', onSigint);

      try {
        const result = await runtime.orchestrator.run({
          signal: controller.signal,
          listener: globalOpts.json
            ? {}
            : {
                onProgress: (progress) => {
                  if (progress.processed < progress.total) {
                    console.log(pc.dim(progress.message));
                  }
                },
                onStateChange: (_from, to) => {
                  if (globalOpts.verbose) console.log(pc.dim(`state: ${to}`));
                },
              },
        });

        if (globalOpts.json) {
          printJson(result);
        } else {
          renderResult(result);
        }
        if (result.state === 'FAILED') {
          process.exitCode = 1;
        }
      } finally {
        process.off('SIGINT', onSigint);
        runtime.close();
      }
    });
}
