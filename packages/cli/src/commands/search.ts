import { Command } from 'commander';
import pc from 'picocolors';
import { parseSearchArguments } from '@recall/memory';
import { globalOptions, openRuntime, type RuntimeOptions } from '../runtime';
import { formatSimilarity, formatTimestamp, printJson } from '../output';

export function registerSearchCommand(program: Command, runtimeOptions: RuntimeOptions = {}) {
  program
    .command('search <query>')
    .description('Find messages similar in meaning to the query')
    .option('-n, --max-results <n>', 'Number of results to return (1-20)')
    .option('-t, --threshold <t>', 'Minimum similarity (0-1)')
    .action(async (query: string, options: { maxResults?: string; threshold?: string }, command: Command) => {
      const globalOpts = globalOptions(command);
      const runtime = openRuntime(globalOpts, runtimeOptions);

      try {
        const request = parseSearchArguments(
          {
            query,
            max_results: options.maxResults,
            similarity_threshold: options.threshold,
          },
          runtime.search.defaults(),
        );
        runtime.warmSnapshot();
        const outcome = await runtime.search.run(request);
        const results = outcome.hits.map(({ body: _body, ...result }) => result);

        if (globalOpts.json) {
          printJson({
            query: request.query,
            maxResults: request.maxResults,
            threshold: request.threshold,
            scanned: outcome.scanned,
            skippedCorrupt: outcome.skippedCorrupt,
            results,
          });
          return;
        }

        if (results.length === 0) {
          console.log(`No messages matched "${request.query}".`);
          return;
        }
        results.forEach((result, index) => {
          console.log(
            `${pc.bold(`${index + 1}.`)} ${formatSimilarity(result.similarity)}  ${result.sender || pc.dim('(unknown)')}  ${pc.dim(formatTimestamp(result.timestamp))}  ${pc.dim(`thread ${result.threadId}`)}`,
          );
          console.log(`   ${result.snippet}`);
        });
        if (outcome.skippedCorrupt > 0) {
          console.log(pc.yellow(`Skipped ${outcome.skippedCorrupt} unreadable embeddings.`));
        }
      } finally {
        runtime.close();
      }
    });
}
