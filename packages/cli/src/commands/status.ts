import { Command } from 'commander';
import { describeCorpus, type CorpusDescription } from '@recall/embeddings';
import { globalOptions, openRuntime, type RuntimeOptions } from '../runtime';
import { formatTimestamp, printJson, printTable } from '../output';

export function registerStatusCommand(program: Command, runtimeOptions: RuntimeOptions = {}) {
  program
    .command('status')
    .description('Show how much of the message history is indexed')
    .option('--corpus', 'Also rebuild and describe the corpus statistics', false)
    .action((options: { corpus: boolean }, command: Command) => {
      const globalOpts = globalOptions(command);
      const runtime = openRuntime(globalOpts, runtimeOptions);

      try {
        const status = runtime.store.status(runtime.indexEmbedder.version());
        let corpus: CorpusDescription | null = null;
        if (options.corpus) {
          runtime.warmSnapshot();
          corpus = describeCorpus(
            runtime.snapshots.current(),
            runtime.indexEmbedder.dims(),
            runtime.tokenizerOptions,
          );
        }

        if (globalOpts.json) {
          printJson({
            storage: runtime.config.storage.path,
            embedder: runtime.indexEmbedder.id(),
            status,
            corpus,
          });
          return;
        }

        const rows = [
          { key: 'Storage', value: runtime.config.storage.path },
          { key: 'Embedder', value: runtime.indexEmbedder.id() },
          { key: 'Messages', value: status.total },
          { key: 'Embedded', value: status.embedded },
          { key: 'Missing', value: status.missing },
          { key: 'Stale', value: status.stale },
          { key: 'Last indexed', value: formatTimestamp(status.lastIndexedAt) },
        ];
        if (corpus) {
          rows.push(
            { key: 'Corpus documents', value: corpus.documentCount },
            { key: 'Unique terms', value: corpus.uniqueTerms },
            { key: 'Stop words', value: corpus.stopWordCount },
          );
        }
        printTable(rows, {
          head: ['Metric', 'Value'],
          colAligns: ['right', 'left'],
        });
      } finally {
        runtime.close();
      }
    });
}
