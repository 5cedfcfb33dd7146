import type { Command } from 'commander';
import {
  ConfigLoader,
  ConsoleLogger,
  JsonlLogger,
  type Logger,
  type RecallConfig,
  type RecallConfigInput,
} from '@recall/shared';
import {
  buildCorpusStatistics,
  createEmbedder,
  createIndexEmbedder,
  type Embedder,
  type TokenizerOptions,
} from '@recall/embeddings';
import {
  CorpusSnapshotHolder,
  createMessageStore,
  IndexingOrchestrator,
  SimilaritySearchEngine,
  type MessageStore,
} from '@recall/memory';
import type { GlobalOptions } from './types';

export interface Runtime {
  config: RecallConfig;
  logger: Logger;
  store: MessageStore;
  indexEmbedder: Embedder;
  snapshots: CorpusSnapshotHolder;
  tokenizerOptions: TokenizerOptions;
  search: SimilaritySearchEngine;
  orchestrator: IndexingOrchestrator;
  /** Builds the corpus snapshot from the store unless one is already held. */
  warmSnapshot(): void;
  close(): void;
}

export interface RuntimeOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/** Walks up to the root command, where the global flags live. */
export function globalOptions(command: Command): GlobalOptions {
  let root = command;
  while (root.parent) {
    root = root.parent;
  }
  return root.opts<GlobalOptions>();
}

export function createLogger(config: RecallConfig): Logger {
  return config.logging.jsonlPath
    ? new JsonlLogger(config.logging.jsonlPath, { level: config.logging.level })
    : new ConsoleLogger(config.logging.level);
}

export function openRuntime(globalOpts: GlobalOptions, options: RuntimeOptions = {}): Runtime {
  const flags: RecallConfigInput = globalOpts.verbose ? { logging: { level: 'debug' } } : {};
  const config = ConfigLoader.load({
    configPath: globalOpts.config,
    cwd: options.cwd,
    env: options.env,
    flags,
  });
  const logger = createLogger(config);

  const store = createMessageStore();
  store.init({ dbPath: config.storage.path });

  const tokenizerOptions: TokenizerOptions = { minTokenLength: config.embeddings.minTokenLength };
  const snapshots = new CorpusSnapshotHolder();
  const indexEmbedder = createIndexEmbedder(config.embeddings);

  const search = new SimilaritySearchEngine({
    store,
    embedder: createEmbedder(config.embeddings),
    snapshots,
    logger: logger.child({ component: 'search' }),
    config: config.search,
  });
  const orchestrator = new IndexingOrchestrator({
    store,
    embedder: indexEmbedder,
    snapshots,
    tokenizerOptions,
    logger: logger.child({ component: 'indexing' }),
    config: config.indexing,
  });

  return {
    config,
    logger,
    store,
    indexEmbedder,
    snapshots,
    tokenizerOptions,
    search,
    orchestrator,
    warmSnapshot: () => {
      snapshots.ensure(() => buildCorpusStatistics(store.listAllBodies(), tokenizerOptions));
    },
    close: () => store.close(),
  };
}
