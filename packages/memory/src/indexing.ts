import { randomUUID } from 'node:crypto';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import {
  CorpusReadError,
  defaultConfig,
  errorMessage,
  eventEnvelope,
  IndexingCancelledError,
  ItemPersistenceError,
  SilentLogger,
  UsageError,
  type IndexingConfig,
  type IndexingState,
  type IndexingTerminalState,
  type Logger,
} from '@recall/shared';
import {
  buildCorpusStatistics,
  toStorageForm,
  type CorpusStatistics,
  type Embedder,
  type TokenizerOptions,
} from '@recall/embeddings';
import type { MessageStore } from './sqlite';
import type { CorpusSnapshotHolder } from './snapshot';
import type {
  IndexingListener,
  IndexingProgress,
  IndexingRunResult,
  PendingMessage,
} from './types';

export interface IndexingOrchestratorDependencies {
  store: Pick<
    MessageStore,
    'listAllBodies' | 'listMessagesNeedingEmbedding' | 'updateEmbedding'
  >;
  /** Must tokenize with the same options as `tokenizerOptions`. */
  embedder: Embedder;
  snapshots: CorpusSnapshotHolder;
  tokenizerOptions?: TokenizerOptions;
  logger?: Logger;
  config?: Partial<IndexingConfig>;
  now?: () => number;
}

export interface IndexingRunOptions {
  /** Checked between write batches. */
  signal?: AbortSignal;
  listener?: IndexingListener;
}

interface RunContext {
  runId: string;
  listener: IndexingListener;
  logger: Logger;
  processed: number;
  failed: number;
  total: number;
  corpusSize: number;
  startedAt: number;
}

/**
 * Drives one indexing pass: find messages needing a vector, rebuild the
 * corpus snapshot from every body, then embed and persist the pending
 * messages in write batches.
 *
 * IDLE -> SCANNING -> CORPUS_REBUILD -> BATCH_PROCESSING -> COMPLETED | CANCELLED | FAILED
 */
export class IndexingOrchestrator {
  private readonly config: IndexingConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private currentState: IndexingState = 'IDLE';
  private running = false;

  constructor(private readonly deps: IndexingOrchestratorDependencies) {
    this.config = { ...defaultConfig().indexing, ...deps.config };
    this.logger = deps.logger ?? new SilentLogger();
    this.now = deps.now ?? Date.now;
  }

  get state(): IndexingState {
    return this.currentState;
  }

  isRunning(): boolean {
    return this.running;
  }

  async run(options: IndexingRunOptions = {}): Promise<IndexingRunResult> {
    if (this.running) {
      throw new UsageError('An indexing run is already in progress');
    }
    this.running = true;

    const runId = randomUUID();
    const ctx: RunContext = {
      runId,
      listener: options.listener ?? {},
      logger: this.logger.child({ runId }),
      processed: 0,
      failed: 0,
      total: 0,
      corpusSize: 0,
      startedAt: this.now(),
    };
    this.currentState = 'IDLE';

    try {
      await ctx.logger.log({
        ...eventEnvelope(runId),
        type: 'IndexingStarted',
        payload: {
          embedderId: this.deps.embedder.id(),
          embeddingVersion: this.deps.embedder.version(),
        },
      });
      return await this.execute(ctx, options.signal);
    } catch (error) {
      if (error instanceof IndexingCancelledError) {
        return await this.finish(ctx, 'CANCELLED', error.message);
      }
      if (error instanceof CorpusReadError) {
        await ctx.logger.error(error, 'Indexing failed');
        return await this.finish(ctx, 'FAILED', error.message);
      }
      throw error;
    } finally {
      this.running = false;
    }
  }

  private async execute(ctx: RunContext, signal?: AbortSignal): Promise<IndexingRunResult> {
    const version = this.deps.embedder.version();

    await this.transition(ctx, 'SCANNING');
    const pending = this.readCorpus(() => this.deps.store.listMessagesNeedingEmbedding(version));
    ctx.total = pending.length;
    if (pending.length === 0) {
      return this.finish(ctx, 'COMPLETED', 'All messages are already indexed');
    }
    this.throwIfCancelled(ctx, signal);

    await this.transition(ctx, 'CORPUS_REBUILD');
    const stats = this.readCorpus(() =>
      buildCorpusStatistics(this.deps.store.listAllBodies(), {
        ...this.deps.tokenizerOptions,
        now: this.now,
      }),
    );
    ctx.corpusSize = stats.documentCount;
    this.deps.snapshots.publish(stats);
    await ctx.logger.debug(
      `Corpus rebuilt: ${stats.documentCount} documents, ${stats.idf.size} terms`,
    );

    await this.transition(ctx, 'BATCH_PROCESSING');
    const batchSize = this.config.writeBatchSize;
    for (let start = 0; start < pending.length; start += batchSize) {
      this.throwIfCancelled(ctx, signal);
      await this.processBatch(ctx, pending.slice(start, start + batchSize), stats, version);
      await yieldToEventLoop();
    }

    const summary =
      ctx.failed > 0
        ? `Indexed ${ctx.processed - ctx.failed} of ${ctx.total} messages (${ctx.failed} failed)`
        : `Indexed ${ctx.processed} messages`;
    return this.finish(ctx, 'COMPLETED', summary);
  }

  private async processBatch(
    ctx: RunContext,
    batch: PendingMessage[],
    stats: CorpusStatistics,
    version: number,
  ): Promise<void> {
    let reportedAt = -1;
    for (const message of batch) {
      try {
        const vector = this.deps.embedder.embed(message.body, stats);
        this.deps.store.updateEmbedding(message.id, toStorageForm(vector), version, this.now());
      } catch (error) {
        ctx.failed++;
        await ctx.logger.error(
          new ItemPersistenceError(message.id, errorMessage(error), { cause: error }),
          'Skipping message; it will be retried on the next run',
        );
      }
      ctx.processed++;
      if (ctx.processed % this.config.progressEvery === 0) {
        this.report(ctx, `Processing ${ctx.processed}/${ctx.total}`);
        reportedAt = ctx.processed;
      }
    }
    if (reportedAt !== ctx.processed) {
      this.report(ctx, `Processing ${ctx.processed}/${ctx.total}`);
    }
  }

  /** Store enumeration failures end the run; nothing has been written yet. */
  private readCorpus<T>(read: () => T): T {
    try {
      return read();
    } catch (error) {
      if (error instanceof CorpusReadError) throw error;
      throw new CorpusReadError(`Failed to read messages: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private throwIfCancelled(ctx: RunContext, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new IndexingCancelledError(ctx.processed);
    }
  }

  private report(ctx: RunContext, message: string): void {
    const progress: IndexingProgress = {
      processed: ctx.processed,
      total: ctx.total,
      message,
    };
    ctx.listener.onProgress?.(progress);
  }

  private async transition(ctx: RunContext, to: IndexingState): Promise<void> {
    const from = this.currentState;
    this.currentState = to;
    ctx.listener.onStateChange?.(from, to);
    await ctx.logger.log({
      ...eventEnvelope(ctx.runId),
      type: 'IndexingStateChanged',
      payload: { from, to },
    });
  }

  private async finish(
    ctx: RunContext,
    state: IndexingTerminalState,
    message: string,
  ): Promise<IndexingRunResult> {
    await this.transition(ctx, state);
    const result: IndexingRunResult = {
      state,
      processed: ctx.processed,
      failed: ctx.failed,
      total: ctx.total,
      message,
    };
    this.report(ctx, message);
    await ctx.logger.log({
      ...eventEnvelope(ctx.runId),
      type: 'IndexingFinished',
      payload: {
        state,
        processed: ctx.processed,
        failed: ctx.failed,
        total: ctx.total,
        corpusSize: ctx.corpusSize,
        durationMs: this.now() - ctx.startedAt,
      },
    });
    return result;
  }
}
