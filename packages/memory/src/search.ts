import { randomUUID } from 'node:crypto';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import {
  defaultConfig,
  eventEnvelope,
  SilentLogger,
  type Logger,
  type SearchConfig,
} from '@recall/shared';
import {
  cosineSimilarity,
  fromStorageForm,
  isZeroVector,
  type Embedder,
} from '@recall/embeddings';
import type { MessageStore } from './sqlite';
import type { CorpusSnapshotHolder } from './snapshot';
import {
  normalizeSearchRequest,
  type SearchDefaults,
  type SearchRequestInput,
} from './request';
import type { EmbeddedCursor, EmbeddedMessage, SearchRequest, SearchResult } from './types';

export interface SimilaritySearchDependencies {
  store: Pick<MessageStore, 'readEmbeddedBatch'>;
  embedder: Embedder;
  snapshots: CorpusSnapshotHolder;
  logger?: Logger;
  config?: Partial<SearchConfig>;
}

/** A ranked hit that still carries the full body. */
export interface RankedMessage extends SearchResult {
  body: string;
}

export interface SearchOutcome {
  request: SearchRequest;
  hits: RankedMessage[];
  /** Stored vectors compared against the query */
  scanned: number;
  /** Stored vectors that could not be decoded */
  skippedCorrupt: number;
  durationMs: number;
}

/**
 * Orders by similarity, then newer timestamp, then message id. Ids are
 * unique, so this is a total order and any prefix of the ranking is stable.
 */
export function compareHits(
  a: Pick<SearchResult, 'similarity' | 'timestamp' | 'messageId'>,
  b: Pick<SearchResult, 'similarity' | 'timestamp' | 'messageId'>,
): number {
  if (a.similarity !== b.similarity) return b.similarity - a.similarity;
  if (a.timestamp !== b.timestamp) return b.timestamp - a.timestamp;
  if (a.messageId === b.messageId) return 0;
  return a.messageId < b.messageId ? -1 : 1;
}

export function toSnippet(body: string, maxLength: number): string {
  return body.length > maxLength ? `${body.slice(0, maxLength)}...` : body;
}

/** Keeps at most `limit` hits sorted by compareHits. */
function insertRanked(ranked: RankedMessage[], hit: RankedMessage, limit: number): void {
  let index = ranked.length;
  while (index > 0 && compareHits(hit, ranked[index - 1]) < 0) {
    index--;
  }
  if (index >= limit) return;
  ranked.splice(index, 0, hit);
  if (ranked.length > limit) ranked.pop();
}

/**
 * Brute-force cosine search over stored vectors. The store is read in
 * fixed-size pages so only one page of serialized vectors is held at once.
 */
export class SimilaritySearchEngine {
  private readonly config: SearchConfig;
  private readonly logger: Logger;

  constructor(private readonly deps: SimilaritySearchDependencies) {
    this.config = { ...defaultConfig().search, ...deps.config };
    this.logger = deps.logger ?? new SilentLogger();
  }

  defaults(): SearchDefaults {
    return {
      maxResults: this.config.defaultMaxResults,
      threshold: this.config.defaultThreshold,
    };
  }

  async search(input: SearchRequestInput): Promise<SearchResult[]> {
    const outcome = await this.run(input);
    return outcome.hits.map(({ body: _body, ...result }) => result);
  }

  async run(input: SearchRequestInput): Promise<SearchOutcome> {
    const started = Date.now();
    const request = normalizeSearchRequest(input, this.defaults());
    const { embedder, snapshots, store } = this.deps;

    const queryVector = embedder.embed(request.query, snapshots.current());
    const hits: RankedMessage[] = [];
    let scanned = 0;
    let skippedCorrupt = 0;

    if (!isZeroVector(queryVector)) {
      const batchSize = this.config.readBatchSize;
      let cursor: EmbeddedCursor | undefined;
      for (;;) {
        const batch: EmbeddedMessage[] = store.readEmbeddedBatch(batchSize, cursor);
        for (const row of batch) {
          const vector = fromStorageForm(row.embedding, embedder.dims());
          if (vector === null) {
            skippedCorrupt++;
            continue;
          }
          scanned++;
          // Bodies without indexable tokens are stored as the zero vector and never match.
          if (isZeroVector(vector)) continue;
          const similarity = cosineSimilarity(queryVector, vector);
          if (similarity < request.threshold) continue;
          insertRanked(
            hits,
            {
              messageId: row.id,
              threadId: row.threadId,
              sender: row.sender,
              timestamp: row.timestamp,
              snippet: toSnippet(row.body, this.config.snippetLength),
              similarity,
              body: row.body,
            },
            request.maxResults,
          );
        }
        if (batch.length < batchSize) break;
        const last = batch[batch.length - 1];
        cursor = { timestamp: last.timestamp, id: last.id };
        // Let indexing and other callers run between pages.
        await yieldToEventLoop();
      }
    }

    const durationMs = Date.now() - started;
    if (skippedCorrupt > 0) {
      await this.logger.warn(`Skipped ${skippedCorrupt} unreadable embeddings`);
    }
    await this.logger.log({
      ...eventEnvelope(randomUUID()),
      type: 'SearchFinished',
      payload: {
        maxResults: request.maxResults,
        threshold: request.threshold,
        scanned,
        skippedCorrupt,
        hitCount: hits.length,
        durationMs,
      },
    });

    return { request, hits, scanned, skippedCorrupt, durationMs };
  }
}
