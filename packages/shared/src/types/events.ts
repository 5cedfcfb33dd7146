/**
 * Base interface for all recall events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the indexing run or search that produced the event */
  runId: string;
  /** Event type discriminator */
  type: string;
}

export type IndexingState =
  | 'IDLE'
  | 'SCANNING'
  | 'CORPUS_REBUILD'
  | 'BATCH_PROCESSING'
  | 'COMPLETED'
  | 'CANCELLED'
  | 'FAILED';

export type IndexingTerminalState = Extract<IndexingState, 'COMPLETED' | 'CANCELLED' | 'FAILED'>;

/** Emitted when an indexing run starts. */
export interface IndexingStarted extends BaseEvent {
  type: 'IndexingStarted';
  payload: {
    embedderId: string;
    embeddingVersion: number;
  };
}

/** Emitted on every state machine transition of an indexing run. */
export interface IndexingStateChanged extends BaseEvent {
  type: 'IndexingStateChanged';
  payload: {
    from: IndexingState;
    to: IndexingState;
  };
}

/** Emitted once an indexing run reaches a terminal state. */
export interface IndexingFinished extends BaseEvent {
  type: 'IndexingFinished';
  payload: {
    state: IndexingTerminalState;
    processed: number;
    failed: number;
    total: number;
    corpusSize: number;
    durationMs: number;
  };
}

/** Emitted after a similarity search scanned the store. */
export interface SearchFinished extends BaseEvent {
  type: 'SearchFinished';
  payload: {
    maxResults: number;
    threshold: number;
    scanned: number;
    skippedCorrupt: number;
    hitCount: number;
    durationMs: number;
  };
}

export type RecallEvent = IndexingStarted | IndexingStateChanged | IndexingFinished | SearchFinished;

/**
 * Builds the common envelope fields for an event.
 */
export function eventEnvelope(runId: string): Pick<BaseEvent, 'schemaVersion' | 'timestamp' | 'runId'> {
  return {
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId,
  };
}
