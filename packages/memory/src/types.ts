import type { IndexingState, IndexingTerminalState } from '@recall/shared';

/** A message as persisted in the local store. */
export interface Message {
  id: string;
  threadId: string;
  /** Sender address */
  sender: string;
  body: string;
  /** Epoch ms */
  timestamp: number;
  /** Comma-separated vector, present iff lastIndexed is set */
  embedding: string | null;
  embeddingVersion: number;
  lastIndexed: number | null;
}

export type NewMessage = Pick<Message, 'id' | 'threadId' | 'sender' | 'body' | 'timestamp'>;

/** Work item for an indexing run. */
export interface PendingMessage {
  id: string;
  body: string;
}

/** One row of the batched scan used by search. */
export interface EmbeddedMessage {
  id: string;
  threadId: string;
  sender: string;
  body: string;
  timestamp: number;
  embedding: string;
}

/** Position of the last row read by a paged scan of embedded messages. */
export interface EmbeddedCursor {
  timestamp: number;
  id: string;
}

export interface StoreStatus {
  total: number;
  /** Messages carrying an embedding of the current version */
  embedded: number;
  /** Messages without any embedding */
  missing: number;
  /** Messages embedded by an older version */
  stale: number;
  lastIndexedAt: number | null;
}

export interface SearchRequest {
  query: string;
  /** 1..20 */
  maxResults: number;
  /** 0..1 */
  threshold: number;
}

export interface SearchResult {
  messageId: string;
  threadId: string;
  sender: string;
  timestamp: number;
  snippet: string;
  similarity: number;
}

export interface IndexingProgress {
  processed: number;
  total: number;
  message: string;
}

export interface IndexingRunResult extends IndexingProgress {
  state: IndexingTerminalState;
  failed: number;
}

export interface IndexingListener {
  onProgress?(progress: IndexingProgress): void;
  onStateChange?(from: IndexingState, to: IndexingState): void;
}
