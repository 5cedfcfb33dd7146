import type { Logger, RecallEvent } from '@recall/shared';
import {
  buildCorpusStatistics,
  toStorageForm,
  type CorpusStatistics,
  type Embedder,
} from '@recall/embeddings';
import type { MessageStore } from './sqlite';
import type { CorpusSnapshotHolder } from './snapshot';
import type { NewMessage } from './types';

/** Logger that keeps everything it receives for assertions. */
export class RecordingLogger implements Logger {
  readonly events: RecallEvent[] = [];
  readonly errors: Error[] = [];
  readonly messages: string[] = [];

  log(event: RecallEvent): void {
    this.events.push(event);
  }

  trace(event: RecallEvent): void {
    this.events.push(event);
  }

  debug(message: string): void {
    this.messages.push(message);
  }

  info(message: string): void {
    this.messages.push(message);
  }

  warn(message: string): void {
    this.messages.push(message);
  }

  error(error: Error): void {
    this.errors.push(error);
  }

  child(): Logger {
    return this;
  }
}

export function message(
  id: string,
  body: string,
  timestamp: number,
  overrides: Partial<NewMessage> = {},
): NewMessage {
  return { id, threadId: 'thread-1', sender: '+15550100', body, timestamp, ...overrides };
}

/** Inserts messages, embeds all of them and publishes the snapshot. */
export function seedIndexed(
  store: MessageStore,
  embedder: Embedder,
  snapshots: CorpusSnapshotHolder,
  messages: NewMessage[],
): CorpusStatistics {
  store.insertMessages(messages);
  const stats = buildCorpusStatistics(messages.map((m) => m.body));
  snapshots.publish(stats);
  for (const m of messages) {
    store.updateEmbedding(m.id, toStorageForm(embedder.embed(m.body, stats)), embedder.version(), 1);
  }
  return stats;
}
