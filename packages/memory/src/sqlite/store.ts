import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { StoreError } from '@recall/shared';
import type {
  EmbeddedCursor,
  EmbeddedMessage,
  Message,
  NewMessage,
  PendingMessage,
  StoreStatus,
} from '../types';
import { runMigrations } from './schema';

export interface MessageStoreOptions {
  /** File path, or `:memory:` */
  dbPath: string;
}

export interface MessageStore {
  init(options: MessageStoreOptions): void;
  insertMessages(messages: NewMessage[]): number;
  get(id: string): Message | null;
  /** Lazily yields every body; consume it before issuing other queries. */
  listAllBodies(): Iterable<string>;
  /** Messages with no embedding or one older than `currentVersion`. */
  listMessagesNeedingEmbedding(currentVersion: number): PendingMessage[];
  /**
   * Embedded messages, newest first, starting after `after`. Keyed on
   * (timestamp, id) so rows embedded between pages never shift a page.
   */
  readEmbeddedBatch(limit: number, after?: EmbeddedCursor): EmbeddedMessage[];
  /** Writes embedding, version and lastIndexed in one statement. */
  updateEmbedding(id: string, embedding: string, version: number, lastIndexed: number): void;
  status(currentVersion: number): StoreStatus;
  close(): void;
}

interface StatusRow {
  total: number;
  embedded: number;
  missing: number;
  stale: number;
  lastIndexedAt: number | null;
}

export function createMessageStore(): MessageStore {
  let db: Database.Database | null = null;

  const requireDb = (): Database.Database => {
    if (!db) throw new StoreError('Database not initialized');
    return db;
  };

  const init = (options: MessageStoreOptions): void => {
    if (db) return;

    if (options.dbPath !== ':memory:') {
      mkdirSync(dirname(options.dbPath), { recursive: true });
    }
    db = new Database(options.dbPath);
    db.pragma('journal_mode = WAL');
    runMigrations(db);
  };

  const close = (): void => {
    if (db) {
      db.close();
      db = null;
    }
  };

  const insertMessages = (messages: NewMessage[]): number => {
    const conn = requireDb();
    // A changed body invalidates the stored vector.
    const stmt = conn.prepare<NewMessage>(`
      INSERT INTO messages (id, threadId, sender, body, timestamp)
      VALUES (@id, @threadId, @sender, @body, @timestamp)
      ON CONFLICT(id) DO UPDATE SET
        threadId = excluded.threadId,
        sender = excluded.sender,
        timestamp = excluded.timestamp,
        embedding = CASE WHEN messages.body = excluded.body THEN messages.embedding ELSE NULL END,
        embeddingVersion = CASE WHEN messages.body = excluded.body THEN messages.embeddingVersion ELSE 0 END,
        lastIndexed = CASE WHEN messages.body = excluded.body THEN messages.lastIndexed ELSE NULL END,
        body = excluded.body;
    `);

    const insertAll = conn.transaction((batch: NewMessage[]) => {
      for (const message of batch) {
        stmt.run({
          id: message.id,
          threadId: message.threadId,
          sender: message.sender,
          body: message.body,
          timestamp: message.timestamp,
        });
      }
      return batch.length;
    });

    return insertAll(messages);
  };

  const get = (id: string): Message | null => {
    const stmt = requireDb().prepare<[string], Message>('SELECT * FROM messages WHERE id = ?');
    return stmt.get(id) ?? null;
  };

  const listAllBodies = (): Iterable<string> => {
    const stmt = requireDb().prepare<[], { body: string }>('SELECT body FROM messages');
    return {
      *[Symbol.iterator]() {
        for (const row of stmt.iterate()) {
          yield row.body;
        }
      },
    };
  };

  const listMessagesNeedingEmbedding = (currentVersion: number): PendingMessage[] => {
    const stmt = requireDb().prepare<[number], PendingMessage>(`
      SELECT id, body
      FROM messages
      WHERE embedding IS NULL OR embeddingVersion < ?
      ORDER BY timestamp DESC, id ASC
    `);
    return stmt.all(currentVersion);
  };

  const readEmbeddedBatch = (limit: number, after?: EmbeddedCursor): EmbeddedMessage[] => {
    const conn = requireDb();
    if (!after) {
      const stmt = conn.prepare<[number], EmbeddedMessage>(`
        SELECT id, threadId, sender, body, timestamp, embedding
        FROM messages
        WHERE embedding IS NOT NULL
        ORDER BY timestamp DESC, id ASC
        LIMIT ?
      `);
      return stmt.all(limit);
    }
    const stmt = conn.prepare<
      { timestamp: number; id: string; limit: number },
      EmbeddedMessage
    >(`
      SELECT id, threadId, sender, body, timestamp, embedding
      FROM messages
      WHERE embedding IS NOT NULL
        AND (timestamp < @timestamp OR (timestamp = @timestamp AND id > @id))
      ORDER BY timestamp DESC, id ASC
      LIMIT @limit
    `);
    return stmt.all({ timestamp: after.timestamp, id: after.id, limit });
  };

  const updateEmbedding = (
    id: string,
    embedding: string,
    version: number,
    lastIndexed: number,
  ): void => {
    const stmt = requireDb().prepare<[string, number, number, string]>(
      'UPDATE messages SET embedding = ?, embeddingVersion = ?, lastIndexed = ? WHERE id = ?',
    );
    const result = stmt.run(embedding, version, lastIndexed, id);
    if (result.changes === 0) {
      throw new StoreError(`Message "${id}" not found`, { details: { id } });
    }
  };

  const status = (currentVersion: number): StoreStatus => {
    const stmt = requireDb().prepare<[number, number], StatusRow>(`
      SELECT
        COUNT(*) AS total,
        COALESCE(SUM(CASE WHEN embedding IS NOT NULL AND embeddingVersion >= ? THEN 1 ELSE 0 END), 0) AS embedded,
        COALESCE(SUM(CASE WHEN embedding IS NULL THEN 1 ELSE 0 END), 0) AS missing,
        COALESCE(SUM(CASE WHEN embedding IS NOT NULL AND embeddingVersion < ? THEN 1 ELSE 0 END), 0) AS stale,
        MAX(lastIndexed) AS lastIndexedAt
      FROM messages
    `);
    const row = stmt.get(currentVersion, currentVersion);
    return {
      total: row?.total ?? 0,
      embedded: row?.embedded ?? 0,
      missing: row?.missing ?? 0,
      stale: row?.stale ?? 0,
      lastIndexedAt: row?.lastIndexedAt ?? null,
    };
  };

  return {
    init,
    close,
    insertMessages,
    get,
    listAllBodies,
    listMessagesNeedingEmbedding,
    readEmbeddedBatch,
    updateEmbedding,
    status,
  };
}
