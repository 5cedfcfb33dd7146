import type Database from 'better-sqlite3';

const SCHEMA_VERSION = 1;

/** Creates the message table and its scan index; safe to run on every open. */
export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS messages (
      id TEXT PRIMARY KEY,
      threadId TEXT NOT NULL,
      sender TEXT NOT NULL,
      body TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      embedding TEXT,
      embeddingVersion INTEGER NOT NULL DEFAULT 0,
      lastIndexed INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_messages_timestamp
    ON messages (timestamp DESC, id);
  `);
  db.pragma(`user_version = ${SCHEMA_VERSION}`);
}
