/**
 * SQLite database initialization and schema.
 *
 * Owns every CREATE TABLE statement. The handle is created by the caller
 * (startup or tests) and handed to `createSqliteBackend`.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { logger } from '../middleware/logger.js';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS connections (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    server1_id TEXT NOT NULL,
    channel1_id TEXT NOT NULL,
    server2_id TEXT NOT NULL,
    channel2_id TEXT NOT NULL,
    connection_name TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    created_by TEXT NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1,
    description TEXT,
    CHECK (server1_id <> server2_id)
  );

  CREATE INDEX IF NOT EXISTS idx_connections_active
    ON connections (is_active);

  CREATE INDEX IF NOT EXISTS idx_connections_channels
    ON connections (channel1_id, channel2_id);

  CREATE TABLE IF NOT EXISTS message_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    original_message_id TEXT NOT NULL,
    forwarded_message_id TEXT NOT NULL,
    author_id TEXT NOT NULL,
    connection_id INTEGER NOT NULL REFERENCES connections (id),
    timestamp INTEGER NOT NULL,
    content_hash TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_message_history_connection
    ON message_history (connection_id);

  CREATE TABLE IF NOT EXISTS server_settings (
    server_id TEXT PRIMARY KEY,
    prefix TEXT,
    enabled INTEGER NOT NULL DEFAULT 1,
    mod_role_id TEXT,
    log_channel_id TEXT,
    spam_protection INTEGER NOT NULL DEFAULT 1,
    profanity_filter INTEGER NOT NULL DEFAULT 1,
    auto_delete_commands INTEGER NOT NULL DEFAULT 0,
    webhook_notifications INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS spam_tracking (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    server_id TEXT NOT NULL,
    channel_id TEXT NOT NULL,
    message_count INTEGER NOT NULL DEFAULT 1,
    first_message_time INTEGER NOT NULL,
    last_message_time INTEGER NOT NULL,
    is_blocked INTEGER NOT NULL DEFAULT 0
  );

  CREATE INDEX IF NOT EXISTS idx_spam_tracking_user
    ON spam_tracking (user_id, server_id);

  CREATE UNIQUE INDEX IF NOT EXISTS idx_spam_tracking_key
    ON spam_tracking (user_id, server_id, channel_id);
`;

/**
 * Open (creating if needed) the relay database and apply the schema.
 * Pass `:memory:` for a throwaway database.
 */
export function openSqliteDatabase(file: string): SqliteDatabase {
  if (file !== ':memory:') {
    mkdirSync(dirname(file), { recursive: true });
  }

  // Connection-level busy timeout so concurrent writers wait instead of failing.
  const db = new Database(file, { timeout: 5000 });

  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');
  if (file !== ':memory:') {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }

  db.exec(SCHEMA);

  logger.info({ path: file }, 'SQLite database opened');
  return db;
}
