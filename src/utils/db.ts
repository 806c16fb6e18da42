/**
 * Storage entry point: picks the backend named by DB_DIALECT.
 *
 * Callers receive a DbBackend and never touch driver handles directly.
 */

import type { RelayConfig } from './config.js';
import type { DbBackend } from './db-backend.js';
import { openSqliteDatabase } from './db-schema.js';
import { createSqliteBackend } from './db-sqlite.js';
import { createPostgresBackend, createPostgresPool } from './db-postgres.js';

export type { DbBackend } from './db-backend.js';

type StorageConfig = Pick<RelayConfig, 'DB_DIALECT' | 'DATABASE_FILE' | 'DATABASE_URL'>;

export async function createDbBackend(config: StorageConfig): Promise<DbBackend> {
  if (config.DB_DIALECT === 'postgres') {
    if (!config.DATABASE_URL) {
      throw new Error('DATABASE_URL is required when DB_DIALECT=postgres');
    }
    return createPostgresBackend(createPostgresPool(config.DATABASE_URL));
  }

  return createSqliteBackend(openSqliteDatabase(config.DATABASE_FILE));
}
