import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { Pool, type PoolClient, type PoolConfig } from 'pg';

import { logger } from '../middleware/logger.js';
import { PROJECT_ROOT } from './config.js';
import type { DbBackend } from './db-backend.js';
import type {
  Connection,
  InsertConnectionResult,
  MessageLogEntry,
  MessageStats,
  ServerSettings,
  ServerSettingKey,
  ServerSettingUpdate,
  SpamTrackingEntry,
} from './db-types.js';

const REQUIRED_CORE_TABLES = [
  'connections',
  'message_history',
  'server_settings',
  'spam_tracking',
] as const;

// Advisory lock namespace for connection creation; serializes quota checks.
const CONNECTION_LOCK_KEY = 7_301_001;

type BigintLike = string | number;

interface DbCountRow {
  count: BigintLike;
}

interface ConnectionRow {
  id: BigintLike;
  server1_id: string;
  channel1_id: string;
  server2_id: string;
  channel2_id: string;
  connection_name: string;
  created_at: BigintLike;
  created_by: string;
  is_active: boolean;
  description: string | null;
}

interface MessageHistoryRow {
  original_message_id: string;
  forwarded_message_id: string;
  author_id: string;
  connection_id: BigintLike;
  timestamp: BigintLike;
  content_hash: string | null;
}

interface MessageStatsRow {
  total_messages: BigintLike;
  unique_users: BigintLike;
  active_connections: BigintLike;
}

interface ServerSettingsRow {
  server_id: string;
  prefix: string | null;
  enabled: boolean;
  mod_role_id: string | null;
  log_channel_id: string | null;
  spam_protection: boolean;
  profanity_filter: boolean;
  auto_delete_commands: boolean;
  webhook_notifications: boolean;
  created_at: BigintLike;
  updated_at: BigintLike;
}

interface SpamTrackingRow {
  user_id: string;
  server_id: string;
  channel_id: string;
  message_count: BigintLike;
  first_message_time: BigintLike;
  last_message_time: BigintLike;
  is_blocked: boolean;
}

interface DatabaseStatsRow {
  active_connections: BigintLike;
  total_messages: BigintLike;
  total_servers: BigintLike;
}

function toNumber(value: BigintLike | null | undefined): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'number') return value;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

function toConnection(row: ConnectionRow): Connection {
  return {
    id: toNumber(row.id),
    server1Id: row.server1_id,
    channel1Id: row.channel1_id,
    server2Id: row.server2_id,
    channel2Id: row.channel2_id,
    name: row.connection_name,
    createdBy: row.created_by,
    description: row.description,
    createdAt: toNumber(row.created_at),
    active: row.is_active,
  };
}

function toMessageLogEntry(row: MessageHistoryRow): MessageLogEntry {
  return {
    originalMessageId: row.original_message_id,
    forwardedMessageId: row.forwarded_message_id,
    authorId: row.author_id,
    connectionId: toNumber(row.connection_id),
    timestamp: toNumber(row.timestamp),
    contentHash: row.content_hash,
  };
}

function toServerSettings(row: ServerSettingsRow): ServerSettings {
  return {
    serverId: row.server_id,
    prefix: row.prefix,
    enabled: row.enabled,
    modRoleId: row.mod_role_id,
    logChannelId: row.log_channel_id,
    spamProtection: row.spam_protection,
    profanityFilter: row.profanity_filter,
    autoDeleteCommands: row.auto_delete_commands,
    webhookNotifications: row.webhook_notifications,
    createdAt: toNumber(row.created_at),
    updatedAt: toNumber(row.updated_at),
  };
}

function toSpamEntry(row: SpamTrackingRow): SpamTrackingEntry {
  return {
    userId: row.user_id,
    serverId: row.server_id,
    channelId: row.channel_id,
    messageCount: toNumber(row.message_count),
    firstMessageTime: toNumber(row.first_message_time),
    lastMessageTime: toNumber(row.last_message_time),
    blocked: row.is_blocked,
  };
}

const SETTING_UPDATE_SQL: Record<ServerSettingKey, string> = {
  prefix: 'UPDATE server_settings SET prefix = $1, updated_at = $2 WHERE server_id = $3',
  enabled: 'UPDATE server_settings SET enabled = $1, updated_at = $2 WHERE server_id = $3',
  spam_protection: 'UPDATE server_settings SET spam_protection = $1, updated_at = $2 WHERE server_id = $3',
  profanity_filter: 'UPDATE server_settings SET profanity_filter = $1, updated_at = $2 WHERE server_id = $3',
  auto_delete_commands: 'UPDATE server_settings SET auto_delete_commands = $1, updated_at = $2 WHERE server_id = $3',
  webhook_notifications: 'UPDATE server_settings SET webhook_notifications = $1, updated_at = $2 WHERE server_id = $3',
  mod_role_id: 'UPDATE server_settings SET mod_role_id = $1, updated_at = $2 WHERE server_id = $3',
  log_channel_id: 'UPDATE server_settings SET log_channel_id = $1, updated_at = $2 WHERE server_id = $3',
};

function settingParam(update: ServerSettingUpdate): string | boolean | null {
  return update.value;
}

function resolveSchemaPath(): string | undefined {
  const candidates = [
    resolve(PROJECT_ROOT, 'src', 'utils', 'postgres-schema.sql'),
    resolve(PROJECT_ROOT, 'dist', 'utils', 'postgres-schema.sql'),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) return candidate;
  }

  return undefined;
}

async function validateCoreTables(pool: Pool): Promise<void> {
  const res = await pool.query<{ table_name: string }>(
    `SELECT table_name
     FROM information_schema.tables
     WHERE table_schema = 'public' AND table_name = ANY($1::text[])`,
    [Array.from(REQUIRED_CORE_TABLES)],
  );

  const available = new Set(res.rows.map((row) => row.table_name));
  const missing = REQUIRED_CORE_TABLES.filter((table) => !available.has(table));
  if (missing.length > 0) {
    throw new Error(
      `Postgres schema is incomplete; missing tables: ${missing.join(', ')}. `
      + 'Ensure postgres-schema.sql is shipped next to the compiled backend.',
    );
  }
}

async function withClient<T>(pool: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    return await work(client);
  } finally {
    client.release();
  }
}

async function inTransaction<T>(pool: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      logger.warn({ err: rollbackErr }, 'Postgres rollback failed');
    });
    throw err;
  } finally {
    client.release();
  }
}

export function createPostgresPool(connectionString: string): Pool {
  const poolConfig: PoolConfig = { connectionString };
  return new Pool(poolConfig);
}

export async function createPostgresBackend(pool: Pool): Promise<DbBackend> {
  const schemaPath = resolveSchemaPath();
  if (schemaPath) {
    await pool.query(readFileSync(schemaPath, 'utf-8'));
  } else {
    logger.warn('postgres-schema.sql not found in runtime filesystem; relying on existing DB tables');
  }

  await validateCoreTables(pool);
  await pool.query('SELECT 1');
  logger.info('Postgres backend initialized');

  const countForServer = async (client: PoolClient, serverId: string): Promise<number> => {
    const res = await client.query<DbCountRow>(
      `SELECT COUNT(*) AS count FROM connections
       WHERE (server1_id = $1 OR server2_id = $1) AND is_active = TRUE`,
      [serverId],
    );
    return toNumber(res.rows[0]?.count);
  };

  const ensureSettings = async (client: PoolClient, serverId: string, now: number): Promise<void> => {
    await client.query(
      `INSERT INTO server_settings (server_id, created_at, updated_at)
       VALUES ($1, $2, $2)
       ON CONFLICT (server_id) DO NOTHING`,
      [serverId, now],
    );
  };

  const selectSettings = async (client: PoolClient, serverId: string): Promise<ServerSettings | undefined> => {
    const res = await client.query<ServerSettingsRow>(
      'SELECT * FROM server_settings WHERE server_id = $1',
      [serverId],
    );
    const row = res.rows[0];
    return row ? toServerSettings(row) : undefined;
  };

  const spamCount = async (client: PoolClient): Promise<number> => {
    const res = await client.query<DbCountRow>('SELECT COUNT(*) AS count FROM spam_tracking');
    return toNumber(res.rows[0]?.count);
  };

  return {
    dialect: 'postgres',

    async insertConnection(input, maxPerServer, now) {
      return inTransaction<InsertConnectionResult>(pool, async (client) => {
        await client.query('SELECT pg_advisory_xact_lock($1)', [CONNECTION_LOCK_KEY]);

        for (const serverId of [input.server1Id, input.server2Id]) {
          const count = await countForServer(client, serverId);
          if (count >= maxPerServer) {
            return { ok: false, reason: 'quota_exceeded', serverId, count };
          }
        }

        const dup = await client.query<ConnectionRow>(
          `SELECT * FROM connections
           WHERE is_active = TRUE
             AND ((channel1_id = $1 AND channel2_id = $2) OR (channel1_id = $2 AND channel2_id = $1))
           LIMIT 1`,
          [input.channel1Id, input.channel2Id],
        );
        const existing = dup.rows[0];
        if (existing) {
          return { ok: false, reason: 'duplicate_connection', existing: toConnection(existing) };
        }

        const res = await client.query<{ id: BigintLike }>(
          `INSERT INTO connections
           (server1_id, channel1_id, server2_id, channel2_id, connection_name, created_at, created_by, description)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
           RETURNING id`,
          [
            input.server1Id, input.channel1Id,
            input.server2Id, input.channel2Id,
            input.name, now, input.createdBy, input.description ?? null,
          ],
        );
        return { ok: true, id: toNumber(res.rows[0]?.id) };
      });
    },

    async getConnectionById(id) {
      const res = await pool.query<ConnectionRow>(
        'SELECT * FROM connections WHERE id = $1 AND is_active = TRUE',
        [id],
      );
      const row = res.rows[0];
      return row ? toConnection(row) : undefined;
    },

    async getConnectionsByChannel(channelId) {
      const res = await pool.query<ConnectionRow>(
        `SELECT * FROM connections
         WHERE (channel1_id = $1 OR channel2_id = $1) AND is_active = TRUE
         ORDER BY id ASC`,
        [channelId],
      );
      return res.rows.map(toConnection);
    },

    async getConnectionsByServer(serverId) {
      const res = await pool.query<ConnectionRow>(
        `SELECT * FROM connections
         WHERE (server1_id = $1 OR server2_id = $1) AND is_active = TRUE
         ORDER BY created_at DESC, id DESC`,
        [serverId],
      );
      return res.rows.map(toConnection);
    },

    async softDeleteConnection(id) {
      const res = await pool.query(
        'UPDATE connections SET is_active = FALSE WHERE id = $1 AND is_active = TRUE',
        [id],
      );
      return (res.rowCount ?? 0) > 0;
    },

    async countActiveConnections(serverId) {
      return withClient(pool, (client) => countForServer(client, serverId));
    },

    async deactivateServerConnections(serverId) {
      const res = await pool.query(
        `UPDATE connections SET is_active = FALSE
         WHERE (server1_id = $1 OR server2_id = $1) AND is_active = TRUE`,
        [serverId],
      );
      return res.rowCount ?? 0;
    },

    async logMessage(entry) {
      await pool.query(
        `INSERT INTO message_history
         (original_message_id, forwarded_message_id, author_id, connection_id, timestamp, content_hash)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          entry.originalMessageId,
          entry.forwardedMessageId,
          entry.authorId,
          entry.connectionId,
          entry.timestamp,
          entry.contentHash,
        ],
      );
    },

    async getMessageStats(since, connectionId) {
      const res = connectionId === undefined
        ? await pool.query<MessageStatsRow>(
          `SELECT COUNT(*) AS total_messages,
                  COUNT(DISTINCT author_id) AS unique_users,
                  COUNT(DISTINCT connection_id) AS active_connections
           FROM message_history WHERE timestamp >= $1`,
          [since],
        )
        : await pool.query<MessageStatsRow>(
          `SELECT COUNT(*) AS total_messages,
                  COUNT(DISTINCT author_id) AS unique_users,
                  COUNT(DISTINCT connection_id) AS active_connections
           FROM message_history WHERE connection_id = $1 AND timestamp >= $2`,
          [connectionId, since],
        );
      const row = res.rows[0];
      const stats: MessageStats = {
        totalMessages: toNumber(row?.total_messages),
        uniqueUsers: toNumber(row?.unique_users),
      };
      if (connectionId === undefined) stats.activeConnections = toNumber(row?.active_connections);
      return stats;
    },

    async getMessageLog(connectionId, limit = 50) {
      const res = await pool.query<MessageHistoryRow>(
        `SELECT original_message_id, forwarded_message_id, author_id, connection_id, timestamp, content_hash
         FROM message_history WHERE connection_id = $1
         ORDER BY timestamp DESC, id DESC LIMIT $2`,
        [connectionId, limit],
      );
      return res.rows.map(toMessageLogEntry);
    },

    async ensureServerSettings(serverId, now) {
      return withClient(pool, async (client) => {
        await ensureSettings(client, serverId, now);
        const settings = await selectSettings(client, serverId);
        if (!settings) throw new Error(`server_settings row for ${serverId} missing after insert`);
        return settings;
      });
    },

    async getServerSettings(serverId) {
      return withClient(pool, (client) => selectSettings(client, serverId));
    },

    async updateServerSetting(serverId, update, now) {
      return inTransaction(pool, async (client) => {
        await ensureSettings(client, serverId, now);
        await client.query(SETTING_UPDATE_SQL[update.key], [settingParam(update), now, serverId]);
        const settings = await selectSettings(client, serverId);
        if (!settings) throw new Error(`server_settings row for ${serverId} missing after update`);
        logger.debug({ serverId, key: update.key }, 'Server setting updated');
        return settings;
      });
    },

    async trackSpamMessage(key, now, windowMs, threshold) {
      return inTransaction(pool, async (client) => {
        // Upsert takes the row lock; the existing row is then read under it.
        await client.query(
          `INSERT INTO spam_tracking
           (user_id, server_id, channel_id, message_count, first_message_time, last_message_time, is_blocked)
           VALUES ($1, $2, $3, 0, $4, $4, FALSE)
           ON CONFLICT (user_id, server_id, channel_id) DO NOTHING`,
          [key.userId, key.serverId, key.channelId, now],
        );
        const res = await client.query<SpamTrackingRow>(
          `SELECT user_id, server_id, channel_id, message_count, first_message_time, last_message_time, is_blocked
           FROM spam_tracking WHERE user_id = $1 AND server_id = $2 AND channel_id = $3
           FOR UPDATE`,
          [key.userId, key.serverId, key.channelId],
        );
        const row = res.rows[0];
        const previous = row ? toSpamEntry(row) : undefined;

        if (previous && previous.messageCount > 0 && previous.lastMessageTime > now - windowMs) {
          const count = previous.messageCount + 1;
          const blocked = count >= threshold;
          await client.query(
            `UPDATE spam_tracking SET message_count = $1, last_message_time = $2, is_blocked = $3
             WHERE user_id = $4 AND server_id = $5 AND channel_id = $6`,
            [count, now, blocked, key.userId, key.serverId, key.channelId],
          );
          return { count, blocked };
        }

        await client.query(
          `UPDATE spam_tracking
           SET message_count = 1, first_message_time = $1, last_message_time = $1, is_blocked = FALSE
           WHERE user_id = $2 AND server_id = $3 AND channel_id = $4`,
          [now, key.userId, key.serverId, key.channelId],
        );
        return { count: 1, blocked: false };
      });
    },

    async getLiveSpamEntry(key, now, windowMs) {
      const res = await pool.query<SpamTrackingRow>(
        `SELECT user_id, server_id, channel_id, message_count, first_message_time, last_message_time, is_blocked
         FROM spam_tracking
         WHERE user_id = $1 AND server_id = $2 AND channel_id = $3 AND last_message_time > $4`,
        [key.userId, key.serverId, key.channelId, now - windowMs],
      );
      const row = res.rows[0];
      return row ? toSpamEntry(row) : undefined;
    },

    async pruneSpamTracking(olderThan) {
      return inTransaction(pool, async (client) => {
        const beforeCount = await spamCount(client);
        const res = await client.query('DELETE FROM spam_tracking WHERE last_message_time < $1', [olderThan]);
        const afterCount = await spamCount(client);
        return { pruned: res.rowCount ?? 0, beforeCount, afterCount };
      });
    },

    async getDatabaseStats() {
      const res = await pool.query<DatabaseStatsRow>(
        `SELECT
           (SELECT COUNT(*) FROM connections WHERE is_active = TRUE) AS active_connections,
           (SELECT COUNT(*) FROM message_history) AS total_messages,
           (SELECT COUNT(*) FROM server_settings) AS total_servers`,
      );
      const row = res.rows[0];
      return {
        activeConnections: toNumber(row?.active_connections),
        totalMessages: toNumber(row?.total_messages),
        totalServers: toNumber(row?.total_servers),
      };
    },

    async close() {
      await pool.end();
      logger.info('Postgres pool closed');
    },
  };
}
