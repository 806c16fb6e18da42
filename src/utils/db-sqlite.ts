/**
 * SQLite backend: implements DbBackend over a better-sqlite3 handle.
 *
 * better-sqlite3 is synchronous, so each multi-statement operation runs
 * inside `db.transaction`, which makes it atomic with respect to every
 * other call in the process.
 */

import type Database from 'better-sqlite3';
import type { DbBackend } from './db-backend.js';
import type { SqliteDatabase } from './db-schema.js';
import type {
  Connection,
  DatabaseStats,
  InsertConnectionResult,
  MaintenanceStats,
  MessageLogEntry,
  MessageStats,
  NewConnection,
  ServerSettings,
  ServerSettingKey,
  ServerSettingUpdate,
  SpamCheckResult,
  SpamKey,
  SpamTrackingEntry,
} from './db-types.js';
import { logger } from '../middleware/logger.js';

// ── Row types ───────────────────────────────────────────────────────

interface ConnectionRow {
  id: number;
  server1_id: string;
  channel1_id: string;
  server2_id: string;
  channel2_id: string;
  connection_name: string;
  created_at: number;
  created_by: string;
  is_active: number;
  description: string | null;
}

interface MessageHistoryRow {
  original_message_id: string;
  forwarded_message_id: string;
  author_id: string;
  connection_id: number;
  timestamp: number;
  content_hash: string | null;
}

interface ServerSettingsRow {
  server_id: string;
  prefix: string | null;
  enabled: number;
  mod_role_id: string | null;
  log_channel_id: string | null;
  spam_protection: number;
  profanity_filter: number;
  auto_delete_commands: number;
  webhook_notifications: number;
  created_at: number;
  updated_at: number;
}

interface SpamTrackingRow {
  user_id: string;
  server_id: string;
  channel_id: string;
  message_count: number;
  first_message_time: number;
  last_message_time: number;
  is_blocked: number;
}

interface CountRow {
  count: number;
}

interface MessageStatsRow {
  total_messages: number;
  unique_users: number;
  active_connections: number;
}

// ── Row mapping ─────────────────────────────────────────────────────

function toConnection(row: ConnectionRow): Connection {
  return {
    id: row.id,
    server1Id: row.server1_id,
    channel1Id: row.channel1_id,
    server2Id: row.server2_id,
    channel2Id: row.channel2_id,
    name: row.connection_name,
    createdBy: row.created_by,
    description: row.description,
    createdAt: row.created_at,
    active: row.is_active === 1,
  };
}

function toMessageLogEntry(row: MessageHistoryRow): MessageLogEntry {
  return {
    originalMessageId: row.original_message_id,
    forwardedMessageId: row.forwarded_message_id,
    authorId: row.author_id,
    connectionId: row.connection_id,
    timestamp: row.timestamp,
    contentHash: row.content_hash,
  };
}

function toServerSettings(row: ServerSettingsRow): ServerSettings {
  return {
    serverId: row.server_id,
    prefix: row.prefix,
    enabled: row.enabled === 1,
    modRoleId: row.mod_role_id,
    logChannelId: row.log_channel_id,
    spamProtection: row.spam_protection === 1,
    profanityFilter: row.profanity_filter === 1,
    autoDeleteCommands: row.auto_delete_commands === 1,
    webhookNotifications: row.webhook_notifications === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toSpamEntry(row: SpamTrackingRow): SpamTrackingEntry {
  return {
    userId: row.user_id,
    serverId: row.server_id,
    channelId: row.channel_id,
    messageCount: row.message_count,
    firstMessageTime: row.first_message_time,
    lastMessageTime: row.last_message_time,
    blocked: row.is_blocked === 1,
  };
}

type SettingParams = [string | number | null, number, string];
type SettingStatement = Database.Statement<SettingParams>;

function settingParam(update: ServerSettingUpdate): string | number | null {
  return typeof update.value === 'boolean' ? Number(update.value) : update.value;
}

// ── Backend ─────────────────────────────────────────────────────────

export function createSqliteBackend(db: SqliteDatabase): DbBackend {
  // Connections
  const insertConnectionStmt = db.prepare<[string, string, string, string, string, number, string, string | null]>(
    `INSERT INTO connections
     (server1_id, channel1_id, server2_id, channel2_id, connection_name, created_at, created_by, description)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
  );
  const selectConnectionById = db.prepare<[number], ConnectionRow>(
    `SELECT * FROM connections WHERE id = ? AND is_active = 1`,
  );
  const selectConnectionsByChannel = db.prepare<[string, string], ConnectionRow>(
    `SELECT * FROM connections
     WHERE (channel1_id = ? OR channel2_id = ?) AND is_active = 1
     ORDER BY id ASC`,
  );
  const selectConnectionsByServer = db.prepare<[string, string], ConnectionRow>(
    `SELECT * FROM connections
     WHERE (server1_id = ? OR server2_id = ?) AND is_active = 1
     ORDER BY created_at DESC, id DESC`,
  );
  const selectDuplicateConnection = db.prepare<[string, string, string, string], ConnectionRow>(
    `SELECT * FROM connections
     WHERE is_active = 1
       AND ((channel1_id = ? AND channel2_id = ?) OR (channel1_id = ? AND channel2_id = ?))
     LIMIT 1`,
  );
  const countServerConnections = db.prepare<[string, string], CountRow>(
    `SELECT COUNT(*) AS count FROM connections
     WHERE (server1_id = ? OR server2_id = ?) AND is_active = 1`,
  );
  const softDeleteConnectionStmt = db.prepare<[number]>(
    `UPDATE connections SET is_active = 0 WHERE id = ? AND is_active = 1`,
  );
  const deactivateServerStmt = db.prepare<[string, string]>(
    `UPDATE connections SET is_active = 0
     WHERE (server1_id = ? OR server2_id = ?) AND is_active = 1`,
  );

  // Message history
  const insertMessageLog = db.prepare<[string, string, string, number, number, string | null]>(
    `INSERT INTO message_history
     (original_message_id, forwarded_message_id, author_id, connection_id, timestamp, content_hash)
     VALUES (?, ?, ?, ?, ?, ?)`,
  );
  const selectMessageStatsAll = db.prepare<[number], MessageStatsRow>(
    `SELECT COUNT(*) AS total_messages,
            COUNT(DISTINCT author_id) AS unique_users,
            COUNT(DISTINCT connection_id) AS active_connections
     FROM message_history WHERE timestamp >= ?`,
  );
  const selectMessageStatsForConnection = db.prepare<[number, number], MessageStatsRow>(
    `SELECT COUNT(*) AS total_messages,
            COUNT(DISTINCT author_id) AS unique_users,
            COUNT(DISTINCT connection_id) AS active_connections
     FROM message_history WHERE connection_id = ? AND timestamp >= ?`,
  );
  const selectMessageLog = db.prepare<[number, number], MessageHistoryRow>(
    `SELECT original_message_id, forwarded_message_id, author_id, connection_id, timestamp, content_hash
     FROM message_history WHERE connection_id = ?
     ORDER BY timestamp DESC, id DESC LIMIT ?`,
  );

  // Server settings
  const insertSettings = db.prepare<[string, number, number]>(
    `INSERT OR IGNORE INTO server_settings (server_id, created_at, updated_at) VALUES (?, ?, ?)`,
  );
  const selectSettings = db.prepare<[string], ServerSettingsRow>(
    `SELECT * FROM server_settings WHERE server_id = ?`,
  );
  // Column names come from the closed key set, never from input.
  const updateSetting = (column: ServerSettingKey): SettingStatement =>
    db.prepare<SettingParams>(`UPDATE server_settings SET ${column} = ?, updated_at = ? WHERE server_id = ?`);
  const settingStatements: Record<ServerSettingKey, SettingStatement> = {
    prefix: updateSetting('prefix'),
    enabled: updateSetting('enabled'),
    spam_protection: updateSetting('spam_protection'),
    profanity_filter: updateSetting('profanity_filter'),
    auto_delete_commands: updateSetting('auto_delete_commands'),
    webhook_notifications: updateSetting('webhook_notifications'),
    mod_role_id: updateSetting('mod_role_id'),
    log_channel_id: updateSetting('log_channel_id'),
  };

  // Spam tracking
  const selectSpamEntry = db.prepare<[string, string, string], SpamTrackingRow>(
    `SELECT user_id, server_id, channel_id, message_count, first_message_time, last_message_time, is_blocked
     FROM spam_tracking WHERE user_id = ? AND server_id = ? AND channel_id = ?`,
  );
  const insertSpamEntry = db.prepare<[string, string, string, number, number]>(
    `INSERT INTO spam_tracking
     (user_id, server_id, channel_id, message_count, first_message_time, last_message_time, is_blocked)
     VALUES (?, ?, ?, 1, ?, ?, 0)`,
  );
  const updateSpamEntry = db.prepare<[number, number, number, string, string, string]>(
    `UPDATE spam_tracking SET message_count = ?, last_message_time = ?, is_blocked = ?
     WHERE user_id = ? AND server_id = ? AND channel_id = ?`,
  );
  const restartSpamEntry = db.prepare<[number, number, string, string, string]>(
    `UPDATE spam_tracking
     SET message_count = 1, first_message_time = ?, last_message_time = ?, is_blocked = 0
     WHERE user_id = ? AND server_id = ? AND channel_id = ?`,
  );
  const countSpamEntries = db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM spam_tracking`);
  const pruneSpamEntries = db.prepare<[number]>(`DELETE FROM spam_tracking WHERE last_message_time < ?`);

  // Stats
  const countActiveConnections = db.prepare<[], CountRow>(
    `SELECT COUNT(*) AS count FROM connections WHERE is_active = 1`,
  );
  const countMessages = db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM message_history`);
  const countServers = db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM server_settings`);

  // ── Transactions ──────────────────────────────────────────────────

  const insertConnectionTx = db.transaction(
    (input: NewConnection, maxPerServer: number, now: number): InsertConnectionResult => {
      for (const serverId of [input.server1Id, input.server2Id]) {
        const count = countServerConnections.get(serverId, serverId)?.count ?? 0;
        if (count >= maxPerServer) {
          return { ok: false, reason: 'quota_exceeded', serverId, count };
        }
      }

      const existing = selectDuplicateConnection.get(
        input.channel1Id, input.channel2Id,
        input.channel2Id, input.channel1Id,
      );
      if (existing) {
        return { ok: false, reason: 'duplicate_connection', existing: toConnection(existing) };
      }

      const result = insertConnectionStmt.run(
        input.server1Id, input.channel1Id,
        input.server2Id, input.channel2Id,
        input.name, now, input.createdBy, input.description ?? null,
      );
      return { ok: true, id: Number(result.lastInsertRowid) };
    },
  );

  const ensureSettingsTx = db.transaction((serverId: string, now: number): ServerSettingsRow => {
    insertSettings.run(serverId, now, now);
    const row = selectSettings.get(serverId);
    if (!row) throw new Error(`server_settings row for ${serverId} missing after insert`);
    return row;
  });

  const trackSpamTx = db.transaction(
    (key: SpamKey, now: number, windowMs: number, threshold: number): SpamCheckResult => {
      const row = selectSpamEntry.get(key.userId, key.serverId, key.channelId);

      if (row && row.last_message_time > now - windowMs) {
        const count = row.message_count + 1;
        const blocked = count >= threshold;
        updateSpamEntry.run(count, now, Number(blocked), key.userId, key.serverId, key.channelId);
        return { count, blocked };
      }

      if (row) {
        restartSpamEntry.run(now, now, key.userId, key.serverId, key.channelId);
      } else {
        insertSpamEntry.run(key.userId, key.serverId, key.channelId, now, now);
      }
      return { count: 1, blocked: false };
    },
  );

  const pruneSpamTx = db.transaction((olderThan: number): MaintenanceStats => {
    const beforeCount = countSpamEntries.get()?.count ?? 0;
    const pruned = pruneSpamEntries.run(olderThan).changes;
    const afterCount = countSpamEntries.get()?.count ?? 0;
    return { pruned, beforeCount, afterCount };
  });

  // ── API ───────────────────────────────────────────────────────────

  return {
    dialect: 'sqlite',

    async insertConnection(input, maxPerServer, now) {
      return insertConnectionTx(input, maxPerServer, now);
    },

    async getConnectionById(id) {
      const row = selectConnectionById.get(id);
      return row ? toConnection(row) : undefined;
    },

    async getConnectionsByChannel(channelId) {
      return selectConnectionsByChannel.all(channelId, channelId).map(toConnection);
    },

    async getConnectionsByServer(serverId) {
      return selectConnectionsByServer.all(serverId, serverId).map(toConnection);
    },

    async softDeleteConnection(id) {
      return softDeleteConnectionStmt.run(id).changes > 0;
    },

    async countActiveConnections(serverId) {
      return countServerConnections.get(serverId, serverId)?.count ?? 0;
    },

    async deactivateServerConnections(serverId) {
      return deactivateServerStmt.run(serverId, serverId).changes;
    },

    async logMessage(entry) {
      insertMessageLog.run(
        entry.originalMessageId,
        entry.forwardedMessageId,
        entry.authorId,
        entry.connectionId,
        entry.timestamp,
        entry.contentHash,
      );
    },

    async getMessageStats(since, connectionId) {
      const row = connectionId === undefined
        ? selectMessageStatsAll.get(since)
        : selectMessageStatsForConnection.get(connectionId, since);
      const stats: MessageStats = {
        totalMessages: row?.total_messages ?? 0,
        uniqueUsers: row?.unique_users ?? 0,
      };
      if (connectionId === undefined) stats.activeConnections = row?.active_connections ?? 0;
      return stats;
    },

    async getMessageLog(connectionId, limit = 50) {
      return selectMessageLog.all(connectionId, limit).map(toMessageLogEntry);
    },

    async ensureServerSettings(serverId, now) {
      return toServerSettings(ensureSettingsTx(serverId, now));
    },

    async getServerSettings(serverId) {
      const row = selectSettings.get(serverId);
      return row ? toServerSettings(row) : undefined;
    },

    async updateServerSetting(serverId, update, now) {
      ensureSettingsTx(serverId, now);
      settingStatements[update.key].run(settingParam(update), now, serverId);
      const row = selectSettings.get(serverId);
      if (!row) throw new Error(`server_settings row for ${serverId} missing after update`);
      logger.debug({ serverId, key: update.key }, 'Server setting updated');
      return toServerSettings(row);
    },

    async trackSpamMessage(key, now, windowMs, threshold) {
      return trackSpamTx(key, now, windowMs, threshold);
    },

    async getLiveSpamEntry(key, now, windowMs) {
      const row = selectSpamEntry.get(key.userId, key.serverId, key.channelId);
      if (!row || row.last_message_time <= now - windowMs) return undefined;
      return toSpamEntry(row);
    },

    async pruneSpamTracking(olderThan) {
      return pruneSpamTx(olderThan);
    },

    async getDatabaseStats(): Promise<DatabaseStats> {
      return {
        activeConnections: countActiveConnections.get()?.count ?? 0,
        totalMessages: countMessages.get()?.count ?? 0,
        totalServers: countServers.get()?.count ?? 0,
      };
    },

    async close() {
      db.close();
      logger.info('SQLite database closed');
    },
  };
}
