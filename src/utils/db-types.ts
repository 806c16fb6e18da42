/**
 * Shared database domain types used by all backends.
 *
 * Keep this file backend-agnostic so sqlite and postgres implementations
 * can share the exact same API contract. Platform ids (servers, channels,
 * users, messages) are opaque 64-bit snowflakes and are carried as strings.
 */

export interface Connection {
  id: number;
  server1Id: string;
  channel1Id: string;
  server2Id: string;
  channel2Id: string;
  name: string;
  createdBy: string;
  description: string | null;
  /** Milliseconds since epoch. */
  createdAt: number;
  active: boolean;
}

export interface NewConnection {
  server1Id: string;
  channel1Id: string;
  server2Id: string;
  channel2Id: string;
  name: string;
  createdBy: string;
  description?: string | null;
}

/** Outcome of the transactional quota/duplicate check + insert. */
export type InsertConnectionResult =
  | { ok: true; id: number }
  | { ok: false; reason: 'quota_exceeded'; serverId: string; count: number }
  | { ok: false; reason: 'duplicate_connection'; existing: Connection };

export interface MessageLogEntry {
  originalMessageId: string;
  forwardedMessageId: string;
  authorId: string;
  connectionId: number;
  timestamp: number;
  /** sha256 hex of the relayed text; null when the message had no text. */
  contentHash: string | null;
}

export interface MessageStats {
  totalMessages: number;
  uniqueUsers: number;
  /** Only populated for the all-connections query. */
  activeConnections?: number;
}

export interface ServerSettings {
  serverId: string;
  /** Per-server command prefix override; null means the global prefix. */
  prefix: string | null;
  enabled: boolean;
  modRoleId: string | null;
  logChannelId: string | null;
  spamProtection: boolean;
  profanityFilter: boolean;
  autoDeleteCommands: boolean;
  webhookNotifications: boolean;
  createdAt: number;
  updatedAt: number;
}

export const DEFAULT_SERVER_SETTINGS = {
  prefix: null,
  enabled: true,
  modRoleId: null,
  logChannelId: null,
  spamProtection: true,
  profanityFilter: true,
  autoDeleteCommands: false,
  webhookNotifications: false,
} as const satisfies Omit<ServerSettings, 'serverId' | 'createdAt' | 'updatedAt'>;

/**
 * A single typed settings mutation. The key set is closed: backends map
 * each key to a fixed statement.
 */
export type ServerSettingUpdate =
  | { key: 'prefix'; value: string | null }
  | { key: 'enabled'; value: boolean }
  | { key: 'spam_protection'; value: boolean }
  | { key: 'profanity_filter'; value: boolean }
  | { key: 'auto_delete_commands'; value: boolean }
  | { key: 'webhook_notifications'; value: boolean }
  | { key: 'mod_role_id'; value: string | null }
  | { key: 'log_channel_id'; value: string | null };

export type ServerSettingKey = ServerSettingUpdate['key'];

export interface SpamKey {
  userId: string;
  serverId: string;
  channelId: string;
}

export interface SpamTrackingEntry extends SpamKey {
  messageCount: number;
  firstMessageTime: number;
  lastMessageTime: number;
  blocked: boolean;
}

export interface SpamCheckResult {
  count: number;
  blocked: boolean;
}

export interface DatabaseStats {
  activeConnections: number;
  totalMessages: number;
  totalServers: number;
}

export interface MaintenanceStats {
  pruned: number;
  beforeCount: number;
  afterCount: number;
}
