import type {
  Connection,
  DatabaseStats,
  InsertConnectionResult,
  MaintenanceStats,
  MessageLogEntry,
  MessageStats,
  NewConnection,
  ServerSettings,
  ServerSettingUpdate,
  SpamCheckResult,
  SpamKey,
  SpamTrackingEntry,
} from './db-types.js';

/**
 * A database backend implements the storage API the relay depends on.
 *
 * Every method is async so sqlite (synchronous driver) and postgres
 * (network client) share one contract. Multi-step writes are transactional
 * inside the backend; callers never see a partial connection row.
 */
export interface DbBackend {
  readonly dialect: 'sqlite' | 'postgres';

  // Connections
  insertConnection(input: NewConnection, maxPerServer: number, now: number): Promise<InsertConnectionResult>;
  getConnectionById(id: number): Promise<Connection | undefined>;
  getConnectionsByChannel(channelId: string): Promise<Connection[]>;
  getConnectionsByServer(serverId: string): Promise<Connection[]>;
  softDeleteConnection(id: number): Promise<boolean>;
  countActiveConnections(serverId: string): Promise<number>;
  deactivateServerConnections(serverId: string): Promise<number>;

  // Message history
  logMessage(entry: MessageLogEntry): Promise<void>;
  getMessageStats(since: number, connectionId?: number): Promise<MessageStats>;
  getMessageLog(connectionId: number, limit?: number): Promise<MessageLogEntry[]>;

  // Server settings
  ensureServerSettings(serverId: string, now: number): Promise<ServerSettings>;
  getServerSettings(serverId: string): Promise<ServerSettings | undefined>;
  updateServerSetting(serverId: string, update: ServerSettingUpdate, now: number): Promise<ServerSettings>;

  // Spam tracking
  /**
   * Atomically record one message for `key` and return the post-update
   * count and block state. An entry whose last message is at or before
   * `now - windowMs` is treated as absent and restarted at count 1.
   */
  trackSpamMessage(key: SpamKey, now: number, windowMs: number, threshold: number): Promise<SpamCheckResult>;
  getLiveSpamEntry(key: SpamKey, now: number, windowMs: number): Promise<SpamTrackingEntry | undefined>;

  // Maintenance
  pruneSpamTracking(olderThan: number): Promise<MaintenanceStats>;
  getDatabaseStats(): Promise<DatabaseStats>;

  // Lifecycle
  close(): Promise<void>;
}
