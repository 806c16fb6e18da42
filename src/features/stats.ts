/**
 * Admin/stats surface: read-only views over connections, message history
 * and the live gateway.
 */

import { getRelayStats, type RelayStatsSnapshot } from '../middleware/stats.js';
import type { ChannelCapability, ChannelInfo, RelayMessenger } from '../core/relay-messenger.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { Connection, MessageStats } from '../utils/db-types.js';
import type { ConnectionRegistry } from './connections.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** What the bot needs on both ends of a connection for forwards to render fully. */
export const REQUIRED_RELAY_CAPABILITIES: readonly ChannelCapability[] = ['send', 'embed', 'attach'];

export interface BotStats {
  activeConnections: number;
  totalMessages: number;
  messagesLast7Days: number;
  uniqueUsersLast7Days: number;
  serversInDatabase: number;
  guildCount: number;
  rssMb: number;
  uptimeMs: number;
  relay: RelayStatsSnapshot;
}

export interface ConnectionVolume {
  connection: Connection;
  messages: number;
}

export interface ServerStats {
  serverId: string;
  activeConnections: number;
  limit: number;
  free: number;
  messagesLast30Days: number;
  topConnections: ConnectionVolume[];
}

export interface EndpointCheck {
  channelId: string;
  channel: ChannelInfo | null;
  missing: ChannelCapability[];
}

export interface ConnectionTestReport {
  connection: Connection;
  endpoints: [EndpointCheck, EndpointCheck];
  channelsReachable: 'both' | 'one' | 'none';
  permissionsOk: boolean;
  serversEnabled: boolean;
  active: boolean;
}

export interface StatsService {
  getBotStats(): Promise<BotStats>;
  getServerStats(serverId: string): Promise<ServerStats>;
  getConnectionStats(connectionId: number, days: number): Promise<MessageStats>;
  testConnection(connectionId: number): Promise<ConnectionTestReport>;
}

export interface StatsServiceDeps {
  backend: DbBackend;
  registry: ConnectionRegistry;
  messenger: RelayMessenger;
  now?: () => number;
}

export function createStatsService(deps: StatsServiceDeps): StatsService {
  const { backend, registry, messenger } = deps;
  const now = deps.now ?? Date.now;

  const checkEndpoint = async (channelId: string): Promise<EndpointCheck> => {
    const channel = await messenger.getChannel(channelId);
    if (!channel) return { channelId, channel: null, missing: [...REQUIRED_RELAY_CAPABILITIES] };
    const granted = await messenger.getChannelPermissions(channelId);
    const missing = REQUIRED_RELAY_CAPABILITIES.filter((capability) => !granted?.has(capability));
    return { channelId, channel, missing };
  };

  return {
    async getBotStats() {
      const at = now();
      const [db, week] = await Promise.all([
        backend.getDatabaseStats(),
        backend.getMessageStats(at - 7 * DAY_MS),
      ]);
      const relay = getRelayStats();

      return {
        activeConnections: db.activeConnections,
        totalMessages: db.totalMessages,
        messagesLast7Days: week.totalMessages,
        uniqueUsersLast7Days: week.uniqueUsers,
        serversInDatabase: db.totalServers,
        guildCount: messenger.guildCount(),
        rssMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
        uptimeMs: at - relay.startedAt,
        relay,
      };
    },

    async getServerStats(serverId) {
      const at = now();
      const connections = await registry.listByServer(serverId);

      let messagesLast30Days = 0;
      const volumes: ConnectionVolume[] = [];
      for (const connection of connections) {
        const month = await backend.getMessageStats(at - 30 * DAY_MS, connection.id);
        const week = await backend.getMessageStats(at - 7 * DAY_MS, connection.id);
        messagesLast30Days += month.totalMessages;
        volumes.push({ connection, messages: week.totalMessages });
      }

      const topConnections = volumes
        .sort((a, b) => b.messages - a.messages || b.connection.id - a.connection.id)
        .slice(0, 3);

      return {
        serverId,
        activeConnections: connections.length,
        limit: registry.maxPerServer,
        free: Math.max(0, registry.maxPerServer - connections.length),
        messagesLast30Days,
        topConnections,
      };
    },

    async getConnectionStats(connectionId, days) {
      return backend.getMessageStats(now() - days * DAY_MS, connectionId);
    },

    async testConnection(connectionId) {
      const connection = await registry.getById(connectionId);
      const [first, second] = await Promise.all([
        checkEndpoint(connection.channel1Id),
        checkEndpoint(connection.channel2Id),
      ]);
      const [settings1, settings2] = await Promise.all([
        backend.getServerSettings(connection.server1Id),
        backend.getServerSettings(connection.server2Id),
      ]);

      const reachable = [first, second].filter((endpoint) => endpoint.channel !== null).length;

      return {
        connection,
        endpoints: [first, second],
        channelsReachable: reachable === 2 ? 'both' : reachable === 1 ? 'one' : 'none',
        permissionsOk: [first, second]
          .filter((endpoint) => endpoint.channel !== null)
          .every((endpoint) => endpoint.missing.length === 0),
        // A server without a settings row has never disabled the bot.
        serversEnabled: (settings1?.enabled ?? true) && (settings2?.enabled ?? true),
        active: connection.active,
      };
    },
  };
}
