/**
 * Connection registry: links between two channels on two different
 * servers.
 *
 * Removal is a soft delete; history rows keep pointing at the connection.
 */

import { logger } from '../middleware/logger.js';
import { NotFoundError, ValidationError } from '../core/errors.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { Connection, NewConnection } from '../utils/db-types.js';

export type { Connection, NewConnection } from '../utils/db-types.js';

export interface ConnectionEndpoint {
  serverId: string;
  channelId: string;
}

export interface ConnectionRegistry {
  create(input: NewConnection): Promise<number>;
  getById(id: number): Promise<Connection>;
  findById(id: number): Promise<Connection | undefined>;
  listByChannel(channelId: string): Promise<Connection[]>;
  listByServer(serverId: string): Promise<Connection[]>;
  softDelete(id: number): Promise<boolean>;
  countActiveForServer(serverId: string): Promise<number>;
  deactivateAllForServer(serverId: string): Promise<number>;
  readonly maxPerServer: number;
}

export interface ConnectionRegistryOptions {
  maxPerServer: number;
  now?: () => number;
}

/**
 * The endpoint on the other side of `connection` from `channelId`, or
 * undefined when the channel is not part of it.
 */
export function oppositeEndpoint(connection: Connection, channelId: string): ConnectionEndpoint | undefined {
  if (connection.channel1Id === channelId) {
    return { serverId: connection.server2Id, channelId: connection.channel2Id };
  }
  if (connection.channel2Id === channelId) {
    return { serverId: connection.server1Id, channelId: connection.channel1Id };
  }
  return undefined;
}

export function createConnectionRegistry(
  backend: DbBackend,
  options: ConnectionRegistryOptions,
): ConnectionRegistry {
  const now = options.now ?? Date.now;

  return {
    maxPerServer: options.maxPerServer,

    async create(input) {
      if (input.server1Id === input.server2Id) {
        throw new ValidationError('same_server', 'Cannot connect two channels on the same server');
      }

      const result = await backend.insertConnection(input, options.maxPerServer, now());
      if (!result.ok) {
        if (result.reason === 'quota_exceeded') {
          throw new ValidationError(
            'quota_exceeded',
            `Server ${result.serverId} already has ${result.count} of ${options.maxPerServer} allowed connections`,
          );
        }
        throw new ValidationError(
          'duplicate_connection',
          `These channels are already linked by connection #${result.existing.id} (${result.existing.name})`,
        );
      }

      logger.info({
        connectionId: result.id,
        name: input.name,
        server1Id: input.server1Id,
        channel1Id: input.channel1Id,
        server2Id: input.server2Id,
        channel2Id: input.channel2Id,
        createdBy: input.createdBy,
      }, 'Connection created');
      return result.id;
    },

    async getById(id) {
      const connection = await backend.getConnectionById(id);
      if (!connection) throw new NotFoundError('Connection', id);
      return connection;
    },

    async findById(id) {
      return backend.getConnectionById(id);
    },

    async listByChannel(channelId) {
      return backend.getConnectionsByChannel(channelId);
    },

    async listByServer(serverId) {
      return backend.getConnectionsByServer(serverId);
    },

    async softDelete(id) {
      const removed = await backend.softDeleteConnection(id);
      if (removed) logger.info({ connectionId: id }, 'Connection deactivated');
      return removed;
    },

    async countActiveForServer(serverId) {
      return backend.countActiveConnections(serverId);
    },

    async deactivateAllForServer(serverId) {
      const count = await backend.deactivateServerConnections(serverId);
      if (count > 0) logger.info({ serverId, count }, 'Server connections deactivated');
      return count;
    },
  };
}
