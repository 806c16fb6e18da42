import type { Server } from 'node:http';
import { Client, Events, GatewayIntentBits, Partials } from 'discord.js';

import { logger } from '../../middleware/logger.js';
import { markConnected, markDisconnected } from '../../middleware/health.js';
import { createRelayServices, dispatchInbound } from '../../core/relay-services.js';
import type { RelayConfig } from '../../utils/config.js';
import type { DbBackend } from '../../utils/db-backend.js';
import type { PlatformRuntime } from '../types.js';

import { createDiscordAdapter, createDiscordDemoAdapter, type DiscordDemoOutboxEntry } from './adapter.js';
import { createDiscordDemoServer } from './demo-server.js';
import { normalizeDiscordMessage } from './processor.js';

/** Fire-and-forget event work; failures are logged, never rethrown into the gateway. */
function runTask(task: string, fields: Record<string, unknown>, work: () => Promise<unknown>): void {
  void work().catch((err: unknown) => {
    logger.error({ err, task, ...fields }, 'Discord event handler failed');
  });
}

export function createDiscordRuntime(config: RelayConfig, backend: DbBackend): PlatformRuntime {
  return config.DISCORD_DEMO ? createDemoRuntime(config, backend) : createGatewayRuntime(config, backend);
}

function createGatewayRuntime(config: RelayConfig, backend: DbBackend): PlatformRuntime {
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.GuildMessageReactions,
    ],
    partials: [Partials.Message, Partials.Channel, Partials.Reaction],
  });

  const messenger = createDiscordAdapter(client);
  const services = createRelayServices(config, backend, messenger);

  client.once(Events.ClientReady, (ready) => {
    logger.info({ tag: ready.user.tag, guilds: ready.guilds.cache.size }, 'Discord gateway ready');
  });

  client.on(Events.ShardReady, () => markConnected());
  client.on(Events.ShardResume, () => markConnected());

  client.on(Events.ShardDisconnect, (event, shardId) => {
    markDisconnected();
    logger.warn({ code: event.code, shardId }, 'Discord gateway disconnected');
  });

  client.on(Events.Error, (err) => {
    logger.error({ err }, 'Discord client error');
  });

  client.on(Events.MessageCreate, (message) => {
    const inbound = normalizeDiscordMessage(message, client.user?.id);
    if (!inbound) return;
    runTask('message', { messageId: inbound.messageId }, () => dispatchInbound(services, inbound));
  });

  client.on(Events.GuildCreate, (guild) => {
    logger.info({ serverId: guild.id, name: guild.name }, 'Joined server');
    runTask('guild_create', { serverId: guild.id }, () => services.settings.ensureSettings(guild.id));
  });

  client.on(Events.GuildDelete, (guild) => {
    logger.info({ serverId: guild.id }, 'Removed from server');
    runTask('guild_delete', { serverId: guild.id }, () => services.registry.deactivateAllForServer(guild.id));
  });

  return {
    platform: 'discord',

    async start() {
      if (!config.DISCORD_BOT_TOKEN) {
        throw new Error('Discord runtime requires DISCORD_BOT_TOKEN, or DISCORD_DEMO=true for local demo mode');
      }
      await client.login(config.DISCORD_BOT_TOKEN);
      logger.info('Discord gateway runtime started');
    },

    async stop() {
      await client.destroy();
      markDisconnected();
    },
  };
}

function createDemoRuntime(config: RelayConfig, backend: DbBackend): PlatformRuntime {
  const outbox: DiscordDemoOutboxEntry[] = [];
  const messenger = createDiscordDemoAdapter(outbox);
  const services = createRelayServices(config, backend, messenger);
  let server: Server | null = null;

  return {
    platform: 'discord',

    async start() {
      server = createDiscordDemoServer({
        host: config.DISCORD_DEMO_BIND_HOST,
        port: config.DISCORD_DEMO_PORT,
        services,
        messenger,
        outbox,
      });
      markConnected();

      logger.info(
        { host: config.DISCORD_DEMO_BIND_HOST, port: config.DISCORD_DEMO_PORT },
        'Discord demo mode started (local dev only)',
      );
    },

    async stop() {
      const closing = server;
      server = null;
      if (!closing) return;
      await new Promise<void>((resolve, reject) => {
        closing.close((err) => (err ? reject(err) : resolve()));
      });
      markDisconnected();
    },
  };
}
