import type { RelayInbound } from '../src/core/inbound-message.js';
import type { ChannelCapability } from '../src/core/relay-messenger.js';
import { createRelayServices, type RelayServices, type RelayServicesOptions } from '../src/core/relay-services.js';
import {
  createDiscordDemoAdapter,
  type DemoChannel,
  type DiscordDemoAdapter,
  type DiscordDemoOutboxEntry,
} from '../src/platforms/discord/adapter.js';
import { loadConfig, type RelayConfig } from '../src/utils/config.js';
import type { DbBackend } from '../src/utils/db-backend.js';
import { openSqliteDatabase } from '../src/utils/db-schema.js';
import { createSqliteBackend } from '../src/utils/db-sqlite.js';

export const SERVER_A = '111111111111111111';
export const SERVER_B = '122222222222222222';
export const SERVER_C = '133333333333333333';
export const CHANNEL_A = '211111111111111111';
export const CHANNEL_B = '222222222222222222';
export const CHANNEL_A2 = '211111111111111112';
export const CHANNEL_C = '233333333333333333';
export const ALICE = '311111111111111111';
export const BOB = '322222222222222222';

/** 2024-01-15T00:00:00Z */
export const T0 = Date.UTC(2024, 0, 15);

export const ALL_CAPABILITIES: ChannelCapability[] = [
  'view',
  'send',
  'embed',
  'attach',
  'read_history',
  'add_reactions',
  'manage_messages',
];

export function demoChannel(
  id: string,
  guildId: string,
  guildName: string,
  permissions: ChannelCapability[] = ALL_CAPABILITIES,
): DemoChannel {
  return { id, name: `chan-${id.slice(-2)}`, guildId, guildName, permissions };
}

export function testConfig(env: Record<string, string> = {}): RelayConfig {
  return loadConfig({ DISCORD_DEMO: 'true', DATABASE_PATH: ':memory:', ...env });
}

export function memoryBackend(): DbBackend {
  return createSqliteBackend(openSqliteDatabase(':memory:'));
}

let inboundSeq = 0;

export function inbound(overrides: Partial<RelayInbound> = {}): RelayInbound {
  inboundSeq += 1;
  return {
    platform: 'discord',
    messageId: `m-${inboundSeq}`,
    channelId: CHANNEL_A,
    serverId: SERVER_A,
    serverName: 'Server A',
    authorId: ALICE,
    authorDisplayName: 'Alice',
    authorAvatarUrl: null,
    authorIsBot: false,
    fromSelf: false,
    authorCapabilities: [],
    kind: 'default',
    text: 'hello there',
    attachments: [],
    timestampMs: T0,
    ...overrides,
  };
}

export interface Harness {
  config: RelayConfig;
  backend: DbBackend;
  outbox: DiscordDemoOutboxEntry[];
  messenger: DiscordDemoAdapter;
  services: RelayServices;
  clock: { now: number };
}

export interface HarnessOptions extends Omit<RelayServicesOptions, 'now'> {
  env?: Record<string, string>;
  channels?: DemoChannel[];
  attachments?: Map<string, Uint8Array>;
}

/**
 * Demo messenger + in-memory SQLite + all relay services, on a clock the
 * test controls. Channels A and B (servers A and B) exist by default.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
  const config = testConfig(options.env);
  const backend = memoryBackend();
  const outbox: DiscordDemoOutboxEntry[] = [];
  const messenger = createDiscordDemoAdapter(outbox, {
    channels: options.channels ?? [
      demoChannel(CHANNEL_A, SERVER_A, 'Server A'),
      demoChannel(CHANNEL_B, SERVER_B, 'Server B'),
    ],
    ...(options.attachments ? { attachments: options.attachments } : {}),
  });
  const clock = { now: T0 };
  const services = createRelayServices(config, backend, messenger, {
    now: () => clock.now,
    ...(options.confirm ? { confirm: options.confirm } : {}),
  });

  return { config, backend, outbox, messenger, services, clock };
}
