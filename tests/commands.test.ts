import { beforeEach, describe, it, expect, vi } from 'vitest';

import type { ConfirmationRequest, ConfirmationResult } from '../src/core/confirmation.js';
import type { MemberCapability, RelayInbound } from '../src/core/inbound-message.js';
import { NotFoundError, ValidationError } from '../src/core/errors.js';
import { describeSetting, errorReply, parseChannelArgument, parseConnectionId } from '../src/features/commands.js';
import type { DiscordDemoOutboxEntry } from '../src/platforms/discord/adapter.js';
import { EMBED_COLORS } from '../src/utils/formatting.js';
import {
  ALICE,
  BOB,
  CHANNEL_A,
  CHANNEL_A2,
  CHANNEL_B,
  SERVER_A,
  SERVER_B,
  SERVER_C,
  T0,
  createHarness,
  demoChannel,
  inbound,
  type Harness,
} from './helpers.js';

const DAY_MS = 24 * 60 * 60 * 1000;

async function run(
  harness: Harness,
  text: string,
  capabilities: MemberCapability[] = [],
  overrides: Partial<RelayInbound> = {},
) {
  const message = inbound({ text, authorCapabilities: capabilities, ...overrides });
  const result = await harness.services.commands.handle(message, '!');
  return { message, result };
}

function sentEmbed(entry: DiscordDemoOutboxEntry | undefined) {
  if (!entry || (entry.type !== 'send' && entry.type !== 'edit')) return undefined;
  return entry.message.embed;
}

function stubConfirm() {
  return vi.fn(async (_request: ConfirmationRequest): Promise<ConfirmationResult> => 'confirmed');
}

async function linkAB(harness: Harness): Promise<number> {
  return harness.services.registry.create({
    server1Id: SERVER_A,
    channel1Id: CHANNEL_A,
    server2Id: SERVER_B,
    channel2Id: CHANNEL_B,
    name: 'bridge',
    createdBy: ALICE,
  });
}

describe('Command argument helpers', () => {
  it('parses channel mentions and bare ids', () => {
    expect(parseChannelArgument(`<#${CHANNEL_B}>`)).toBe(CHANNEL_B);
    expect(parseChannelArgument(CHANNEL_B)).toBe(CHANNEL_B);
    expect(parseChannelArgument('#general')).toBeNull();
  });

  it('parses positive connection ids', () => {
    expect(parseConnectionId('12')).toBe(12);
    expect(() => parseConnectionId('0')).toThrow('"0" is not a valid connection id');
    expect(() => parseConnectionId(undefined)).toThrow('"" is not a valid connection id');
  });

  it('maps user-facing errors to embeds', () => {
    expect(errorReply(new NotFoundError('Connection', 4))).toEqual({
      title: '❌ Not found',
      description: 'Connection 4 not found',
      color: EMBED_COLORS.error,
    });
    expect(errorReply(new ValidationError('duplicate_connection', 'taken'))).toEqual({
      title: '⚠️ Connection already exists',
      description: 'taken',
      color: EMBED_COLORS.warning,
    });
    expect(errorReply(new Error('db down'))).toBeNull();
  });
});

describe('Command handler', () => {
  let harness: Harness;
  let confirm: ReturnType<typeof stubConfirm>;

  beforeEach(() => {
    confirm = stubConfirm();
    harness = createHarness({ confirm });
  });

  it('leaves unknown commands unhandled', async () => {
    const { result } = await run(harness, '!dance');
    expect(result).toEqual({ handled: false });
    expect(harness.outbox).toEqual([]);
  });

  it('answers help in the invoking channel', async () => {
    const { result } = await run(harness, '!help');

    expect(result).toEqual({ handled: true, command: 'help' });
    expect(harness.outbox).toHaveLength(1);
    expect(harness.outbox[0]).toMatchObject({ type: 'send', channelId: CHANNEL_A });
    expect(sentEmbed(harness.outbox[0])?.title).toBe('🤖 Channel relay');
  });

  it('shows connect help for a missing subcommand', async () => {
    const { result } = await run(harness, '!connect');
    expect(result).toEqual({ handled: true, command: 'connect' });
    expect(sentEmbed(harness.outbox[0])?.title).toBe('🔗 Cross-server connections');
  });

  describe('connect create', () => {
    it('creates the connection and announces it on the other side', async () => {
      const { result } = await run(harness, `!connect create <#${CHANNEL_B}> my bridge`, ['manage_channels']);

      expect(result).toEqual({ handled: true, command: 'connect create' });
      expect(sentEmbed(harness.outbox[0])).toEqual({
        title: '✅ Connection created',
        description: '**my bridge** (ID: 1)',
        color: EMBED_COLORS.success,
        fields: [
          { name: 'Channel 1', value: `<#${CHANNEL_A}>\nServer A`, inline: true },
          { name: 'Channel 2', value: `<#${CHANNEL_B}>\nServer B`, inline: true },
          { name: 'Created by', value: `<@${ALICE}>`, inline: true },
        ],
      });
      expect(harness.outbox[1]).toMatchObject({ type: 'send', channelId: CHANNEL_B });
      expect(sentEmbed(harness.outbox[1])).toEqual({
        title: '🔗 New connection',
        description: `This channel is now connected to <#${CHANNEL_A}> on **Server A**`,
        color: EMBED_COLORS.info,
        footer: 'Connection: my bridge • ID: 1',
      });

      const connection = await harness.services.registry.getById(1);
      expect(connection.description).toBe('Connection between Server A and Server B');
      expect(connection.createdBy).toBe(ALICE);
    });

    it('requires Manage Channels', async () => {
      await run(harness, `!connect create <#${CHANNEL_B}> bridge`);

      expect(sentEmbed(harness.outbox[0])).toEqual({
        title: '❌ Missing permissions',
        description: 'You need the Manage Channels permission to use this command',
        color: EMBED_COLORS.error,
      });
      expect(await harness.services.registry.listByServer(SERVER_A)).toEqual([]);
    });

    it('prints usage when arguments are missing', async () => {
      await run(harness, '!connect create', ['administrator']);
      expect(sentEmbed(harness.outbox[0])?.description).toBe('Usage: `!connect create <#channel> <name>`');
    });

    it('rejects channels on the same server', async () => {
      harness.messenger.addChannel(demoChannel(CHANNEL_A2, SERVER_A, 'Server A'));
      await run(harness, `!conn add <#${CHANNEL_A2}> local`, ['manage_channels']);

      expect(sentEmbed(harness.outbox[0])).toMatchObject({
        title: '❌ Same server',
        description: 'Cannot connect two channels on the same server',
      });
    });

    it('reports channels the bot cannot see', async () => {
      await run(harness, '!connect create <#999> bridge', ['manage_channels']);
      expect(sentEmbed(harness.outbox[0])).toMatchObject({ title: '❌ Not found', description: 'Channel 999 not found' });
    });

    it('lists the permissions the bot lacks in the target', async () => {
      harness = createHarness({
        channels: [
          demoChannel(CHANNEL_A, SERVER_A, 'Server A'),
          demoChannel(CHANNEL_B, SERVER_B, 'Server B', ['view', 'send']),
        ],
      });
      await run(harness, `!connect create <#${CHANNEL_B}> bridge`, ['manage_channels']);

      expect(sentEmbed(harness.outbox[0])?.description)
        .toBe(`The bot is missing permissions in <#${CHANNEL_B}>: Embed Links, Attach Files, Read Message History`);
    });

    it('warns about an existing link', async () => {
      await linkAB(harness);
      await run(harness, `!connect create <#${CHANNEL_B}> again`, ['manage_channels']);

      expect(sentEmbed(harness.outbox[0])).toEqual({
        title: '⚠️ Connection already exists',
        description: 'These channels are already linked by connection #1 (bridge)',
        color: EMBED_COLORS.warning,
      });
    });

    it('answers unexpected failures with a generic error', async () => {
      harness.messenger.getChannel = async () => {
        throw new Error('gateway down');
      };
      const { result } = await run(harness, `!connect create <#${CHANNEL_B}> bridge`, ['manage_channels']);

      expect(result).toEqual({ handled: true, command: 'connect create' });
      expect(sentEmbed(harness.outbox[0])).toEqual({
        title: '❌ Command failed',
        description: 'Something went wrong. Please try again later.',
        color: EMBED_COLORS.error,
      });
    });
  });

  describe('connect list and info', () => {
    it('explains how to start when there are no connections', async () => {
      await run(harness, '!connect list');
      expect(sentEmbed(harness.outbox[0])?.title).toBe('ℹ️ No connections');
    });

    it('lists connections with their remote side', async () => {
      await linkAB(harness);
      await run(harness, '!connect ls');

      expect(sentEmbed(harness.outbox[0])).toEqual({
        title: '🔗 Connections',
        description: 'Page 1/1 • Total: 1',
        color: EMBED_COLORS.info,
        fields: [{
          name: 'bridge (ID: 1)',
          value: `Local: <#${CHANNEL_A}>\nRemote: #chan-22 (Server B)\nCreated: 2024-01-15`,
        }],
      });
    });

    it('shows details from either endpoint server', async () => {
      await linkAB(harness);
      await run(harness, '!connect info 1', [], { serverId: SERVER_B, channelId: CHANNEL_B, serverName: 'Server B' });

      const embed = sentEmbed(harness.outbox[0]);
      expect(embed?.title).toBe('ℹ️ bridge');
      expect(embed?.description).toBe('No description');
      expect(embed?.fields?.[1]).toEqual({ name: 'Status', value: 'Active', inline: true });
      expect(embed?.fields?.[6]).toEqual({ name: 'Activity (7 days)', value: 'Messages: 0\nUnique users: 0' });
    });

    it('hides connections of other servers', async () => {
      await linkAB(harness);
      await run(harness, '!connect info 1', [], { serverId: SERVER_C });
      expect(sentEmbed(harness.outbox[0])?.description).toBe('You can only view connections of your own server');
    });

    it('rejects malformed ids', async () => {
      await run(harness, '!connect info abc');
      expect(sentEmbed(harness.outbox[0])).toMatchObject({
        title: '❌ Invalid argument',
        description: '"abc" is not a valid connection id',
      });
    });
  });

  describe('connect remove', () => {
    it('removes after confirmation and notifies the other channel', async () => {
      await linkAB(harness);
      const { result } = await run(harness, '!connect remove 1');

      expect(result).toEqual({ handled: true, command: 'connect remove' });
      expect(confirm).toHaveBeenCalledWith({ channelId: CHANNEL_A, messageId: 'demo-1', userId: ALICE });
      expect(harness.outbox.map((entry) => [entry.type, entry.channelId])).toEqual([
        ['send', CHANNEL_A],
        ['edit', CHANNEL_A],
        ['send', CHANNEL_B],
      ]);
      expect(sentEmbed(harness.outbox[1])?.title).toBe('✅ Connection removed');
      expect(sentEmbed(harness.outbox[2])?.description).toBe(`Connection **bridge** was removed by <@${ALICE}>.`);
      expect(await harness.services.registry.findById(1)).toBeUndefined();
    });

    it('keeps the connection when the user declines', async () => {
      confirm.mockResolvedValue('declined');
      await linkAB(harness);
      await run(harness, '!connect rm 1');

      expect(sentEmbed(harness.outbox[1])?.title).toBe('ℹ️ Removal cancelled');
      expect((await harness.services.registry.getById(1)).active).toBe(true);
    });

    it('keeps the connection when the prompt expires', async () => {
      confirm.mockResolvedValue('expired');
      await linkAB(harness);
      await run(harness, '!connect remove 1');

      expect(sentEmbed(harness.outbox[1])?.title).toBe('⏱️ Confirmation expired');
      expect((await harness.services.registry.getById(1)).active).toBe(true);
    });

    it('lets an administrator of an endpoint server remove it', async () => {
      await linkAB(harness);
      await run(harness, '!connect remove 1', ['administrator'], {
        authorId: BOB,
        serverId: SERVER_B,
        channelId: CHANNEL_B,
        serverName: 'Server B',
      });

      expect(sentEmbed(harness.outbox[1])?.title).toBe('✅ Connection removed');
      expect(harness.outbox[2]).toMatchObject({ type: 'send', channelId: CHANNEL_A });
    });

    it('refuses anyone else without prompting', async () => {
      await linkAB(harness);
      await run(harness, '!connect remove 1', ['manage_channels'], { authorId: BOB });

      expect(confirm).not.toHaveBeenCalled();
      expect(sentEmbed(harness.outbox[0])?.description)
        .toBe('Only the connection creator or an administrator of a connected server can remove it');
    });
  });

  describe('admin', () => {
    it('requires Administrator for every admin command', async () => {
      await run(harness, '!admin settings', ['manage_channels']);
      expect(sentEmbed(harness.outbox[0])?.description).toBe('You need the Administrator permission to use this command');
    });

    it('shows the current settings', async () => {
      await run(harness, '!admin settings', ['administrator']);

      const embed = sentEmbed(harness.outbox[0]);
      expect(embed?.title).toBe('⚙️ Server settings');
      expect(embed?.fields?.[0]).toEqual({ name: 'prefix', value: '`!` (default)', inline: true });
      expect(embed?.fields?.[1]).toEqual({ name: 'enabled', value: 'On', inline: true });
      expect(embed?.footer).toBe('Change with !admin set <key> <value>');
    });

    it('updates a setting', async () => {
      await run(harness, '!admin set PREFIX ?', ['administrator']);

      expect(sentEmbed(harness.outbox[0])).toEqual({
        title: '✅ Setting updated',
        description: '`prefix` is now `?`',
        color: EMBED_COLORS.success,
      });
      expect((await harness.services.settings.getSettings(SERVER_A)).prefix).toBe('?');
    });

    it('rejects unknown settings', async () => {
      await run(harness, '!admin set colour red', ['administrator']);
      expect(sentEmbed(harness.outbox[0])?.title).toBe('❌ Invalid setting');
    });

    it('reports per-server usage', async () => {
      await linkAB(harness);
      await run(harness, '!admin serverstats', ['administrator']);

      expect(sentEmbed(harness.outbox[0])?.fields).toEqual([
        { name: 'Active connections', value: '1/10', inline: true },
        { name: 'Free slots', value: '9', inline: true },
        { name: 'Messages (30 days)', value: '0', inline: true },
        { name: 'Most active (7 days)', value: '1. bridge (ID: 1): 0 messages' },
      ]);
    });

    it('reports bot-wide statistics', async () => {
      await linkAB(harness);
      await run(harness, '!admin stats', ['administrator']);

      const embed = sentEmbed(harness.outbox[0]);
      expect(embed?.title).toBe('📊 Bot statistics');
      expect(embed?.fields?.[0]).toEqual({ name: 'Servers', value: '2', inline: true });
      expect(embed?.fields?.[1]).toEqual({ name: 'Active connections', value: '1', inline: true });
    });

    it('tests a connection end to end', async () => {
      await linkAB(harness);
      await run(harness, '!admin test 1', ['administrator']);

      const embed = sentEmbed(harness.outbox[0]);
      expect(embed?.description).toBe('**bridge** (ID: 1)');
      expect(embed?.fields?.[0]).toEqual({
        name: 'Results',
        value: [
          '✅ Both channels are reachable',
          '✅ Bot permissions are fine',
          '✅ Relay is enabled on both servers',
          '✅ Connection is active',
        ].join('\n'),
      });
      expect(embed?.fields?.[2]).toEqual({ name: 'Channel 2', value: `<#${CHANNEL_B}>\nServer B` });
    });

    it('rejects short retention windows before prompting', async () => {
      await run(harness, '!admin cleanup 3', ['administrator']);

      expect(confirm).not.toHaveBeenCalled();
      expect(sentEmbed(harness.outbox[0])?.description).toBe('Retention must be a whole number of days, at least 7');
    });

    it('prunes stale spam records after confirmation', async () => {
      const key = { userId: ALICE, serverId: SERVER_A, channelId: CHANNEL_A };
      await harness.backend.trackSpamMessage(key, T0 - 8 * DAY_MS, 10_000, 5);
      await harness.backend.trackSpamMessage({ ...key, userId: BOB }, T0 - DAY_MS, 10_000, 5);

      await run(harness, '!admin cleanup 7', ['administrator']);

      expect(sentEmbed(harness.outbox[1])).toEqual({
        title: '✅ Cleanup complete',
        description: 'Removed 1 spam-tracking records older than 7 days.',
        color: EMBED_COLORS.success,
      });
    });

    it('deletes nothing when cleanup is declined', async () => {
      confirm.mockResolvedValue('declined');
      await harness.backend.trackSpamMessage(
        { userId: ALICE, serverId: SERVER_A, channelId: CHANNEL_A },
        T0 - 40 * DAY_MS,
        10_000,
        5,
      );

      await run(harness, '!admin cleanup', ['administrator']);

      expect(sentEmbed(harness.outbox[1])?.title).toBe('ℹ️ Cleanup cancelled');
      expect(await harness.backend.pruneSpamTracking(0)).toEqual({ pruned: 0, beforeCount: 1, afterCount: 1 });
    });
  });

  it('links the invite with the required permissions', async () => {
    await run(harness, '!invite');

    const embed = sentEmbed(harness.outbox[0]);
    expect(embed?.title).toBe('🤖 Invite the bot');
    expect(embed?.fields?.[0]).toEqual({
      name: 'Invite link',
      value: '[Add the bot to a server](https://discord.com/oauth2/authorize?client_id=100000000000000001&permissions=537259072&scope=bot+applications.commands)',
    });
  });

  it('deletes the command message when auto-delete is on', async () => {
    await harness.services.settings.updateSetting(SERVER_A, 'auto_delete_commands', 'on');
    const { message } = await run(harness, '!help');

    expect(harness.outbox[1]).toEqual({ type: 'delete', channelId: CHANNEL_A, messageId: message.messageId });
  });

  it('keeps the command message when the command is rejected', async () => {
    await harness.services.settings.updateSetting(SERVER_A, 'auto_delete_commands', 'on');
    await run(harness, '!admin settings');

    expect(harness.outbox.map((entry) => entry.type)).toEqual(['send']);
  });

  it('describes id settings as mentions', async () => {
    const settings = await harness.services.settings.updateSetting(SERVER_A, 'log_channel_id', CHANNEL_B);
    expect(describeSetting(settings, 'log_channel_id', '!')).toBe(`<#${CHANNEL_B}>`);
    expect(describeSetting(settings, 'mod_role_id', '!')).toBe('Not set');
  });
});
