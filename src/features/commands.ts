/**
 * Command layer - `connect`, `admin`, `help` and `invite` under the
 * server's command prefix.
 *
 * Every reply is an embed in the invoking channel. Validation, not-found
 * and permission errors become error embeds; anything else is logged and
 * answered with a generic failure.
 */

import { logger, type Logger } from '../middleware/logger.js';
import {
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
  errorMessage,
  type ValidationCode,
} from '../core/errors.js';
import { runConfirmation, type ConfirmationRequest, type ConfirmationResult } from '../core/confirmation.js';
import type { MemberCapability, RelayInbound } from '../core/inbound-message.js';
import type { ChannelCapability, OutboundEmbed, OutboundEmbedField, RelayMessenger } from '../core/relay-messenger.js';
import type { RelayConfig } from '../utils/config.js';
import type { DbBackend } from '../utils/db-backend.js';
import { MIN_RETENTION_DAYS, runRetentionSweep } from '../utils/db-maintenance.js';
import type { Connection, ServerSettingKey, ServerSettings } from '../utils/db-types.js';
import {
  EMBED_COLORS,
  bold,
  channelMention,
  code,
  formatDate,
  formatDuration,
  userMention,
} from '../utils/formatting.js';
import type { ConnectionRegistry } from './connections.js';
import { SETTING_KEYS, effectivePrefix, type SettingsService } from './settings.js';
import type { StatsService } from './stats.js';

export const CONNECTIONS_PER_PAGE = 5;
export const MAX_CONNECTION_NAME_LENGTH = 100;

/** What the bot needs in a target channel before a connection is created. */
export const CREATE_REQUIRED_CAPABILITIES: readonly ChannelCapability[] = ['send', 'embed', 'attach', 'read_history'];

const CAPABILITY_LABELS: Record<ChannelCapability, string> = {
  view: 'View Channel',
  send: 'Send Messages',
  embed: 'Embed Links',
  attach: 'Attach Files',
  read_history: 'Read Message History',
  add_reactions: 'Add Reactions',
  manage_messages: 'Manage Messages',
};

const INVITE_PERMISSION_LABELS = [
  'View Channels',
  'Send Messages',
  'Embed Links',
  'Attach Files',
  'Read Message History',
  'Manage Messages',
  'Add Reactions',
  'Use External Emojis',
  'Manage Webhooks',
];

const VALIDATION_TITLES: Record<ValidationCode, string> = {
  same_server: 'Same server',
  duplicate_connection: 'Connection already exists',
  quota_exceeded: 'Connection limit reached',
  invalid_setting: 'Invalid setting',
  invalid_argument: 'Invalid argument',
};

export type CommandConfig = Pick<RelayConfig, 'COMMAND_PREFIX' | 'RETENTION_DAYS'>;

export interface CommandHandlerDeps {
  config: CommandConfig;
  messenger: RelayMessenger;
  backend: DbBackend;
  registry: ConnectionRegistry;
  settings: SettingsService;
  stats: StatsService;
  /** Defaults to the reaction workflow on `messenger`. */
  confirm?: (request: ConfirmationRequest) => Promise<ConfirmationResult>;
  now?: () => number;
}

export interface CommandResult {
  handled: boolean;
  /** Resolved command path, e.g. `connect create`. */
  command?: string;
}

export interface CommandHandler {
  handle(message: RelayInbound, prefix: string): Promise<CommandResult>;
}

interface CommandContext {
  message: RelayInbound;
  prefix: string;
  args: string[];
  log: Logger;
  reply(embed: OutboundEmbed): Promise<string>;
  edit(messageId: string, embed: OutboundEmbed): Promise<void>;
}

type Subcommand = (ctx: CommandContext) => Promise<void>;

// ── Argument helpers ────────────────────────────────────────────────

function hasCapability(message: RelayInbound, capability: MemberCapability): boolean {
  return message.authorCapabilities.includes('administrator') || message.authorCapabilities.includes(capability);
}

function requireCapability(message: RelayInbound, capability: MemberCapability, label: string): void {
  if (!hasCapability(message, capability)) {
    throw new PermissionDeniedError(`You need the ${label} permission to use this command`, [capability]);
  }
}

/** Accepts `<#123>` or bare digits. */
export function parseChannelArgument(raw: string): string | null {
  const match = /^(?:<#(\d+)>|(\d+))$/.exec(raw.trim());
  if (!match) return null;
  return match[1] ?? match[2] ?? null;
}

export function parseConnectionId(raw: string | undefined): number {
  const value = raw === undefined ? NaN : Number(raw);
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ValidationError('invalid_argument', `"${raw ?? ''}" is not a valid connection id`);
  }
  return value;
}

function isEndpointServer(connection: Connection, serverId: string): boolean {
  return connection.server1Id === serverId || connection.server2Id === serverId;
}

function onOff(value: boolean): string {
  return value ? 'On' : 'Off';
}

/** Human-readable value of one setting. */
export function describeSetting(settings: ServerSettings, key: ServerSettingKey, globalPrefix: string): string {
  switch (key) {
    case 'prefix':
      return settings.prefix === null
        ? `${code(globalPrefix)} (default)`
        : code(effectivePrefix(settings, globalPrefix));
    case 'enabled':
      return onOff(settings.enabled);
    case 'spam_protection':
      return onOff(settings.spamProtection);
    case 'profanity_filter':
      return onOff(settings.profanityFilter);
    case 'auto_delete_commands':
      return onOff(settings.autoDeleteCommands);
    case 'webhook_notifications':
      return onOff(settings.webhookNotifications);
    case 'mod_role_id':
      return settings.modRoleId ? `<@&${settings.modRoleId}>` : 'Not set';
    case 'log_channel_id':
      return settings.logChannelId ? channelMention(settings.logChannelId) : 'Not set';
  }
}

function errorEmbed(title: string, description: string): OutboundEmbed {
  return { title: `❌ ${title}`, description, color: EMBED_COLORS.error };
}

/** Map a thrown error to the embed the invoker sees; null when it is not user-facing. */
export function errorReply(err: unknown): OutboundEmbed | null {
  if (err instanceof ValidationError) {
    const embed = errorEmbed(VALIDATION_TITLES[err.code], err.message);
    return err.code === 'duplicate_connection' ? { ...embed, title: `⚠️ ${VALIDATION_TITLES[err.code]}`, color: EMBED_COLORS.warning } : embed;
  }
  if (err instanceof NotFoundError) return errorEmbed('Not found', err.message);
  if (err instanceof PermissionDeniedError) return errorEmbed('Missing permissions', err.message);
  return null;
}

// ── Handler ─────────────────────────────────────────────────────────

export function createCommandHandler(deps: CommandHandlerDeps): CommandHandler {
  const { config, messenger, backend, registry, settings, stats } = deps;
  const now = deps.now ?? Date.now;
  const confirm = deps.confirm ?? ((request: ConfirmationRequest) => runConfirmation(messenger, request));

  // ── connect ───────────────────────────────────────────────────────

  const connectHelp: Subcommand = async ({ prefix, reply }) => {
    await reply({
      title: '🔗 Cross-server connections',
      description: 'Commands for linking this channel with channels on other servers:',
      color: EMBED_COLORS.info,
      fields: [
        { name: 'Create a connection', value: `${code(`${prefix}connect create <#channel> <name>`)}\nLinks this channel with a channel on another server` },
        { name: 'List connections', value: `${code(`${prefix}connect list [page]`)}\nShows this server's active connections` },
        { name: 'Connection details', value: `${code(`${prefix}connect info <id>`)}\nShows one connection with recent activity` },
        { name: 'Remove a connection', value: `${code(`${prefix}connect remove <id>`)}\nUnlinks the channels after confirmation` },
      ],
    });
  };

  const connectCreate: Subcommand = async ({ message, prefix, args, log, reply }) => {
    requireCapability(message, 'manage_channels', 'Manage Channels');

    const [rawTarget, ...nameParts] = args;
    const name = nameParts.join(' ').trim();
    if (!rawTarget || !name) {
      throw new ValidationError('invalid_argument', `Usage: ${code(`${prefix}connect create <#channel> <name>`)}`);
    }
    if (name.length > MAX_CONNECTION_NAME_LENGTH) {
      throw new ValidationError('invalid_argument', `Connection names are limited to ${MAX_CONNECTION_NAME_LENGTH} characters`);
    }

    const targetId = parseChannelArgument(rawTarget);
    if (!targetId) throw new ValidationError('invalid_argument', `"${rawTarget}" is not a channel`);

    const target = await messenger.getChannel(targetId);
    if (!target) throw new NotFoundError('Channel', targetId);
    if (target.guildId === message.serverId) {
      throw new ValidationError('same_server', 'Cannot connect two channels on the same server');
    }

    const granted = await messenger.getChannelPermissions(target.id);
    const missing = CREATE_REQUIRED_CAPABILITIES.filter((capability) => !granted?.has(capability));
    if (missing.length > 0) {
      throw new PermissionDeniedError(
        `The bot is missing permissions in ${channelMention(target.id)}: ${missing.map((capability) => CAPABILITY_LABELS[capability]).join(', ')}`,
        missing,
      );
    }

    const id = await registry.create({
      server1Id: message.serverId,
      channel1Id: message.channelId,
      server2Id: target.guildId,
      channel2Id: target.id,
      name,
      createdBy: message.authorId,
      description: `Connection between ${message.serverName} and ${target.guildName}`,
    });

    await reply({
      title: '✅ Connection created',
      description: `${bold(name)} (ID: ${id})`,
      color: EMBED_COLORS.success,
      fields: [
        { name: 'Channel 1', value: `${channelMention(message.channelId)}\n${message.serverName}`, inline: true },
        { name: 'Channel 2', value: `${channelMention(target.id)}\n${target.guildName}`, inline: true },
        { name: 'Created by', value: userMention(message.authorId), inline: true },
      ],
    });

    try {
      await messenger.send(target.id, {
        embed: {
          title: '🔗 New connection',
          description: `This channel is now connected to ${channelMention(message.channelId)} on ${bold(message.serverName)}`,
          color: EMBED_COLORS.info,
          footer: `Connection: ${name} • ID: ${id}`,
        },
      });
    } catch (err) {
      log.warn({ err, connectionId: id, channelId: target.id }, 'Failed to announce new connection');
    }
  };

  const connectList: Subcommand = async ({ message, prefix, args, reply }) => {
    const connections = await registry.listByServer(message.serverId);
    if (connections.length === 0) {
      await reply({
        title: 'ℹ️ No connections',
        description: 'This server has no cross-server connections yet.',
        color: EMBED_COLORS.info,
        fields: [{ name: 'Create one', value: code(`${prefix}connect create <#channel> <name>`) }],
      });
      return;
    }

    const totalPages = Math.ceil(connections.length / CONNECTIONS_PER_PAGE);
    const requested = Number.parseInt(args[0] ?? '1', 10);
    const page = Math.max(1, Math.min(Number.isNaN(requested) ? 1 : requested, totalPages));
    const start = (page - 1) * CONNECTIONS_PER_PAGE;

    const fields: OutboundEmbedField[] = [];
    for (const connection of connections.slice(start, start + CONNECTIONS_PER_PAGE)) {
      const local = connection.server1Id === message.serverId ? connection.channel1Id : connection.channel2Id;
      const remoteId = local === connection.channel1Id ? connection.channel2Id : connection.channel1Id;
      const remote = await messenger.getChannel(remoteId);
      fields.push({
        name: `${connection.name} (ID: ${connection.id})`,
        value: [
          `Local: ${channelMention(local)}`,
          `Remote: ${remote ? `#${remote.name} (${remote.guildName})` : 'unavailable'}`,
          `Created: ${formatDate(connection.createdAt)}`,
        ].join('\n'),
      });
    }

    await reply({
      title: '🔗 Connections',
      description: `Page ${page}/${totalPages} • Total: ${connections.length}`,
      color: EMBED_COLORS.info,
      fields,
    });
  };

  const connectInfo: Subcommand = async ({ message, args, reply }) => {
    const id = parseConnectionId(args[0]);
    const connection = await registry.getById(id);
    if (!isEndpointServer(connection, message.serverId)) {
      throw new PermissionDeniedError('You can only view connections of your own server');
    }

    const week = await stats.getConnectionStats(id, 7);
    await reply({
      title: `ℹ️ ${connection.name}`,
      description: connection.description ?? 'No description',
      color: EMBED_COLORS.info,
      fields: [
        { name: 'Connection ID', value: String(connection.id), inline: true },
        { name: 'Status', value: connection.active ? 'Active' : 'Inactive', inline: true },
        { name: 'Created', value: formatDate(connection.createdAt), inline: true },
        { name: 'Channel 1', value: channelMention(connection.channel1Id), inline: true },
        { name: 'Channel 2', value: channelMention(connection.channel2Id), inline: true },
        { name: 'Creator', value: userMention(connection.createdBy), inline: true },
        { name: 'Activity (7 days)', value: `Messages: ${week.totalMessages}\nUnique users: ${week.uniqueUsers}` },
      ],
    });
  };

  const connectRemove: Subcommand = async ({ message, args, log, reply, edit }) => {
    const id = parseConnectionId(args[0]);
    const connection = await registry.getById(id);

    const isCreator = connection.createdBy === message.authorId;
    const isEndpointAdmin = hasCapability(message, 'administrator') && isEndpointServer(connection, message.serverId);
    if (!isCreator && !isEndpointAdmin) {
      throw new PermissionDeniedError(
        'Only the connection creator or an administrator of a connected server can remove it',
        ['administrator'],
      );
    }

    const promptId = await reply({
      title: '⚠️ Confirm removal',
      description: `Remove connection ${bold(connection.name)}? React with ✅ to confirm or ❌ to cancel.`,
      color: EMBED_COLORS.warning,
      fields: [{
        name: 'Linked channels',
        value: `${channelMention(connection.channel1Id)} ↔ ${channelMention(connection.channel2Id)}`,
      }],
    });

    const decision = await confirm({ channelId: message.channelId, messageId: promptId, userId: message.authorId });
    if (decision === 'declined') {
      await edit(promptId, { title: 'ℹ️ Removal cancelled', description: 'The connection was not removed.', color: EMBED_COLORS.info });
      return;
    }
    if (decision === 'expired') {
      await edit(promptId, {
        title: '⏱️ Confirmation expired',
        description: 'No response in time. The connection was not removed.',
        color: EMBED_COLORS.warning,
      });
      return;
    }

    const removed = await registry.softDelete(id);
    if (!removed) {
      await edit(promptId, errorEmbed('Not found', `Connection ${id} was already removed`));
      return;
    }

    await edit(promptId, {
      title: '✅ Connection removed',
      description: `Connection ${bold(connection.name)} was removed.`,
      color: EMBED_COLORS.success,
    });

    const others = [connection.channel1Id, connection.channel2Id].filter((channelId) => channelId !== message.channelId);
    for (const channelId of others) {
      try {
        await messenger.send(channelId, {
          embed: {
            title: 'ℹ️ Connection closed',
            description: `Connection ${bold(connection.name)} was removed by ${userMention(message.authorId)}.`,
            color: EMBED_COLORS.info,
          },
        });
      } catch (err) {
        log.warn({ err, connectionId: id, channelId }, 'Failed to notify channel about removed connection');
      }
    }
  };

  // ── admin ─────────────────────────────────────────────────────────

  const adminHelp: Subcommand = async ({ prefix, reply }) => {
    await reply({
      title: '🛠️ Administration',
      description: 'Administrator commands:',
      color: EMBED_COLORS.info,
      fields: [
        { name: `${prefix}admin settings`, value: 'Show this server\'s settings' },
        { name: `${prefix}admin set <key> <value>`, value: `Change a setting (${SETTING_KEYS.join(', ')})` },
        { name: `${prefix}admin stats`, value: 'Bot-wide statistics' },
        { name: `${prefix}admin serverstats`, value: 'Statistics for this server' },
        { name: `${prefix}admin cleanup [days]`, value: `Delete spam-tracking records older than N days (at least ${MIN_RETENTION_DAYS})` },
        { name: `${prefix}admin test <id>`, value: 'Check that a connection can deliver messages' },
      ],
    });
  };

  const adminSettings: Subcommand = async ({ message, prefix, reply }) => {
    const current = await settings.getSettings(message.serverId);
    await reply({
      title: '⚙️ Server settings',
      color: EMBED_COLORS.info,
      fields: SETTING_KEYS.map((key) => ({
        name: key,
        value: describeSetting(current, key, config.COMMAND_PREFIX),
        inline: true,
      })),
      footer: `Change with ${prefix}admin set <key> <value>`,
    });
  };

  const adminSet: Subcommand = async ({ message, prefix, args, log, reply }) => {
    const [key, ...valueParts] = args;
    const value = valueParts.join(' ');
    if (!key || !value) {
      throw new ValidationError(
        'invalid_argument',
        `Usage: ${code(`${prefix}admin set <key> <value>`)}. Keys: ${SETTING_KEYS.join(', ')}`,
      );
    }

    const normalizedKey = key.toLowerCase();
    const updated = await settings.updateSetting(message.serverId, normalizedKey, value);
    log.info({ key: normalizedKey, value }, 'Server setting changed');

    const shown = SETTING_KEYS.find((candidate) => candidate === normalizedKey);
    await reply({
      title: '✅ Setting updated',
      description: shown
        ? `${code(shown)} is now ${describeSetting(updated, shown, config.COMMAND_PREFIX)}`
        : `${code(normalizedKey)} updated`,
      color: EMBED_COLORS.success,
    });
  };

  const adminStats: Subcommand = async ({ reply }) => {
    const bot = await stats.getBotStats();
    await reply({
      title: '📊 Bot statistics',
      color: EMBED_COLORS.info,
      fields: [
        { name: 'Servers', value: String(bot.guildCount), inline: true },
        { name: 'Active connections', value: String(bot.activeConnections), inline: true },
        { name: 'Known servers', value: String(bot.serversInDatabase), inline: true },
        { name: 'Messages relayed', value: String(bot.totalMessages), inline: true },
        { name: 'Messages (7 days)', value: String(bot.messagesLast7Days), inline: true },
        { name: 'Unique users (7 days)', value: String(bot.uniqueUsersLast7Days), inline: true },
        { name: 'Memory', value: `${bot.rssMb} MB`, inline: true },
        { name: 'Uptime', value: formatDuration(bot.uptimeMs), inline: true },
        {
          name: 'Today',
          value: `Relayed: ${bot.relay.today.outcomes.relayed} • Filtered: ${bot.relay.today.outcomes.filtered} • Spam blocked: ${bot.relay.today.outcomes.spam_blocked}`,
        },
      ],
    });
  };

  const adminServerStats: Subcommand = async ({ message, reply }) => {
    const server = await stats.getServerStats(message.serverId);
    const top = server.topConnections.length > 0
      ? server.topConnections
        .map((entry, index) => `${index + 1}. ${entry.connection.name} (ID: ${entry.connection.id}): ${entry.messages} messages`)
        .join('\n')
      : 'No activity yet';

    await reply({
      title: `🖥️ ${message.serverName}`,
      color: EMBED_COLORS.info,
      fields: [
        { name: 'Active connections', value: `${server.activeConnections}/${server.limit}`, inline: true },
        { name: 'Free slots', value: String(server.free), inline: true },
        { name: 'Messages (30 days)', value: String(server.messagesLast30Days), inline: true },
        { name: 'Most active (7 days)', value: top },
      ],
    });
  };

  const adminCleanup: Subcommand = async ({ message, args, reply, edit }) => {
    const days = args[0] === undefined ? config.RETENTION_DAYS : Number(args[0]);
    if (!Number.isInteger(days) || days < MIN_RETENTION_DAYS) {
      throw new ValidationError('invalid_argument', `Retention must be a whole number of days, at least ${MIN_RETENTION_DAYS}`);
    }

    const promptId = await reply({
      title: '⚠️ Confirm cleanup',
      description: `Delete spam-tracking records older than ${days} days? Connections and message history are kept.`,
      color: EMBED_COLORS.warning,
    });

    const decision = await confirm({ channelId: message.channelId, messageId: promptId, userId: message.authorId });
    if (decision === 'declined') {
      await edit(promptId, { title: 'ℹ️ Cleanup cancelled', description: 'Nothing was deleted.', color: EMBED_COLORS.info });
      return;
    }
    if (decision === 'expired') {
      await edit(promptId, {
        title: '⏱️ Confirmation expired',
        description: 'No response in time. Nothing was deleted.',
        color: EMBED_COLORS.warning,
      });
      return;
    }

    const result = await runRetentionSweep(backend, days, now());
    await edit(promptId, {
      title: '✅ Cleanup complete',
      description: `Removed ${result.pruned} spam-tracking records older than ${days} days.`,
      color: EMBED_COLORS.success,
    });
  };

  const adminTest: Subcommand = async ({ message, args, reply }) => {
    const id = parseConnectionId(args[0]);
    const connection = await registry.getById(id);
    if (!isEndpointServer(connection, message.serverId)) {
      throw new PermissionDeniedError('You can only test connections of your own server');
    }

    const report = await stats.testConnection(id);
    const results = [
      {
        both: '✅ Both channels are reachable',
        one: '⚠️ One of the channels is unreachable',
        none: '❌ Neither channel is reachable',
      }[report.channelsReachable],
      report.permissionsOk ? '✅ Bot permissions are fine' : '❌ The bot is missing permissions',
      report.serversEnabled ? '✅ Relay is enabled on both servers' : '⚠️ Relay is disabled on one of the servers',
      report.active ? '✅ Connection is active' : '❌ Connection is inactive',
    ];

    const fields = [{ name: 'Results', value: results.join('\n') }];
    report.endpoints.forEach((endpoint, index) => {
      if (!endpoint.channel) return;
      const missing = endpoint.missing.length > 0
        ? `\nMissing: ${endpoint.missing.map((capability) => CAPABILITY_LABELS[capability]).join(', ')}`
        : '';
      fields.push({
        name: `Channel ${index + 1}`,
        value: `${channelMention(endpoint.channelId)}\n${endpoint.channel.guildName}${missing}`,
      });
    });

    await reply({
      title: 'ℹ️ Connection test',
      description: `${bold(connection.name)} (ID: ${id})`,
      color: EMBED_COLORS.info,
      fields,
    });
  };

  // ── help / invite ─────────────────────────────────────────────────

  const help: Subcommand = async ({ prefix, reply }) => {
    await reply({
      title: '🤖 Channel relay',
      description: 'Relays messages between linked channels on different servers.',
      color: EMBED_COLORS.info,
      fields: [
        {
          name: '🔗 Connections',
          value: [
            `${code(`${prefix}connect create <#channel> <name>`)} Link a channel`,
            `${code(`${prefix}connect list [page]`)} List connections`,
            `${code(`${prefix}connect info <id>`)} Connection details`,
            `${code(`${prefix}connect remove <id>`)} Remove a connection`,
          ].join('\n'),
        },
        {
          name: '⚙️ Administration',
          value: [
            `${code(`${prefix}admin settings`)} Server settings`,
            `${code(`${prefix}admin stats`)} Bot statistics`,
            `${code(`${prefix}admin test <id>`)} Test a connection`,
          ].join('\n'),
        },
        {
          name: '📋 Requirements',
          value: 'The bot must be on both servers. Creating a connection needs Manage Channels.',
        },
      ],
    });
  };

  const invite: Subcommand = async ({ reply }) => {
    const url = messenger.inviteUrl();
    if (!url) {
      await reply({
        title: '⚠️ Invite unavailable',
        description: 'The bot has not finished logging in. Try again shortly.',
        color: EMBED_COLORS.warning,
      });
      return;
    }

    await reply({
      title: '🤖 Invite the bot',
      description: 'Use this link to add the bot to another server:',
      color: EMBED_COLORS.info,
      fields: [
        { name: 'Invite link', value: `[Add the bot to a server](${url})` },
        { name: 'Required permissions', value: INVITE_PERMISSION_LABELS.map((label) => `• ${label}`).join('\n') },
      ],
      footer: 'The bot must be on both servers to connect their channels',
    });
  };

  // ── Routing ───────────────────────────────────────────────────────

  const connectCommands = new Map<string, [string, Subcommand]>([
    ['create', ['create', connectCreate]],
    ['add', ['create', connectCreate]],
    ['new', ['create', connectCreate]],
    ['list', ['list', connectList]],
    ['ls', ['list', connectList]],
    ['show', ['list', connectList]],
    ['info', ['info', connectInfo]],
    ['details', ['info', connectInfo]],
    ['remove', ['remove', connectRemove]],
    ['delete', ['remove', connectRemove]],
    ['rm', ['remove', connectRemove]],
  ]);

  const adminCommands = new Map<string, Subcommand>([
    ['settings', adminSettings],
    ['set', adminSet],
    ['stats', adminStats],
    ['serverstats', adminServerStats],
    ['cleanup', adminCleanup],
    ['test', adminTest],
  ]);

  /** Resolve `tokens` to a command path and its handler; null for unknown commands. */
  const route = (name: string, sub: string | undefined): [string, Subcommand] | null => {
    switch (name) {
      case 'connect':
      case 'conn': {
        const found = sub ? connectCommands.get(sub) : undefined;
        return found ? [`connect ${found[0]}`, found[1]] : ['connect', connectHelp];
      }
      case 'admin': {
        const found = sub ? adminCommands.get(sub) : undefined;
        const [path, run]: [string, Subcommand] = found && sub ? [`admin ${sub}`, found] : ['admin', adminHelp];
        return [path, async (ctx) => {
          requireCapability(ctx.message, 'administrator', 'Administrator');
          await run(ctx);
        }];
      }
      case 'help':
        return ['help', help];
      case 'invite':
        return ['invite', invite];
      default:
        return null;
    }
  };

  const autoDelete = async (message: RelayInbound, log: Logger): Promise<void> => {
    try {
      const current = await settings.getSettings(message.serverId);
      if (current.autoDeleteCommands) await messenger.deleteMessage(message.channelId, message.messageId);
    } catch (err) {
      log.warn({ err, messageId: message.messageId }, 'Failed to auto-delete command message');
    }
  };

  return {
    async handle(message, prefix) {
      const tokens = message.text.slice(prefix.length).trim().split(/\s+/).filter(Boolean);
      const name = tokens[0]?.toLowerCase();
      if (!name) return { handled: false };

      const sub = tokens[1]?.toLowerCase();
      const routed = route(name, sub);
      if (!routed) return { handled: false };

      const [command, run] = routed;
      const consumed = command.split(' ').length;
      const log = logger.child({
        command,
        serverId: message.serverId,
        channelId: message.channelId,
        authorId: message.authorId,
      });

      const ctx: CommandContext = {
        message,
        prefix,
        args: tokens.slice(consumed),
        log,
        reply: (embed) => messenger.send(message.channelId, { embed }),
        edit: (messageId, embed) => messenger.editMessage(message.channelId, messageId, { embed }),
      };

      try {
        await run(ctx);
        log.info('Command handled');
        await autoDelete(message, log);
      } catch (err) {
        const embed = errorReply(err);
        if (embed) {
          log.info({ reason: errorMessage(err) }, 'Command rejected');
        } else {
          log.error({ err }, 'Command failed');
        }
        try {
          await ctx.reply(embed ?? errorEmbed('Command failed', 'Something went wrong. Please try again later.'));
        } catch (replyErr) {
          log.warn({ err: replyErr }, 'Failed to send command error reply');
        }
      }

      return { handled: true, command };
    },
  };
}
