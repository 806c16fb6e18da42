import {
  AttachmentBuilder,
  DiscordAPIError,
  EmbedBuilder,
  Events,
  PermissionFlagsBits,
  type Client,
  type GuildTextBasedChannel,
  type Message,
} from 'discord.js';

import { logger } from '../../middleware/logger.js';
import { PermissionDeniedError, TransportError, errorMessage } from '../../core/errors.js';
import type { InboundAttachment } from '../../core/inbound-message.js';
import type {
  ChannelCapability,
  ChannelInfo,
  OutboundEmbed,
  OutboundMessage,
  ReactionSignal,
  RelayMessenger,
} from '../../core/relay-messenger.js';
import { buildInviteUrl } from './invite.js';

// ── Error mapping ───────────────────────────────────────────────────

const MISSING_ACCESS = 50001;
const MISSING_PERMISSIONS = 50013;
const UNKNOWN_CHANNEL = 10003;

function toRelayError(err: unknown, action: string): Error {
  if (err instanceof PermissionDeniedError || err instanceof TransportError) return err;
  if (err instanceof DiscordAPIError && (err.code === MISSING_ACCESS || err.code === MISSING_PERMISSIONS)) {
    return new PermissionDeniedError(`Discord refused ${action}: ${err.message}`, [], { cause: err });
  }
  return new TransportError(`Discord ${action} failed: ${errorMessage(err)}`, { cause: err });
}

async function discordCall<T>(action: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    throw toRelayError(err, action);
  }
}

// ── Payload builders ────────────────────────────────────────────────

function toEmbedBuilder(embed: OutboundEmbed): EmbedBuilder {
  const builder = new EmbedBuilder();
  if (embed.title) builder.setTitle(embed.title);
  if (embed.description) builder.setDescription(embed.description);
  if (embed.color !== undefined) builder.setColor(embed.color);
  if (embed.author) builder.setAuthor({ name: embed.author.name, iconURL: embed.author.iconUrl });
  if (embed.fields && embed.fields.length > 0) builder.addFields(embed.fields);
  if (embed.footer) builder.setFooter({ text: embed.footer });
  if (embed.timestamp !== undefined) builder.setTimestamp(embed.timestamp);
  return builder;
}

function toMessagePayload(message: OutboundMessage): {
  content?: string;
  embeds: EmbedBuilder[];
  files: AttachmentBuilder[];
} {
  return {
    ...(message.text ? { content: message.text } : {}),
    embeds: message.embed ? [toEmbedBuilder(message.embed)] : [],
    files: (message.files ?? []).map((file) => new AttachmentBuilder(Buffer.from(file.data), { name: file.name })),
  };
}

const CAPABILITY_FLAGS: Record<ChannelCapability, bigint> = {
  view: PermissionFlagsBits.ViewChannel,
  send: PermissionFlagsBits.SendMessages,
  embed: PermissionFlagsBits.EmbedLinks,
  attach: PermissionFlagsBits.AttachFiles,
  read_history: PermissionFlagsBits.ReadMessageHistory,
  add_reactions: PermissionFlagsBits.AddReactions,
  manage_messages: PermissionFlagsBits.ManageMessages,
};

// ── discord.js adapter ──────────────────────────────────────────────

export function createDiscordAdapter(client: Client): RelayMessenger {
  const reactionListeners = new Map<string, Set<(signal: ReactionSignal) => void>>();

  client.on(Events.MessageReactionAdd, (reaction, user) => {
    const listeners = reactionListeners.get(reaction.message.id);
    if (!listeners || user.bot) return;
    const signal: ReactionSignal = {
      messageId: reaction.message.id,
      userId: user.id,
      emoji: reaction.emoji.name ?? '',
    };
    for (const listener of listeners) listener(signal);
  });

  async function resolveChannel(channelId: string): Promise<GuildTextBasedChannel | null> {
    try {
      const channel = await client.channels.fetch(channelId);
      if (!channel || !channel.isTextBased() || channel.isDMBased()) return null;
      return channel;
    } catch (err) {
      if (err instanceof DiscordAPIError
        && (err.code === UNKNOWN_CHANNEL || err.code === MISSING_ACCESS || err.code === MISSING_PERMISSIONS)) {
        return null;
      }
      throw toRelayError(err, 'channel lookup');
    }
  }

  async function requireChannel(channelId: string): Promise<GuildTextBasedChannel> {
    const channel = await resolveChannel(channelId);
    if (!channel) throw new TransportError(`Channel ${channelId} is not reachable`);
    return channel;
  }

  async function fetchMessage(channelId: string, messageId: string): Promise<Message> {
    const channel = await requireChannel(channelId);
    return discordCall('message fetch', () => channel.messages.fetch(messageId));
  }

  return {
    platform: 'discord',

    async send(channelId, message) {
      const channel = await requireChannel(channelId);
      const sent = await discordCall('send', () => channel.send(toMessagePayload(message)));
      return sent.id;
    },

    async editMessage(channelId, messageId, message) {
      const target = await fetchMessage(channelId, messageId);
      const payload = toMessagePayload(message);
      await discordCall('edit', () => target.edit({ content: payload.content ?? null, embeds: payload.embeds }));
    },

    async deleteMessage(channelId, messageId) {
      const target = await fetchMessage(channelId, messageId);
      await discordCall('delete', () => target.delete());
    },

    async addReactions(channelId, messageId, emojis) {
      const target = await fetchMessage(channelId, messageId);
      for (const emoji of emojis) {
        await discordCall('react', () => target.react(emoji));
      }
    },

    async clearReactions(channelId, messageId) {
      const target = await fetchMessage(channelId, messageId);
      await discordCall('clear reactions', () => target.reactions.removeAll());
    },

    watchReactions(_channelId, messageId, listener) {
      const listeners = reactionListeners.get(messageId) ?? new Set();
      listeners.add(listener);
      reactionListeners.set(messageId, listeners);
      return () => {
        listeners.delete(listener);
        if (listeners.size === 0) reactionListeners.delete(messageId);
      };
    },

    async getChannel(channelId): Promise<ChannelInfo | null> {
      const channel = await resolveChannel(channelId);
      if (!channel) return null;
      return {
        id: channel.id,
        name: channel.name,
        guildId: channel.guild.id,
        guildName: channel.guild.name,
      };
    },

    async getChannelPermissions(channelId) {
      const channel = await resolveChannel(channelId);
      const me = channel?.guild.members.me;
      if (!channel || !me) return null;

      const permissions = me.permissionsIn(channel);
      const granted = new Set<ChannelCapability>();
      for (const [capability, flag] of Object.entries(CAPABILITY_FLAGS)) {
        if (permissions.has(flag) && isCapability(capability)) granted.add(capability);
      }
      return granted;
    },

    async readAttachment(attachment: InboundAttachment) {
      let response: Response;
      try {
        response = await fetch(attachment.url);
      } catch (err) {
        throw new TransportError(`Attachment download failed: ${errorMessage(err)}`, { cause: err });
      }
      if (!response.ok) {
        throw new TransportError(`Attachment download failed (${response.status}) for ${attachment.filename}`);
      }
      return new Uint8Array(await response.arrayBuffer());
    },

    guildCount() {
      return client.guilds.cache.size;
    },

    inviteUrl() {
      return client.user ? buildInviteUrl(client.user.id) : null;
    },
  };
}

function isCapability(value: string): value is ChannelCapability {
  return value in CAPABILITY_FLAGS;
}

// ── Demo adapter ────────────────────────────────────────────────────

export const DEMO_BOT_USER_ID = '100000000000000001';

export interface DemoChannel extends ChannelInfo {
  permissions: ChannelCapability[];
}

export interface DemoFileSummary {
  name: string;
  size: number;
}

export interface DemoOutboundMessage {
  text?: string;
  embed?: OutboundEmbed;
  files?: DemoFileSummary[];
}

export type DiscordDemoOutboxEntry =
  | { type: 'send'; channelId: string; messageId: string; message: DemoOutboundMessage }
  | { type: 'edit'; channelId: string; messageId: string; message: DemoOutboundMessage }
  | { type: 'delete'; channelId: string; messageId: string }
  | { type: 'react'; channelId: string; messageId: string; emojis: string[] }
  | { type: 'clear_reactions'; channelId: string; messageId: string };

export interface DiscordDemoAdapter extends RelayMessenger {
  /** Deliver a reaction as if a user had added it. */
  emitReaction(signal: ReactionSignal): void;
  addChannel(channel: DemoChannel): void;
}

export interface DiscordDemoOptions {
  channels?: DemoChannel[];
  /** Attachment bytes keyed by URL; unknown URLs fail to download. */
  attachments?: Map<string, Uint8Array>;
  guildCount?: number;
  /** Application id used for the invite link. */
  botUserId?: string;
}

function summarize(message: OutboundMessage): DemoOutboundMessage {
  return {
    ...(message.text ? { text: message.text } : {}),
    ...(message.embed ? { embed: message.embed } : {}),
    ...(message.files && message.files.length > 0
      ? { files: message.files.map((file) => ({ name: file.name, size: file.data.byteLength })) }
      : {}),
  };
}

/**
 * In-memory messenger for local demos and tests. Every outbound action is
 * appended to `outbox`; channels and attachment bytes come from `options`.
 */
export function createDiscordDemoAdapter(
  outbox: DiscordDemoOutboxEntry[],
  options: DiscordDemoOptions = {},
): DiscordDemoAdapter {
  const channels = new Map((options.channels ?? []).map((channel) => [channel.id, channel]));
  const attachments = options.attachments ?? new Map<string, Uint8Array>();
  const reactionListeners = new Map<string, Set<(signal: ReactionSignal) => void>>();
  let nextMessageId = 1;

  const requireChannel = (channelId: string): DemoChannel => {
    const channel = channels.get(channelId);
    if (!channel) throw new TransportError(`Channel ${channelId} is not reachable`);
    return channel;
  };

  const requirePermission = (channel: DemoChannel, capability: ChannelCapability, action: string): void => {
    if (!channel.permissions.includes(capability)) {
      throw new PermissionDeniedError(`Discord refused ${action}: missing ${capability}`, [capability]);
    }
  };

  return {
    platform: 'discord',

    async send(channelId, message) {
      const channel = requireChannel(channelId);
      requirePermission(channel, 'send', 'send');
      const messageId = `demo-${nextMessageId++}`;
      outbox.push({ type: 'send', channelId, messageId, message: summarize(message) });
      return messageId;
    },

    async editMessage(channelId, messageId, message) {
      requireChannel(channelId);
      outbox.push({ type: 'edit', channelId, messageId, message: summarize(message) });
    },

    async deleteMessage(channelId, messageId) {
      requirePermission(requireChannel(channelId), 'manage_messages', 'delete');
      outbox.push({ type: 'delete', channelId, messageId });
    },

    async addReactions(channelId, messageId, emojis) {
      requireChannel(channelId);
      outbox.push({ type: 'react', channelId, messageId, emojis: [...emojis] });
    },

    async clearReactions(channelId, messageId) {
      requireChannel(channelId);
      outbox.push({ type: 'clear_reactions', channelId, messageId });
    },

    watchReactions(_channelId, messageId, listener) {
      const listeners = reactionListeners.get(messageId) ?? new Set();
      listeners.add(listener);
      reactionListeners.set(messageId, listeners);
      return () => {
        listeners.delete(listener);
        if (listeners.size === 0) reactionListeners.delete(messageId);
      };
    },

    emitReaction(signal) {
      const listeners = reactionListeners.get(signal.messageId);
      if (!listeners) return;
      for (const listener of [...listeners]) listener(signal);
    },

    addChannel(channel) {
      channels.set(channel.id, channel);
    },

    async getChannel(channelId) {
      const channel = channels.get(channelId);
      if (!channel) return null;
      return { id: channel.id, name: channel.name, guildId: channel.guildId, guildName: channel.guildName };
    },

    async getChannelPermissions(channelId) {
      const channel = channels.get(channelId);
      return channel ? new Set(channel.permissions) : null;
    },

    async readAttachment(attachment) {
      const data = attachments.get(attachment.url);
      if (!data) {
        logger.debug({ url: attachment.url }, 'Demo attachment not found');
        throw new TransportError(`Attachment download failed (404) for ${attachment.filename}`);
      }
      return data;
    },

    guildCount() {
      return options.guildCount ?? new Set([...channels.values()].map((channel) => channel.guildId)).size;
    },

    inviteUrl() {
      return buildInviteUrl(options.botUserId ?? DEMO_BOT_USER_ID);
    },
  };
}
