import { MessageType, PermissionFlagsBits, type Message } from 'discord.js';
import { z } from 'zod';

import type { InboundMessageKind, MemberCapability, RelayInbound } from '../../core/inbound-message.js';

// ── Demo payload ────────────────────────────────────────────────────

const DemoAttachmentSchema = z.object({
  id: z.string().optional(),
  filename: z.string().min(1),
  url: z.string().min(1),
  size: z.coerce.number().int().min(0),
  contentType: z.string().nullable().optional(),
});

const DiscordDemoMessageSchema = z.object({
  messageId: z.string().min(1).optional(),
  channelId: z.string().min(1),
  serverId: z.string().min(1),
  serverName: z.string().default('Demo Server'),
  authorId: z.string().min(1),
  authorName: z.string().optional(),
  authorAvatarUrl: z.string().url().optional(),
  bot: z.boolean().default(false),
  kind: z.enum(['default', 'reply', 'system']).default('default'),
  text: z.string().default(''),
  attachments: z.array(DemoAttachmentSchema).default([]),
  timestamp: z.union([z.number(), z.string()]).optional(),
  capabilities: z.array(z.enum(['administrator', 'manage_channels'])).default([]),
});

export type DiscordDemoMessage = z.infer<typeof DiscordDemoMessageSchema>;

export function parseDiscordDemoMessage(input: unknown): DiscordDemoMessage {
  return DiscordDemoMessageSchema.parse(input);
}

function parseTimestamp(value: number | string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value === 'number') return value;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

let demoMessageSeq = 0;

export function normalizeDiscordDemoInbound(message: DiscordDemoMessage, now: number = Date.now()): RelayInbound {
  demoMessageSeq += 1;
  return {
    platform: 'discord',
    messageId: message.messageId ?? `demo-in-${demoMessageSeq}`,
    channelId: message.channelId,
    serverId: message.serverId,
    serverName: message.serverName,
    authorId: message.authorId,
    authorDisplayName: message.authorName ?? message.authorId,
    authorAvatarUrl: message.authorAvatarUrl ?? null,
    authorIsBot: message.bot,
    fromSelf: false,
    authorCapabilities: message.capabilities,
    kind: message.kind,
    text: message.text,
    attachments: message.attachments.map((attachment, index) => ({
      id: attachment.id ?? String(index + 1),
      filename: attachment.filename,
      url: attachment.url,
      size: attachment.size,
      contentType: attachment.contentType ?? null,
    })),
    timestampMs: parseTimestamp(message.timestamp, now),
  };
}

// ── Gateway messages ────────────────────────────────────────────────

function messageKind(type: MessageType): InboundMessageKind {
  if (type === MessageType.Default) return 'default';
  if (type === MessageType.Reply) return 'reply';
  return 'system';
}

function memberCapabilities(message: Message): MemberCapability[] {
  const permissions = message.member?.permissions;
  if (!permissions) return [];
  const capabilities: MemberCapability[] = [];
  if (permissions.has(PermissionFlagsBits.Administrator)) capabilities.push('administrator');
  if (permissions.has(PermissionFlagsBits.ManageChannels)) capabilities.push('manage_channels');
  return capabilities;
}

/**
 * Map a discord.js guild message to the relay shape.
 * Returns null for direct messages.
 */
export function normalizeDiscordMessage(message: Message, botUserId: string | undefined): RelayInbound | null {
  if (!message.inGuild()) return null;

  return {
    platform: 'discord',
    messageId: message.id,
    channelId: message.channelId,
    serverId: message.guildId,
    serverName: message.guild.name,
    authorId: message.author.id,
    authorDisplayName: message.member?.displayName ?? message.author.globalName ?? message.author.username,
    authorAvatarUrl: message.author.displayAvatarURL(),
    authorIsBot: message.author.bot || message.webhookId !== null,
    fromSelf: botUserId !== undefined && message.author.id === botUserId,
    authorCapabilities: memberCapabilities(message),
    kind: messageKind(message.type),
    text: message.content,
    attachments: message.attachments.map((attachment) => ({
      id: attachment.id,
      filename: attachment.name,
      url: attachment.url,
      size: attachment.size,
      contentType: attachment.contentType,
    })),
    timestampMs: message.createdTimestamp,
  };
}
