import type { MessagingPlatform } from '../platforms/types.js';

/** Only `default` messages are relayed; replies, pins, joins and the rest are not. */
export type InboundMessageKind = 'default' | 'reply' | 'system';

/** Member-level capabilities the command layer gates on. */
export type MemberCapability = 'administrator' | 'manage_channels';

export interface InboundAttachment {
  id: string;
  filename: string;
  url: string;
  /** Bytes, as reported by the platform before download. */
  size: number;
  contentType: string | null;
}

/**
 * Normalized guild message.
 *
 * Platform runtimes map their native events into this shape so the relay
 * engine and command layer never see SDK types.
 */
export interface RelayInbound {
  platform: MessagingPlatform;
  messageId: string;
  channelId: string;
  serverId: string;
  serverName: string;

  authorId: string;
  authorDisplayName: string;
  authorAvatarUrl: string | null;
  /** True for any bot or webhook author. */
  authorIsBot: boolean;
  /** True when the message was sent by this bot. */
  fromSelf: boolean;
  authorCapabilities: MemberCapability[];

  kind: InboundMessageKind;
  /** Raw message text; empty string when the message has none. */
  text: string;
  attachments: InboundAttachment[];
  /** Milliseconds since epoch. */
  timestampMs: number;
}
