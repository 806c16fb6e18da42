import type { MessagingPlatform } from '../platforms/types.js';
import type { InboundAttachment } from './inbound-message.js';

export interface OutboundEmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface OutboundEmbed {
  title?: string;
  description?: string;
  color?: number;
  author?: { name: string; iconUrl?: string };
  fields?: OutboundEmbedField[];
  footer?: string;
  /** Milliseconds since epoch. */
  timestamp?: number;
}

export interface OutboundFile {
  name: string;
  data: Uint8Array;
  contentType?: string;
}

export interface OutboundMessage {
  text?: string;
  embed?: OutboundEmbed;
  files?: OutboundFile[];
}

export interface ChannelInfo {
  id: string;
  name: string;
  guildId: string;
  guildName: string;
}

/** What the bot itself may do in a channel. */
export type ChannelCapability =
  | 'view'
  | 'send'
  | 'embed'
  | 'attach'
  | 'read_history'
  | 'add_reactions'
  | 'manage_messages';

export interface ReactionSignal {
  messageId: string;
  userId: string;
  emoji: string;
}

/**
 * Platform messenger used by the relay engine and the command layer.
 *
 * Implementations throw PermissionDeniedError when the platform refuses an
 * action for lack of access and TransportError for every other failure.
 */
export interface RelayMessenger {
  platform: MessagingPlatform;

  /** Returns the id of the created message. */
  send(channelId: string, message: OutboundMessage): Promise<string>;
  editMessage(channelId: string, messageId: string, message: OutboundMessage): Promise<void>;
  deleteMessage(channelId: string, messageId: string): Promise<void>;

  addReactions(channelId: string, messageId: string, emojis: string[]): Promise<void>;
  clearReactions(channelId: string, messageId: string): Promise<void>;
  /** Subscribe to reactions added to one message. Returns the unsubscribe function. */
  watchReactions(channelId: string, messageId: string, listener: (signal: ReactionSignal) => void): () => void;

  /** Null when the channel does not exist or the bot cannot see it. */
  getChannel(channelId: string): Promise<ChannelInfo | null>;
  /** Null when the channel is unreachable. */
  getChannelPermissions(channelId: string): Promise<ReadonlySet<ChannelCapability> | null>;

  readAttachment(attachment: InboundAttachment): Promise<Uint8Array>;
  guildCount(): number;
  /** OAuth2 URL for adding the bot to another server; null before login completes. */
  inviteUrl(): string | null;
}
