/**
 * Relay engine: takes one inbound guild message through the relay pipeline
 * and forwards it to every channel linked with its origin.
 *
 * Pipeline (first blocking step ends the run):
 *   ignore → command → settings → abuse → connections → filter → forward
 *
 * Settings and abuse-tracker failures abort the message; nothing is
 * forwarded on doubt. Forward failures are contained to their connection
 * and never retried.
 */

import { createHash } from 'node:crypto';

import { logger, type Logger } from '../middleware/logger.js';
import {
  recordAttachmentsDropped,
  recordForward,
  recordRelayOutcome,
  type ForwardResult,
} from '../middleware/stats.js';
import type { RelayConfig } from '../utils/config.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { Connection } from '../utils/db-types.js';
import { EMBED_COLORS, truncate } from '../utils/formatting.js';
import type { AbuseTracker } from '../features/abuse-tracker.js';
import type { ContentFilter, FilterChecks, FilterReason } from '../features/content-filter.js';
import { oppositeEndpoint, type ConnectionRegistry } from '../features/connections.js';
import { effectivePrefix, type SettingsService } from '../features/settings.js';
import { errorMessage } from './errors.js';
import type { RelayInbound } from './inbound-message.js';
import type { OutboundFile, OutboundMessage, RelayMessenger } from './relay-messenger.js';

export const EMPTY_TEXT_PLACEHOLDER = '*Message without text*';

export type RelayOutcome =
  | { status: 'ignored'; reason: 'self' | 'bot_author' | 'not_default' }
  | { status: 'command'; prefix: string }
  | { status: 'disabled' }
  | { status: 'spam_blocked'; count: number }
  | { status: 'no_connections' }
  | { status: 'filtered'; reasons: FilterReason[] }
  | { status: 'relayed'; delivered: number; failed: number; skipped: number }
  | { status: 'failed'; error: string };

export type RelayEngineConfig = Pick<
  RelayConfig,
  'COMMAND_PREFIX' | 'MAX_ATTACHMENTS' | 'MAX_FILE_SIZE' | 'MAX_MESSAGE_LENGTH' | 'STRICT_FILTER'
>;

export interface RelayEngineDeps {
  config: RelayEngineConfig;
  messenger: RelayMessenger;
  backend: DbBackend;
  registry: ConnectionRegistry;
  settings: SettingsService;
  abuse: AbuseTracker;
  filter: ContentFilter;
  now?: () => number;
}

export interface RelayEngine {
  handle(message: RelayInbound): Promise<RelayOutcome>;
}

/** sha256 hex of the relayed text, or null for messages without text. */
export function contentHash(text: string): string | null {
  if (!text) return null;
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/** The embed-bearing message a connection's far side receives. */
export function buildForwardedMessage(
  message: RelayInbound,
  connection: Connection,
  maxMessageLength: number,
  files: OutboundFile[] = [],
): OutboundMessage {
  return {
    embed: {
      description: message.text ? truncate(message.text, maxMessageLength) : EMPTY_TEXT_PLACEHOLDER,
      color: EMBED_COLORS.relay,
      author: {
        name: `${message.authorDisplayName} (${message.serverName})`,
        ...(message.authorAvatarUrl ? { iconUrl: message.authorAvatarUrl } : {}),
      },
      timestamp: message.timestampMs,
      footer: `Connection: ${connection.name} • ID: ${connection.id}`,
    },
    ...(files.length > 0 ? { files } : {}),
  };
}

export function createRelayEngine(deps: RelayEngineDeps): RelayEngine {
  const { config, messenger, backend, registry, settings, abuse, filter } = deps;
  const now = deps.now ?? Date.now;

  const filterChecks = (profanity: boolean): FilterChecks => ({
    profanity,
    links: true,
    spamPatterns: config.STRICT_FILTER,
    massMentions: config.STRICT_FILTER,
    tokens: config.STRICT_FILTER,
  });

  /** Download eligible attachments once; each connection reuses the bytes. */
  const collectFiles = async (message: RelayInbound, log: Logger): Promise<OutboundFile[]> => {
    const candidates = message.attachments.slice(0, config.MAX_ATTACHMENTS);
    let dropped = message.attachments.length - candidates.length;
    const files: OutboundFile[] = [];

    for (const attachment of candidates) {
      if (attachment.size > config.MAX_FILE_SIZE) {
        dropped++;
        log.info({ filename: attachment.filename, size: attachment.size, limit: config.MAX_FILE_SIZE }, 'Attachment too large; dropped');
        continue;
      }
      try {
        const data = await messenger.readAttachment(attachment);
        files.push({
          name: attachment.filename,
          data,
          ...(attachment.contentType ? { contentType: attachment.contentType } : {}),
        });
      } catch (err) {
        dropped++;
        log.warn({ err, filename: attachment.filename }, 'Could not read attachment; dropped');
      }
    }

    recordAttachmentsDropped(dropped);
    return files;
  };

  const forward = async (
    message: RelayInbound,
    connection: Connection,
    files: OutboundFile[],
    log: Logger,
  ): Promise<ForwardResult> => {
    const target = oppositeEndpoint(connection, message.channelId);
    const connLog = log.child({ connectionId: connection.id, targetChannelId: target?.channelId });

    try {
      if (!target) {
        connLog.warn('Origin channel is not an endpoint of this connection; skipping');
        return 'skipped';
      }

      const channel = await messenger.getChannel(target.channelId);
      if (!channel) {
        connLog.warn('Target channel unreachable; skipping');
        return 'skipped';
      }

      const permissions = await messenger.getChannelPermissions(target.channelId);
      if (!permissions?.has('send')) {
        connLog.warn('Missing send permission in target channel; skipping');
        return 'skipped';
      }

      const forwardedId = await messenger.send(
        target.channelId,
        buildForwardedMessage(message, connection, config.MAX_MESSAGE_LENGTH, files),
      );

      try {
        await backend.logMessage({
          originalMessageId: message.messageId,
          forwardedMessageId: forwardedId,
          authorId: message.authorId,
          connectionId: connection.id,
          timestamp: now(),
          contentHash: contentHash(message.text),
        });
      } catch (err) {
        connLog.error({ err, forwardedId }, 'Forwarded message but failed to record it');
      }

      connLog.debug({ forwardedId }, 'Message forwarded');
      return 'delivered';
    } catch (err) {
      connLog.error({ err }, 'Forward failed');
      return 'failed';
    }
  };

  const run = async (message: RelayInbound, log: Logger): Promise<RelayOutcome> => {
    // 1. Authors and kinds that never relay
    if (message.fromSelf) return { status: 'ignored', reason: 'self' };
    if (message.authorIsBot) return { status: 'ignored', reason: 'bot_author' };
    if (message.kind !== 'default') return { status: 'ignored', reason: 'not_default' };

    // 2. Server settings (lazy-created); commands under the prefix in effect
    const serverSettings = await settings.getSettings(message.serverId);
    const serverPrefix = effectivePrefix(serverSettings, config.COMMAND_PREFIX);
    if (message.text.startsWith(serverPrefix)) {
      return { status: 'command', prefix: serverPrefix };
    }
    if (!serverSettings.enabled) return { status: 'disabled' };

    // 3. Abuse tracking
    if (serverSettings.spamProtection) {
      const spam = await abuse.recordAndCheck(message.authorId, message.serverId, message.channelId);
      if (spam.blocked) return { status: 'spam_blocked', count: spam.count };
    }

    // 4. Connections for the origin channel
    const connections = await registry.listByChannel(message.channelId);
    if (connections.length === 0) return { status: 'no_connections' };

    // 5. Content filter
    const verdict = filter.classify(message.text, filterChecks(serverSettings.profanityFilter));
    if (!verdict.allowed) {
      const reasons = Array.from(verdict.reasons);
      log.info({ reasons }, 'Message filtered');
      return { status: 'filtered', reasons };
    }

    // 6. Forward to each connection independently
    const files = await collectFiles(message, log);
    const counts = { delivered: 0, failed: 0, skipped: 0 };
    for (const connection of connections) {
      const result = await forward(message, connection, files, log);
      counts[result]++;
      recordForward(result);
    }

    return { status: 'relayed', ...counts };
  };

  return {
    async handle(message) {
      const log = logger.child({
        messageId: message.messageId,
        serverId: message.serverId,
        channelId: message.channelId,
        authorId: message.authorId,
      });

      let outcome: RelayOutcome;
      try {
        outcome = await run(message, log);
      } catch (err) {
        log.error({ err }, 'Relay aborted');
        outcome = { status: 'failed', error: errorMessage(err) };
      }

      recordRelayOutcome(outcome.status);
      if (outcome.status === 'relayed') {
        log.info({ delivered: outcome.delivered, failed: outcome.failed, skipped: outcome.skipped }, 'Message relayed');
      } else {
        log.debug({ outcome: outcome.status }, 'Relay finished');
      }
      return outcome;
    },
  };
}
