/**
 * Wires the relay components around one messenger and one storage backend,
 * and routes inbound messages through them.
 */

import { logger } from '../middleware/logger.js';
import { markMessageReceived } from '../middleware/health.js';
import type { RelayConfig } from '../utils/config.js';
import type { DbBackend } from '../utils/db-backend.js';
import { createAbuseTracker } from '../features/abuse-tracker.js';
import { createCommandHandler, type CommandHandler, type CommandResult } from '../features/commands.js';
import { createConnectionRegistry, type ConnectionRegistry } from '../features/connections.js';
import { createContentFilter } from '../features/content-filter.js';
import { createSettingsService, type SettingsService } from '../features/settings.js';
import { createStatsService, type StatsService } from '../features/stats.js';
import type { ConfirmationRequest, ConfirmationResult } from './confirmation.js';
import type { RelayInbound } from './inbound-message.js';
import { createRelayEngine, type RelayEngine, type RelayOutcome } from './relay-engine.js';
import type { RelayMessenger } from './relay-messenger.js';

export interface RelayServices {
  registry: ConnectionRegistry;
  settings: SettingsService;
  stats: StatsService;
  engine: RelayEngine;
  commands: CommandHandler;
}

export interface RelayServicesOptions {
  now?: () => number;
  confirm?: (request: ConfirmationRequest) => Promise<ConfirmationResult>;
}

export function createRelayServices(
  config: RelayConfig,
  backend: DbBackend,
  messenger: RelayMessenger,
  options: RelayServicesOptions = {},
): RelayServices {
  const now = options.now ?? Date.now;

  const registry = createConnectionRegistry(backend, { maxPerServer: config.MAX_CONNECTIONS_PER_SERVER, now });
  const settings = createSettingsService(backend, now);
  const stats = createStatsService({ backend, registry, messenger, now });
  const abuse = createAbuseTracker(backend, {
    threshold: config.SPAM_THRESHOLD,
    windowMs: config.SPAM_WINDOW_MS,
    now,
  });
  const filter = createContentFilter({
    profanityWords: config.PROFANITY_WORDS,
    blockedDomains: config.BLOCKED_DOMAINS,
    massMentionThreshold: config.MASS_MENTION_THRESHOLD,
  });

  const engine = createRelayEngine({ config, messenger, backend, registry, settings, abuse, filter, now });
  const commands = createCommandHandler({
    config,
    messenger,
    backend,
    registry,
    settings,
    stats,
    now,
    ...(options.confirm ? { confirm: options.confirm } : {}),
  });

  return { registry, settings, stats, engine, commands };
}

export interface DispatchResult {
  outcome: RelayOutcome;
  command?: CommandResult;
}

/**
 * Run one inbound message through the relay engine; messages the engine
 * classifies as commands go to the command layer.
 */
export async function dispatchInbound(services: RelayServices, message: RelayInbound): Promise<DispatchResult> {
  markMessageReceived();

  const outcome = await services.engine.handle(message);
  if (outcome.status !== 'command') return { outcome };

  const command = await services.commands.handle(message, outcome.prefix);
  if (!command.handled) {
    logger.debug({ messageId: message.messageId, prefix: outcome.prefix }, 'Unknown command ignored');
  }
  return { outcome, command };
}
