/**
 * Abuse tracker: per (user, server, channel) sliding window over relayed
 * messages.
 *
 * Window state lives in spam_tracking so it survives restarts. Calls for the
 * same key are serialized in-process; different keys never wait on each other.
 */

import { logger } from '../middleware/logger.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { SpamCheckResult, SpamKey } from '../utils/db-types.js';

export interface AbuseTrackerOptions {
  /** Messages per window at which the key is blocked. */
  threshold: number;
  windowMs: number;
  now?: () => number;
}

/** Chains async work per key; the chain entry is dropped once it drains. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Keys with work queued or running. */
  get size(): number {
    return this.tails.size;
  }
}

function spamKeyId(key: SpamKey): string {
  return `${key.userId}:${key.serverId}:${key.channelId}`;
}

export interface AbuseTracker {
  recordAndCheck(userId: string, serverId: string, channelId: string): Promise<SpamCheckResult>;
  isBlocked(userId: string, serverId: string, channelId: string): Promise<boolean>;
}

export function createAbuseTracker(backend: DbBackend, options: AbuseTrackerOptions): AbuseTracker {
  const mutex = new KeyedMutex();
  const now = options.now ?? Date.now;

  return {
    async recordAndCheck(userId, serverId, channelId) {
      const key: SpamKey = { userId, serverId, channelId };
      const result = await mutex.run(spamKeyId(key), () =>
        backend.trackSpamMessage(key, now(), options.windowMs, options.threshold));

      if (result.blocked) {
        logger.info({ ...key, count: result.count, threshold: options.threshold }, 'Spam threshold reached');
      }
      return result;
    },

    async isBlocked(userId, serverId, channelId) {
      const entry = await backend.getLiveSpamEntry({ userId, serverId, channelId }, now(), options.windowMs);
      return entry?.blocked ?? false;
    },
  };
}
