/**
 * Retention sweep: prunes stale spam-tracking rows and schedules the
 * nightly 4 AM run.
 *
 * Connections, settings and message history are never touched here.
 */

import { logger } from '../middleware/logger.js';
import { ValidationError } from '../core/errors.js';
import type { DbBackend } from './db-backend.js';
import type { MaintenanceStats } from './db-types.js';

export type { MaintenanceStats } from './db-types.js';

export const MIN_RETENTION_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Delete spam_tracking rows whose last message is older than `days` days.
 * Rejects windows shorter than a week before touching storage.
 */
export async function runRetentionSweep(
  backend: DbBackend,
  days: number,
  now: number = Date.now(),
): Promise<MaintenanceStats> {
  if (!Number.isInteger(days) || days < MIN_RETENTION_DAYS) {
    throw new ValidationError(
      'invalid_argument',
      `Retention must be a whole number of days, at least ${MIN_RETENTION_DAYS}`,
    );
  }

  const cutoff = now - days * DAY_MS;
  const stats = await backend.pruneSpamTracking(cutoff);

  logger.info({
    ...stats,
    retentionDays: days,
    cutoff: new Date(cutoff).toISOString(),
  }, 'Retention sweep complete');

  return stats;
}

// ── Scheduled maintenance ───────────────────────────────────────────

let maintenanceTimer: ReturnType<typeof setTimeout> | null = null;

/**
 * Schedule the sweep daily at 4 AM local time.
 * Reschedules itself after each run; failures are logged and the next run
 * still happens.
 */
export function scheduleMaintenance(backend: DbBackend, days: number): void {
  const now = new Date();
  const next4AM = new Date(now);
  next4AM.setHours(4, 0, 0, 0);

  // If it's already past 4 AM today, schedule for tomorrow
  if (now >= next4AM) {
    next4AM.setDate(next4AM.getDate() + 1);
  }

  const msUntil = next4AM.getTime() - now.getTime();

  maintenanceTimer = setTimeout(() => {
    runRetentionSweep(backend, days)
      .catch((err: unknown) => {
        logger.error({ err, retentionDays: days }, 'Retention sweep failed');
      })
      .finally(() => scheduleMaintenance(backend, days));
  }, msUntil);
  maintenanceTimer.unref();

  logger.info({
    nextRun: next4AM.toISOString(),
    inHours: +(msUntil / 3_600_000).toFixed(1),
  }, 'Retention sweep scheduled');
}

/** Stop the scheduled daily sweep. */
export function stopMaintenance(): void {
  if (maintenanceTimer) {
    clearTimeout(maintenanceTimer);
    maintenanceTimer = null;
  }
}
