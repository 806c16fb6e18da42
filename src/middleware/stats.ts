/**
 * Relay counters: in-memory tallies of relay outcomes since process start,
 * with a daily bucket that rolls over at local midnight.
 *
 * Surfaced by the health endpoint and `admin stats`.
 */

import { logger } from './logger.js';

export type RelayOutcomeStatus =
  | 'ignored'
  | 'command'
  | 'disabled'
  | 'spam_blocked'
  | 'no_connections'
  | 'filtered'
  | 'relayed'
  | 'failed';

export type ForwardResult = 'delivered' | 'failed' | 'skipped';

export interface RelayCounters {
  outcomes: Record<RelayOutcomeStatus, number>;
  forwards: Record<ForwardResult, number>;
  attachmentsDropped: number;
}

export interface RelayStatsSnapshot {
  startedAt: number;
  total: RelayCounters;
  /** ISO date string (YYYY-MM-DD) of the daily bucket. */
  date: string;
  today: RelayCounters;
}

function freshCounters(): RelayCounters {
  return {
    outcomes: {
      ignored: 0,
      command: 0,
      disabled: 0,
      spam_blocked: 0,
      no_connections: 0,
      filtered: 0,
      relayed: 0,
      failed: 0,
    },
    forwards: { delivered: 0, failed: 0, skipped: 0 },
    attachmentsDropped: 0,
  };
}

function todayISO(): string {
  const now = new Date();
  return `${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, '0')}-${String(now.getDate()).padStart(2, '0')}`;
}

let startedAt = Date.now();
let total: RelayCounters = freshCounters();
let today: RelayCounters = freshCounters();
let currentDate = todayISO();

function maybeRollover(): void {
  const date = todayISO();
  if (date !== currentDate) {
    logger.info({ oldDate: currentDate, newDate: date, relayed: today.outcomes.relayed }, 'Relay stats rolled over');
    today = freshCounters();
    currentDate = date;
  }
}

// ── Public recording functions ──────────────────────────────────────

/** Record the terminal state of one inbound message. */
export function recordRelayOutcome(status: RelayOutcomeStatus): void {
  maybeRollover();
  total.outcomes[status]++;
  today.outcomes[status]++;
}

/** Record one per-connection forward attempt. */
export function recordForward(result: ForwardResult): void {
  maybeRollover();
  total.forwards[result]++;
  today.forwards[result]++;
}

/** Record attachments left off a forwarded message (too large or unreadable). */
export function recordAttachmentsDropped(count: number): void {
  if (count <= 0) return;
  maybeRollover();
  total.attachmentsDropped += count;
  today.attachmentsDropped += count;
}

function cloneCounters(counters: RelayCounters): RelayCounters {
  return {
    outcomes: { ...counters.outcomes },
    forwards: { ...counters.forwards },
    attachmentsDropped: counters.attachmentsDropped,
  };
}

export function getRelayStats(): RelayStatsSnapshot {
  maybeRollover();
  return {
    startedAt,
    total: cloneCounters(total),
    date: currentDate,
    today: cloneCounters(today),
  };
}

/** Reset all counters. Intended for tests. */
export function resetRelayStats(): void {
  startedAt = Date.now();
  total = freshCounters();
  today = freshCounters();
  currentDate = todayISO();
}
