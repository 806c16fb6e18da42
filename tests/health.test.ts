import { afterEach, describe, it, expect } from 'vitest';

import {
  buildHealthReport,
  getConnectionState,
  isHealthRequestRateLimited,
  markConnected,
  markDisconnected,
  markMessageReceived,
  stopHealthServer,
} from '../src/middleware/health.js';
import { recordRelayOutcome, resetRelayStats } from '../src/middleware/stats.js';

afterEach(() => {
  stopHealthServer();
});

describe('Health endpoint', () => {
  it('rate limits each address to 120 requests per minute', () => {
    const now = 1_000_000;
    const results = Array.from({ length: 121 }, () => isHealthRequestRateLimited('10.0.0.1', now));

    expect(results.slice(0, 120).every((limited) => !limited)).toBe(true);
    expect(results[120]).toBe(true);
    expect(isHealthRequestRateLimited('10.0.0.2', now)).toBe(false);
    expect(isHealthRequestRateLimited('10.0.0.1', now + 60_000)).toBe(false);
  });

  it('tracks gateway state', () => {
    markConnected();
    expect(getConnectionState().status).toBe('connected');
    markMessageReceived();
    expect(getConnectionState().lastMessageAt).not.toBeNull();
    markDisconnected();
    expect(getConnectionState().status).toBe('disconnected');
  });

  it('reports relay counters', () => {
    resetRelayStats();
    recordRelayOutcome('relayed');
    recordRelayOutcome('filtered');

    const report = buildHealthReport();

    expect(Object.keys(report)).toEqual([
      'status',
      'stale',
      'uptime',
      'connectedFor',
      'lastMessageAgo',
      'reconnectCount',
      'memory',
      'relay',
    ]);
    expect(report.relay).toMatchObject({
      outcomes: { relayed: 1, filtered: 1 },
      forwards: { delivered: 0, failed: 0, skipped: 0 },
      attachmentsDropped: 0,
    });
  });
});
