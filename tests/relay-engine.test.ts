import { createHash } from 'node:crypto';

import { beforeEach, describe, it, expect } from 'vitest';

import { EMPTY_TEXT_PLACEHOLDER, buildForwardedMessage, contentHash } from '../src/core/relay-engine.js';
import { dispatchInbound } from '../src/core/relay-services.js';
import { getRelayStats, resetRelayStats } from '../src/middleware/stats.js';
import {
  ALICE,
  CHANNEL_A,
  CHANNEL_B,
  CHANNEL_C,
  SERVER_A,
  SERVER_B,
  SERVER_C,
  T0,
  createHarness,
  demoChannel,
  inbound,
  type Harness,
} from './helpers.js';

async function linkAB(harness: Harness, name = 'bridge'): Promise<number> {
  return harness.services.registry.create({
    server1Id: SERVER_A,
    channel1Id: CHANNEL_A,
    server2Id: SERVER_B,
    channel2Id: CHANNEL_B,
    name,
    createdBy: ALICE,
  });
}

describe('Relay engine', () => {
  let harness: Harness;

  beforeEach(() => {
    resetRelayStats();
    harness = createHarness();
  });

  it('forwards a message as an embed and records it', async () => {
    const id = await linkAB(harness);
    const message = inbound({ messageId: 'orig-1', text: 'hello there' });

    const outcome = await harness.services.engine.handle(message);

    expect(outcome).toEqual({ status: 'relayed', delivered: 1, failed: 0, skipped: 0 });
    expect(harness.outbox).toEqual([{
      type: 'send',
      channelId: CHANNEL_B,
      messageId: 'demo-1',
      message: {
        embed: {
          description: 'hello there',
          color: 0x7289da,
          author: { name: 'Alice (Server A)' },
          timestamp: T0,
          footer: `Connection: bridge • ID: ${id}`,
        },
      },
    }]);

    expect(await harness.backend.getMessageLog(id)).toEqual([{
      originalMessageId: 'orig-1',
      forwardedMessageId: 'demo-1',
      authorId: ALICE,
      connectionId: id,
      timestamp: T0,
      contentHash: createHash('sha256').update('hello there').digest('hex'),
    }]);
    expect(getRelayStats().total.forwards.delivered).toBe(1);
  });

  it('relays in both directions', async () => {
    await linkAB(harness);
    const outcome = await harness.services.engine.handle(inbound({
      channelId: CHANNEL_B,
      serverId: SERVER_B,
      serverName: 'Server B',
    }));

    expect(outcome.status).toBe('relayed');
    expect(harness.outbox[0]).toMatchObject({ type: 'send', channelId: CHANNEL_A });
  });

  it('uses a placeholder for attachment-only messages and drops oversized files', async () => {
    harness = createHarness({
      attachments: new Map([['https://cdn.example.test/a.png', new Uint8Array([1, 2, 3])]]),
    });
    await linkAB(harness);

    const outcome = await harness.services.engine.handle(inbound({
      text: '',
      attachments: [
        { id: '1', filename: 'a.png', url: 'https://cdn.example.test/a.png', size: 3, contentType: 'image/png' },
        { id: '2', filename: 'huge.bin', url: 'https://cdn.example.test/huge.bin', size: 9_000_000, contentType: null },
      ],
    }));

    expect(outcome).toEqual({ status: 'relayed', delivered: 1, failed: 0, skipped: 0 });
    const sent = harness.outbox[0];
    expect(sent.type === 'send' && sent.message.embed?.description).toBe(EMPTY_TEXT_PLACEHOLDER);
    expect(sent.type === 'send' && sent.message.files).toEqual([{ name: 'a.png', size: 3 }]);
    expect(getRelayStats().total.attachmentsDropped).toBe(1);

    const [entry] = await harness.backend.getMessageLog(1);
    expect(entry?.contentHash).toBeNull();
  });

  it('sends text with its attachment and logs one hashed entry', async () => {
    harness = createHarness({
      attachments: new Map([['https://cdn.example.test/f.bin', new Uint8Array(100)]]),
    });
    const id = await linkAB(harness);

    const outcome = await harness.services.engine.handle(inbound({
      text: 'hi',
      attachments: [{ id: '1', filename: 'f.bin', url: 'https://cdn.example.test/f.bin', size: 100, contentType: null }],
    }));

    expect(outcome).toEqual({ status: 'relayed', delivered: 1, failed: 0, skipped: 0 });
    expect(harness.outbox).toHaveLength(1);
    const sent = harness.outbox[0];
    expect(sent.type === 'send' && sent.message.embed?.description).toBe('hi');
    expect(sent.type === 'send' && sent.message.files).toEqual([{ name: 'f.bin', size: 100 }]);

    const log = await harness.backend.getMessageLog(id);
    expect(log).toHaveLength(1);
    expect(log[0]?.contentHash).toBe(createHash('sha256').update('hi').digest('hex'));
  });

  it('drops attachments that cannot be downloaded', async () => {
    await linkAB(harness);

    const outcome = await harness.services.engine.handle(inbound({
      attachments: [{ id: '1', filename: 'gone.png', url: 'https://cdn.example.test/gone.png', size: 10, contentType: null }],
    }));

    expect(outcome.status).toBe('relayed');
    const sent = harness.outbox[0];
    expect(sent.type === 'send' && sent.message.files).toBeUndefined();
  });

  it('truncates long text to the configured length', async () => {
    await linkAB(harness);
    await harness.services.engine.handle(inbound({ text: 'x'.repeat(2500) }));

    const sent = harness.outbox[0];
    const description = sent.type === 'send' ? sent.message.embed?.description : undefined;
    expect(description).toHaveLength(2000);
    expect(description?.endsWith('...')).toBe(true);
  });

  it('ignores its own, bot and non-default messages', async () => {
    await linkAB(harness);

    expect(await harness.services.engine.handle(inbound({ fromSelf: true }))).toEqual({ status: 'ignored', reason: 'self' });
    expect(await harness.services.engine.handle(inbound({ authorIsBot: true }))).toEqual({ status: 'ignored', reason: 'bot_author' });
    expect(await harness.services.engine.handle(inbound({ kind: 'reply' }))).toEqual({ status: 'ignored', reason: 'not_default' });
    expect(harness.outbox).toEqual([]);
  });

  it('hands prefixed messages to the command layer', async () => {
    expect(await harness.services.engine.handle(inbound({ text: '!help' }))).toEqual({ status: 'command', prefix: '!' });

    await harness.services.settings.updateSetting(SERVER_A, 'prefix', '?');
    expect(await harness.services.engine.handle(inbound({ text: '?connect list' }))).toEqual({ status: 'command', prefix: '?' });
  });

  it('relays text under the global prefix once a server overrides it', async () => {
    await linkAB(harness);
    await harness.services.settings.updateSetting(SERVER_A, 'prefix', '?');

    expect(await harness.services.engine.handle(inbound({ text: '!not a command' })))
      .toEqual({ status: 'relayed', delivered: 1, failed: 0, skipped: 0 });
    const sent = harness.outbox[0];
    expect(sent.type === 'send' && sent.message.embed?.description).toBe('!not a command');
  });

  it('does nothing on a disabled server', async () => {
    await linkAB(harness);
    await harness.services.settings.updateSetting(SERVER_A, 'enabled', 'off');

    expect(await harness.services.engine.handle(inbound())).toEqual({ status: 'disabled' });
    expect(harness.outbox).toEqual([]);
  });

  it('reports channels without connections', async () => {
    expect(await harness.services.engine.handle(inbound())).toEqual({ status: 'no_connections' });
  });

  it('blocks the message that crosses the spam threshold', async () => {
    await linkAB(harness);

    const statuses = [];
    for (let i = 0; i < 5; i++) {
      statuses.push((await harness.services.engine.handle(inbound({ text: `msg ${i}` }))).status);
    }

    expect(statuses).toEqual(['relayed', 'relayed', 'relayed', 'relayed', 'spam_blocked']);
    expect(harness.outbox).toHaveLength(4);
  });

  it('keeps dropping messages past the threshold without logging them', async () => {
    const id = await linkAB(harness);

    const statuses = [];
    for (let i = 0; i < 6; i++) {
      statuses.push((await harness.services.engine.handle(inbound({ text: `msg ${i}` }))).status);
    }

    expect(statuses).toEqual(['relayed', 'relayed', 'relayed', 'relayed', 'spam_blocked', 'spam_blocked']);
    expect(harness.outbox).toHaveLength(4);
    expect(await harness.backend.getMessageLog(id)).toHaveLength(4);
  });

  it('fails closed when settings cannot be read', async () => {
    const id = await linkAB(harness);
    harness.backend.ensureServerSettings = async () => {
      throw new Error('db down');
    };

    expect(await harness.services.engine.handle(inbound())).toEqual({ status: 'failed', error: 'db down' });
    expect(harness.outbox).toEqual([]);
    expect(await harness.backend.getMessageLog(id)).toEqual([]);
    expect(getRelayStats().total.outcomes.failed).toBe(1);
  });

  it('fails closed when the abuse tracker cannot be read', async () => {
    const id = await linkAB(harness);
    harness.backend.trackSpamMessage = async () => {
      throw new Error('spam table locked');
    };

    expect(await harness.services.engine.handle(inbound())).toEqual({ status: 'failed', error: 'spam table locked' });
    expect(harness.outbox).toEqual([]);
    expect(await harness.backend.getMessageLog(id)).toEqual([]);
  });

  it('skips spam tracking when the server turns it off', async () => {
    await linkAB(harness);
    await harness.services.settings.updateSetting(SERVER_A, 'spam_protection', 'off');

    for (let i = 0; i < 6; i++) await harness.services.engine.handle(inbound({ text: `msg ${i}` }));
    expect(harness.outbox).toHaveLength(6);
  });

  it('filters blocked links and profanity', async () => {
    harness = createHarness({ env: { PROFANITY_WORDS: 'darn' } });
    await linkAB(harness);

    expect(await harness.services.engine.handle(inbound({ text: 'check bit.ly/abc' })))
      .toEqual({ status: 'filtered', reasons: ['blocked_link'] });
    expect(await harness.services.engine.handle(inbound({ text: 'darn it' })))
      .toEqual({ status: 'filtered', reasons: ['profanity'] });
    expect(harness.outbox).toEqual([]);

    await harness.services.settings.updateSetting(SERVER_A, 'profanity_filter', 'off');
    expect((await harness.services.engine.handle(inbound({ text: 'darn it' }))).status).toBe('relayed');
  });

  it('runs the extra checks only in strict mode', async () => {
    await linkAB(harness);
    const text = '@everyone @everyone @everyone';
    expect((await harness.services.engine.handle(inbound({ text }))).status).toBe('relayed');

    const strict = createHarness({ env: { STRICT_FILTER: 'true' } });
    await linkAB(strict);
    expect(await strict.services.engine.handle(inbound({ text })))
      .toEqual({ status: 'filtered', reasons: ['mass_mention'] });
  });

  it('skips targets the bot cannot post in or cannot see', async () => {
    harness = createHarness({
      channels: [
        demoChannel(CHANNEL_A, SERVER_A, 'Server A'),
        demoChannel(CHANNEL_B, SERVER_B, 'Server B', ['view']),
      ],
    });
    await linkAB(harness);
    await harness.services.registry.create({
      server1Id: SERVER_A,
      channel1Id: CHANNEL_A,
      server2Id: SERVER_C,
      channel2Id: CHANNEL_C,
      name: 'ghost',
      createdBy: ALICE,
    });

    const outcome = await harness.services.engine.handle(inbound());

    expect(outcome).toEqual({ status: 'relayed', delivered: 0, failed: 0, skipped: 2 });
    expect(harness.outbox).toEqual([]);
  });

  it('delivers to healthy connections when another one fails', async () => {
    harness = createHarness({
      channels: [
        demoChannel(CHANNEL_A, SERVER_A, 'Server A'),
        demoChannel(CHANNEL_B, SERVER_B, 'Server B'),
        demoChannel(CHANNEL_C, SERVER_C, 'Server C'),
      ],
    });
    await linkAB(harness);
    await harness.services.registry.create({
      server1Id: SERVER_A,
      channel1Id: CHANNEL_A,
      server2Id: SERVER_C,
      channel2Id: CHANNEL_C,
      name: 'second',
      createdBy: ALICE,
    });
    const messenger = harness.messenger;
    const originalSend = messenger.send.bind(messenger);
    messenger.send = async (channelId, message) => {
      if (channelId === CHANNEL_B) throw new Error('boom');
      return originalSend(channelId, message);
    };

    const outcome = await harness.services.engine.handle(inbound());

    expect(outcome).toEqual({ status: 'relayed', delivered: 1, failed: 1, skipped: 0 });
    expect(harness.outbox.map((entry) => entry.channelId)).toEqual([CHANNEL_C]);
  });

  it('routes commands through dispatchInbound', async () => {
    const result = await dispatchInbound(harness.services, inbound({ text: '!help' }));

    expect(result.outcome).toEqual({ status: 'command', prefix: '!' });
    expect(result.command).toEqual({ handled: true, command: 'help' });
    expect(harness.outbox[0]).toMatchObject({ type: 'send', channelId: CHANNEL_A });
  });
});

describe('Forwarded message shape', () => {
  it('carries the author avatar when present', () => {
    const message = buildForwardedMessage(
      inbound({ authorAvatarUrl: 'https://cdn.example.test/avatar.png', text: 'hi' }),
      {
        id: 7,
        server1Id: SERVER_A,
        channel1Id: CHANNEL_A,
        server2Id: SERVER_B,
        channel2Id: CHANNEL_B,
        name: 'bridge',
        createdBy: ALICE,
        description: null,
        createdAt: T0,
        active: true,
      },
      2000,
    );

    expect(message.embed?.author).toEqual({ name: 'Alice (Server A)', iconUrl: 'https://cdn.example.test/avatar.png' });
    expect(message.embed?.footer).toBe('Connection: bridge • ID: 7');
    expect(message.files).toBeUndefined();
  });

  it('hashes only non-empty text', () => {
    expect(contentHash('')).toBeNull();
    expect(contentHash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});
