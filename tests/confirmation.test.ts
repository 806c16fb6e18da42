import { describe, it, expect } from 'vitest';

import { CONFIRM_EMOJI, DECLINE_EMOJI, awaitSignal, runConfirmation } from '../src/core/confirmation.js';
import { createDiscordDemoAdapter, type DiscordDemoOutboxEntry } from '../src/platforms/discord/adapter.js';
import { ALICE, BOB, CHANNEL_A, SERVER_A, demoChannel } from './helpers.js';

function setup() {
  const outbox: DiscordDemoOutboxEntry[] = [];
  const messenger = createDiscordDemoAdapter(outbox, { channels: [demoChannel(CHANNEL_A, SERVER_A, 'Server A')] });
  return { outbox, messenger };
}

/** runConfirmation subscribes only after the reactions are added. */
const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('runConfirmation', () => {
  const request = { channelId: CHANNEL_A, messageId: 'prompt-1', userId: ALICE, timeoutMs: 1_000 };

  it('confirms on the invoking user\'s ✅ and clears reactions', async () => {
    const { outbox, messenger } = setup();
    const pending = runConfirmation(messenger, request);

    await flush();
    messenger.emitReaction({ messageId: 'prompt-1', userId: ALICE, emoji: CONFIRM_EMOJI });

    expect(await pending).toBe('confirmed');
    expect(outbox).toEqual([
      { type: 'react', channelId: CHANNEL_A, messageId: 'prompt-1', emojis: [CONFIRM_EMOJI, DECLINE_EMOJI] },
      { type: 'clear_reactions', channelId: CHANNEL_A, messageId: 'prompt-1' },
    ]);
  });

  it('declines on ❌', async () => {
    const { messenger } = setup();
    const pending = runConfirmation(messenger, request);

    await flush();
    messenger.emitReaction({ messageId: 'prompt-1', userId: ALICE, emoji: DECLINE_EMOJI });

    expect(await pending).toBe('declined');
  });

  it('ignores other users and other emoji until it expires', async () => {
    const { messenger } = setup();
    const pending = runConfirmation(messenger, { ...request, timeoutMs: 20 });

    await flush();
    messenger.emitReaction({ messageId: 'prompt-1', userId: BOB, emoji: CONFIRM_EMOJI });
    messenger.emitReaction({ messageId: 'prompt-1', userId: ALICE, emoji: '👍' });

    expect(await pending).toBe('expired');
  });
});

describe('awaitSignal', () => {
  it('settles on a value emitted during subscribe and unsubscribes', async () => {
    let unsubscribed = false;
    const outcome = await awaitSignal<number>((emit) => {
      emit(42);
      return () => {
        unsubscribed = true;
      };
    }, 1_000);

    expect(outcome).toEqual({ status: 'signal', value: 42 });
    expect(unsubscribed).toBe(true);
  });

  it('keeps only the first value', async () => {
    const outcome = await awaitSignal<string>((emit) => {
      setTimeout(() => {
        emit('first');
        emit('second');
      }, 0);
      return () => undefined;
    }, 1_000);

    expect(outcome).toEqual({ status: 'signal', value: 'first' });
  });

  it('expires without a signal', async () => {
    let unsubscribed = false;
    const outcome = await awaitSignal<string>(() => () => {
      unsubscribed = true;
    }, 10);

    expect(outcome).toEqual({ status: 'expired' });
    expect(unsubscribed).toBe(true);
  });
});
