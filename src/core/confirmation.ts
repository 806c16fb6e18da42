/**
 * Reaction-based confirmation for destructive commands.
 *
 * A prompt message moves from `awaiting_confirmation` to exactly one of
 * `confirmed`, `declined` or `expired`. Only reactions from the invoking
 * user count.
 */

import { logger } from '../middleware/logger.js';
import type { ReactionSignal, RelayMessenger } from './relay-messenger.js';

export const CONFIRM_EMOJI = '✅';
export const DECLINE_EMOJI = '❌';
export const CONFIRMATION_TIMEOUT_MS = 30_000;

export type ConfirmationState = 'awaiting_confirmation' | 'confirmed' | 'declined' | 'expired';
export type ConfirmationResult = Exclude<ConfirmationState, 'awaiting_confirmation'>;

export type SignalOutcome<T> =
  | { status: 'signal'; value: T }
  | { status: 'expired' };

/**
 * Resolve with the first value `subscribe` emits, or `expired` after
 * `timeoutMs`. The subscription is torn down either way.
 */
export function awaitSignal<T>(
  subscribe: (emit: (value: T) => void) => () => void,
  timeoutMs: number,
): Promise<SignalOutcome<T>> {
  return new Promise((resolve) => {
    let settled = false;
    let unsubscribe: (() => void) | null = null;

    const finish = (outcome: SignalOutcome<T>): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      unsubscribe?.();
      resolve(outcome);
    };

    const timer = setTimeout(() => finish({ status: 'expired' }), timeoutMs);
    unsubscribe = subscribe((value) => finish({ status: 'signal', value }));
    // A synchronous emit during subscribe settles before unsubscribe is known.
    if (settled) unsubscribe();
  });
}

export interface ConfirmationRequest {
  channelId: string;
  /** The prompt message the user reacts to. */
  messageId: string;
  userId: string;
  timeoutMs?: number;
}

const TRANSITIONS: Record<string, ConfirmationResult> = {
  [CONFIRM_EMOJI]: 'confirmed',
  [DECLINE_EMOJI]: 'declined',
};

function isDecision(signal: ReactionSignal, request: ConfirmationRequest): boolean {
  return signal.messageId === request.messageId
    && signal.userId === request.userId
    && signal.emoji in TRANSITIONS;
}

/**
 * Add ✅/❌ to the prompt and wait for the invoking user's choice.
 * Reactions are cleared afterwards; a failure to clear is logged only.
 */
export async function runConfirmation(
  messenger: RelayMessenger,
  request: ConfirmationRequest,
): Promise<ConfirmationResult> {
  const timeoutMs = request.timeoutMs ?? CONFIRMATION_TIMEOUT_MS;

  await messenger.addReactions(request.channelId, request.messageId, [CONFIRM_EMOJI, DECLINE_EMOJI]);

  const outcome = await awaitSignal<ReactionSignal>((emit) =>
    messenger.watchReactions(request.channelId, request.messageId, (signal) => {
      if (isDecision(signal, request)) emit(signal);
    }), timeoutMs);

  const state: ConfirmationResult = outcome.status === 'expired' ? 'expired' : TRANSITIONS[outcome.value.emoji] ?? 'declined';

  logger.info({
    channelId: request.channelId,
    messageId: request.messageId,
    userId: request.userId,
    state,
  }, 'Confirmation resolved');

  try {
    await messenger.clearReactions(request.channelId, request.messageId);
  } catch (err) {
    logger.warn({ err, channelId: request.channelId, messageId: request.messageId }, 'Failed to clear confirmation reactions');
  }

  return state;
}
