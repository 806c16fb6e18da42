/**
 * Discord text formatting helpers + shared utility types.
 *
 * Discord markdown:
 *   **bold**  *italic*  ~~strikethrough~~  `inline`  ```block```
 */

// ── Shared utility types ────────────────────────────────────────────

/**
 * Discriminated union for operations that report failure as a value.
 *
 * @example
 * ```ts
 * function parseId(raw: string): Result<string> {
 *   if (!/^\d+$/.test(raw)) return { ok: false, error: 'Not an id' };
 *   return { ok: true, value: raw };
 * }
 * ```
 */
export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/** Bold text */
export function bold(text: string): string {
  return `**${text}**`;
}

/** Inline code */
export function code(text: string): string {
  return `\`${text}\``;
}

/** Channel mention */
export function channelMention(channelId: string): string {
  return `<#${channelId}>`;
}

/** User mention */
export function userMention(userId: string): string {
  return `<@${userId}>`;
}

/** Truncate text to max length with ellipsis */
export function truncate(text: string, maxLength: number = 2000): string {
  if (text.length <= maxLength) return text;
  let end = maxLength - 3;
  // Never split a surrogate pair
  if (end > 0 && isHighSurrogate(text.charCodeAt(end - 1))) end--;
  return text.slice(0, end) + '...';
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Human-readable uptime, e.g. `2d 3h 15m`. */
export function formatDuration(ms: number): string {
  const totalMinutes = Math.max(0, Math.floor(ms / 60_000));
  const days = Math.floor(totalMinutes / 1440);
  const hours = Math.floor((totalMinutes % 1440) / 60);
  const minutes = totalMinutes % 60;
  if (days > 0) return `${days}d ${hours}h ${minutes}m`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}

/** `YYYY-MM-DD` in UTC. */
export function formatDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

// ── Embed colors ────────────────────────────────────────────────────

export const EMBED_COLORS = {
  success: 0x00ff00,
  error: 0xff0000,
  warning: 0xffaa00,
  info: 0x0099ff,
  relay: 0x7289da,
} as const;
