/**
 * Content filter: classifies message text before it leaves its origin
 * channel.
 *
 * Every check is pure and synchronous. The relay engine decides which
 * checks apply; this module only reports which ones matched.
 */

import { logger } from '../middleware/logger.js';
import {
  BUILTIN_BLOCKED_DOMAINS,
  FAKE_GIFT_PATTERN,
  HAS_SCHEME,
  IPV4_PATTERN,
  MASS_MENTION_PATTERN,
  SPAM_PATTERNS,
  SUSPICIOUS_PATH_FRAGMENTS,
  TOKEN_PATTERN,
  URL_PATTERN,
  URL_TRAILING_PUNCTUATION,
  type FilterReason,
} from './filter-patterns.js';

export type { FilterReason } from './filter-patterns.js';

export interface FilterChecks {
  profanity?: boolean;
  links?: boolean;
  spamPatterns?: boolean;
  massMentions?: boolean;
  tokens?: boolean;
}

export interface FilterVerdict {
  allowed: boolean;
  reasons: Set<FilterReason>;
}

export interface ContentFilterOptions {
  profanityWords?: readonly string[];
  /** Added to the built-in blocklist. */
  blockedDomains?: readonly string[];
  massMentionThreshold?: number;
}

export interface ContentFilter {
  classify(text: string, checks?: FilterChecks): FilterVerdict;
  containsProfanity(text: string): boolean;
  containsBlockedLink(text: string): boolean;
  isSuspiciousUrl(url: string): boolean;
  isSpamPattern(text: string): boolean;
  containsMassMentions(text: string): boolean;
  containsToken(text: string): boolean;
}

const ALL_CHECKS: Required<FilterChecks> = {
  profanity: true,
  links: true,
  spamPatterns: true,
  massMentions: true,
  tokens: true,
};

// ── Text helpers ────────────────────────────────────────────────────

/** Every URL-like token in `text`, in order, with trailing punctuation trimmed. */
export function extractUrls(text: string): string[] {
  if (!text) return [];
  const matches = text.match(URL_PATTERN) ?? [];
  return matches
    .map((match) => match.replace(URL_TRAILING_PUNCTUATION, ''))
    .filter((url) => url.length > 0);
}

/** Collapse whitespace runs and truncate with `...` past `maxLength`. */
export function cleanText(text: string, maxLength?: number): string {
  if (!text) return text;
  const cleaned = text.trim().replace(/\s+/g, ' ');
  if (maxLength !== undefined && cleaned.length > maxLength) {
    return cleaned.slice(0, Math.max(0, maxLength - 3)) + '...';
  }
  return cleaned;
}

export function removeUrls(text: string, replacement: string = '[link removed]'): string {
  if (!text) return text;
  return text.replace(URL_PATTERN, replacement);
}

// ── Filter ──────────────────────────────────────────────────────────

export function createContentFilter(options: ContentFilterOptions = {}): ContentFilter {
  const profanityWords = (options.profanityWords ?? [])
    .map((word) => word.trim().toLowerCase())
    .filter(Boolean);
  const blockedDomains = new Set(
    [...BUILTIN_BLOCKED_DOMAINS, ...(options.blockedDomains ?? [])].map((domain) => domain.toLowerCase()),
  );
  const massMentionThreshold = options.massMentionThreshold ?? 3;

  const isBlockedHost = (host: string): boolean => {
    if (blockedDomains.has(host)) return true;
    for (const blocked of blockedDomains) {
      if (host.endsWith(`.${blocked}`)) return true;
    }
    return false;
  };

  const isSuspiciousUrl = (url: string): boolean => {
    const lowered = url.toLowerCase();
    let parsed: URL;
    try {
      parsed = new URL(HAS_SCHEME.test(lowered) ? lowered : `http://${lowered}`);
    } catch (err) {
      logger.warn({ err, url }, 'Could not parse URL; treating as safe');
      return false;
    }

    let host = parsed.hostname;
    if (host.startsWith('www.')) host = host.slice(4);

    if (isBlockedHost(host)) return true;
    if (FAKE_GIFT_PATTERN.test(lowered)) return true;
    if (IPV4_PATTERN.test(host)) return true;
    if (host.length < 6 && /\d/.test(host)) return true;

    const path = parsed.pathname.toLowerCase();
    return SUSPICIOUS_PATH_FRAGMENTS.some((fragment) => path.includes(fragment));
  };

  const containsProfanity = (text: string): boolean => {
    if (!text || profanityWords.length === 0) return false;
    const lowered = text.toLowerCase();
    return profanityWords.some((word) => lowered.includes(word));
  };

  const containsBlockedLink = (text: string): boolean => extractUrls(text).some((url) => {
    const suspicious = isSuspiciousUrl(url);
    if (suspicious) logger.info({ url }, 'Suspicious link detected');
    return suspicious;
  });

  const isSpamPattern = (text: string): boolean => {
    if (!text) return false;
    const lowered = text.toLowerCase();
    return SPAM_PATTERNS.some((pattern) => pattern.test(lowered));
  };

  const containsMassMentions = (text: string): boolean => {
    if (!text) return false;
    return (text.match(MASS_MENTION_PATTERN)?.length ?? 0) >= massMentionThreshold;
  };

  const containsToken = (text: string): boolean => Boolean(text) && TOKEN_PATTERN.test(text);

  return {
    classify(text, checks = ALL_CHECKS) {
      const reasons = new Set<FilterReason>();
      if (!text) return { allowed: true, reasons };

      if (checks.profanity && containsProfanity(text)) reasons.add('profanity');
      if (checks.links && containsBlockedLink(text)) reasons.add('blocked_link');
      if (checks.spamPatterns && isSpamPattern(text)) reasons.add('spam_pattern');
      if (checks.massMentions && containsMassMentions(text)) reasons.add('mass_mention');
      if (checks.tokens && containsToken(text)) reasons.add('token_leak');

      return { allowed: reasons.size === 0, reasons };
    },
    containsProfanity,
    containsBlockedLink,
    isSuspiciousUrl,
    isSpamPattern,
    containsMassMentions,
    containsToken,
  };
}
