/**
 * Content filter patterns: regexes and the built-in domain blocklist.
 *
 * Pure data, no external dependencies. Patterns run against lowercased
 * text unless noted.
 */

// ── Types ───────────────────────────────────────────────────────────

export type FilterReason =
  | 'profanity'
  | 'blocked_link'
  | 'spam_pattern'
  | 'mass_mention'
  | 'token_leak';

// ── URLs ────────────────────────────────────────────────────────────

/**
 * Tolerant URL matcher: explicit http(s) URLs, bare `host.tld/path`
 * forms and bare IPv4 hosts.
 */
export const URL_PATTERN =
  /\bhttps?:\/\/[^\s<>]+|\b(?:\d{1,3}\.){3}\d{1,3}(?::\d+)?(?:\/[^\s<>]*)?|\b(?:[a-z0-9-]+\.)+[a-z]{2,}(?::\d+)?(?:\/[^\s<>]*)?/gi;

/** Punctuation that ends a sentence rather than a URL. */
export const URL_TRAILING_PUNCTUATION = /[.,!?;:)\]'"]+$/;

export const HAS_SCHEME = /^https?:\/\//i;

export const FAKE_GIFT_PATTERN = /discord(?:\.(?:gift|nitro|app)|app\.com\/gifts?)/i;

export const IPV4_PATTERN = /\b(?:[0-9]{1,3}\.){3}[0-9]{1,3}\b/;

export const SUSPICIOUS_PATH_FRAGMENTS = ['/logger', '/grab', '/track', '/ip'] as const;

/** IP loggers, shorteners and gift-scam lookalikes. */
export const BUILTIN_BLOCKED_DOMAINS: readonly string[] = [
  'bit.ly',
  'tinyurl.com',
  'grabify.link',
  'iplogger.org',
  '2no.co',
  'cutt.ly',
  'discord.gift',
  'discordnitro.info',
  'discord-nitro.org',
  'discordgift.site',
  'steamcommunity-net.org',
  'steemcommunity.org',
  'stemcommunity.org',
  'iplogger.com',
  'iplogger.net',
  'iplogger.co',
  'yip.su',
  'iplis.ru',
  'ip-api.io',
  'bmwforum.co',
  'leancoding.co',
  'quickmessage.io',
  'spottyfly.com',
];

// ── Message patterns ────────────────────────────────────────────────

// Unicode-aware start-of-word, so Cyrillic stems anchor the same way Latin ones do.
const WORD_START = '(?<![\\p{L}\\p{N}_])';

export const SPAM_PATTERNS: readonly RegExp[] = [
  /(.)\1{10,}/u,
  /(.{1,5})\1{5,}/u,
  new RegExp(`${WORD_START}(free|бесплатн).*(nitro|discord)`, 'u'),
  new RegExp(`${WORD_START}(win|выигра).*(money|деньг|приз)`, 'u'),
  new RegExp(`${WORD_START}(click|кликн|переход).*(link|ссылк)`, 'u'),
];

export const MASS_MENTION_PATTERN = /@(everyone|here)/gi;

export const TOKEN_PATTERN = /[MN][A-Za-z\d]{23}\.[\w-]{6}\.[\w-]{27}|mfa\.[\w-]{84}/i;
