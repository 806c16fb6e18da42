import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { readFileSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');

const TRUTHY = new Set(['true', '1', 'yes', 'on']);

const booleanFlag = z
  .string()
  .default('false')
  .transform((value) => TRUTHY.has(value.trim().toLowerCase()));

const commaList = z
  .string()
  .default('')
  .transform((value) => value
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean));

const envSchema = z.object({
  // Discord
  DISCORD_BOT_TOKEN: z.string().min(1).optional(),
  DISCORD_DEMO: booleanFlag,
  DISCORD_DEMO_BIND_HOST: z.string().default('127.0.0.1'),
  DISCORD_DEMO_PORT: z.coerce.number().int().min(1).max(65_535).default(3002),

  // Commands
  COMMAND_PREFIX: z.string().min(1).max(5).default('!'),

  // Storage
  DB_DIALECT: z.enum(['sqlite', 'postgres']).default('sqlite'),
  DATABASE_PATH: z.string().default('data/relay.db'),
  DATABASE_URL: z.string().optional(),

  // Abuse controls
  SPAM_THRESHOLD: z.coerce.number().int().min(1).default(5),
  SPAM_TIME_WINDOW: z.coerce.number().int().min(1).default(10), // seconds
  MAX_CONNECTIONS_PER_SERVER: z.coerce.number().int().min(1).default(10),

  // Forwarding limits
  MAX_FILE_SIZE: z.coerce.number().int().min(1).default(8_388_608), // 8 MB
  MAX_ATTACHMENTS: z.coerce.number().int().min(0).max(10).default(10),
  MAX_MESSAGE_LENGTH: z.coerce.number().int().min(16).max(4096).default(2000),

  // Retention sweep
  RETENTION_DAYS: z.coerce.number().int().min(7, 'RETENTION_DAYS must be at least 7').default(30),

  // Content filtering
  BLOCKED_DOMAINS: commaList,
  PROFANITY_WORDS: commaList,
  PROFANITY_WORDS_FILE: z.string().optional(),
  MASS_MENTION_THRESHOLD: z.coerce.number().int().min(1).default(3),
  STRICT_FILTER: booleanFlag,

  // Infrastructure
  HEALTH_PORT: z.coerce.number().int().min(0).max(65_535).default(3001),
  HEALTH_BIND_HOST: z.string().default('127.0.0.1'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

type ParsedEnv = z.infer<typeof envSchema>;

/**
 * Runtime configuration, built once at startup and passed to every
 * component that needs it.
 */
export interface RelayConfig extends Readonly<Omit<ParsedEnv, 'PROFANITY_WORDS'>> {
  /** Merged from PROFANITY_WORDS and PROFANITY_WORDS_FILE. */
  readonly PROFANITY_WORDS: readonly string[];
  /** SPAM_TIME_WINDOW converted to milliseconds. */
  readonly SPAM_WINDOW_MS: number;
  /** DATABASE_PATH resolved against the project root. */
  readonly DATABASE_FILE: string;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function readWordFile(path: string): string[] {
  const absolute = isAbsolute(path) ? path : resolve(PROJECT_ROOT, path);
  return readFileSync(absolute, 'utf-8')
    .split(/\r?\n/)
    .map((line) => line.trim().toLowerCase())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Parse and validate configuration from an environment map.
 * Throws ConfigError listing every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  // Blank lines in .env (`KEY=`) mean "unset", not "empty string".
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const data = parsed.data;
  const issues: string[] = [];

  if (!data.DISCORD_BOT_TOKEN && !data.DISCORD_DEMO) {
    issues.push('DISCORD_BOT_TOKEN is required unless DISCORD_DEMO=true');
  }
  if (data.DB_DIALECT === 'postgres' && !data.DATABASE_URL) {
    issues.push('DATABASE_URL is required when DB_DIALECT=postgres');
  }

  let profanityWords = data.PROFANITY_WORDS;
  if (data.PROFANITY_WORDS_FILE) {
    try {
      profanityWords = [...profanityWords, ...readWordFile(data.PROFANITY_WORDS_FILE)];
    } catch (err) {
      issues.push(`PROFANITY_WORDS_FILE: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  if (issues.length > 0) throw new ConfigError(issues);

  return Object.freeze({
    ...data,
    PROFANITY_WORDS: Object.freeze(Array.from(new Set(profanityWords))),
    SPAM_WINDOW_MS: data.SPAM_TIME_WINDOW * 1000,
    DATABASE_FILE: data.DATABASE_PATH === ':memory:' || isAbsolute(data.DATABASE_PATH)
      ? data.DATABASE_PATH
      : resolve(PROJECT_ROOT, data.DATABASE_PATH),
  });
}

/** Load `.env` from the project root into process.env, then parse it. */
export function loadConfigFromEnvironment(): RelayConfig {
  loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });
  return loadConfig(process.env);
}

export { PROJECT_ROOT };
