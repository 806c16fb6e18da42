/**
 * Server settings: lazy-created per-server configuration with a closed set
 * of mutable keys.
 */

import { ValidationError } from '../core/errors.js';
import type { DbBackend } from '../utils/db-backend.js';
import type { ServerSettings, ServerSettingKey, ServerSettingUpdate } from '../utils/db-types.js';
import type { Result } from '../utils/formatting.js';

export type { ServerSettings, ServerSettingKey } from '../utils/db-types.js';

export const SETTING_KEYS: readonly ServerSettingKey[] = [
  'prefix',
  'enabled',
  'spam_protection',
  'profanity_filter',
  'auto_delete_commands',
  'webhook_notifications',
  'mod_role_id',
  'log_channel_id',
];

const TRUTHY = new Set(['true', '1', 'yes', 'on']);
const CLEAR_VALUES = new Set(['none', 'default', 'off', 'reset']);
const SNOWFLAKE = /^\d{15,21}$/;
const MAX_PREFIX_LENGTH = 5;

export function isSettingKey(value: string): value is ServerSettingKey {
  return SETTING_KEYS.some((key) => key === value);
}

function parseFlag(raw: string): boolean {
  return TRUTHY.has(raw.trim().toLowerCase());
}

/** Discord ids may arrive as a mention (`<@&123>`, `<#123>`) or bare digits. */
function parseId(raw: string): Result<string | null> {
  const value = raw.trim();
  if (CLEAR_VALUES.has(value.toLowerCase())) return { ok: true, value: null };
  const stripped = value.replace(/^<[@#]&?(\d+)>$/, '$1');
  if (!SNOWFLAKE.test(stripped)) return { ok: false, error: `"${raw}" is not a valid id (use digits or "none")` };
  return { ok: true, value: stripped };
}

function parsePrefix(raw: string): Result<string | null> {
  const value = raw.trim();
  if (CLEAR_VALUES.has(value.toLowerCase())) return { ok: true, value: null };
  if (value.length === 0 || value.length > MAX_PREFIX_LENGTH || /\s/.test(value)) {
    return { ok: false, error: `Prefix must be 1-${MAX_PREFIX_LENGTH} characters without spaces` };
  }
  return { ok: true, value };
}

/**
 * Turn a user-supplied key/value pair into a typed update.
 * Booleans accept true/1/yes/on; anything else reads as false.
 */
export function parseSettingUpdate(rawKey: string, rawValue: string): Result<ServerSettingUpdate> {
  const key = rawKey.trim().toLowerCase();
  if (!isSettingKey(key)) {
    return { ok: false, error: `Unknown setting "${rawKey}". Available: ${SETTING_KEYS.join(', ')}` };
  }

  switch (key) {
    case 'prefix': {
      const parsed = parsePrefix(rawValue);
      return parsed.ok ? { ok: true, value: { key, value: parsed.value } } : parsed;
    }
    case 'mod_role_id':
    case 'log_channel_id': {
      const parsed = parseId(rawValue);
      return parsed.ok ? { ok: true, value: { key, value: parsed.value } } : parsed;
    }
    case 'enabled':
    case 'spam_protection':
    case 'profanity_filter':
    case 'auto_delete_commands':
    case 'webhook_notifications':
      return { ok: true, value: { key, value: parseFlag(rawValue) } };
  }
}

export interface SettingsService {
  getSettings(serverId: string): Promise<ServerSettings>;
  ensureSettings(serverId: string): Promise<ServerSettings>;
  updateSetting(serverId: string, key: string, rawValue: string): Promise<ServerSettings>;
}

export function createSettingsService(backend: DbBackend, now: () => number = Date.now): SettingsService {
  const ensureSettings = (serverId: string): Promise<ServerSettings> => backend.ensureServerSettings(serverId, now());

  return {
    getSettings: ensureSettings,
    ensureSettings,

    async updateSetting(serverId, key, rawValue) {
      const parsed = parseSettingUpdate(key, rawValue);
      if (!parsed.ok) throw new ValidationError('invalid_setting', parsed.error);
      return backend.updateServerSetting(serverId, parsed.value, now());
    },
  };
}

/** Command prefix in effect for a server. */
export function effectivePrefix(settings: Pick<ServerSettings, 'prefix'> | undefined, globalPrefix: string): string {
  return settings?.prefix ?? globalPrefix;
}
