import type { LockInSettings } from '@lockin/shared';
import { DEFAULT_LOCKIN_SETTINGS } from '@lockin/shared';
import { ConfigurationError } from '../errors.js';
import { validateSettings } from '../lockin/processor.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { DatabaseHandle } from './database.js';

const SETTINGS_KEY = 'lockin';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an untrusted value (request body, stored JSON) to LockInSettings.
 * Missing fields are taken from `base`; present ones must be numbers.
 */
export function parseLockInSettings(value: unknown, base: LockInSettings = DEFAULT_LOCKIN_SETTINGS): LockInSettings {
  if (!isRecord(value)) throw new ConfigurationError('Settings must be an object');
  const field = (key: keyof LockInSettings): number => {
    const v = value[key];
    if (v === undefined) return base[key];
    if (typeof v !== 'number') throw new ConfigurationError(`${key} must be a number`);
    return v;
  };
  const settings: LockInSettings = {
    lowPassCutoffHz: field('lowPassCutoffHz'),
    filterOrder: field('filterOrder'),
    averagingFraction: field('averagingFraction'),
  };
  validateSettings(settings);
  return settings;
}

export class SettingsService {
  constructor(private readonly db: DatabaseHandle, private readonly logger: Logger = silentLogger) {}

  get(): LockInSettings {
    const row = this.db
      .prepare<[string], { value: string }>('SELECT value FROM settings WHERE key = ?')
      .get(SETTINGS_KEY);
    if (!row) return { ...DEFAULT_LOCKIN_SETTINGS };
    try {
      return parseLockInSettings(JSON.parse(row.value));
    } catch (err) {
      this.logger.warn(`Stored settings unreadable, using defaults: ${err instanceof Error ? err.message : String(err)}`);
      return { ...DEFAULT_LOCKIN_SETTINGS };
    }
  }

  /** Merge a partial update over the current settings, validate, persist. */
  update(patch: unknown): LockInSettings {
    const next = parseLockInSettings(patch, this.get());
    this.db
      .prepare('INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)')
      .run(SETTINGS_KEY, JSON.stringify(next));
    return next;
  }

  reset(): LockInSettings {
    this.db.prepare('DELETE FROM settings WHERE key = ?').run(SETTINGS_KEY);
    return { ...DEFAULT_LOCKIN_SETTINGS };
  }
}
