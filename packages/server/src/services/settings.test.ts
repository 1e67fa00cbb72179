import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DEFAULT_LOCKIN_SETTINGS } from '@lockin/shared';
import { ConfigurationError } from '../errors.js';
import { openDatabase, type DatabaseHandle } from './database.js';
import { SettingsService, parseLockInSettings } from './settings.js';

describe('parseLockInSettings', () => {
  it('fills missing fields from the base', () => {
    expect(parseLockInSettings({ filterOrder: 6 })).toEqual({ ...DEFAULT_LOCKIN_SETTINGS, filterOrder: 6 });
  });

  it('rejects non-numbers and out-of-range values', () => {
    expect(() => parseLockInSettings({ filterOrder: '6' })).toThrow(ConfigurationError);
    expect(() => parseLockInSettings({ averagingFraction: 2 })).toThrow(ConfigurationError);
    expect(() => parseLockInSettings(null)).toThrow(ConfigurationError);
    expect(() => parseLockInSettings([1, 2, 3])).toThrow(ConfigurationError);
  });
});

describe('SettingsService', () => {
  let db: DatabaseHandle;
  let settings: SettingsService;

  beforeEach(() => {
    db = openDatabase(':memory:');
    settings = new SettingsService(db);
  });

  afterEach(() => db.close());

  it('starts from the defaults', () => {
    expect(settings.get()).toEqual(DEFAULT_LOCKIN_SETTINGS);
  });

  it('persists merged updates', () => {
    settings.update({ lowPassCutoffHz: 25 });
    const next = settings.update({ averagingFraction: 0.8 });
    expect(next).toEqual({ lowPassCutoffHz: 25, filterOrder: 4, averagingFraction: 0.8 });
    expect(new SettingsService(db).get()).toEqual(next);
  });

  it('keeps the stored value when an update is rejected', () => {
    settings.update({ filterOrder: 2 });
    expect(() => settings.update({ filterOrder: 12 })).toThrow(ConfigurationError);
    expect(settings.get().filterOrder).toBe(2);
  });

  it('falls back to defaults when the stored row is unreadable', () => {
    db.prepare('INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)').run('lockin', '{not json');
    expect(settings.get()).toEqual(DEFAULT_LOCKIN_SETTINGS);
  });

  it('resets to the defaults', () => {
    settings.update({ filterOrder: 9 });
    expect(settings.reset()).toEqual(DEFAULT_LOCKIN_SETTINGS);
    expect(settings.get()).toEqual(DEFAULT_LOCKIN_SETTINGS);
  });
});
