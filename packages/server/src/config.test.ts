import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3401,
      instrument: 'mock',
      scopeHost: '127.0.0.1',
      scopePort: 5555,
      pollIntervalMs: 100,
      triggerTimeoutMs: 10_000,
      cycleDelayMs: 100,
      dataDir: join(process.cwd(), 'data'),
      logLevel: 'info',
    });
  });

  it('reads the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      LOCKIN_INSTRUMENT: 'ds1000z',
      LOCKIN_SCOPE_HOST: '192.168.1.50',
      LOCKIN_MEMORY_DEPTH: '600000',
      LOCKIN_CYCLE_DELAY_MS: '0',
      LOCKIN_LOG_LEVEL: 'debug',
    });
    expect(config).toMatchObject({
      port: 8080,
      instrument: 'ds1000z',
      scopeHost: '192.168.1.50',
      memoryDepth: 600_000,
      cycleDelayMs: 0,
      logLevel: 'debug',
    });
  });

  it('rejects bad values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LOCKIN_POLL_INTERVAL_MS: '0' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LOCKIN_INSTRUMENT: 'block-mode' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LOCKIN_LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });
});
