import { join } from 'path';
import type { InstrumentKind } from '@lockin/shared';
import { ConfigurationError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

export interface ServerConfig {
  port: number;
  instrument: InstrumentKind;
  scopeHost: string;
  scopePort: number;
  /** Unset: the instrument schema's default depth. */
  memoryDepth?: number;
  pollIntervalMs: number;
  triggerTimeoutMs: number;
  cycleDelayMs: number;
  dataDir: string;
  logLevel: LogLevel;
}

const SERVED_INSTRUMENTS: readonly InstrumentKind[] = ['mock', 'simulated', 'ds1000z'];

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${key} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const instrument = env.LOCKIN_INSTRUMENT || 'mock';
  const served = SERVED_INSTRUMENTS.find(k => k === instrument);
  if (!served) {
    throw new ConfigurationError(`LOCKIN_INSTRUMENT must be one of ${SERVED_INSTRUMENTS.join(', ')}, got '${instrument}'`);
  }

  const logLevel = env.LOCKIN_LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOCKIN_LOG_LEVEL '${logLevel}' is not a log level`);
  }

  return {
    port: readInt(env, 'PORT', 3401, 1),
    instrument: served,
    scopeHost: env.LOCKIN_SCOPE_HOST || '127.0.0.1',
    scopePort: readInt(env, 'LOCKIN_SCOPE_PORT', 5555, 1),
    ...(env.LOCKIN_MEMORY_DEPTH ? { memoryDepth: readInt(env, 'LOCKIN_MEMORY_DEPTH', 0, 1) } : {}),
    pollIntervalMs: readInt(env, 'LOCKIN_POLL_INTERVAL_MS', 100, 1),
    triggerTimeoutMs: readInt(env, 'LOCKIN_TRIGGER_TIMEOUT_MS', 10_000, 1),
    cycleDelayMs: readInt(env, 'LOCKIN_CYCLE_DELAY_MS', 100),
    dataDir: env.LOCKIN_DATA_DIR || join(process.cwd(), 'data'),
    logLevel,
  };
}
