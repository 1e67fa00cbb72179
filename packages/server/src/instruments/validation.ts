import type { CaptureConfig, Channel } from '@lockin/shared';
import { CHANNELS } from '@lockin/shared';
import { ConfigurationError } from '../errors.js';

export function isChannel(value: unknown): value is Channel {
  return CHANNELS.some(c => c === value);
}

export function validateChannels(config: Pick<CaptureConfig, 'referenceChannel' | 'acquisitionChannel'>): void {
  if (!isChannel(config.referenceChannel)) {
    throw new ConfigurationError(`Invalid reference channel ${config.referenceChannel}; expected one of ${CHANNELS.join(', ')}`);
  }
  if (!isChannel(config.acquisitionChannel)) {
    throw new ConfigurationError(`Invalid acquisition channel ${config.acquisitionChannel}; expected one of ${CHANNELS.join(', ')}`);
  }
  if (config.referenceChannel === config.acquisitionChannel) {
    throw new ConfigurationError(`Reference and acquisition must be different channels (both CH${config.referenceChannel})`);
  }
}

/**
 * Every range must be keyed by a real channel; when `allowed` is given the
 * value must be one of it, otherwise any positive voltage is accepted.
 */
export function validateChannelRanges(ranges: CaptureConfig['channelRanges'], allowed?: readonly number[]): void {
  for (const [key, value] of Object.entries(ranges ?? {})) {
    if (!isChannel(Number(key))) {
      throw new ConfigurationError(`Channel range given for unknown channel '${key}'`);
    }
    if (value === undefined) continue;
    if (allowed ? !allowed.includes(value) : !(value > 0)) {
      throw new ConfigurationError(
        allowed
          ? `Invalid range ${value} V for CH${key}. Allowed values are ${allowed.join(', ')}`
          : `Range for CH${key} must be a positive voltage, got ${value}`,
      );
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow a request body to CaptureConfig, merging over `base`. Only the shape
 * is checked here; enumerated values are the instrument's to validate.
 */
export function parseCaptureConfig(value: unknown, base: CaptureConfig): CaptureConfig {
  if (!isRecord(value)) throw new ConfigurationError('Capture config must be an object');

  const number = (key: 'memoryDepth' | 'sampleRate'): number | undefined => {
    const v = value[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'number') throw new ConfigurationError(`${key} must be a number`);
    return v;
  };
  const channel = (key: 'referenceChannel' | 'acquisitionChannel'): Channel => {
    const v = value[key];
    if (v === undefined) return base[key];
    if (!isChannel(v)) throw new ConfigurationError(`${key} must be one of ${CHANNELS.join(', ')}`);
    return v;
  };

  let channelRanges = base.channelRanges;
  if (value.channelRanges !== undefined) {
    if (!isRecord(value.channelRanges)) throw new ConfigurationError('channelRanges must be an object');
    channelRanges = {};
    for (const [key, range] of Object.entries(value.channelRanges)) {
      const ch = Number(key);
      if (!isChannel(ch)) throw new ConfigurationError(`Channel range given for unknown channel '${key}'`);
      if (typeof range !== 'number') throw new ConfigurationError(`Range for CH${key} must be a number`);
      channelRanges[ch] = range;
    }
  }

  const sampleRate = number('sampleRate') ?? base.sampleRate;
  return {
    memoryDepth: number('memoryDepth') ?? base.memoryDepth,
    ...(sampleRate !== undefined ? { sampleRate } : {}),
    ...(channelRanges !== undefined ? { channelRanges } : {}),
    referenceChannel: channel('referenceChannel'),
    acquisitionChannel: channel('acquisitionChannel'),
  };
}
