import { describe, it, expect } from 'vitest';
import type { CaptureConfig } from '@lockin/shared';
import { ConfigurationError } from '../errors.js';
import { isChannel, parseCaptureConfig, validateChannelRanges, validateChannels } from './validation.js';

const BASE: CaptureConfig = { memoryDepth: 6000, referenceChannel: 1, acquisitionChannel: 2 };

describe('channel validation', () => {
  it('knows the four inputs', () => {
    expect([0, 1, 4, 5, '1'].map(isChannel)).toEqual([false, true, true, false, false]);
  });

  it('requires two distinct channels', () => {
    expect(() => validateChannels({ referenceChannel: 2, acquisitionChannel: 2 })).toThrow(ConfigurationError);
    expect(() => validateChannels({ referenceChannel: 1, acquisitionChannel: 4 })).not.toThrow();
  });

  it('checks ranges against an enumerated set when given', () => {
    expect(() => validateChannelRanges({ 1: 5 }, [1, 2, 5])).not.toThrow();
    expect(() => validateChannelRanges({ 1: 3 }, [1, 2, 5])).toThrow('Invalid range 3 V for CH1. Allowed values are 1, 2, 5');
    expect(() => validateChannelRanges({ 2: -1 })).toThrow(ConfigurationError);
  });
});

describe('parseCaptureConfig', () => {
  it('merges over the base', () => {
    expect(parseCaptureConfig({ memoryDepth: 60_000, acquisitionChannel: 3 }, BASE)).toEqual({
      memoryDepth: 60_000,
      referenceChannel: 1,
      acquisitionChannel: 3,
    });
  });

  it('reads sample rate and channel ranges', () => {
    expect(parseCaptureConfig({ sampleRate: 1e6, channelRanges: { 2: 0.5 } }, BASE)).toEqual({
      ...BASE,
      sampleRate: 1e6,
      channelRanges: { 2: 0.5 },
    });
  });

  it('rejects the wrong shapes', () => {
    expect(() => parseCaptureConfig('6000', BASE)).toThrow(ConfigurationError);
    expect(() => parseCaptureConfig({ memoryDepth: '6000' }, BASE)).toThrow(ConfigurationError);
    expect(() => parseCaptureConfig({ referenceChannel: 7 }, BASE)).toThrow(ConfigurationError);
    expect(() => parseCaptureConfig({ channelRanges: { 5: 1 } }, BASE)).toThrow(ConfigurationError);
    expect(() => parseCaptureConfig({ channelRanges: { 1: 'big' } }, BASE)).toThrow(ConfigurationError);
  });
});
