import { describe, it, expect } from 'vitest';
import type { CaptureConfig } from '@lockin/shared';
import { ConfigurationError } from '../errors.js';
import { MockOscilloscope } from './mock.js';

const CONFIG: CaptureConfig = { memoryDepth: 1000, sampleRate: 50_000, referenceChannel: 2, acquisitionChannel: 4 };

describe('MockOscilloscope', () => {
  it('validates the memory depth against its enumerated set', async () => {
    const scope = new MockOscilloscope();
    await expect(scope.configure({ ...CONFIG, memoryDepth: 999 })).rejects.toThrow(
      'Invalid value for memoryDepth: 999. Allowed values are 1000, 10000, 100000, 1000000',
    );
    expect(scope.describe().configured).toBe(false);
  });

  it('produces captures on the configured timebase', async () => {
    const scope = new MockOscilloscope({ noiseRms: 0 });
    await scope.configure(CONFIG);
    const data = await scope.acquire();

    expect(data.refWaveform).toHaveLength(1000);
    expect(data.timeIncrement).toBe(1 / 50_000);
    expect(data.timeOrigin).toBe(-500 / 50_000);
    expect(data.refWaveform[0]).toBe(0);
    expect(scope.acquireCount).toBe(1);
  });

  it('repeats the same sequence for the same seed', async () => {
    const a = new MockOscilloscope({ seed: 42 });
    const b = new MockOscilloscope({ seed: 42 });
    await a.configure(CONFIG);
    await b.configure(CONFIG);
    expect(await a.acquire()).toEqual(await b.acquire());
  });

  it('fails after the configured number of captures', async () => {
    const scope = new MockOscilloscope({ failAfter: 1, failure: new ConfigurationError('unplugged') });
    await scope.configure(CONFIG);
    await scope.acquire();
    await expect(scope.acquire()).rejects.toThrow('unplugged');
    expect(scope.acquireCount).toBe(1);
  });
});
