import { describe, it, expect } from 'vitest';
import type { CaptureConfig } from '@lockin/shared';
import { ConfigurationError } from '../errors.js';
import { averageTrailing } from '../lockin/averager.js';
import { performLockIn } from '../lockin/processor.js';
import { degrees } from '../test-utils/signals.js';
import { Ds1000zOscilloscope } from './ds1000z.js';
import { SimulatedScpiInstrument } from './simulated-scpi.js';

const CONFIG: CaptureConfig = { memoryDepth: 6000, sampleRate: 100_000, referenceChannel: 1, acquisitionChannel: 3 };

function rig(options: ConstructorParameters<typeof SimulatedScpiInstrument>[0] = {}) {
  const sim = new SimulatedScpiInstrument({
    tones: {
      1: { frequencyHz: 1000, amplitude: 1, phaseRadians: 0, noiseRms: 0 },
      3: { frequencyHz: 1000, amplitude: 0.5, phaseRadians: Math.PI / 6, noiseRms: 0 },
    },
    ...options,
  });
  const scope = new Ds1000zOscilloscope(sim, { settleMs: 0, pollIntervalMs: 1 });
  return { sim, scope };
}

describe('Ds1000zOscilloscope', () => {
  it('identifies the instrument', async () => {
    const { scope } = rig();
    expect(await scope.identify()).toBe('RIGOL TECHNOLOGIES,DS1054Z,SIM0000001,00.04.04.SP4');
    expect(scope.describe().identity).toBe('RIGOL TECHNOLOGIES,DS1054Z,SIM0000001,00.04.04.SP4');
  });

  it('rejects a memory depth outside the enumerated set without sending anything', async () => {
    const { sim, scope } = rig();
    const error = await scope.configure({ ...CONFIG, memoryDepth: 5000 }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty(
      'message',
      'Invalid value for memoryDepth: 5000. Allowed values are 6000, 60000, 600000, 6000000, 12000000',
    );
    expect(sim.commands).toHaveLength(0);
  });

  it('rejects using one channel for both roles', async () => {
    const { sim, scope } = rig();
    await expect(scope.configure({ ...CONFIG, acquisitionChannel: 1 })).rejects.toBeInstanceOf(ConfigurationError);
    expect(sim.commands).toHaveLength(0);
  });

  it('shows only the two channels in use and sets up byte readout', async () => {
    const { sim, scope } = rig();
    await scope.configure({ ...CONFIG, channelRanges: { 1: 8 } });

    expect([...sim.displayed].sort()).toEqual([1, 3]);
    expect(sim.commands).toEqual([
      ':RUN',
      ':CHANnel1:DISPlay ON',
      ':CHANnel2:DISPlay OFF',
      ':CHANnel3:DISPlay ON',
      ':CHANnel4:DISPlay OFF',
      ':CHANnel1:RANGe 8',
      ':TIMebase:MAIN:SCALe 0.005',
      ':ACQuire:MDEPth 6000',
      ':WAVeform:FORMat BYTE',
      ':WAVeform:MODE RAW',
      ':TRIGger:SWEep SINGle',
      ':ACQuire:MDEPth?',
    ]);
    expect(scope.describe()).toMatchObject({ kind: 'ds1000z', configured: true, config: { memoryDepth: 6000 } });
  });

  it('requires configure before acquire', async () => {
    const { scope } = rig();
    await expect(scope.acquire()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('feeds the lock-in a usable capture', async () => {
    const { scope } = rig();
    await scope.configure(CONFIG);
    const data = await scope.acquire();

    expect(data.refWaveform).toHaveLength(6000);
    expect(data.timeIncrement).toBe(1e-5);

    const result = performLockIn(data, { lowPassCutoffHz: 100, filterOrder: 4, averagingFraction: 0.3 });
    expect(result.fundamentalFreqHz).toBe(1000);
    const { amplitude, phaseRadians } = averageTrailing(result, 0.3);
    expect(Math.abs(amplitude - 0.5) / 0.5).toBeLessThan(0.03);
    expect(Math.abs(degrees(phaseRadians) + 30)).toBeLessThan(2);
  });

  it('closes the session once', async () => {
    const { sim, scope } = rig();
    await scope.close();
    await scope.close();
    expect(sim.closeCount).toBe(1);
  });
});
