import { setTimeout as delay } from 'timers/promises';
import type { AcquisitionData, CaptureConfig, ConfigField, InstrumentInfo, OscilloscopeInterface } from '@lockin/shared';
import { CHANNELS } from '@lockin/shared';
import { ConfigurationError } from '../errors.js';
import { seededRandom, synthesizeTone } from './synth.js';
import { validateChannels, validateChannelRanges } from './validation.js';

export const MOCK_MEMORY_DEPTHS: readonly number[] = [1_000, 10_000, 100_000, 1_000_000];

export const MOCK_SCHEMA: readonly ConfigField[] = [
  { name: 'memoryDepth', type: 'int', allowedValues: MOCK_MEMORY_DEPTHS, default: 10_000, unit: 'pts' },
  { name: 'sampleRate', type: 'float', default: 100_000, unit: 'Sa/s' },
  { name: 'referenceChannel', type: 'channel', allowedValues: CHANNELS, default: 1 },
  { name: 'acquisitionChannel', type: 'channel', allowedValues: CHANNELS, default: 2 },
];

export interface MockOptions {
  referenceFrequencyHz?: number;
  referenceAmplitude?: number;
  signalAmplitude?: number;
  signalPhaseDeg?: number;
  noiseRms?: number;
  seed?: number;
  /** Simulated capture time per acquire. */
  acquireDelayMs?: number;
  /** Number of successful acquires before every later one rejects with `failure`. */
  failAfter?: number;
  failure?: Error;
}

/**
 * Deterministic in-memory digitizer: the reference is a clean sine, the
 * signal a weaker phase-shifted sine in Gaussian noise. The same seed yields
 * the same sequence of captures.
 */
export class MockOscilloscope implements OscilloscopeInterface {
  acquireCount = 0;
  closeCount = 0;
  private config: CaptureConfig | null = null;
  private readonly options: Required<Omit<MockOptions, 'failAfter' | 'failure'>> & Pick<MockOptions, 'failAfter' | 'failure'>;
  private readonly random: () => number;

  constructor(options: MockOptions = {}) {
    this.options = {
      referenceFrequencyHz: 1000,
      referenceAmplitude: 1,
      signalAmplitude: 0.01,
      signalPhaseDeg: 30,
      noiseRms: 0.05,
      seed: 1,
      acquireDelayMs: 0,
      ...options,
    };
    this.random = seededRandom(this.options.seed);
  }

  async configure(config: CaptureConfig): Promise<void> {
    if (!MOCK_MEMORY_DEPTHS.includes(config.memoryDepth)) {
      throw new ConfigurationError(
        `Invalid value for memoryDepth: ${config.memoryDepth}. Allowed values are ${MOCK_MEMORY_DEPTHS.join(', ')}`,
      );
    }
    validateChannels(config);
    validateChannelRanges(config.channelRanges);
    if (config.sampleRate !== undefined && !(config.sampleRate > 0)) {
      throw new ConfigurationError(`Sample rate must be positive, got ${config.sampleRate}`);
    }
    this.config = { sampleRate: 100_000, ...config };
  }

  async acquire(): Promise<AcquisitionData> {
    if (!this.config) throw new ConfigurationError('configure() must run before acquire()');
    if (this.options.acquireDelayMs > 0) await delay(this.options.acquireDelayMs);

    const { failAfter, failure } = this.options;
    if (failure && failAfter !== undefined && this.acquireCount >= failAfter) throw failure;
    this.acquireCount++;

    const N = this.config.memoryDepth;
    const fs = this.config.sampleRate ?? 100_000;
    const { referenceFrequencyHz, referenceAmplitude, signalAmplitude, signalPhaseDeg, noiseRms } = this.options;

    const refWaveform = synthesizeTone(
      { frequencyHz: referenceFrequencyHz, amplitude: referenceAmplitude, phaseRadians: 0, noiseRms: 0 },
      N, fs, this.random,
    );
    const acquisitionWaveform = synthesizeTone(
      { frequencyHz: referenceFrequencyHz, amplitude: signalAmplitude, phaseRadians: (signalPhaseDeg * Math.PI) / 180, noiseRms },
      N, fs, this.random,
    );
    // Trigger at mid-screen, like a scope in its default horizontal position
    return { refWaveform, acquisitionWaveform, timeIncrement: 1 / fs, timeOrigin: -(N / 2) / fs };
  }

  async close(): Promise<void> {
    this.closeCount++;
  }

  describe(): InstrumentInfo {
    return {
      kind: 'mock',
      identity: `Mock digitizer (seed ${this.options.seed})`,
      configured: this.config !== null,
      config: this.config ? { ...this.config } : null,
      schema: MOCK_SCHEMA,
    };
  }
}
