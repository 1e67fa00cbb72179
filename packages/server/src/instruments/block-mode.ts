import { setTimeout as delay } from 'timers/promises';
import type { AcquisitionData, CaptureConfig, Channel, ConfigField, InstrumentInfo, OscilloscopeInterface } from '@lockin/shared';
import { CHANNELS } from '@lockin/shared';
import { AcquisitionTimeoutError, ConfigurationError, LockInError, TransportError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { validateChannels, validateChannelRanges } from './validation.js';

/**
 * Block-mode digitizer adapter (PicoScope 6000E style).
 *
 * The capture is armed with runBlock, polled with isReady, then both channel
 * buffers are fetched at once. Raw ADC counts scale as raw / maxAdc * fullScale.
 * The vendor binding lives behind BlockDriver.
 */

export type DriverChannel = 'A' | 'B' | 'C' | 'D';

const DRIVER_CHANNELS: Record<Channel, DriverChannel> = { 1: 'A', 2: 'B', 3: 'C', 4: 'D' };

/** Probe full-scale ranges the front end offers, volts. */
export const BLOCK_MODE_RANGES: readonly number[] = [0.01, 0.02, 0.05, 0.1, 0.2, 0.5, 1, 2, 5, 10, 20];
const DEFAULT_RANGE = 10;

export const BLOCK_MODE_SCHEMA: readonly ConfigField[] = [
  { name: 'memoryDepth', type: 'int', default: 1_000_000, unit: 'pts' },
  { name: 'sampleRate', type: 'float', default: 1_000_000, unit: 'Sa/s' },
  { name: 'channelRanges', type: 'range', allowedValues: BLOCK_MODE_RANGES, default: DEFAULT_RANGE, unit: 'V' },
  { name: 'referenceChannel', type: 'channel', allowedValues: CHANNELS, default: 1 },
  { name: 'acquisitionChannel', type: 'channel', allowedValues: CHANNELS, default: 3 },
];

export interface Timebase {
  timebase: number;
  /** Actual sample interval, seconds. */
  interval: number;
}

/** Boundary to a native block-mode SDK. */
export interface BlockDriver {
  unitInfo(): Promise<string>;
  setChannelOn(channel: DriverChannel, fullScaleVolts: number): Promise<void>;
  setChannelOff(channel: DriverChannel): Promise<void>;
  nearestTimebase(channels: DriverChannel[], interval: number): Promise<Timebase>;
  runBlock(samples: number, timebase: number): Promise<void>;
  isReady(): Promise<boolean>;
  getValues(channels: DriverChannel[], samples: number): Promise<Record<DriverChannel, Int16Array>>;
  /** Largest positive ADC count at the current resolution. */
  maxAdcValue(): number;
  closeUnit(): Promise<void>;
}

interface BlockSetup {
  config: CaptureConfig;
  refRange: number;
  sigRange: number;
  timebase: Timebase;
}

export interface BlockModeOptions {
  pollIntervalMs?: number;
  logger?: Logger;
}

export class BlockModeOscilloscope implements OscilloscopeInterface {
  private setup: BlockSetup | null = null;
  private identity = 'Block-mode digitizer';
  private closed = false;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;

  constructor(private readonly driver: BlockDriver, options: BlockModeOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
    this.logger = options.logger ?? silentLogger;
  }

  async open(): Promise<void> {
    for (const channel of Object.values(DRIVER_CHANNELS)) await this.driver.setChannelOff(channel);
    this.identity = await this.driver.unitInfo();
    this.logger.debug(`Connected to ${this.identity}`);
  }

  async configure(config: CaptureConfig): Promise<void> {
    if (!Number.isInteger(config.memoryDepth) || config.memoryDepth <= 0) {
      throw new ConfigurationError(`Memory depth must be a positive integer, got ${config.memoryDepth}`);
    }
    validateChannels(config);
    validateChannelRanges(config.channelRanges, BLOCK_MODE_RANGES);
    const sampleRate = config.sampleRate ?? 1_000_000;
    if (!(sampleRate > 0)) {
      throw new ConfigurationError(`Sample rate must be positive, got ${sampleRate}`);
    }

    const refRange = config.channelRanges?.[config.referenceChannel] ?? DEFAULT_RANGE;
    const sigRange = config.channelRanges?.[config.acquisitionChannel] ?? DEFAULT_RANGE;
    const ref = DRIVER_CHANNELS[config.referenceChannel];
    const sig = DRIVER_CHANNELS[config.acquisitionChannel];

    await this.call(async () => {
      for (const [channel, name] of Object.entries(DRIVER_CHANNELS)) {
        if (name !== ref && name !== sig) await this.driver.setChannelOff(name);
        else this.logger.debug(`CH${channel} (${name}) on`);
      }
      await this.driver.setChannelOn(ref, refRange);
      await this.driver.setChannelOn(sig, sigRange);
      const timebase = await this.driver.nearestTimebase([ref, sig], 1 / sampleRate);
      this.logger.info(`Actual sample rate: ${(1 / timebase.interval).toFixed(3)} Hz`);
      this.setup = { config: { ...config, sampleRate }, refRange, sigRange, timebase };
    });
  }

  async acquire(): Promise<AcquisitionData> {
    const setup = this.setup;
    if (!setup) throw new ConfigurationError('configure() must run before acquire()');
    const { config, timebase } = setup;
    const samples = config.memoryDepth;
    const ref = DRIVER_CHANNELS[config.referenceChannel];
    const sig = DRIVER_CHANNELS[config.acquisitionChannel];

    return this.call(async () => {
      await this.driver.runBlock(samples, timebase.timebase);

      // Three times the capture window plus a fixed allowance
      const limitMs = (timebase.interval * samples * 3 + 5) * 1000;
      const started = Date.now();
      while (!(await this.driver.isReady())) {
        const elapsed = Date.now() - started;
        if (elapsed >= limitMs) {
          await this.close();
          throw new AcquisitionTimeoutError(elapsed, limitMs);
        }
        await delay(Math.min(this.pollIntervalMs, limitMs - elapsed));
      }

      const values = await this.driver.getValues([ref, sig], samples);
      const maxAdc = this.driver.maxAdcValue();
      this.logger.debug(`Buffers acquired in ${Date.now() - started} ms`);
      return {
        refWaveform: Float64Array.from(values[ref], v => (v / maxAdc) * setup.refRange),
        acquisitionWaveform: Float64Array.from(values[sig], v => (v / maxAdc) * setup.sigRange),
        timeIncrement: timebase.interval,
        timeOrigin: 0,
      };
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.call(() => this.driver.closeUnit());
  }

  describe(): InstrumentInfo {
    return {
      kind: 'block-mode',
      identity: this.identity,
      configured: this.setup !== null,
      config: this.setup ? { ...this.setup.config } : null,
      schema: BLOCK_MODE_SCHEMA,
    };
  }

  /** Driver faults surface as TransportError. */
  private async call<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      if (err instanceof LockInError) throw err;
      throw new TransportError(`Driver call failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  }
}
