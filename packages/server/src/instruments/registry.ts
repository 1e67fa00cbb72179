import type { CaptureConfig, Channel, ConfigField, InstrumentKind, OscilloscopeInterface } from '@lockin/shared';
import { ConfigurationError } from '../errors.js';
import type { Logger } from '../logger.js';
import { BLOCK_MODE_SCHEMA, BlockModeOscilloscope, type BlockDriver } from './block-mode.js';
import { DS1000Z_DEFAULT_PORT, DS1000Z_SCHEMA, Ds1000zOscilloscope } from './ds1000z.js';
import { MOCK_SCHEMA, MockOscilloscope } from './mock.js';
import { SimulatedScpiInstrument } from './simulated-scpi.js';
import { isChannel } from './validation.js';

export const INSTRUMENT_SCHEMAS: Record<InstrumentKind, readonly ConfigField[]> = {
  'ds1000z': DS1000Z_SCHEMA,
  'simulated': DS1000Z_SCHEMA,
  'block-mode': BLOCK_MODE_SCHEMA,
  'mock': MOCK_SCHEMA,
};

export interface InstrumentOptions {
  logger: Logger;
  host?: string;
  port?: number;
  pollIntervalMs?: number;
  triggerTimeoutMs?: number;
  /** Required for 'block-mode'; the native binding is supplied by the caller. */
  blockDriver?: BlockDriver;
}

/** Initial capture config from a variant's schema defaults. */
export function defaultCaptureConfig(kind: InstrumentKind, memoryDepth?: number): CaptureConfig {
  const schema = INSTRUMENT_SCHEMAS[kind];
  const field = (name: ConfigField['name']) => schema.find(f => f.name === name)?.default ?? undefined;
  const channel = (name: ConfigField['name'], fallback: Channel): Channel => {
    const value = field(name);
    return isChannel(value) ? value : fallback;
  };
  const sampleRate = field('sampleRate');
  return {
    memoryDepth: memoryDepth ?? field('memoryDepth') ?? 10_000,
    ...(sampleRate !== undefined ? { sampleRate } : {}),
    referenceChannel: channel('referenceChannel', 1),
    acquisitionChannel: channel('acquisitionChannel', 2),
  };
}

export async function createInstrument(kind: InstrumentKind, options: InstrumentOptions): Promise<OscilloscopeInterface> {
  const { logger } = options;
  const protocolOptions = {
    logger,
    pollIntervalMs: options.pollIntervalMs,
    maxTriggerWaitMs: options.triggerTimeoutMs,
  };

  switch (kind) {
    case 'mock':
      return new MockOscilloscope();

    case 'simulated': {
      const transport = new SimulatedScpiInstrument({
        xIncrement: 1e-5,
        tones: {
          1: { frequencyHz: 1000, amplitude: 1, phaseRadians: 0, noiseRms: 0 },
          2: { frequencyHz: 1000, amplitude: 0.2, phaseRadians: Math.PI / 6, noiseRms: 0.1 },
        },
      });
      const scope = new Ds1000zOscilloscope(transport, { ...protocolOptions, settleMs: 0 });
      await scope.identify();
      return scope;
    }

    case 'ds1000z':
      return Ds1000zOscilloscope.connect(options.host ?? '127.0.0.1', options.port ?? DS1000Z_DEFAULT_PORT, protocolOptions);

    case 'block-mode': {
      if (!options.blockDriver) {
        throw new ConfigurationError('block-mode instrument needs a driver binding');
      }
      const scope = new BlockModeOscilloscope(options.blockDriver, { logger, pollIntervalMs: options.pollIntervalMs });
      await scope.open();
      return scope;
    }
  }
}
