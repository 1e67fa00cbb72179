import { setTimeout as delay } from 'timers/promises';
import type { AcquisitionData, CaptureConfig, ConfigField, InstrumentInfo, OscilloscopeInterface } from '@lockin/shared';
import { CHANNELS } from '@lockin/shared';
import { SweepAcquisitionProtocol, type SweepProtocolOptions } from '../acquisition/protocol.js';
import { ScpiTcpClient, type ScpiTransport } from '../acquisition/scpi.js';
import { ConfigurationError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { validateChannels, validateChannelRanges } from './validation.js';

/**
 * Rigol DS1000Z-family adapter (swept SCPI digitizer).
 *
 * Memory depth is one of a fixed set; sample rate is reached through the
 * horizontal scale (12 divisions span the whole memory).
 */

export const DS1000Z_MEMORY_DEPTHS: readonly number[] = [6_000, 60_000, 600_000, 6_000_000, 12_000_000];
export const DS1000Z_DEFAULT_PORT = 5555;
const HORIZONTAL_DIVISIONS = 12;

export const DS1000Z_SCHEMA: readonly ConfigField[] = [
  { name: 'memoryDepth', type: 'int', allowedValues: DS1000Z_MEMORY_DEPTHS, default: 60_000, unit: 'pts' },
  { name: 'sampleRate', type: 'float', default: null, unit: 'Sa/s' },
  { name: 'channelRanges', type: 'range', default: null, unit: 'V' },
  { name: 'referenceChannel', type: 'channel', allowedValues: CHANNELS, default: 1 },
  { name: 'acquisitionChannel', type: 'channel', allowedValues: CHANNELS, default: 2 },
];

export interface Ds1000zOptions extends SweepProtocolOptions {
  /** Pause after mode changes that the scope applies asynchronously. */
  settleMs?: number;
}

export class Ds1000zOscilloscope implements OscilloscopeInterface {
  readonly protocol: SweepAcquisitionProtocol;
  private config: CaptureConfig | null = null;
  private identity = 'DS1000Z (not identified)';
  private closed = false;
  private readonly settleMs: number;
  private readonly logger: Logger;

  constructor(private readonly transport: ScpiTransport, options: Ds1000zOptions = {}) {
    this.protocol = new SweepAcquisitionProtocol(transport, options);
    this.settleMs = options.settleMs ?? 100;
    this.logger = options.logger ?? silentLogger;
  }

  /** Open a raw-socket SCPI session and identify the instrument. */
  static async connect(host: string, port = DS1000Z_DEFAULT_PORT, options: Ds1000zOptions = {}): Promise<Ds1000zOscilloscope> {
    const client = new ScpiTcpClient(host, port, { logger: options.logger });
    await client.connect();
    const scope = new Ds1000zOscilloscope(client, options);
    try {
      await scope.identify();
    } catch (err) {
      await client.close();
      throw err;
    }
    return scope;
  }

  async identify(): Promise<string> {
    this.identity = (await this.transport.query('*IDN?')).trim();
    this.logger.info(`Connected to ${this.identity}`);
    return this.identity;
  }

  async configure(config: CaptureConfig): Promise<void> {
    if (!DS1000Z_MEMORY_DEPTHS.includes(config.memoryDepth)) {
      throw new ConfigurationError(
        `Invalid value for memoryDepth: ${config.memoryDepth}. Allowed values are ${DS1000Z_MEMORY_DEPTHS.join(', ')}`,
      );
    }
    validateChannels(config);
    validateChannelRanges(config.channelRanges);
    if (config.sampleRate !== undefined && !(config.sampleRate > 0)) {
      throw new ConfigurationError(`Sample rate must be positive, got ${config.sampleRate}`);
    }

    const t = this.transport;
    await t.write(':RUN');
    await this.settle();

    // Only the two channels in use stay on
    for (const channel of CHANNELS) {
      const active = channel === config.referenceChannel || channel === config.acquisitionChannel;
      await t.write(`:CHANnel${channel}:DISPlay ${active ? 'ON' : 'OFF'}`);
    }
    for (const [channel, range] of Object.entries(config.channelRanges ?? {})) {
      if (range !== undefined) await t.write(`:CHANnel${channel}:RANGe ${range}`);
    }
    if (config.sampleRate !== undefined) {
      const scale = config.memoryDepth / (config.sampleRate * HORIZONTAL_DIVISIONS);
      await t.write(`:TIMebase:MAIN:SCALe ${scale}`);
    }

    await t.write(`:ACQuire:MDEPth ${config.memoryDepth}`);
    await this.settle();
    await t.write(':WAVeform:FORMat BYTE');
    await t.write(':WAVeform:MODE RAW');
    await t.write(':TRIGger:SWEep SINGle');

    const reported = Number((await t.query(':ACQuire:MDEPth?')).trim());
    if (reported !== config.memoryDepth) {
      throw new ConfigurationError(`Instrument reports memory depth ${reported} after requesting ${config.memoryDepth}`);
    }

    this.config = { ...config };
    this.logger.info(`Configured: depth=${config.memoryDepth} ref=CH${config.referenceChannel} sig=CH${config.acquisitionChannel}`);
  }

  async acquire(): Promise<AcquisitionData> {
    if (!this.config) throw new ConfigurationError('configure() must run before acquire()');
    return this.protocol.acquire(this.config.referenceChannel, this.config.acquisitionChannel);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.transport.close();
    this.logger.info('Instrument closed');
  }

  describe(): InstrumentInfo {
    return {
      kind: 'ds1000z',
      identity: this.identity,
      configured: this.config !== null,
      config: this.config ? { ...this.config } : null,
      schema: DS1000Z_SCHEMA,
    };
  }

  private async settle() {
    if (this.settleMs > 0) await delay(this.settleMs);
  }
}
