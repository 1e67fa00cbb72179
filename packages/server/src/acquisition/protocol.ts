import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import type { AcquisitionData, AcquisitionState, Channel } from '@lockin/shared';
import { AcquisitionTimeoutError, EmptyDataError, LockInError, TransportError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { ScpiTransport } from './scpi.js';

/**
 * Single-sweep acquisition over SCPI.
 *
 * Cycle: idle → armed → waiting → stopped → reading → idle
 * - armed:   :RUN, single sweep, force trigger
 * - waiting: poll :TRIGger:STATus? until STOP, re-forcing while WAIT
 * - stopped: :STOP freezes memory for readout
 * - reading: each channel in bounded batches, raw bytes scaled to volts
 *
 * A cycle either returns a complete AcquisitionData or throws.
 */

/** YREFerence reported when the channel has nothing in memory (all bits set). */
export const NO_DATA_REFERENCE = 4294967295;

export const DEFAULT_MAX_POINTS_PER_READ = 125_000;

export interface SweepProtocolOptions {
  pollIntervalMs?: number;
  maxTriggerWaitMs?: number;
  maxPointsPerRead?: number;
  logger?: Logger;
}

export interface ReadProgress {
  channel: Channel;
  batch: number;
  batches: number;
}

export interface BatchWindow {
  /** 1-based inclusive */
  start: number;
  stop: number;
}

/** Batch windows covering 1..total, ceil(total / size) of them. */
export function batchWindows(total: number, size: number): BatchWindow[] {
  const count = Math.ceil(total / size);
  const windows: BatchWindow[] = [];
  for (let b = 0; b < count; b++) {
    windows.push({ start: b * size + 1, stop: Math.min((b + 1) * size, total) });
  }
  return windows;
}

export class SweepAcquisitionProtocol extends EventEmitter {
  private _state: AcquisitionState = 'idle';
  private readonly pollIntervalMs: number;
  private readonly maxTriggerWaitMs: number;
  private readonly maxPointsPerRead: number;
  private readonly logger: Logger;

  constructor(private readonly transport: ScpiTransport, options: SweepProtocolOptions = {}) {
    super();
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
    this.maxTriggerWaitMs = options.maxTriggerWaitMs ?? 10000;
    this.maxPointsPerRead = options.maxPointsPerRead ?? DEFAULT_MAX_POINTS_PER_READ;
    this.logger = options.logger ?? silentLogger;
  }

  get state(): AcquisitionState { return this._state; }

  async acquire(referenceChannel: Channel, acquisitionChannel: Channel): Promise<AcquisitionData> {
    try {
      this.setState('armed');
      await this.transport.write(':RUN');
      await this.transport.write(':TRIGger:SWEep SINGle');
      await this.transport.write(':TFORce');

      this.setState('waiting');
      await this.waitForTrigger();

      this.setState('stopped');
      await this.transport.write(':STOP');

      this.setState('reading');
      const refWaveform = await this.readChannel(referenceChannel);
      const acquisitionWaveform = await this.readChannel(acquisitionChannel);
      if (refWaveform.length !== acquisitionWaveform.length) {
        throw new TransportError(
          `Channel lengths differ: CH${referenceChannel}=${refWaveform.length}, CH${acquisitionChannel}=${acquisitionWaveform.length}`,
        );
      }
      const timeIncrement = await this.queryNumber(':WAVeform:XINCrement?');
      const timeOrigin = await this.queryNumber(':WAVeform:XORigin?');
      if (!(timeIncrement > 0)) {
        throw new TransportError(`Instrument reported non-positive time increment ${timeIncrement}`);
      }

      this.logger.info(`Got ${(timeIncrement * refWaveform.length).toPrecision(4)} s of data (${refWaveform.length} points)`);
      return { refWaveform, acquisitionWaveform, timeIncrement, timeOrigin };
    } catch (err) {
      if (err instanceof LockInError) throw err;
      throw new TransportError(`Acquisition failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    } finally {
      this.setState('idle');
    }
  }

  /** Read one channel's full memory and convert to volts. */
  async readChannel(channel: Channel): Promise<Float64Array> {
    this.logger.debug(`Getting data for CH${channel}`);
    await this.transport.write(':STOP');

    const total = await this.queryNumber(':ACQuire:MDEPth?');
    if (!Number.isInteger(total) || total <= 0) {
      throw new TransportError(`Instrument reported invalid memory depth ${total}`);
    }

    await this.transport.write(`:WAVeform:SOURce CHANnel${channel}`);
    const yIncrement = await this.queryNumber(':WAVeform:YINCrement?');
    const yOrigin = await this.queryNumber(':WAVeform:YORigin?');
    const yReference = await this.queryNumber(':WAVeform:YREFerence?');
    this.logger.debug(`CH${channel} yinc=${yIncrement} yorigin=${yOrigin} yref=${yReference}`);

    if (yReference === NO_DATA_REFERENCE) throw new EmptyDataError(channel);

    const volts = new Float64Array(total);
    const windows = batchWindows(total, this.maxPointsPerRead);
    for (let b = 0; b < windows.length; b++) {
      const { start, stop } = windows[b];
      await this.transport.write(`:WAVeform:STARt ${start}`);
      await this.transport.write(`:WAVeform:STOP ${stop}`);
      const raw = await this.transport.queryBinary(':WAVeform:DATA?');
      const expected = stop - start + 1;
      if (raw.length !== expected) {
        throw new TransportError(`CH${channel} batch ${b + 1}/${windows.length}: expected ${expected} points, got ${raw.length}`);
      }
      for (let i = 0; i < raw.length; i++) {
        volts[start - 1 + i] = (raw[i] - yReference) * yIncrement - yOrigin;
      }
      const progress: ReadProgress = { channel, batch: b + 1, batches: windows.length };
      this.emit('progress', progress);
    }
    return volts;
  }

  private async waitForTrigger(): Promise<void> {
    const started = Date.now();
    for (;;) {
      const status = (await this.transport.query(':TRIGger:STATus?')).trim().toUpperCase();
      if (status === 'STOP') return;
      this.logger.debug(`:TRIGger:STATus? = ${status}`);
      if (status === 'WAIT') await this.transport.write(':TFORce');

      const elapsed = Date.now() - started;
      if (elapsed >= this.maxTriggerWaitMs) {
        throw new AcquisitionTimeoutError(elapsed, this.maxTriggerWaitMs);
      }
      await delay(Math.min(this.pollIntervalMs, this.maxTriggerWaitMs - elapsed));
    }
  }

  private async queryNumber(command: string): Promise<number> {
    const reply = await this.transport.query(command);
    const value = Number(reply.trim());
    if (reply.trim() === '' || !Number.isFinite(value)) {
      throw new TransportError(`Unexpected reply to ${command}: '${reply.trim()}'`);
    }
    return value;
  }

  private setState(state: AcquisitionState) {
    if (state === this._state) return;
    this._state = state;
    this.emit('state', state);
  }
}
