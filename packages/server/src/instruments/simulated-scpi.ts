import type { Channel } from '@lockin/shared';
import type { ScpiTransport } from '../acquisition/scpi.js';
import { TransportError } from '../errors.js';
import { seededRandom, synthesizeTone, type ToneSpec } from './synth.js';

/**
 * In-process stand-in for a DS1000Z on the other end of a SCPI session.
 *
 * Holds byte-coded channel memory, answers the subset of commands the sweep
 * protocol and the DS1000Z adapter use, and records every command. Used by the
 * `simulated` instrument and by tests.
 */

export interface SimulatedScpiOptions {
  memoryDepth?: number;
  /** Sample interval reported before any horizontal scale is set. */
  xIncrement?: number;
  xOrigin?: number;
  /** Fixed memory contents; when absent each capture synthesizes tones. */
  memory?: Partial<Record<Channel, Uint8Array>>;
  yIncrement?: number;
  yOrigin?: number;
  /** Per-channel YREFerence overrides, e.g. the 4294967295 "no data" code. */
  yReference?: Partial<Record<Channel, number>>;
  /** Status polls answered WAIT before STOP; Infinity never completes. */
  triggerPolls?: number;
  /** Largest :WAVeform:DATA? window the instrument serves. */
  maxPointsPerTransfer?: number;
  /** Commands starting with this prefix fail like a dropped connection. */
  failOn?: string;
  tones?: Partial<Record<Channel, ToneSpec>>;
  seed?: number;
}

const DEFAULT_Y_REFERENCE = 127;
const HORIZONTAL_DIVISIONS = 12;

export class SimulatedScpiInstrument implements ScpiTransport {
  readonly commands: string[] = [];
  closeCount = 0;

  private memoryDepth: number;
  private xIncrement: number;
  private readonly xOrigin: number;
  private readonly yIncrement: number;
  private readonly yOrigin: number;
  private readonly options: SimulatedScpiOptions;
  private readonly random: () => number;
  private memory: Partial<Record<Channel, Uint8Array>>;
  private source: Channel = 1;
  private start = 1;
  private stop = 1;
  private polls = 0;
  private closed = false;
  readonly displayed = new Set<Channel>([1, 2, 3, 4]);

  constructor(options: SimulatedScpiOptions = {}) {
    this.options = options;
    this.memoryDepth = options.memoryDepth ?? 6000;
    this.xIncrement = options.xIncrement ?? 1e-5;
    this.xOrigin = options.xOrigin ?? 0;
    this.yIncrement = options.yIncrement ?? 0.01;
    this.yOrigin = options.yOrigin ?? 0;
    this.memory = { ...options.memory };
    this.random = seededRandom(options.seed ?? 1);
  }

  /** Volts → byte code, the inverse of (code - yref) * yinc - yorigin. */
  encode(volts: number, channel: Channel = 1): number {
    const yref = this.yReferenceFor(channel);
    return Math.max(0, Math.min(255, Math.round((volts + this.yOrigin) / this.yIncrement + yref)));
  }

  async write(command: string): Promise<void> {
    this.record(command);
    const [head, arg] = command.split(/\s+/, 2);
    const header = head.toUpperCase();

    const display = /^:CHAN(?:NEL)?([1-4]):DISP(?:LAY)?$/.exec(header);
    if (display) {
      const channel = channelOf(Number(display[1]));
      if (arg?.toUpperCase() === 'ON') this.displayed.add(channel);
      else this.displayed.delete(channel);
      return;
    }

    switch (header) {
      case ':RUN':
        this.polls = 0;
        return;
      case ':ACQUIRE:MDEPTH':
        this.memoryDepth = parseInt(arg ?? '', 10);
        return;
      case ':TIMEBASE:MAIN:SCALE':
        this.xIncrement = (Number(arg) * HORIZONTAL_DIVISIONS) / this.memoryDepth;
        return;
      case ':WAVEFORM:SOURCE':
        this.source = channelOf(Number((arg ?? '').replace(/\D/g, '')));
        return;
      case ':WAVEFORM:START':
        this.start = parseInt(arg ?? '', 10);
        return;
      case ':WAVEFORM:STOP':
        this.stop = parseInt(arg ?? '', 10);
        return;
      default:
        // :STOP, :TFORce, trigger sweep, waveform format/mode, channel range
        return;
    }
  }

  async query(command: string): Promise<string> {
    this.record(command);
    switch (command.toUpperCase()) {
      case '*IDN?':
        return 'RIGOL TECHNOLOGIES,DS1054Z,SIM0000001,00.04.04.SP4';
      case ':TRIGGER:STATUS?': {
        const limit = this.options.triggerPolls ?? 1;
        if (this.polls < limit) {
          this.polls++;
          return 'WAIT';
        }
        this.capture();
        return 'STOP';
      }
      case ':ACQUIRE:MDEPTH?':
        return String(this.memoryDepth);
      case ':WAVEFORM:XINCREMENT?':
        return this.xIncrement.toExponential(6);
      case ':WAVEFORM:XORIGIN?':
        return this.xOrigin.toExponential(6);
      case ':WAVEFORM:YINCREMENT?':
        return this.yIncrement.toExponential(6);
      case ':WAVEFORM:YORIGIN?':
        return this.yOrigin.toExponential(6);
      case ':WAVEFORM:YREFERENCE?':
        return String(this.yReferenceFor(this.source));
      default:
        throw new TransportError(`Simulated instrument: unsupported query ${command}`);
    }
  }

  async queryBinary(command: string): Promise<Uint8Array> {
    this.record(command);
    if (command.toUpperCase() !== ':WAVEFORM:DATA?') {
      throw new TransportError(`Simulated instrument: unsupported binary query ${command}`);
    }
    const count = this.stop - this.start + 1;
    const limit = this.options.maxPointsPerTransfer ?? 250_000;
    if (count > limit) {
      throw new TransportError(`Simulated instrument: window of ${count} points exceeds ${limit}`);
    }
    const mem = this.memory[this.source] ?? new Uint8Array(this.memoryDepth).fill(DEFAULT_Y_REFERENCE);
    return mem.slice(this.start - 1, this.stop);
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.closed = true;
  }

  private record(command: string) {
    if (this.closed) throw new TransportError('Simulated instrument: session closed');
    this.commands.push(command);
    if (this.options.failOn && command.startsWith(this.options.failOn)) {
      throw new TransportError(`Simulated instrument: connection lost during ${command}`);
    }
  }

  private yReferenceFor(channel: Channel): number {
    return this.options.yReference?.[channel] ?? DEFAULT_Y_REFERENCE;
  }

  /** Fill memory for displayed channels with fresh tones, unless memory was fixed. Hidden channels hold nothing. */
  private capture() {
    if (this.options.memory) return;
    const sampleRate = 1 / this.xIncrement;
    for (const [key, tone] of Object.entries(this.options.tones ?? {})) {
      if (!tone) continue;
      const channel = channelOf(Number(key));
      if (!this.displayed.has(channel)) {
        delete this.memory[channel];
        continue;
      }
      const volts = synthesizeTone(tone, this.memoryDepth, sampleRate, this.random);
      this.memory[channel] = Uint8Array.from(volts, v => this.encode(v, channel));
    }
  }
}

function channelOf(n: number): Channel {
  if (n === 1 || n === 2 || n === 3 || n === 4) return n;
  throw new TransportError(`Simulated instrument: no channel ${n}`);
}
