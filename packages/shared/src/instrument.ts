// ============================================================================
// Instrument Types
// ============================================================================

import type { AcquisitionData, Channel } from './lockin.js';

export type InstrumentKind = 'ds1000z' | 'block-mode' | 'mock' | 'simulated';

export interface CaptureConfig {
  memoryDepth: number;
  sampleRate?: number;                                // Hz
  channelRanges?: Partial<Record<Channel, number>>;   // full-scale volts
  referenceChannel: Channel;
  acquisitionChannel: Channel;
}

/** One configurable parameter of an instrument variant. */
export interface ConfigField {
  name: keyof CaptureConfig;
  type: 'int' | 'float' | 'channel' | 'range';
  allowedValues?: readonly number[];
  default: number | null;
  unit?: string;
}

export interface InstrumentInfo {
  kind: InstrumentKind;
  identity: string;
  configured: boolean;
  config: CaptureConfig | null;
  schema: readonly ConfigField[];
}

/** Capability boundary every digitizer variant implements. */
export interface OscilloscopeInterface {
  /** Rejects disallowed values before any device command is issued. */
  configure(config: CaptureConfig): Promise<void>;
  /** One complete, fully scaled capture, or a rejection. Never partial. */
  acquire(): Promise<AcquisitionData>;
  /** Releases the device handle. Safe to call more than once. */
  close(): Promise<void>;
  describe(): InstrumentInfo;
}

/** Acquisition protocol states for one single-sweep cycle. */
export type AcquisitionState = 'idle' | 'armed' | 'waiting' | 'stopped' | 'reading';
