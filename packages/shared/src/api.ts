// Service surface payloads

import type { AveragedEstimate, ErrorPayload, LockInSettings, LoopStatus } from './lockin.js';
import type { InstrumentKind } from './instrument.js';

export interface HealthStatus {
  name: string;
  version: string;
  uptime: number;
  timestamp: number;
  instrument: InstrumentKind;
  loop: LoopStatus;
}

export interface EstimateRecord extends AveragedEstimate {
  id: number;
  runId: string;
  recordedAt: number;
  settings: LockInSettings;
}

export interface HistoryQuery {
  runId?: string;
  limit?: number;
}

export type WsMessage =
  | { type: 'estimate'; runId: string; estimate: AveragedEstimate }
  | { type: 'status'; status: LoopStatus }
  | { type: 'error'; error: ErrorPayload };

/**
 * Debug run reduced for transport: every `stride`-th sample of each series.
 * `overlay` is the sine reference scaled to the reference channel's RMS (×√2)
 * so it can be drawn over the raw reference.
 */
export interface DebugRunPayload {
  fundamentalFreqHz: number;
  frequencyResolutionHz: number;
  estimate: AveragedEstimate;
  samples: number;
  stride: number;
  time: number[];
  reference: number[];
  acquisition: number[];
  overlay: number[];
  amplitude: number[];
  phaseRadians: number[];
}
