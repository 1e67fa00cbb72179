// ============================================================================
// Lock-In Types
// ============================================================================

/** Physical input of a four-channel digitizer. */
export type Channel = 1 | 2 | 3 | 4;

export const CHANNELS: readonly Channel[] = [1, 2, 3, 4];

/**
 * One acquisition cycle: the reference and signal channels sampled on a shared
 * timebase. Values are physical voltages.
 */
export interface AcquisitionData {
  readonly refWaveform: Float64Array;
  readonly acquisitionWaveform: Float64Array;
  /** Seconds between samples (1 / effective sample rate). */
  readonly timeIncrement: number;
  /** Instrument time of sample 0, seconds. */
  readonly timeOrigin: number;
}

export interface LockInSettings {
  lowPassCutoffHz: number;
  filterOrder: number;     // integer, 1-10
  averagingFraction: number; // 0.0 to 1.0, trailing share of samples averaged
}

export const DEFAULT_LOCKIN_SETTINGS: Readonly<LockInSettings> = {
  lowPassCutoffHz: 10,
  filterOrder: 4,
  averagingFraction: 0.5,
};

export const FILTER_ORDER_RANGE = { min: 1, max: 10 } as const;

export interface LockInResult {
  /** Absolute time axis: timeOrigin + i * timeIncrement. */
  time: Float64Array;
  amplitude: Float64Array;
  /** Phase relative to the reference channel, unwrapped. */
  phaseRadians: Float64Array;
  fundamentalFreqHz: number;
  /** Bin spacing fs / N; the inherent uncertainty of fundamentalFreqHz. */
  frequencyResolutionHz: number;
}

/** Zero-phase demodulation references synthesized at the fundamental. */
export interface ReferenceSignals {
  cos: Float64Array;
  sin: Float64Array;
}

export interface AveragedEstimate {
  amplitude: number;
  phaseRadians: number;
  /** Seconds since the acquisition loop was created. */
  timestamp: number;
}

export interface DebugRun {
  data: AcquisitionData;
  result: LockInResult;
  reference: ReferenceSignals;
  estimate: AveragedEstimate;
}

export interface LoopStatus {
  running: boolean;
  runId: string | null;
  cycles: number;
  startedAt: number | null;
  lastEstimate: AveragedEstimate | null;
  lastError: ErrorPayload | null;
}

export interface ErrorPayload {
  code: string;
  message: string;
}
