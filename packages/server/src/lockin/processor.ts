/**
 * Lock-in processing: AcquisitionData × LockInSettings → LockInResult.
 *
 * 1. fs = 1 / timeIncrement
 * 2. Fundamental = strongest strictly-positive DFT bin of the reference
 * 3. Zero-phase cos/sin references on the relative axis t = i / fs
 * 4. I = signal * cos, Q = signal * sin
 * 5. Butterworth low-pass of I and Q, zero-phase forward-backward
 * 6. amplitude = 2 * |I + jQ|, phase = atan2(Q, I)
 * 7. Subtract the reference channel's phase against the synthesized references
 * 8. Unwrap
 *
 * Everything here is pure: no I/O, no instrument state, no hidden caches.
 */
import type { AcquisitionData, LockInResult, LockInSettings, ReferenceSignals } from '@lockin/shared';
import { FILTER_ORDER_RANGE } from '@lockin/shared';
import { designLowPass, filtfilt } from '../dsp/butterworth.js';
import { binFrequency, dft } from '../dsp/fft.js';
import { ConfigurationError, ProcessingError } from '../errors.js';

export interface FundamentalEstimate {
  frequencyHz: number;
  /** fs / N */
  resolutionHz: number;
  bin: number;
}

/**
 * Checks settings that do not depend on the sample rate. Throws
 * ConfigurationError; values are never clamped.
 */
export function validateSettings(settings: LockInSettings): void {
  const { lowPassCutoffHz, filterOrder, averagingFraction } = settings;
  if (!Number.isFinite(lowPassCutoffHz) || lowPassCutoffHz <= 0) {
    throw new ConfigurationError(`Low-pass cutoff must be a positive frequency, got ${lowPassCutoffHz} Hz`);
  }
  if (!Number.isInteger(filterOrder) || filterOrder < FILTER_ORDER_RANGE.min || filterOrder > FILTER_ORDER_RANGE.max) {
    throw new ConfigurationError(
      `Filter order must be an integer in [${FILTER_ORDER_RANGE.min}, ${FILTER_ORDER_RANGE.max}], got ${filterOrder}`,
    );
  }
  if (!Number.isFinite(averagingFraction) || averagingFraction < 0 || averagingFraction > 1) {
    throw new ConfigurationError(`Averaging fraction must be in [0, 1], got ${averagingFraction}`);
  }
}

/**
 * Frequency of the largest-magnitude positive bin of the reference's DFT.
 * DC and the mirrored half are excluded; the first bin wins a tie.
 * The estimate is quantized to fs / N.
 */
export function extractFundamentalFrequency(refWaveform: ArrayLike<number>, timeIncrement: number): FundamentalEstimate {
  const N = refWaveform.length;
  if (N < 2) {
    throw new ProcessingError(`Need at least 2 reference samples for a spectrum, got ${N}`);
  }
  if (!Number.isFinite(timeIncrement) || timeIncrement <= 0) {
    throw new ProcessingError(`Time increment must be positive and finite, got ${timeIncrement}`);
  }
  const fs = 1 / timeIncrement;
  const { re, im } = dft(refWaveform);

  const lastPositive = Math.ceil(N / 2) - 1;
  let peakBin = -1;
  let peakMag = 0;
  for (let k = 1; k <= lastPositive; k++) {
    const mag = Math.hypot(re[k], im[k]);
    if (mag > peakMag) {
      peakMag = mag;
      peakBin = k;
    }
  }

  // Rounding noise from a constant or all-zero input must not pass as a peak
  let energy = 0;
  for (let i = 0; i < N; i++) energy += Math.abs(refWaveform[i]);
  if (peakBin < 0 || !(peakMag > 1e-9 * Math.max(energy, Number.MIN_VALUE))) {
    throw new ProcessingError('Reference waveform has no energy above DC; fundamental frequency is undefined');
  }

  return {
    frequencyHz: binFrequency(peakBin, N, fs),
    resolutionHz: fs / N,
    bin: peakBin,
  };
}

/** cos/sin at `frequencyHz` with zero phase at sample 0. */
export function generateReferenceSignals(frequencyHz: number, N: number, timeIncrement: number): ReferenceSignals {
  const cos = new Float64Array(N);
  const sin = new Float64Array(N);
  const omega = 2 * Math.PI * frequencyHz * timeIncrement;
  for (let i = 0; i < N; i++) {
    cos[i] = Math.cos(omega * i);
    sin[i] = Math.sin(omega * i);
  }
  return { cos, sin };
}

/**
 * Zero-phase Butterworth low-pass. Padding is 3 * order samples at each end.
 * Throws ConfigurationError for a cutoff outside (0, fs/2).
 */
export function lowPassFilter(signal: ArrayLike<number>, cutoffHz: number, sampleRate: number, order: number): Float64Array {
  const nyquist = sampleRate / 2;
  if (!(cutoffHz > 0) || cutoffHz >= nyquist) {
    throw new ConfigurationError(`Low-pass cutoff ${cutoffHz} Hz must be in (0, ${nyquist}) Hz for fs = ${sampleRate} Hz`);
  }
  const sections = designLowPass(order, cutoffHz / nyquist);
  return filtfilt(sections, signal, 3 * order);
}

/** Removes jumps larger than π by adding multiples of 2π, in place. */
export function unwrapPhase(phase: Float64Array): Float64Array {
  let offset = 0;
  for (let i = 1; i < phase.length; i++) {
    const raw = phase[i] + offset;
    const delta = raw - phase[i - 1];
    if (delta > Math.PI || delta < -Math.PI) {
      const turns = Math.round(delta / (2 * Math.PI));
      offset -= turns * 2 * Math.PI;
    }
    phase[i] += offset;
  }
  return phase;
}

function mean(values: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < values.length; i++) sum += values[i];
  return sum / values.length;
}

export function performLockIn(data: AcquisitionData, settings: LockInSettings): LockInResult {
  validateSettings(settings);
  const { refWaveform, acquisitionWaveform, timeIncrement, timeOrigin } = data;
  const N = refWaveform.length;
  if (acquisitionWaveform.length !== N) {
    throw new ProcessingError(`Channel lengths differ: reference ${N}, acquisition ${acquisitionWaveform.length}`);
  }
  if (!Number.isFinite(timeIncrement) || timeIncrement <= 0) {
    throw new ProcessingError(`Time increment must be positive and finite, got ${timeIncrement}`);
  }

  const fs = 1 / timeIncrement;
  // Cutoff is checked against Nyquist before any numeric work
  if (settings.lowPassCutoffHz >= fs / 2) {
    throw new ConfigurationError(`Low-pass cutoff ${settings.lowPassCutoffHz} Hz must be below Nyquist (${fs / 2} Hz)`);
  }

  const fundamental = extractFundamentalFrequency(refWaveform, timeIncrement);
  const { cos, sin } = generateReferenceSignals(fundamental.frequencyHz, N, timeIncrement);

  const I = new Float64Array(N);
  const Q = new Float64Array(N);
  for (let i = 0; i < N; i++) {
    I[i] = acquisitionWaveform[i] * cos[i];
    Q[i] = acquisitionWaveform[i] * sin[i];
  }

  const iFiltered = lowPassFilter(I, settings.lowPassCutoffHz, fs, settings.filterOrder);
  const qFiltered = lowPassFilter(Q, settings.lowPassCutoffHz, fs, settings.filterOrder);

  let refSin = 0, refCos = 0;
  for (let i = 0; i < N; i++) {
    refSin += refWaveform[i] * sin[i];
    refCos += refWaveform[i] * cos[i];
  }
  const refPhase = Math.atan2(refSin / N, refCos / N);

  const time = new Float64Array(N);
  const amplitude = new Float64Array(N);
  const phaseRadians = new Float64Array(N);
  for (let i = 0; i < N; i++) {
    time[i] = timeOrigin + i * timeIncrement;
    amplitude[i] = 2 * Math.hypot(iFiltered[i], qFiltered[i]);
    phaseRadians[i] = Math.atan2(qFiltered[i], iFiltered[i]) - refPhase;
  }
  unwrapPhase(phaseRadians);

  if (!Number.isFinite(mean(amplitude)) || !Number.isFinite(mean(phaseRadians))) {
    throw new ProcessingError('Lock-in produced non-finite amplitude or phase');
  }

  return {
    time,
    amplitude,
    phaseRadians,
    fundamentalFreqHz: fundamental.frequencyHz,
    frequencyResolutionHz: fundamental.resolutionHz,
  };
}
