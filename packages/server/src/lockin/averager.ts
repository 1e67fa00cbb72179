import type { AveragedEstimate, LockInResult } from '@lockin/shared';
import { ConfigurationError, ProcessingError } from '../errors.js';

/**
 * First index of the trailing window: floor(N * (1 - fraction)), clamped to
 * N - 1 so that fraction 0 averages the single last sample.
 */
export function trailingWindowStart(length: number, fraction: number): number {
  if (!Number.isFinite(fraction) || fraction < 0 || fraction > 1) {
    throw new ConfigurationError(`Averaging fraction must be in [0, 1], got ${fraction}`);
  }
  if (length === 0) {
    throw new ProcessingError('Cannot average an empty lock-in result');
  }
  return Math.min(Math.floor(length * (1 - fraction)), length - 1);
}

function meanFrom(values: Float64Array, start: number): number {
  let sum = 0;
  for (let i = start; i < values.length; i++) sum += values[i];
  return sum / (values.length - start);
}

/**
 * Arithmetic mean of the trailing `fraction` of amplitude and phase. The
 * leading samples carry the filter's startup transient. Phase is averaged on
 * the unwrapped sequence.
 */
export function averageTrailing(result: LockInResult, fraction: number): Omit<AveragedEstimate, 'timestamp'> {
  const start = trailingWindowStart(result.amplitude.length, fraction);
  return {
    amplitude: meanFrom(result.amplitude, start),
    phaseRadians: meanFrom(result.phaseRadians, start),
  };
}
