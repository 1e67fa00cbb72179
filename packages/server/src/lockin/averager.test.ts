import { describe, it, expect } from 'vitest';
import type { LockInResult } from '@lockin/shared';
import { ConfigurationError, ProcessingError } from '../errors.js';
import { averageTrailing, trailingWindowStart } from './averager.js';

function resultOf(amplitude: number[], phaseRadians: number[]): LockInResult {
  return {
    time: Float64Array.from(amplitude, (_, i) => i),
    amplitude: Float64Array.from(amplitude),
    phaseRadians: Float64Array.from(phaseRadians),
    fundamentalFreqHz: 1000,
    frequencyResolutionHz: 10,
  };
}

describe('trailingWindowStart', () => {
  it('starts at floor(N * (1 - fraction))', () => {
    expect(trailingWindowStart(10, 0.5)).toBe(5);
    expect(trailingWindowStart(10, 0.25)).toBe(7);
    expect(trailingWindowStart(3, 0.5)).toBe(1);
    expect(trailingWindowStart(10, 1)).toBe(0);
  });

  it('keeps the last sample when the fraction is zero', () => {
    expect(trailingWindowStart(10, 0)).toBe(9);
    expect(trailingWindowStart(1, 0)).toBe(0);
  });

  it('rejects a fraction outside [0, 1]', () => {
    expect(() => trailingWindowStart(10, -0.1)).toThrow(ConfigurationError);
    expect(() => trailingWindowStart(10, 1.5)).toThrow(ConfigurationError);
    expect(() => trailingWindowStart(10, Number.NaN)).toThrow(ConfigurationError);
  });

  it('rejects an empty result', () => {
    expect(() => trailingWindowStart(0, 0.5)).toThrow(ProcessingError);
  });
});

describe('averageTrailing', () => {
  const result = resultOf([1, 2, 3, 4, 5, 6, 7, 8, 9, 10], [0, 0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9]);

  it('averages the trailing half', () => {
    const avg = averageTrailing(result, 0.5);
    expect(avg.amplitude).toBe(8);
    expect(avg.phaseRadians).toBeCloseTo(0.7, 12);
  });

  it('averages everything at fraction 1', () => {
    expect(averageTrailing(result, 1).amplitude).toBe(5.5);
  });

  it('returns the last sample at fraction 0', () => {
    const avg = averageTrailing(result, 0);
    expect(avg.amplitude).toBe(10);
    expect(avg.phaseRadians).toBe(0.9);
  });

  it('averages unwrapped phase past ±π', () => {
    const wrapped = resultOf([1, 1], [3.1, 3.2]);
    expect(averageTrailing(wrapped, 1).phaseRadians).toBeCloseTo(3.15, 12);
  });
});
