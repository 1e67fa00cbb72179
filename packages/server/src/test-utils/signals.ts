/**
 * Signal fixtures for tests. Everything is generated, nothing is loaded.
 */
import type { AcquisitionData } from '@lockin/shared';
import { gaussian, seededRandom } from '../instruments/synth.js';

export interface ToneOptions {
  frequencyHz: number;
  amplitude?: number;
  /** Phase of the cosine at sample 0, radians. */
  phaseRadians?: number;
  offset?: number;
  noiseRms?: number;
  seed?: number;
}

/** amplitude * cos(2π f t + phase) + offset, t = i / fs. */
export function cosineTone(options: ToneOptions, length: number, sampleRate: number): Float64Array {
  const { frequencyHz, amplitude = 1, phaseRadians = 0, offset = 0, noiseRms = 0, seed = 7 } = options;
  const random = seededRandom(seed);
  const out = new Float64Array(length);
  for (let i = 0; i < length; i++) {
    out[i] = offset + amplitude * Math.cos((2 * Math.PI * frequencyHz * i) / sampleRate + phaseRadians);
    if (noiseRms > 0) out[i] += noiseRms * gaussian(random);
  }
  return out;
}

export function constant(value: number, length: number): Float64Array {
  return new Float64Array(length).fill(value);
}

export function acquisition(
  refWaveform: Float64Array,
  acquisitionWaveform: Float64Array,
  sampleRate: number,
  timeOrigin = 0,
): AcquisitionData {
  return { refWaveform, acquisitionWaveform, timeIncrement: 1 / sampleRate, timeOrigin };
}

export function degrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

/** Direct O(N²) DFT, the reference the fast paths are checked against. */
export function naiveDft(input: ArrayLike<number>): { re: Float64Array; im: Float64Array } {
  const N = input.length;
  const re = new Float64Array(N);
  const im = new Float64Array(N);
  for (let k = 0; k < N; k++) {
    for (let n = 0; n < N; n++) {
      const angle = (-2 * Math.PI * k * n) / N;
      re[k] += input[n] * Math.cos(angle);
      im[k] += input[n] * Math.sin(angle);
    }
  }
  return { re, im };
}
