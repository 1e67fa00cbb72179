import type { DebugRun, DebugRunPayload } from '@lockin/shared';

export const DEFAULT_DEBUG_POINTS = 2000;

function rms(values: Float64Array): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v * v;
  return Math.sqrt(sum / values.length);
}

function pick(values: Float64Array, stride: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < values.length; i += stride) out.push(values[i]);
  return out;
}

/** Decimate a debug run to at most `maxPoints` samples per series. */
export function toDebugRunPayload(run: DebugRun, maxPoints = DEFAULT_DEBUG_POINTS): DebugRunPayload {
  const samples = run.result.time.length;
  const stride = Math.max(1, Math.ceil(samples / Math.max(1, Math.floor(maxPoints))));
  const scale = rms(run.data.refWaveform) * Math.SQRT2;
  const overlay = run.reference.sin.map(v => v * scale);

  return {
    fundamentalFreqHz: run.result.fundamentalFreqHz,
    frequencyResolutionHz: run.result.frequencyResolutionHz,
    estimate: { ...run.estimate },
    samples,
    stride,
    time: pick(run.result.time, stride),
    reference: pick(run.data.refWaveform, stride),
    acquisition: pick(run.data.acquisitionWaveform, stride),
    overlay: pick(overlay, stride),
    amplitude: pick(run.result.amplitude, stride),
    phaseRadians: pick(run.result.phaseRadians, stride),
  };
}
