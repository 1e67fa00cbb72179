// ============================================================================
// Butterworth IIR — Pure TypeScript
// ============================================================================

/**
 * One biquad in direct form II transposed, a0 normalized to 1.
 * A first-order section has b2 = a2 = 0.
 */
export interface Biquad {
  b0: number; b1: number; b2: number;
  a1: number; a2: number;
}

/**
 * Digital Butterworth low-pass as cascaded second-order sections.
 *
 * Analog prototype poles are prewarped to `cutoffNorm` (fraction of Nyquist,
 * exclusive 0..1) and mapped through the bilinear transform. All zeros land at
 * z = -1. Each section is scaled to unit DC gain, which for a Butterworth
 * low-pass is also the overall gain.
 */
export function designLowPass(order: number, cutoffNorm: number): Biquad[] {
  if (!Number.isInteger(order) || order < 1) {
    throw new RangeError(`Filter order must be a positive integer, got ${order}`);
  }
  if (!(cutoffNorm > 0 && cutoffNorm < 1)) {
    throw new RangeError(`Normalized cutoff must be in (0, 1), got ${cutoffNorm}`);
  }

  // Bilinear transform with fs = 2, so 2*fs = 4
  const warped = 4 * Math.tan((Math.PI * cutoffNorm) / 2);
  const sections: Biquad[] = [];

  for (let m = order % 2 === 0 ? 1 : 2; m < order; m += 2) {
    const theta = (Math.PI * m) / (2 * order);
    // analog pole s = warped * (-cos θ + j sin θ)
    const sRe = -warped * Math.cos(theta);
    const sIm = warped * Math.sin(theta);
    // z = (4 + s) / (4 - s)
    const nRe = 4 + sRe, nIm = sIm;
    const dRe = 4 - sRe, dIm = -sIm;
    const den = dRe * dRe + dIm * dIm;
    const zRe = (nRe * dRe + nIm * dIm) / den;
    const zIm = (nIm * dRe - nRe * dIm) / den;

    const a1 = -2 * zRe;
    const a2 = zRe * zRe + zIm * zIm;
    const g = (1 + a1 + a2) / 4;
    sections.push({ b0: g, b1: 2 * g, b2: g, a1, a2 });
  }

  if (order % 2 === 1) {
    const z = (4 - warped) / (4 + warped);
    const g = (1 - z) / 2;
    sections.push({ b0: g, b1: g, b2: 0, a1: -z, a2: 0 });
  }

  return sections;
}

/** Steady-state section states for a unit step input (per-section lfilter_zi, chained). */
export function steadyStateInitial(sections: readonly Biquad[]): Float64Array[] {
  let scale = 1;
  return sections.map(({ b0, b1, b2, a1, a2 }) => {
    const B0 = b1 - a1 * b0;
    const B1 = b2 - a2 * b0;
    const z0 = (B0 + B1) / (1 + a1 + a2);
    const z1 = B1 - a2 * z0;
    const zi = Float64Array.of(z0 * scale, z1 * scale);
    scale *= (b0 + b1 + b2) / (1 + a1 + a2);
    return zi;
  });
}

/**
 * Causal pass of the cascade. `initial` states are copied, not mutated.
 */
export function sosFilter(
  sections: readonly Biquad[],
  input: ArrayLike<number>,
  initial?: readonly Float64Array[],
): Float64Array {
  const out = Float64Array.from(input);
  sections.forEach((s, idx) => {
    let z0 = initial ? initial[idx][0] : 0;
    let z1 = initial ? initial[idx][1] : 0;
    for (let n = 0; n < out.length; n++) {
      const x = out[n];
      const y = s.b0 * x + z0;
      z0 = s.b1 * x - s.a1 * y + z1;
      z1 = s.b2 * x - s.a2 * y;
      out[n] = y;
    }
  });
  return out;
}

/** Odd reflection about each end: 2*x[0] - x[padlen..1], ..., 2*x[N-1] - x[N-2..N-1-padlen]. */
function oddExtend(x: ArrayLike<number>, padlen: number): Float64Array {
  const N = x.length;
  const ext = new Float64Array(N + 2 * padlen);
  for (let i = 0; i < padlen; i++) {
    ext[i] = 2 * x[0] - x[padlen - i];
    ext[N + padlen + i] = 2 * x[N - 1] - x[N - 2 - i];
  }
  for (let i = 0; i < N; i++) ext[padlen + i] = x[i];
  return ext;
}

/**
 * Zero-phase forward-backward filtering. Magnitude response is squared
 * (-6 dB at the design cutoff) and phase is zero; the edges are padded by odd
 * reflection and both passes start from steady state.
 */
export function filtfilt(sections: readonly Biquad[], input: ArrayLike<number>, padlen: number): Float64Array {
  const N = input.length;
  if (N === 0) return new Float64Array(0);
  const pad = Math.max(0, Math.min(padlen, N - 1));
  const ext = oddExtend(input, pad);
  const zi = steadyStateInitial(sections);

  const x0 = ext[0];
  const forward = sosFilter(sections, ext, zi.map(z => z.map(v => v * x0)));
  forward.reverse();
  const y0 = forward[0];
  const backward = sosFilter(sections, forward, zi.map(z => z.map(v => v * y0)));
  backward.reverse();

  return backward.slice(pad, pad + N);
}

/** Magnitude of the cascade's frequency response at `freqNorm` (fraction of Nyquist). */
export function magnitudeResponse(sections: readonly Biquad[], freqNorm: number): number {
  const w = Math.PI * freqNorm;
  let mag = 1;
  for (const { b0, b1, b2, a1, a2 } of sections) {
    // e^{-jw}, e^{-2jw}
    const c1 = Math.cos(w), s1 = -Math.sin(w);
    const c2 = Math.cos(2 * w), s2 = -Math.sin(2 * w);
    const numRe = b0 + b1 * c1 + b2 * c2, numIm = b1 * s1 + b2 * s2;
    const denRe = 1 + a1 * c1 + a2 * c2, denIm = a1 * s1 + a2 * s2;
    mag *= Math.hypot(numRe, numIm) / Math.hypot(denRe, denIm);
  }
  return mag;
}
