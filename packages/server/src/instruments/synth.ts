/**
 * Synthetic test tones for the demo instruments: a sinusoid plus Gaussian
 * noise from a seeded generator, so every run with the same seed produces the
 * same samples.
 */

export interface ToneSpec {
  frequencyHz: number;
  amplitude: number;
  phaseRadians: number;
  noiseRms: number;
}

/** mulberry32: small seeded PRNG returning [0, 1). */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Standard normal sample (Box-Muller). */
export function gaussian(random: () => number): number {
  const u = 1 - random(); // (0, 1]
  const v = random();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

export function synthesizeTone(tone: ToneSpec, length: number, sampleRate: number, random: () => number): Float64Array {
  const out = new Float64Array(length);
  const omega = (2 * Math.PI * tone.frequencyHz) / sampleRate;
  for (let i = 0; i < length; i++) {
    out[i] = tone.amplitude * Math.sin(omega * i + tone.phaseRadians);
    if (tone.noiseRms > 0) out[i] += tone.noiseRms * gaussian(random);
  }
  return out;
}
