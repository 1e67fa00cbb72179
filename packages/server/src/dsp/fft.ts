// ============================================================================
// FFT — Pure TypeScript
// ============================================================================

export interface ComplexSpectrum {
  re: Float64Array;
  im: Float64Array;
}

export function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

function nextPowerOfTwo(n: number): number {
  let p = 1;
  while (p < n) p *= 2;
  return p;
}

/** Radix-2 DIT FFT (in-place, split real/imag Float64). Length must be a power of two. */
export function fftRadix2(re: Float64Array, im: Float64Array): void {
  const N = re.length;
  if (!isPowerOfTwo(N) || im.length !== N) {
    throw new RangeError(`Radix-2 FFT needs matching power-of-two buffers, got ${N}/${im.length}`);
  }
  // Bit-reversal permutation
  for (let i = 1, j = 0; i < N; i++) {
    let bit = N >> 1;
    while (j & bit) { j ^= bit; bit >>= 1; }
    j ^= bit;
    if (i < j) {
      [re[i], re[j]] = [re[j], re[i]];
      [im[i], im[j]] = [im[j], im[i]];
    }
  }
  // Twiddle table exp(-2*pi*i*j/N), j < N/2
  const twRe = new Float64Array(N >> 1);
  const twIm = new Float64Array(N >> 1);
  for (let j = 0; j < N >> 1; j++) {
    twRe[j] = Math.cos((-2 * Math.PI * j) / N);
    twIm[j] = Math.sin((-2 * Math.PI * j) / N);
  }
  // Butterfly
  for (let len = 2; len <= N; len <<= 1) {
    const half = len >> 1;
    const step = N / len;
    for (let i = 0; i < N; i += len) {
      for (let j = 0; j < half; j++) {
        const wRe = twRe[j * step], wIm = twIm[j * step];
        const a = i + j, b = a + half;
        const tRe = wRe * re[b] - wIm * im[b];
        const tIm = wRe * im[b] + wIm * re[b];
        re[b] = re[a] - tRe; im[b] = im[a] - tIm;
        re[a] += tRe; im[a] += tIm;
      }
    }
  }
}

function ifftRadix2(re: Float64Array, im: Float64Array): void {
  const N = re.length;
  for (let i = 0; i < N; i++) im[i] = -im[i];
  fftRadix2(re, im);
  for (let i = 0; i < N; i++) {
    re[i] /= N;
    im[i] = -im[i] / N;
  }
}

/**
 * Discrete Fourier transform of a real sequence of any length.
 * Powers of two go straight to radix-2; other lengths use Bluestein's chirp-z
 * reformulation as a power-of-two circular convolution.
 */
export function dft(input: ArrayLike<number>): ComplexSpectrum {
  const N = input.length;
  if (N === 0) return { re: new Float64Array(0), im: new Float64Array(0) };

  if (isPowerOfTwo(N)) {
    const re = Float64Array.from(input);
    const im = new Float64Array(N);
    fftRadix2(re, im);
    return { re, im };
  }

  const M = nextPowerOfTwo(2 * N - 1);
  // chirp w[k] = exp(-i*pi*k^2/N); k^2 reduced mod 2N keeps the angle small
  const wRe = new Float64Array(N);
  const wIm = new Float64Array(N);
  for (let k = 0; k < N; k++) {
    const angle = (Math.PI * ((k * k) % (2 * N))) / N;
    wRe[k] = Math.cos(angle);
    wIm[k] = -Math.sin(angle);
  }

  const aRe = new Float64Array(M);
  const aIm = new Float64Array(M);
  for (let k = 0; k < N; k++) {
    aRe[k] = input[k] * wRe[k];
    aIm[k] = input[k] * wIm[k];
  }

  const bRe = new Float64Array(M);
  const bIm = new Float64Array(M);
  bRe[0] = wRe[0];
  bIm[0] = -wIm[0];
  for (let k = 1; k < N; k++) {
    bRe[k] = bRe[M - k] = wRe[k];
    bIm[k] = bIm[M - k] = -wIm[k];
  }

  fftRadix2(aRe, aIm);
  fftRadix2(bRe, bIm);
  for (let k = 0; k < M; k++) {
    const r = aRe[k] * bRe[k] - aIm[k] * bIm[k];
    const i = aRe[k] * bIm[k] + aIm[k] * bRe[k];
    aRe[k] = r;
    aIm[k] = i;
  }
  ifftRadix2(aRe, aIm);

  const re = new Float64Array(N);
  const im = new Float64Array(N);
  for (let k = 0; k < N; k++) {
    re[k] = aRe[k] * wRe[k] - aIm[k] * wIm[k];
    im[k] = aRe[k] * wIm[k] + aIm[k] * wRe[k];
  }
  return { re, im };
}

/** Bin frequencies in the same order as numpy-style fftfreq. */
export function binFrequency(k: number, N: number, sampleRate: number): number {
  const signed = k < Math.ceil(N / 2) ? k : k - N;
  return (signed * sampleRate) / N;
}
