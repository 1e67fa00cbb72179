import { describe, it, expect } from 'vitest';
import { designLowPass, filtfilt, magnitudeResponse, sosFilter, steadyStateInitial } from './butterworth.js';

describe('designLowPass', () => {
  it('splits the order into biquads plus one first-order section when odd', () => {
    expect(designLowPass(4, 0.2)).toHaveLength(2);
    const odd = designLowPass(5, 0.2);
    expect(odd).toHaveLength(3);
    expect(odd[2].b2).toBe(0);
    expect(odd[2].a2).toBe(0);
  });

  it.each([1, 2, 3, 4, 7, 10])('has unit gain at DC and -3 dB at the cutoff (order %i)', (order) => {
    const sections = designLowPass(order, 0.2);
    expect(magnitudeResponse(sections, 0)).toBeCloseTo(1, 12);
    expect(magnitudeResponse(sections, 0.2)).toBeCloseTo(Math.SQRT1_2, 9);
  });

  it('rolls off at 20 dB per decade per order', () => {
    const sections = designLowPass(4, 0.01);
    // ten times the (prewarped) cutoff: |H| ~ 10^-4
    expect(magnitudeResponse(sections, 0.1)).toBeLessThan(1.1e-4);
    expect(magnitudeResponse(sections, 0.1)).toBeGreaterThan(0.9e-4);
  });

  it('rejects invalid order and cutoff', () => {
    expect(() => designLowPass(0, 0.2)).toThrow(RangeError);
    expect(() => designLowPass(2.5, 0.2)).toThrow(RangeError);
    expect(() => designLowPass(2, 0)).toThrow(RangeError);
    expect(() => designLowPass(2, 1)).toThrow(RangeError);
  });
});

describe('sosFilter', () => {
  it('starts in steady state when given scaled initial conditions', () => {
    const sections = designLowPass(3, 0.1);
    const zi = steadyStateInitial(sections).map(z => z.map(v => v * 2.5));
    const out = sosFilter(sections, new Float64Array(20).fill(2.5), zi);
    for (const v of out) expect(v).toBeCloseTo(2.5, 12);
  });

  it('does not modify the initial state it is given', () => {
    const sections = designLowPass(2, 0.3);
    const zi = steadyStateInitial(sections);
    const before = zi.map(z => Array.from(z));
    sosFilter(sections, [1, 0, 0, 1], zi);
    expect(zi.map(z => Array.from(z))).toEqual(before);
  });
});

describe('filtfilt', () => {
  it('passes a constant unchanged', () => {
    const sections = designLowPass(4, 0.05);
    const out = filtfilt(sections, new Float64Array(50).fill(3), 12);
    expect(out).toHaveLength(50);
    for (const v of out) expect(v).toBeCloseTo(3, 10);
  });

  it('leaves an in-band sine without phase shift', () => {
    const N = 2000;
    const x = Float64Array.from({ length: N }, (_, n) => Math.sin(Math.PI * 0.01 * n));
    const y = filtfilt(designLowPass(4, 0.2), x, 12);
    for (let n = 500; n < 1500; n++) expect(Math.abs(y[n] - x[n])).toBeLessThan(1e-3);
  });

  it('removes an out-of-band tone', () => {
    const N = 4000;
    const x = Float64Array.from({ length: N }, (_, n) => 1 + Math.cos(Math.PI * 0.5 * n));
    const y = filtfilt(designLowPass(4, 0.02), x, 12);
    for (let n = 1000; n < 3000; n++) expect(y[n]).toBeCloseTo(1, 6);
  });

  it('clamps padding for short inputs', () => {
    const out = filtfilt(designLowPass(4, 0.2), [1, 2, 3], 12);
    expect(out).toHaveLength(3);
    expect(out.every(Number.isFinite)).toBe(true);
  });
});
