import { describe, it, expect } from 'vitest';
import type { AcquisitionState } from '@lockin/shared';
import { AcquisitionTimeoutError, EmptyDataError, TransportError } from '../errors.js';
import { SimulatedScpiInstrument, type SimulatedScpiOptions } from '../instruments/simulated-scpi.js';
import { NO_DATA_REFERENCE, SweepAcquisitionProtocol, batchWindows, type ReadProgress } from './protocol.js';

const DEPTH = 20;

function fixedMemory(): SimulatedScpiOptions['memory'] {
  return {
    1: Uint8Array.from({ length: DEPTH }, (_, i) => 100 + i),
    2: Uint8Array.from({ length: DEPTH }, (_, i) => 200 - i),
  };
}

function simulated(options: SimulatedScpiOptions = {}) {
  return new SimulatedScpiInstrument({ memoryDepth: DEPTH, memory: fixedMemory(), xOrigin: -1e-4, ...options });
}

describe('batchWindows', () => {
  it('covers the memory in 1-based inclusive windows', () => {
    expect(batchWindows(20, 7)).toEqual([
      { start: 1, stop: 7 },
      { start: 8, stop: 14 },
      { start: 15, stop: 20 },
    ]);
    expect(batchWindows(250_000, 125_000)).toHaveLength(2);
    expect(batchWindows(6000, 125_000)).toEqual([{ start: 1, stop: 6000 }]);
  });
});

describe('SweepAcquisitionProtocol', () => {
  it('arms, waits for the trigger, stops and reads both channels', async () => {
    const scope = simulated();
    const protocol = new SweepAcquisitionProtocol(scope, { pollIntervalMs: 1 });
    const data = await protocol.acquire(1, 2);

    expect(scope.commands.slice(0, 6)).toEqual([
      ':RUN',
      ':TRIGger:SWEep SINGle',
      ':TFORce',
      ':TRIGger:STATus?',
      ':TFORce',
      ':TRIGger:STATus?',
    ]);
    expect(scope.commands[6]).toBe(':STOP');

    expect(data.refWaveform).toHaveLength(DEPTH);
    expect(data.acquisitionWaveform).toHaveLength(DEPTH);
    expect(data.refWaveform[0]).toBeCloseTo((100 - 127) * 0.01, 12);
    expect(data.acquisitionWaveform[0]).toBeCloseTo((200 - 127) * 0.01, 12);
    expect(data.timeIncrement).toBe(1e-5);
    expect(data.timeOrigin).toBe(-1e-4);
    expect(protocol.state).toBe('idle');
  });

  it('walks through every acquisition state', async () => {
    const protocol = new SweepAcquisitionProtocol(simulated(), { pollIntervalMs: 1 });
    const states: AcquisitionState[] = [];
    protocol.on('state', (s: AcquisitionState) => states.push(s));

    await protocol.acquire(1, 2);
    expect(states).toEqual(['armed', 'waiting', 'stopped', 'reading', 'idle']);
  });

  it('reads the same samples whatever the batch size', async () => {
    const whole = await new SweepAcquisitionProtocol(simulated(), { pollIntervalMs: 1 }).acquire(1, 2);

    const scope = simulated({ maxPointsPerTransfer: 7 });
    const chunked = new SweepAcquisitionProtocol(scope, { pollIntervalMs: 1, maxPointsPerRead: 7 });
    const progress: ReadProgress[] = [];
    chunked.on('progress', (p: ReadProgress) => progress.push(p));
    const data = await chunked.acquire(1, 2);

    expect(data).toEqual(whole);
    expect(progress).toHaveLength(6);
    expect(progress[2]).toEqual({ channel: 1, batch: 3, batches: 3 });
    expect(scope.commands).toContain(':WAVeform:STARt 15');
    expect(scope.commands).toContain(':WAVeform:STOP 20');
  });

  it('fails when a batch exceeds what the instrument serves', async () => {
    const protocol = new SweepAcquisitionProtocol(simulated({ maxPointsPerTransfer: 5 }), {
      pollIntervalMs: 1,
      maxPointsPerRead: 7,
    });
    await expect(protocol.acquire(1, 2)).rejects.toBeInstanceOf(TransportError);
  });

  it('reports an empty channel from the no-data reference code', async () => {
    const protocol = new SweepAcquisitionProtocol(simulated({ yReference: { 2: NO_DATA_REFERENCE } }), { pollIntervalMs: 1 });
    const error = await protocol.acquire(1, 2).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(EmptyDataError);
    expect(error).toHaveProperty('message', 'Empty data: no waveform in memory for channel 2');
  });

  it('gives up on the trigger after the wait limit', async () => {
    const scope = simulated({ triggerPolls: Infinity });
    const protocol = new SweepAcquisitionProtocol(scope, { pollIntervalMs: 10, maxTriggerWaitMs: 50 });

    const started = Date.now();
    const error = await protocol.acquire(1, 2).catch((err: unknown) => err);
    const elapsed = Date.now() - started;

    expect(error).toBeInstanceOf(AcquisitionTimeoutError);
    expect(elapsed).toBeGreaterThanOrEqual(45);
    expect(elapsed).toBeLessThan(1000);
    expect(protocol.state).toBe('idle');
    expect(scope.commands.filter(c => c === ':TFORce').length).toBeGreaterThan(2);
    expect(scope.commands).not.toContain(':WAVeform:DATA?');
  });

  it('surfaces a dropped connection during readout', async () => {
    const protocol = new SweepAcquisitionProtocol(simulated({ failOn: ':WAVeform:DATA?' }), { pollIntervalMs: 1 });
    await expect(protocol.acquire(1, 2)).rejects.toThrow('connection lost');
    expect(protocol.state).toBe('idle');
  });

  it('wraps foreign transport errors', async () => {
    const scope = simulated();
    scope.query = async () => { throw new Error('socket hang up'); };
    const protocol = new SweepAcquisitionProtocol(scope, { pollIntervalMs: 1 });
    const error = await protocol.acquire(1, 2).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty('message', 'Acquisition failed: socket hang up');
  });
});
