import { describe, it, expect } from 'vitest';
import {
  AcquisitionTimeoutError,
  ConfigurationError,
  EmptyDataError,
  LoopBusyError,
  ProcessingError,
  TransportError,
} from './errors.js';
import { httpStatusFor, parseHistoryQuery } from './http.js';

describe('httpStatusFor', () => {
  it('maps error codes to HTTP status', () => {
    expect(httpStatusFor(new ConfigurationError('bad'))).toBe(400);
    expect(httpStatusFor(new LoopBusyError())).toBe(409);
    expect(httpStatusFor(new AcquisitionTimeoutError(10_000, 10_000))).toBe(502);
    expect(httpStatusFor(new EmptyDataError(2))).toBe(502);
    expect(httpStatusFor(new TransportError('gone'))).toBe(502);
    expect(httpStatusFor(new ProcessingError('nan'))).toBe(422);
    expect(httpStatusFor(new SyntaxError('Unexpected token'))).toBe(400);
    expect(httpStatusFor(new Error('boom'))).toBe(500);
    expect(httpStatusFor('boom')).toBe(500);
  });
});

describe('parseHistoryQuery', () => {
  it('reads run and limit', () => {
    expect(parseHistoryQuery({ run: 'run-1', limit: '50' })).toEqual({ runId: 'run-1', limit: 50 });
    expect(parseHistoryQuery({ run: ['run-2', 'run-3'] })).toEqual({ runId: 'run-2' });
  });

  it('drops values it cannot use', () => {
    expect(parseHistoryQuery({ limit: 'all' })).toEqual({});
    expect(parseHistoryQuery({ limit: '-3', run: '' })).toEqual({});
  });
});
