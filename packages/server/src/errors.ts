import type { ErrorPayload } from '@lockin/shared';

/**
 * Base class for every failure the acquisition and lock-in core raises.
 * `code` is stable and safe to send to clients.
 */
export class LockInError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A parameter outside its allowed or enumerated set. Never clamped. */
export class ConfigurationError extends LockInError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export class AcquisitionTimeoutError extends LockInError {
  readonly waitedMs: number;

  constructor(waitedMs: number, limitMs: number) {
    super('ACQUISITION_TIMEOUT', `Trigger not complete after ${waitedMs} ms (limit ${limitMs} ms)`);
    this.waitedMs = waitedMs;
  }
}

/** The instrument reported the "no data" reference code for a channel. */
export class EmptyDataError extends LockInError {
  constructor(channel: number) {
    super('EMPTY_DATA', `Empty data: no waveform in memory for channel ${channel}`);
  }
}

export class TransportError extends LockInError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT', message, options);
  }
}

export class ProcessingError extends LockInError {
  constructor(message: string) {
    super('PROCESSING', message);
  }
}

export class LoopBusyError extends LockInError {
  constructor(message = 'Acquisition loop is running; stop it first') {
    super('LOOP_BUSY', message);
  }
}

export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof LockInError) return { code: err.code, message: err.message };
  if (err instanceof Error) return { code: 'INTERNAL', message: err.message };
  return { code: 'INTERNAL', message: String(err) };
}
