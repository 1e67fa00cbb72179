import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import type {
  AcquisitionData,
  AveragedEstimate,
  DebugRun,
  ErrorPayload,
  LockInResult,
  LockInSettings,
  LoopStatus,
  OscilloscopeInterface,
} from '@lockin/shared';
import { LoopBusyError, toErrorPayload } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { averageTrailing } from './averager.js';
import { generateReferenceSignals, performLockIn, validateSettings } from './processor.js';

export interface LockInLoopOptions {
  /** Pause between cycles so the instrument is not polled back to back. */
  interCycleDelayMs?: number;
  logger?: Logger;
}

export type StartOutcome = 'started' | 'already-running';

interface Cycle {
  data: AcquisitionData;
  result: LockInResult;
  estimate: AveragedEstimate;
}

/**
 * Lock-in loop: acquire → lock-in → average, repeated until stopped.
 *
 * At most one cycle is in flight. The stop flag is read between cycles, so an
 * instrument read in progress finishes (or times out) first. Any error ends
 * the loop after it is logged and reported; nothing is retried here.
 *
 * Events: 'estimate' (AveragedEstimate), 'status' (LoopStatus), 'error'.
 * Estimate timestamps are seconds since this loop object was created.
 */
export class LockInLoop extends EventEmitter {
  private readonly epoch = Date.now();
  private readonly interCycleDelayMs: number;
  private readonly logger: Logger;
  private running = false;
  private stopRequested = false;
  private oneShot: Promise<DebugRun> | null = null;
  private loopDone: Promise<void> = Promise.resolve();
  private runId: string | null = null;
  private startedAt: number | null = null;
  private cycles = 0;
  private lastEstimate: AveragedEstimate | null = null;
  private lastError: ErrorPayload | null = null;

  constructor(private readonly instrument: OscilloscopeInterface, options: LockInLoopOptions = {}) {
    super();
    this.on('error', () => {}); // errors are delivered through onError and the log
    this.interCycleDelayMs = options.interCycleDelayMs ?? 100;
    this.logger = options.logger ?? silentLogger;
  }

  get isRunning() { return this.running; }

  getStatus(): LoopStatus {
    return {
      running: this.running,
      runId: this.runId,
      cycles: this.cycles,
      startedAt: this.startedAt,
      lastEstimate: this.lastEstimate ? { ...this.lastEstimate } : null,
      lastError: this.lastError ? { ...this.lastError } : null,
    };
  }

  /**
   * Start the continuous loop. Settings are validated synchronously
   * (ConfigurationError); a second start while running is a no-op.
   */
  start(
    settings: LockInSettings,
    onEstimate?: (estimate: AveragedEstimate) => void,
    onError?: (error: unknown) => void,
  ): StartOutcome {
    if (this.running) {
      this.logger.warn('Data acquisition is already running.');
      return 'already-running';
    }
    if (this.oneShot) throw new LoopBusyError();
    validateSettings(settings);

    const frozen: LockInSettings = { ...settings };
    this.running = true;
    this.stopRequested = false;
    this.runId = `run-${Date.now()}-${Math.random().toString(36).slice(2, 6)}`;
    this.startedAt = Date.now();
    this.cycles = 0;
    this.lastError = null;
    this.logger.info(`Data acquisition started (${this.runId})`);
    this.emit('status', this.getStatus());

    this.loopDone = this.run(frozen, onEstimate, onError);
    return 'started';
  }

  /** Request a stop and wait for the in-flight cycle to finish. */
  async stop(): Promise<void> {
    if (!this.running) {
      this.logger.warn('Data acquisition is not running.');
      return;
    }
    this.stopRequested = true;
    await this.loopDone;
    this.logger.info('Data acquisition stopped.');
  }

  /**
   * One cycle for inspection: the full per-sample result, the synthesized
   * references and the averaged estimate. Errors propagate to the caller.
   */
  async runOnce(settings: LockInSettings): Promise<DebugRun> {
    if (this.running || this.oneShot) throw new LoopBusyError();
    validateSettings(settings);
    this.oneShot = this.debugCycle({ ...settings });
    try {
      return await this.oneShot;
    } finally {
      this.oneShot = null;
    }
  }

  /**
   * Stop the loop, let a debug run finish, then release the instrument, even
   * if the last cycle failed.
   */
  async close(): Promise<void> {
    try {
      if (this.running) await this.stop();
      // a failed debug run has already rejected to its own caller
      if (this.oneShot) await this.oneShot.catch(() => undefined);
    } finally {
      await this.instrument.close();
    }
  }

  private async debugCycle(settings: LockInSettings): Promise<DebugRun> {
    const { data, result, estimate } = await this.cycle(settings);
    const reference = generateReferenceSignals(result.fundamentalFreqHz, result.time.length, data.timeIncrement);
    this.logger.info(
      `Debug run: f=${result.fundamentalFreqHz.toFixed(2)} Hz (±${result.frequencyResolutionHz.toFixed(2)}), ` +
      `A=${estimate.amplitude.toExponential(3)} V, φ=${((estimate.phaseRadians * 180) / Math.PI).toFixed(3)}°`,
    );
    return { data, result, reference, estimate };
  }

  private async cycle(settings: LockInSettings): Promise<Cycle> {
    const data = await this.instrument.acquire();
    const result = performLockIn(data, settings);
    const averaged = averageTrailing(result, settings.averagingFraction);
    const estimate: AveragedEstimate = { ...averaged, timestamp: (Date.now() - this.epoch) / 1000 };
    return { data, result, estimate };
  }

  private async run(
    settings: LockInSettings,
    onEstimate?: (estimate: AveragedEstimate) => void,
    onError?: (error: unknown) => void,
  ): Promise<void> {
    try {
      while (!this.stopRequested) {
        const { estimate } = await this.cycle(settings);
        this.cycles++;
        this.lastEstimate = estimate;
        onEstimate?.(estimate);
        this.emit('estimate', estimate);
        if (this.stopRequested) break;
        if (this.interCycleDelayMs > 0) await delay(this.interCycleDelayMs);
      }
    } catch (err) {
      this.lastError = toErrorPayload(err);
      this.logger.error(`Error in acquisition loop: ${this.lastError.message}`);
      onError?.(err);
      this.emit('error', err);
    } finally {
      this.running = false;
      this.stopRequested = false;
      this.emit('status', this.getStatus());
    }
  }
}
