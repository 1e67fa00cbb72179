import EventEmitter from 'events';
import type {
  DebugRunPayload,
  EstimateRecord,
  HealthStatus,
  HistoryQuery,
  InstrumentInfo,
  InstrumentKind,
  LockInSettings,
  LoopStatus,
  OscilloscopeInterface,
  WsMessage,
} from '@lockin/shared';
import { LoopBusyError, toErrorPayload } from '../errors.js';
import type { EstimateHistoryService } from '../history/service.js';
import { defaultCaptureConfig } from '../instruments/registry.js';
import { parseCaptureConfig } from '../instruments/validation.js';
import { toDebugRunPayload } from '../lockin/debug-view.js';
import type { LockInLoop, StartOutcome } from '../lockin/loop.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { SettingsService } from './settings.js';

export const SERVICE_NAME = 'scope-lockin';
export const SERVICE_VERSION = '0.1.0';

export interface LockInServiceDeps {
  kind: InstrumentKind;
  instrument: OscilloscopeInterface;
  loop: LockInLoop;
  settings: SettingsService;
  history: EstimateHistoryService;
  logger?: Logger;
}

/**
 * What the HTTP and WebSocket surfaces drive: one instrument, one loop,
 * persisted settings and the estimate history. Every estimate of a run is
 * recorded and published; clients receive WsMessage values via 'message'.
 */
export class LockInService extends EventEmitter {
  private readonly startedAt = Date.now();
  private readonly kind: InstrumentKind;
  private readonly instrument: OscilloscopeInterface;
  private readonly loop: LockInLoop;
  private readonly settings: SettingsService;
  private readonly history: EstimateHistoryService;
  private readonly logger: Logger;

  constructor(deps: LockInServiceDeps) {
    super();
    this.kind = deps.kind;
    this.instrument = deps.instrument;
    this.loop = deps.loop;
    this.settings = deps.settings;
    this.history = deps.history;
    this.logger = deps.logger ?? silentLogger;

    this.loop.on('status', (status: LoopStatus) => this.publish({ type: 'status', status }));
  }

  health(): HealthStatus {
    return {
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      uptime: (Date.now() - this.startedAt) / 1000,
      timestamp: Date.now(),
      instrument: this.kind,
      loop: this.loop.getStatus(),
    };
  }

  instrumentInfo(): InstrumentInfo {
    return this.instrument.describe();
  }

  /** Partial capture config over the current (or default) one. */
  async configureInstrument(body: unknown): Promise<InstrumentInfo> {
    if (this.loop.isRunning) throw new LoopBusyError('Acquisition loop is running; stop it before reconfiguring');
    const current = this.instrument.describe().config ?? defaultCaptureConfig(this.kind);
    const config = parseCaptureConfig(body, current);
    await this.instrument.configure(config);
    this.logger.info(`Instrument configured: ${config.memoryDepth} pts, CH${config.referenceChannel} ref, CH${config.acquisitionChannel} signal`);
    return this.instrument.describe();
  }

  getSettings(): LockInSettings {
    return this.settings.get();
  }

  /** Takes effect on the next start; a running loop keeps its settings. */
  updateSettings(body: unknown): LockInSettings {
    return this.settings.update(body);
  }

  resetSettings(): LockInSettings {
    return this.settings.reset();
  }

  start(): { outcome: StartOutcome; status: LoopStatus } {
    const settings = this.settings.get();
    const outcome = this.loop.start(
      settings,
      estimate => {
        const { runId } = this.loop.getStatus();
        if (!runId) return;
        this.history.record(runId, estimate, settings);
        this.publish({ type: 'estimate', runId, estimate });
      },
      err => this.publish({ type: 'error', error: toErrorPayload(err) }),
    );
    return { outcome, status: this.loop.getStatus() };
  }

  async stop(): Promise<LoopStatus> {
    await this.loop.stop();
    return this.loop.getStatus();
  }

  async debugRun(points?: number): Promise<DebugRunPayload> {
    const run = await this.loop.runOnce(this.settings.get());
    return toDebugRunPayload(run, points);
  }

  historyEntries(query: HistoryQuery): EstimateRecord[] {
    return this.history.query(query);
  }

  historyRuns(): string[] {
    return this.history.runs();
  }

  clearHistory(): number {
    const removed = this.history.clear();
    this.logger.info(`Cleared ${removed} recorded estimates`);
    return removed;
  }

  async close(): Promise<void> {
    await this.loop.close();
  }

  private publish(message: WsMessage) {
    this.emit('message', message);
  }
}
