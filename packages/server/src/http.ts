import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { HistoryQuery } from '@lockin/shared';
import { LockInError, toErrorPayload } from './errors.js';
import type { Logger } from './logger.js';
import type { LockInService } from './services/lockin.js';

const STATUS_BY_CODE: Record<string, number> = {
  CONFIGURATION: 400,
  LOOP_BUSY: 409,
  ACQUISITION_TIMEOUT: 502,
  EMPTY_DATA: 502,
  TRANSPORT: 502,
  PROCESSING: 422,
};

export function httpStatusFor(err: unknown): number {
  if (err instanceof LockInError) return STATUS_BY_CODE[err.code] ?? 500;
  // Malformed JSON body from express.json()
  if (err instanceof SyntaxError) return 400;
  return 500;
}

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

function positiveInt(value: unknown): number | undefined {
  const raw = firstString(value);
  if (raw === undefined) return undefined;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

export function parseHistoryQuery(query: Request['query']): HistoryQuery {
  const runId = firstString(query.run);
  const limit = positiveInt(query.limit);
  return {
    ...(runId ? { runId } : {}),
    ...(limit !== undefined ? { limit } : {}),
  };
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const wrap = (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

export function createApp(service: LockInService, logger: Logger): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  // ============================================================================
  // Status & instrument
  // ============================================================================

  app.get('/api/health', (_req, res) => {
    res.json(service.health());
  });

  app.get('/api/instrument', (_req, res) => {
    res.json(service.instrumentInfo());
  });

  app.post('/api/instrument/configure', wrap(async (req, res) => {
    res.json(await service.configureInstrument(req.body));
  }));

  // ============================================================================
  // Lock-in settings & control
  // ============================================================================

  app.get('/api/settings', (_req, res) => {
    res.json(service.getSettings());
  });

  app.put('/api/settings', (req, res) => {
    res.json(service.updateSettings(req.body));
  });

  app.delete('/api/settings', (_req, res) => {
    res.json(service.resetSettings());
  });

  app.post('/api/lockin/start', (_req, res) => {
    const { outcome, status } = service.start();
    res.status(outcome === 'started' ? 202 : 200).json({ outcome, status });
  });

  app.post('/api/lockin/stop', wrap(async (_req, res) => {
    res.json(await service.stop());
  }));

  app.post('/api/lockin/debug-run', wrap(async (req, res) => {
    res.json(await service.debugRun(positiveInt(req.query.points)));
  }));

  // ============================================================================
  // History
  // ============================================================================

  app.get('/api/lockin/history', (req, res) => {
    res.json(service.historyEntries(parseHistoryQuery(req.query)));
  });

  app.get('/api/lockin/history/runs', (_req, res) => {
    res.json(service.historyRuns());
  });

  app.delete('/api/lockin/history', (_req, res) => {
    res.json({ removed: service.clearHistory() });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusFor(err);
    const payload = toErrorPayload(err);
    if (status >= 500) logger.error(`${payload.code}: ${payload.message}`);
    else logger.warn(`${payload.code}: ${payload.message}`);
    res.status(status).json({ error: payload });
  });

  return app;
}
