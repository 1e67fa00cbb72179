import { createServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { WsMessage } from '@lockin/shared';
import { loadConfig } from './config.js';
import { toErrorPayload } from './errors.js';
import { EstimateHistoryService } from './history/service.js';
import { createApp } from './http.js';
import { createInstrument, defaultCaptureConfig } from './instruments/registry.js';
import { LockInLoop } from './lockin/loop.js';
import { createConsoleLogger } from './logger.js';
import { openDatabase } from './services/database.js';
import { LockInService, SERVICE_VERSION } from './services/lockin.js';
import { SettingsService } from './services/settings.js';

const config = loadConfig();
const log = createConsoleLogger('🌐 [Server]', config.logLevel);

const db = openDatabase(config.dataDir);
const instrument = await createInstrument(config.instrument, {
  logger: createConsoleLogger('📡 [Scope]', config.logLevel),
  host: config.scopeHost,
  port: config.scopePort,
  pollIntervalMs: config.pollIntervalMs,
  triggerTimeoutMs: config.triggerTimeoutMs,
});
await instrument.configure(defaultCaptureConfig(config.instrument, config.memoryDepth));

const loop = new LockInLoop(instrument, {
  interCycleDelayMs: config.cycleDelayMs,
  logger: createConsoleLogger('🔒 [Lock-in]', config.logLevel),
});
const service = new LockInService({
  kind: config.instrument,
  instrument,
  loop,
  settings: new SettingsService(db, log),
  history: new EstimateHistoryService(db),
  logger: log,
});

const app = createApp(service, log);
const server = createServer(app);
const wss = new WebSocketServer({ server, path: '/ws' });

function broadcast(message: WsMessage) {
  const data = JSON.stringify(message);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) client.send(data);
  });
}

service.on('message', broadcast);

// ============================================================================
// WebSocket handling
// ============================================================================

wss.on('connection', (ws: WebSocket) => {
  log.info('⚡ Client connected');
  ws.send(JSON.stringify({ type: 'status', status: service.health().loop } satisfies WsMessage));
  ws.on('close', () => log.info('⚡ Client disconnected'));
});

// ============================================================================
// Shutdown
// ============================================================================

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`${signal} received, shutting down`);
  try {
    await service.close();
  } catch (err) {
    log.error(`Instrument close failed: ${toErrorPayload(err).message}`);
  }
  wss.close();
  server.close();
  db.close();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => log.error(`Shutdown failed: ${toErrorPayload(err).message}`));
  });
}

server.listen(config.port, '0.0.0.0', () => {
  console.log(`
  🔒 ╔═══════════════════════════════════════╗
  🔒 ║      S C O P E   L O C K - I N        ║
  🔒 ║   Software Lock-In Amplifier v${SERVICE_VERSION}   ║
  🔒 ╠═══════════════════════════════════════╣
  🔒 ║  HTTP:  http://0.0.0.0:${config.port}            ║
  🔒 ║  WS:    ws://0.0.0.0:${config.port}/ws           ║
  🔒 ║  Instrument: ${config.instrument.padEnd(25)}║
  🔒 ╚═══════════════════════════════════════╝
  `);
});
