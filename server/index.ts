/**
 * Function Generator Server
 * Express server with WebSocket support for operating waveform generators
 */

import { createServer } from 'http';
import express from 'express';
import cors from 'cors';
import { WebSocketServer } from 'ws';
import { loadServerConfig, loadInstrumentsFile, simulatedInstruments } from './config.js';
import type { InstrumentConfig } from './sessions/SessionManager.js';
import { createDefaultModelRegistry } from './devices/registry.js';
import { createInstrumentRoutes } from './api/instruments.js';
import { createSessionManager } from './sessions/SessionManager.js';
import { createWebSocketHandler } from './websocket/WebSocketHandler.js';

const loaded = loadServerConfig();
if (!loaded.ok) {
  console.error(`[Server] ${loaded.error.message}`);
  process.exit(1);
}
const config = loaded.value;

const registry = createDefaultModelRegistry();

let instruments: InstrumentConfig[] = [];
if (config.instrumentsFile) {
  const list = loadInstrumentsFile(config.instrumentsFile);
  if (!list.ok) {
    console.error(`[Server] ${list.error.message}`);
    process.exit(1);
  }
  instruments = list.value;
}
if (config.simulate) {
  instruments = simulatedInstruments(instruments, registry.getModels().map(m => m.model));
}

const sessionManager = createSessionManager(registry, {
  minPollIntervalSeconds: config.pollIntervalSeconds,
  connectionTimeoutMs: config.connectionTimeoutMs,
  readTimeoutMs: config.readTimeoutMs,
  retryDelayMs: config.retryDelayMs,
});

for (const instrument of instruments) {
  const added = sessionManager.addInstrument(instrument);
  if (!added.ok) {
    console.error(`[Server] Skipping ${instrument.id}: ${added.error.message}`);
  }
}

// Create Express app
const app = express();
app.use(cors());
app.use(express.json());

app.use('/api/instruments', createInstrumentRoutes(sessionManager));

// Health check
app.get('/api/health', (_req, res) => {
  res.json({
    status: 'ok',
    instruments: sessionManager.getSessionCount(),
    connected: sessionManager.getInstrumentSummaries().filter(s => s.connectionState === 'connected').length,
    wsClients: wsHandler.getClientCount(),
  });
});

// Create HTTP server (needed for WebSocket)
const server = createServer(app);

const wss = new WebSocketServer({ server, path: '/ws' });
const wsHandler = createWebSocketHandler(wss, sessionManager);

function start(): void {
  console.log('Function Generator Server starting...');
  console.log(`  Minimum poll interval: ${config.pollIntervalSeconds}s`);
  console.log(`  Connection timeout: ${config.connectionTimeoutMs}ms, read timeout: ${config.readTimeoutMs}ms`);
  console.log(`  Simulation: ${config.simulate ? 'on' : 'off'}`);
  console.log(`Configured ${sessionManager.getSessionCount()} instrument(s)`);
  if (sessionManager.getSessionCount() === 0) {
    console.warn('[Server] No instruments configured; set INSTRUMENTS_FILE or SIMULATE=1');
  }

  sessionManager.connectAll();

  server.listen(config.port, () => {
    console.log('');
    console.log(`Server running on http://localhost:${config.port}`);
    console.log(`WebSocket endpoint: ws://localhost:${config.port}/ws`);
    console.log('');
    console.log('REST API endpoints:');
    console.log('  GET  /api/instruments                     - List instruments');
    console.log('  GET  /api/instruments/:id                 - Session state');
    console.log('  POST /api/instruments/:id/connect         - Connect');
    console.log('  GET  /api/instruments/:id/parameters/:key - Query parameter');
    console.log('  PUT  /api/instruments/:id/parameters/:key - Set parameter');
    console.log('  POST /api/instruments/:id/catalog         - Refresh waveform catalog');
    console.log('  PUT  /api/instruments/:id/poll-interval   - Set minimum poll interval');
  });
}

// Graceful shutdown
function shutdown(): void {
  console.log('Shutting down...');
  wsHandler.close();
  sessionManager.stop()
    .catch(err => console.error('[Server] Session shutdown failed:', err))
    .finally(() => {
      server.close(() => {
        console.log('Server closed');
        process.exit(0);
      });
    });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

start();
