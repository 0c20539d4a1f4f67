import express from 'express';
import cors from 'cors';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import type { ComplianceEvent } from '@seabed/shared';
import { loadConfig } from './config.js';
import { ComplianceStore } from './compliance/store.js';
import { ComplianceService } from './compliance/service.js';
import { createComplianceRouter } from './compliance/api.js';

const config = loadConfig();
const store = new ComplianceStore({ dataDir: config.dataDir });

const compliance = new ComplianceService({
  store,
  sweepIntervalMs: config.sweepIntervalMs,
  engine: {
    warningRatio: config.warningRatio,
    cellSizeDegrees: config.gridCellDegrees,
    maxCellsPerZone: config.maxCellsPerZone,
  },
});
compliance.restoreZones();

const app = express();
app.use(cors({ origin: config.corsOrigin }));
app.use(express.json({ limit: '20mb' }));

const server = createServer(app);
const wss = new WebSocketServer({ server, path: '/ws' });

// Broadcast to all WS clients
function broadcast(data: unknown) {
  const msg = JSON.stringify(data);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) client.send(msg);
  });
}

compliance.on('compliance_event', (event: ComplianceEvent) => {
  broadcast({ type: 'compliance_event', event });
});

compliance.on('zones_loaded', (count: number) => {
  broadcast({ type: 'zones_loaded', count, index: compliance.engine.indexStats() });
});

// ============================================================================
// REST endpoints
// ============================================================================

app.get('/api/health', (_req, res) => {
  res.json({
    name: 'Seabed Compliance',
    version: '0.1.0',
    uptime: process.uptime(),
    status: 'operational',
    zones: compliance.engine.indexStats().zoneCount,
    trackedVehicles: compliance.engine.trackedVehicles().length,
    sweepScheduled: compliance.running,
  });
});

app.use('/api', createComplianceRouter(compliance, store));

wss.on('connection', (ws) => {
  ws.send(JSON.stringify({ type: 'hello', index: compliance.engine.indexStats() }));
});

server.listen(config.port, () => {
  console.log(`[HTTP] Compliance server listening on :${config.port}`);
  compliance.start();
});

function shutdown(signal: string) {
  console.log(`[HTTP] ${signal} received, shutting down`);
  compliance.stop();
  wss.close();
  server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
