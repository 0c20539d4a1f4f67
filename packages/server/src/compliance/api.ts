// ============================================================================
// Compliance API Routes
// ============================================================================

import { Router } from 'express';
import type { ComplianceEventType } from '@seabed/shared';
import { isComplianceEventType } from '@seabed/shared';
import type { ComplianceService } from './service.js';
import type { ComplianceStore } from './store.js';
import { parseSample, parseZoneCatalog, toFeatureCollection } from '../geofence/wire.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberParam(value: unknown): number | undefined {
  if (typeof value !== 'string' || value === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function timeParam(value: unknown): number | undefined {
  const n = numberParam(value);
  if (n !== undefined) return n;
  if (typeof value !== 'string') return undefined;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function createComplianceRouter(service: ComplianceService, store: ComplianceStore): Router {
  const router = Router();
  const engine = service.engine;

  // --- Zones ---

  router.get('/zones', (_req, res) => {
    res.json(engine.getZones());
  });

  router.put('/zones', (req, res) => {
    const parsed = parseZoneCatalog(req.body);
    if (!parsed.ok) return res.status(400).json({ error: 'Invalid zone catalog', issues: parsed.error });
    const loaded = service.replaceZones(parsed.value);
    if (!loaded.ok) {
      const { error } = loaded;
      if (error.kind === 'persistence_failed') return res.status(500).json({ error: error.message });
      return res.status(400).json({ error: error.error.message, zoneIds: error.error.zoneIds, issues: error.error.issues });
    }
    res.json({ loaded: loaded.value, index: engine.indexStats() });
  });

  // Registered before /zones/:id so "geojson" and "bounds" are not taken for ids
  router.get('/zones/geojson', (_req, res) => {
    res.json(toFeatureCollection(engine.getZones()));
  });

  router.get('/zones/bounds', (req, res) => {
    const minLat = numberParam(req.query.minLat);
    const minLon = numberParam(req.query.minLon);
    const maxLat = numberParam(req.query.maxLat);
    const maxLon = numberParam(req.query.maxLon);
    if (minLat === undefined || minLon === undefined || maxLat === undefined || maxLon === undefined) {
      return res.status(400).json({ error: 'minLat, minLon, maxLat and maxLon are required numbers' });
    }
    res.json(engine.zonesInBounds({ minLat, minLon, maxLat, maxLon }));
  });

  router.get('/zones/:id', (req, res) => {
    const info = engine.getZoneInfo(req.params.id);
    if (!info) return res.status(404).json({ error: 'Zone not found' });
    res.json(info);
  });

  router.get('/index/stats', (_req, res) => {
    res.json(engine.indexStats());
  });

  // --- Telemetry ---

  router.post('/telemetry', async (req, res) => {
    const parsed = parseSample(req.body);
    if (!parsed.ok) return res.status(400).json({ error: 'Invalid telemetry payload', issues: parsed.error });
    try {
      const result = await service.ingest(parsed.value);
      if (result.ok) return res.json({ events: result.value });
      const { error } = result;
      if (error.kind === 'stale_sample') return res.status(409).json({ error: 'Stale sample', ...error });
      res.status(400).json({ error: error.message, field: error.field });
    } catch (e) {
      console.error('[HTTP] Telemetry ingestion failed:', e);
      res.status(500).json({ error: 'Internal error' });
    }
  });

  router.post('/telemetry/batch', async (req, res) => {
    const body: unknown = req.body;
    const items: unknown[] | null = Array.isArray(body)
      ? body
      : isRecord(body) && Array.isArray(body.samples) ? body.samples : null;
    if (!items) return res.status(400).json({ error: 'Expected an array of samples or { samples: [...] }' });

    const receivedAt = Date.now();
    const parsed = items.map(item => parseSample(item, receivedAt));
    const accepted = parsed.flatMap(p => (p.ok ? [p.value] : []));
    try {
      const outcomes = await service.ingestBatch(accepted);
      let next = 0;
      const results = parsed.map((p, index) => {
        if (!p.ok) return { index, ok: false, error: 'Invalid telemetry payload', issues: p.error };
        const outcome = outcomes[next++];
        return outcome.ok
          ? { index, ok: true, events: outcome.value }
          : { index, ok: false, error: outcome.error };
      });
      res.json({ processed: accepted.length, rejected: items.length - accepted.length, results });
    } catch (e) {
      console.error('[HTTP] Batch ingestion failed:', e);
      res.status(500).json({ error: 'Internal error' });
    }
  });

  router.post('/sweep', async (req, res) => {
    const now = timeParam(req.query.now);
    try {
      const events = await service.sweep(now);
      res.json({ events });
    } catch (e) {
      console.error('[HTTP] Sweep failed:', e);
      res.status(500).json({ error: 'Internal error' });
    }
  });

  // --- Vehicles ---

  router.get('/auvs', (_req, res) => {
    res.json(engine.trackedVehicles().map(id => engine.getAuvStatus(id)));
  });

  router.get('/auvs/:id/status', (req, res) => {
    res.json(engine.getAuvStatus(req.params.id));
  });

  router.get('/auvs/:id/report', (req, res) => {
    const to = timeParam(req.query.to) ?? Date.now();
    const from = timeParam(req.query.from) ?? to - 86400000;
    res.json(store.getReport(req.params.id, from, to));
  });

  // --- Events ---

  router.get('/statistics', (req, res) => {
    const to = timeParam(req.query.to) ?? Date.now();
    const from = timeParam(req.query.from) ?? to - 7 * 86400000;
    res.json(store.getStatistics(from, to));
  });

  router.get('/events', (req, res) => {
    const type = typeof req.query.type === 'string' ? req.query.type : undefined;
    let eventType: ComplianceEventType | undefined;
    if (type !== undefined) {
      if (!isComplianceEventType(type)) return res.status(400).json({ error: `Unknown event type ${type}` });
      eventType = type;
    }
    res.json(store.listEvents({
      auvId: typeof req.query.auvId === 'string' ? req.query.auvId : undefined,
      zoneId: typeof req.query.zoneId === 'string' ? req.query.zoneId : undefined,
      type: eventType,
      from: timeParam(req.query.from),
      to: timeParam(req.query.to),
      limit: numberParam(req.query.limit) ?? 100,
      offset: numberParam(req.query.offset) ?? 0,
    }));
  });

  return router;
}
