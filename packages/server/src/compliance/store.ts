// ============================================================================
// Compliance Store — zone catalog and event history as JSON files
// ============================================================================

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { z } from 'zod';
import type {
  ComplianceEvent,
  ComplianceEventType,
  ComplianceReport,
  ComplianceStatistics,
  ComplianceStatus,
  EventQuery,
  Result,
  StoredComplianceEvent,
  Zone,
} from '@seabed/shared';
import { COMPLIANCE_EVENT_TYPES, COMPLIANCE_STATUSES, ZONE_TYPES, err } from '@seabed/shared';
import { parseZoneCatalog, type ParseIssue } from '../geofence/wire.js';

export const ZONES_FILE = 'zones.json';
export const EVENTS_FILE = 'events.jsonl';

export interface ComplianceStoreOptions {
  // Directory for zones.json and events.jsonl; without one nothing leaves memory
  dataDir?: string;
}

const storedEventSchema = z.object({
  id: z.number().int().positive(),
  auvId: z.string(),
  zoneId: z.string(),
  zoneName: z.string(),
  zoneType: z.enum(ZONE_TYPES),
  type: z.enum(COMPLIANCE_EVENT_TYPES),
  status: z.enum(COMPLIANCE_STATUSES),
  timestamp: z.number(),
  position: z.object({ latitude: z.number(), longitude: z.number(), depth: z.number() }),
  durationMinutes: z.number(),
  detail: z.string().optional(),
});

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** One event per line; unreadable lines are skipped with a warning. */
function readEventLog(file: string): StoredComplianceEvent[] {
  if (!existsSync(file)) return [];
  const events: StoredComplianceEvent[] = [];
  readFileSync(file, 'utf-8').split('\n').forEach((line, i) => {
    if (line.trim() === '') return;
    let record: unknown;
    try {
      record = JSON.parse(line);
    } catch (e) {
      console.warn(`[Store] Skipping ${EVENTS_FILE} line ${i + 1}: ${errorMessage(e)}`);
      return;
    }
    const parsed = storedEventSchema.safeParse(record);
    if (!parsed.success) {
      console.warn(`[Store] Skipping ${EVENTS_FILE} line ${i + 1}: not a compliance event`);
      return;
    }
    events.push(parsed.data);
  });
  return events;
}

function byTimeThenId(a: StoredComplianceEvent, b: StoredComplianceEvent): number {
  return a.timestamp - b.timestamp || a.id - b.id;
}

export class ComplianceStore {
  private readonly zonesPath: string | null;
  private readonly eventsPath: string | null;
  private zones: Zone[] = [];
  private events: StoredComplianceEvent[] = [];
  private nextId = 1;

  constructor(options: ComplianceStoreOptions = {}) {
    if (options.dataDir === undefined) {
      this.zonesPath = null;
      this.eventsPath = null;
      return;
    }
    const dir = resolve(options.dataDir);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    this.zonesPath = join(dir, ZONES_FILE);
    this.eventsPath = join(dir, EVENTS_FILE);
    this.events = readEventLog(this.eventsPath);
    this.nextId = this.events.reduce((max, e) => Math.max(max, e.id), 0) + 1;
    console.log(`[Store] Using ${dir} (${this.events.length} stored events)`);
  }

  // === Zones ===

  /** Replaces the stored catalog. A failed write throws and leaves the old catalog. */
  saveZones(zones: readonly Zone[]): void {
    if (this.zonesPath) writeFileSync(this.zonesPath, JSON.stringify({ zones }, null, 2));
    this.zones = [...zones];
  }

  loadZones(): Result<Zone[], ParseIssue[]> {
    if (this.zonesPath && existsSync(this.zonesPath)) {
      let payload: unknown;
      try {
        payload = JSON.parse(readFileSync(this.zonesPath, 'utf-8'));
      } catch (e) {
        return err([{ path: ZONES_FILE, message: `stored catalog is not valid JSON: ${errorMessage(e)}` }]);
      }
      return parseZoneCatalog(payload);
    }
    return parseZoneCatalog(this.zones);
  }

  // === Events ===

  /** Appends to the log first; events only become queryable once written. */
  saveEvents(events: readonly ComplianceEvent[]): StoredComplianceEvent[] {
    if (events.length === 0) return [];
    const stored = events.map((e, i): StoredComplianceEvent => ({
      ...e,
      position: { ...e.position },
      id: this.nextId + i,
    }));
    if (this.eventsPath) {
      appendFileSync(this.eventsPath, stored.map(e => JSON.stringify(e)).join('\n') + '\n');
    }
    this.events.push(...stored);
    this.nextId += stored.length;
    return stored;
  }

  /** Ordered by timestamp, then insertion. A negative limit returns everything. */
  listEvents(query: EventQuery = {}): StoredComplianceEvent[] {
    const matching = this.events.filter(e =>
      (!query.auvId || e.auvId === query.auvId)
      && (!query.zoneId || e.zoneId === query.zoneId)
      && (!query.type || e.type === query.type)
      && (query.from === undefined || e.timestamp >= query.from)
      && (query.to === undefined || e.timestamp <= query.to));
    matching.sort(byTimeThenId);

    const offset = query.offset ?? 0;
    const limit = query.limit ?? 100;
    return matching.slice(offset, limit < 0 ? undefined : offset + limit);
  }

  getReport(auvId: string, from: number, to: number): ComplianceReport {
    const events = this.listEvents({ auvId, from, to, limit: -1 });
    return {
      auvId,
      from,
      to,
      totalViolations: events.filter(e => e.type === 'violation').length,
      totalWarnings: events.filter(e => e.type === 'warning').length,
      zonesVisited: [...new Set(events.map(e => e.zoneId))],
      totalTimeInZonesMinutes: events
        .filter(e => e.type === 'exit')
        .reduce((sum, e) => sum + e.durationMinutes, 0),
      events,
    };
  }

  getStatistics(from: number, to: number): ComplianceStatistics {
    const events = this.listEvents({ from, to, limit: -1 });
    const byType: Record<ComplianceEventType, number> = { entry: 0, exit: 0, warning: 0, violation: 0 };
    const byStatus: Record<ComplianceStatus, number> = { compliant: 0, warning: 0, violation: 0 };
    const vehicles = new Set<string>();
    const zones = new Set<string>();
    for (const e of events) {
      byType[e.type]++;
      byStatus[e.status]++;
      vehicles.add(e.auvId);
      zones.add(e.zoneId);
    }
    return {
      from,
      to,
      totalEvents: events.length,
      byType,
      byStatus,
      uniqueVehicles: vehicles.size,
      uniqueZones: zones.size,
      complianceRate: events.length > 0 ? (byStatus.compliant / events.length) * 100 : 0,
    };
  }
}
