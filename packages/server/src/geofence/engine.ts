// ============================================================================
// Compliance Engine — sample -> index -> classifier -> tracker -> monitor -> events
// ============================================================================

import type {
  AuvStatus,
  BoundingBox,
  ComplianceEvent,
  ComplianceStatus,
  EventPosition,
  PositionSample,
  Result,
  SampleError,
  SpatialIndexStats,
  Zone,
  ZoneInfo,
  ZoneLoadError,
} from '@seabed/shared';
import { ok, err, STATUS_RANK } from '@seabed/shared';
import { MembershipClassifier } from './classifier.js';
import { ComplianceEventEmitter, type EventSink } from './events.js';
import { geometryArea, geometryBounds, vertexCount } from './geometry.js';
import { DurationMonitor } from './monitor.js';
import type { SpatialIndexOptions } from './spatial-index.js';
import { MembershipTracker, type MembershipTransition } from './tracker.js';
import { ZoneStore, type ZoneSnapshot } from './zone-store.js';

export interface ComplianceEngineOptions extends SpatialIndexOptions {
  warningRatio?: number;
  sink?: EventSink;
}

export function validateSample(sample: PositionSample): SampleError | null {
  if (typeof sample.auvId !== 'string' || sample.auvId.trim() === '') {
    return { kind: 'invalid_sample', field: 'auvId', message: 'auvId must be a non-empty string' };
  }
  if (!Number.isFinite(sample.latitude) || sample.latitude < -90 || sample.latitude > 90) {
    return { kind: 'invalid_sample', field: 'latitude', message: `latitude must be within [-90, 90], got ${sample.latitude}` };
  }
  if (!Number.isFinite(sample.longitude) || sample.longitude < -180 || sample.longitude > 180) {
    return { kind: 'invalid_sample', field: 'longitude', message: `longitude must be within [-180, 180], got ${sample.longitude}` };
  }
  if (!Number.isFinite(sample.depth) || sample.depth < 0) {
    return { kind: 'invalid_sample', field: 'depth', message: `depth must be >= 0, got ${sample.depth}` };
  }
  if (!Number.isFinite(sample.timestamp)) {
    return { kind: 'invalid_sample', field: 'timestamp', message: 'timestamp must be a finite epoch-ms value' };
  }
  return null;
}

function positionOf(sample: PositionSample): EventPosition {
  return { latitude: sample.latitude, longitude: sample.longitude, depth: sample.depth };
}

function depthDetail(sample: PositionSample, zone: Zone): string {
  const min = zone.depthMin ?? 0;
  const max = zone.depthMax ?? Infinity;
  return `Depth ${sample.depth} m outside zone band [${min}, ${max}] m`;
}

/**
 * One engine instance owns its zone snapshot and membership state. The host
 * must serialize calls per auvId; different vehicles are independent.
 */
export class ComplianceEngine {
  private readonly zones: ZoneStore;
  private readonly classifier: MembershipClassifier;
  private readonly tracker = new MembershipTracker();
  private readonly monitor: DurationMonitor;
  private readonly emitter: ComplianceEventEmitter;

  constructor(options: ComplianceEngineOptions = {}) {
    this.zones = new ZoneStore({ cellSizeDegrees: options.cellSizeDegrees, maxCellsPerZone: options.maxCellsPerZone });
    this.classifier = new MembershipClassifier(() => this.zones.current());
    this.monitor = new DurationMonitor(options.warningRatio);
    this.emitter = new ComplianceEventEmitter(options.sink);
  }

  get warningRatio(): number {
    return this.monitor.warningRatio;
  }

  // === Zones ===

  loadZones(zones: readonly Zone[]): Result<void, ZoneLoadError> {
    const loaded = this.zones.loadZones(zones);
    if (!loaded.ok) return err(loaded.error);
    return ok(undefined);
  }

  getZone(id: string): Zone | undefined {
    return this.zones.getZone(id);
  }

  getZones(): Zone[] {
    return this.zones.getZones();
  }

  getZoneInfo(id: string): ZoneInfo | undefined {
    const zone = this.zones.getZone(id);
    if (!zone) return undefined;
    return {
      zone,
      bbox: this.zones.current().index.getBounds(id) ?? geometryBounds(zone.geometry),
      area: geometryArea(zone.geometry),
      vertexCount: vertexCount(zone.geometry),
    };
  }

  zonesInBounds(box: BoundingBox): Zone[] {
    const snapshot = this.zones.current();
    return snapshot.index.queryBounds(box).flatMap(id => {
      const zone = snapshot.zones.get(id);
      return zone ? [zone] : [];
    });
  }

  indexStats(): SpatialIndexStats {
    const { index, version } = this.zones.current();
    return {
      version,
      zoneCount: index.size,
      cellCount: index.cellCount,
      oversizedZones: index.oversizedCount,
      cellSizeDegrees: index.cellSizeDegrees,
      builtAt: index.builtAt,
    };
  }

  // === Telemetry ===

  process(sample: PositionSample): Result<ComplianceEvent[], SampleError> {
    const invalid = validateSample(sample);
    if (invalid) return err(invalid);
    const stale = this.tracker.checkFreshness(sample);
    if (stale) return err(stale);

    const snapshot = this.zones.current();
    const matches = this.classifier.classify(sample, snapshot);
    const transitions = this.tracker.apply(sample, matches, id => snapshot.zones.has(id));
    const position = positionOf(sample);

    const events = transitions.map(t => this.transitionEvent(t, position, sample, snapshot));
    events.push(...this.evaluateVehicle(sample.auvId, sample.timestamp, position, snapshot));

    this.emitter.publish(events);
    return ok(events);
  }

  // === Sweep ===

  /** Re-checks every active membership against the clock. */
  sweep(now: number): ComplianceEvent[] {
    const events: ComplianceEvent[] = [];
    for (const auvId of this.tracker.activeVehicles()) {
      events.push(...this.sweepVehicle(auvId, now));
    }
    return events;
  }

  sweepVehicle(auvId: string, now: number): ComplianceEvent[] {
    const last = this.tracker.lastSample(auvId);
    if (!last) return [];

    const snapshot = this.zones.current();
    const position = positionOf(last);
    const events: ComplianceEvent[] = [];

    for (const membership of this.tracker.memberships(auvId)) {
      const zone = snapshot.zones.get(membership.zoneId);
      if (!zone) {
        const exit = this.tracker.close(auvId, membership.zoneId, now, 'zone_removed');
        if (exit) events.push(this.transitionEvent(exit, position, last, snapshot));
        continue;
      }
      this.tracker.advance(auvId, zone, now);
    }
    events.push(...this.evaluateVehicle(auvId, now, position, snapshot));

    this.emitter.publish(events);
    return events;
  }

  // === Status ===

  getAuvStatus(auvId: string): AuvStatus {
    const memberships = this.tracker.memberships(auvId);
    let overallStatus: ComplianceStatus = 'compliant';
    let totalActiveMinutes = 0;
    for (const m of memberships) {
      totalActiveMinutes += m.cumulativeDurationMinutes;
      if (STATUS_RANK[m.status] > STATUS_RANK[overallStatus]) overallStatus = m.status;
    }
    const lastSample = this.tracker.lastSample(auvId);
    return {
      auvId,
      memberships,
      overallStatus,
      totalActiveMinutes,
      lastSample: lastSample ? { ...lastSample } : null,
    };
  }

  trackedVehicles(): string[] {
    return this.tracker.trackedVehicles();
  }

  activeVehicles(): string[] {
    return this.tracker.activeVehicles();
  }

  private evaluateVehicle(auvId: string, at: number, position: EventPosition, snapshot: ZoneSnapshot): ComplianceEvent[] {
    const events: ComplianceEvent[] = [];
    for (const membership of this.tracker.memberships(auvId)) {
      const zone = snapshot.zones.get(membership.zoneId);
      if (!zone) continue;
      const crossing = this.monitor.evaluate(membership, zone);
      if (!crossing) continue;
      this.tracker.promote(auvId, membership.zoneId, crossing.status);
      events.push(this.emitter.build({
        membership: { ...membership, status: crossing.status },
        type: crossing.status,
        timestamp: at,
        position,
        detail: crossing.detail,
      }));
    }
    return events;
  }

  private transitionEvent(
    transition: MembershipTransition,
    position: EventPosition,
    sample: PositionSample,
    snapshot: ZoneSnapshot,
  ): ComplianceEvent {
    switch (transition.kind) {
      case 'entry': {
        const zone = snapshot.zones.get(transition.membership.zoneId);
        return this.emitter.build({
          membership: transition.membership,
          type: 'entry',
          timestamp: transition.membership.entryTime,
          position,
          detail: transition.depthViolation && zone ? depthDetail(sample, zone) : undefined,
        });
      }
      case 'exit':
        return this.emitter.build({
          membership: transition.membership,
          type: 'exit',
          timestamp: transition.at,
          position,
          detail: transition.reason === 'zone_removed' ? 'zone removed from catalog' : undefined,
        });
      default: {
        const unreachable: never = transition;
        return unreachable;
      }
    }
  }
}
