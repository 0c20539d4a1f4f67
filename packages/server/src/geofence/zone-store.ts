// ============================================================================
// Zone Store — validated, immutable zone snapshots with all-or-nothing reload
// ============================================================================

import type { Result, Zone, ZoneError, ZoneLoadError } from '@seabed/shared';
import { ok, err } from '@seabed/shared';
import { normalizeGeometry, polygonsOf, ringProblem } from './geometry.js';
import { SpatialIndex, type SpatialIndexOptions } from './spatial-index.js';

export interface ZoneSnapshot {
  readonly version: number;
  readonly zones: ReadonlyMap<string, Zone>;
  readonly index: SpatialIndex;
  readonly loadedAt: number;
}

function validateZone(zone: Zone): ZoneError[] {
  const issues: ZoneError[] = [];
  const zoneId = zone.id;

  if (typeof zoneId !== 'string' || zoneId.trim() === '') {
    issues.push({ kind: 'invalid_zone', zoneId: String(zoneId), reason: 'zone id must be a non-empty string' });
  }
  if (zone.maxDurationMinutes !== undefined && !(Number.isFinite(zone.maxDurationMinutes) && zone.maxDurationMinutes > 0)) {
    issues.push({ kind: 'invalid_zone', zoneId, reason: `maxDurationMinutes must be positive, got ${zone.maxDurationMinutes}` });
  }
  if (zone.depthMin !== undefined && !(Number.isFinite(zone.depthMin) && zone.depthMin >= 0)) {
    issues.push({ kind: 'invalid_zone', zoneId, reason: `depthMin must be >= 0, got ${zone.depthMin}` });
  }
  if (zone.depthMax !== undefined && !(Number.isFinite(zone.depthMax) && zone.depthMax >= 0)) {
    issues.push({ kind: 'invalid_zone', zoneId, reason: `depthMax must be >= 0, got ${zone.depthMax}` });
  }
  if (zone.depthMin !== undefined && zone.depthMax !== undefined && zone.depthMin > zone.depthMax) {
    issues.push({ kind: 'invalid_zone', zoneId, reason: `depth band [${zone.depthMin}, ${zone.depthMax}] is inverted` });
  }

  const polygons = polygonsOf(zone.geometry);
  if (polygons.length === 0) {
    issues.push({ kind: 'invalid_geometry', zoneId, reason: 'geometry has no polygons' });
  }
  polygons.forEach((rings, p) => {
    if (rings.length === 0) {
      issues.push({ kind: 'invalid_geometry', zoneId, reason: `polygon ${p} has no exterior ring` });
      return;
    }
    rings.forEach((ring, r) => {
      const problem = ringProblem(ring);
      if (problem) {
        const which = r === 0 ? 'exterior ring' : `hole ${r}`;
        issues.push({ kind: 'invalid_geometry', zoneId, reason: `polygon ${p} ${which}: ${problem}` });
      }
    });
  });
  return issues;
}

function failure(message: string, issues: ZoneError[]): ZoneLoadError {
  const zoneIds = [...new Set(issues.flatMap(i => (i.kind === 'index_build_failed' ? [] : [i.zoneId])))];
  return { message, zoneIds, issues };
}

export class ZoneStore {
  private snapshot: ZoneSnapshot;

  constructor(private readonly indexOptions: SpatialIndexOptions = {}) {
    this.snapshot = { version: 0, zones: new Map(), index: SpatialIndex.empty(indexOptions), loadedAt: 0 };
  }

  /**
   * Replaces the whole working set. Any invalid zone, duplicate id or index
   * failure rejects the call and leaves the previous snapshot live.
   */
  loadZones(zones: readonly Zone[]): Result<ZoneSnapshot, ZoneLoadError> {
    const issues: ZoneError[] = [];
    const next = new Map<string, Zone>();

    for (const zone of zones) {
      const normalized: Zone = { ...zone, geometry: normalizeGeometry(zone.geometry) };
      const problems = validateZone(normalized);
      if (problems.length > 0) {
        issues.push(...problems);
        continue;
      }
      if (next.has(zone.id)) {
        issues.push({ kind: 'duplicate_id', zoneId: zone.id });
        continue;
      }
      next.set(zone.id, Object.freeze(normalized));
    }

    if (issues.length > 0) {
      return err(failure(`Rejected zone load: ${issues.length} issue(s)`, issues));
    }

    const built = SpatialIndex.build(next.values(), this.indexOptions);
    if (!built.ok) {
      return err(failure(`Spatial index build failed: ${built.error}`, [{ kind: 'index_build_failed', reason: built.error }]));
    }

    this.snapshot = Object.freeze({
      version: this.snapshot.version + 1,
      zones: next,
      index: built.value,
      loadedAt: Date.now(),
    });
    return ok(this.snapshot);
  }

  current(): ZoneSnapshot {
    return this.snapshot;
  }

  getZone(id: string): Zone | undefined {
    return this.snapshot.zones.get(id);
  }

  getZones(): Zone[] {
    return [...this.snapshot.zones.values()];
  }
}
