// ============================================================================
// Spatial Index — uniform lat/lon grid over zone bounding boxes
// ============================================================================

import type { BoundingBox, Result, Zone } from '@seabed/shared';
import { ok, err } from '@seabed/shared';
import { bboxContains, bboxIntersects, geometryBounds } from './geometry.js';

export interface SpatialIndexOptions {
  cellSizeDegrees?: number;
  // Zones covering more cells than this skip the grid and are always bbox-checked
  maxCellsPerZone?: number;
}

export const DEFAULT_CELL_SIZE_DEGREES = 1;
export const DEFAULT_MAX_CELLS_PER_ZONE = 4096;

function cellKey(row: number, col: number): string {
  return `${row}:${col}`;
}

/**
 * Immutable once built. A reload builds a fresh index and swaps it in;
 * nothing is ever patched in place.
 */
export class SpatialIndex {
  private constructor(
    readonly cellSizeDegrees: number,
    private readonly bounds: ReadonlyMap<string, BoundingBox>,
    private readonly cells: ReadonlyMap<string, readonly string[]>,
    private readonly oversized: readonly string[],
    readonly builtAt: number,
  ) {}

  static empty(options: SpatialIndexOptions = {}): SpatialIndex {
    return new SpatialIndex(options.cellSizeDegrees ?? DEFAULT_CELL_SIZE_DEGREES, new Map(), new Map(), [], Date.now());
  }

  static build(zones: Iterable<Zone>, options: SpatialIndexOptions = {}): Result<SpatialIndex, string> {
    const cellSize = options.cellSizeDegrees ?? DEFAULT_CELL_SIZE_DEGREES;
    const maxCells = options.maxCellsPerZone ?? DEFAULT_MAX_CELLS_PER_ZONE;
    if (!Number.isFinite(cellSize) || cellSize <= 0) return err(`invalid cell size ${cellSize}`);
    if (!Number.isInteger(maxCells) || maxCells < 1) return err(`invalid max cells per zone ${maxCells}`);

    const bounds = new Map<string, BoundingBox>();
    const cells = new Map<string, string[]>();
    const oversized: string[] = [];

    for (const zone of zones) {
      const bbox = geometryBounds(zone.geometry);
      const finite = [bbox.minLat, bbox.maxLat, bbox.minLon, bbox.maxLon].every(Number.isFinite);
      if (!finite) return err(`zone ${zone.id} has no finite bounds`);
      bounds.set(zone.id, bbox);

      const row0 = Math.floor(bbox.minLat / cellSize);
      const row1 = Math.floor(bbox.maxLat / cellSize);
      const col0 = Math.floor(bbox.minLon / cellSize);
      const col1 = Math.floor(bbox.maxLon / cellSize);
      const covered = (row1 - row0 + 1) * (col1 - col0 + 1);
      if (covered > maxCells) {
        oversized.push(zone.id);
        continue;
      }
      for (let r = row0; r <= row1; r++) {
        for (let c = col0; c <= col1; c++) {
          const key = cellKey(r, c);
          const bucket = cells.get(key);
          if (bucket) bucket.push(zone.id);
          else cells.set(key, [zone.id]);
        }
      }
    }

    return ok(new SpatialIndex(cellSize, bounds, cells, oversized, Date.now()));
  }

  /**
   * Zones whose bounding box holds the point. A superset of the zones that
   * contain it; exact containment is the classifier's job.
   */
  queryCandidates(lat: number, lon: number): string[] {
    const key = cellKey(Math.floor(lat / this.cellSizeDegrees), Math.floor(lon / this.cellSizeDegrees));
    const out: string[] = [];
    for (const id of this.cells.get(key) ?? []) {
      const bbox = this.bounds.get(id);
      if (bbox && bboxContains(bbox, lat, lon)) out.push(id);
    }
    for (const id of this.oversized) {
      const bbox = this.bounds.get(id);
      if (bbox && bboxContains(bbox, lat, lon)) out.push(id);
    }
    return out;
  }

  /** Zones whose bounding box intersects the given box. */
  queryBounds(box: BoundingBox): string[] {
    const out: string[] = [];
    for (const [id, bbox] of this.bounds) {
      if (bboxIntersects(bbox, box)) out.push(id);
    }
    return out;
  }

  getBounds(zoneId: string): BoundingBox | undefined {
    return this.bounds.get(zoneId);
  }

  get size(): number {
    return this.bounds.size;
  }

  get cellCount(): number {
    return this.cells.size;
  }

  get oversizedCount(): number {
    return this.oversized.length;
  }
}
