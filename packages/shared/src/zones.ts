// ============================================================================
// Zone Catalog & Geometry Types
// ============================================================================

export const ZONE_TYPES = ['restricted', 'sensitive', 'monitoring', 'protected', 'safe'] as const;

export type ZoneType = typeof ZONE_TYPES[number];

export function isZoneType(value: unknown): value is ZoneType {
  return typeof value === 'string' && ZONE_TYPES.some((t) => t === value);
}

/** [longitude, latitude], GeoJSON axis order */
export type LngLat = readonly [number, number];

export type LinearRing = readonly LngLat[];

/** Exterior ring first, then zero or more holes */
export type PolygonRings = readonly LinearRing[];

export type ZoneGeometry =
  | { type: 'Polygon'; coordinates: PolygonRings }
  | { type: 'MultiPolygon'; coordinates: readonly PolygonRings[] };

export interface Zone {
  id: string;
  name: string;
  type: ZoneType;
  // Absent means the zone never leaves 'compliant' (safe zones ignore it anyway)
  maxDurationMinutes?: number;
  depthMin?: number; // meters
  depthMax?: number; // meters
  geometry: ZoneGeometry;
}

export interface BoundingBox {
  minLat: number;
  minLon: number;
  maxLat: number;
  maxLon: number;
}

export interface ZoneInfo {
  zone: Zone;
  bbox: BoundingBox;
  area: number; // square degrees, holes subtracted
  vertexCount: number;
}

export type ZoneError =
  | { kind: 'invalid_geometry'; zoneId: string; reason: string }
  | { kind: 'invalid_zone'; zoneId: string; reason: string }
  | { kind: 'duplicate_id'; zoneId: string }
  | { kind: 'index_build_failed'; reason: string };

export interface ZoneLoadError {
  message: string;
  zoneIds: string[];
  issues: ZoneError[];
}

export interface SpatialIndexStats {
  version: number;
  zoneCount: number;
  cellCount: number;
  oversizedZones: number;
  cellSizeDegrees: number;
  builtAt: number;
}
