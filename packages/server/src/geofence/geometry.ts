// ============================================================================
// Planar geometry on [lon, lat] rings — containment, validation, bounds
// ============================================================================

import type { BoundingBox, LinearRing, LngLat, PolygonRings, ZoneGeometry } from '@seabed/shared';

const EPSILON = 1e-12;

/** Every constituent polygon of a geometry, so callers never branch on the variant. */
export function polygonsOf(geometry: ZoneGeometry): readonly PolygonRings[] {
  switch (geometry.type) {
    case 'Polygon':
      return [geometry.coordinates];
    case 'MultiPolygon':
      return geometry.coordinates;
    default: {
      const unreachable: never = geometry;
      return unreachable;
    }
  }
}

/** Drops the GeoJSON closing vertex and consecutive duplicates. */
export function normalizeRing(ring: LinearRing): LngLat[] {
  const out: LngLat[] = [];
  for (const p of ring) {
    const prev = out[out.length - 1];
    if (prev && prev[0] === p[0] && prev[1] === p[1]) continue;
    out.push([p[0], p[1]]);
  }
  if (out.length > 1) {
    const first = out[0];
    const last = out[out.length - 1];
    if (first[0] === last[0] && first[1] === last[1]) out.pop();
  }
  return out;
}

export function normalizeGeometry(geometry: ZoneGeometry): ZoneGeometry {
  switch (geometry.type) {
    case 'Polygon':
      return { type: 'Polygon', coordinates: geometry.coordinates.map(normalizeRing) };
    case 'MultiPolygon':
      return { type: 'MultiPolygon', coordinates: geometry.coordinates.map(rings => rings.map(normalizeRing)) };
    default: {
      const unreachable: never = geometry;
      return unreachable;
    }
  }
}

/**
 * Crossing-number test: casts a ray from the point towards +lon and counts
 * the ring edges it crosses. An odd count means inside.
 */
export function pointInRing(lon: number, lat: number, ring: LinearRing): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    if ((yi > lat) !== (yj > lat) && lon < ((xj - xi) * (lat - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}

function isLeft(a: LngLat, b: LngLat, lon: number, lat: number): number {
  return (b[0] - a[0]) * (lat - a[1]) - (lon - a[0]) * (b[1] - a[1]);
}

/** Winding number of the ring around the point; non-zero means inside. */
export function windingNumber(lon: number, lat: number, ring: LinearRing): number {
  let wn = 0;
  for (let i = 0; i < ring.length; i++) {
    const a = ring[i];
    const b = ring[(i + 1) % ring.length];
    if (a[1] <= lat) {
      if (b[1] > lat && isLeft(a, b, lon, lat) > 0) wn++;
    } else if (b[1] <= lat && isLeft(a, b, lon, lat) < 0) {
      wn--;
    }
  }
  return wn;
}

export function pointInPolygon(lon: number, lat: number, rings: PolygonRings): boolean {
  if (rings.length === 0 || !pointInRing(lon, lat, rings[0])) return false;
  for (let h = 1; h < rings.length; h++) {
    if (pointInRing(lon, lat, rings[h])) return false;
  }
  return true;
}

export function pointInGeometry(lon: number, lat: number, geometry: ZoneGeometry): boolean {
  return polygonsOf(geometry).some(rings => pointInPolygon(lon, lat, rings));
}

export function ringArea(ring: LinearRing): number {
  let sum = 0;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    sum += ring[j][0] * ring[i][1] - ring[i][0] * ring[j][1];
  }
  return Math.abs(sum) / 2;
}

export function geometryArea(geometry: ZoneGeometry): number {
  let area = 0;
  for (const rings of polygonsOf(geometry)) {
    if (rings.length === 0) continue;
    area += ringArea(rings[0]);
    for (let h = 1; h < rings.length; h++) area -= ringArea(rings[h]);
  }
  return area;
}

export function vertexCount(geometry: ZoneGeometry): number {
  let count = 0;
  for (const rings of polygonsOf(geometry)) {
    for (const ring of rings) count += ring.length;
  }
  return count;
}

/** Bounds of the exterior rings; holes never extend a polygon's footprint. */
export function geometryBounds(geometry: ZoneGeometry): BoundingBox {
  let minLat = Infinity, minLon = Infinity, maxLat = -Infinity, maxLon = -Infinity;
  for (const rings of polygonsOf(geometry)) {
    if (rings.length === 0) continue;
    for (const [lon, lat] of rings[0]) {
      if (lat < minLat) minLat = lat;
      if (lat > maxLat) maxLat = lat;
      if (lon < minLon) minLon = lon;
      if (lon > maxLon) maxLon = lon;
    }
  }
  return { minLat, minLon, maxLat, maxLon };
}

export function bboxContains(bbox: BoundingBox, lat: number, lon: number): boolean {
  return lat >= bbox.minLat && lat <= bbox.maxLat && lon >= bbox.minLon && lon <= bbox.maxLon;
}

export function bboxIntersects(a: BoundingBox, b: BoundingBox): boolean {
  return a.minLat <= b.maxLat && a.maxLat >= b.minLat && a.minLon <= b.maxLon && a.maxLon >= b.minLon;
}

// 0 = collinear, 1 = clockwise, 2 = counter-clockwise
function orientation(a: LngLat, b: LngLat, c: LngLat): 0 | 1 | 2 {
  const v = (b[1] - a[1]) * (c[0] - b[0]) - (b[0] - a[0]) * (c[1] - b[1]);
  if (Math.abs(v) < EPSILON) return 0;
  return v > 0 ? 1 : 2;
}

function onSegment(a: LngLat, p: LngLat, b: LngLat): boolean {
  return p[0] <= Math.max(a[0], b[0]) && p[0] >= Math.min(a[0], b[0])
    && p[1] <= Math.max(a[1], b[1]) && p[1] >= Math.min(a[1], b[1]);
}

export function segmentsIntersect(p1: LngLat, p2: LngLat, p3: LngLat, p4: LngLat): boolean {
  const o1 = orientation(p1, p2, p3);
  const o2 = orientation(p1, p2, p4);
  const o3 = orientation(p3, p4, p1);
  const o4 = orientation(p3, p4, p2);

  if (o1 !== o2 && o3 !== o4) return true;
  if (o1 === 0 && onSegment(p1, p3, p2)) return true;
  if (o2 === 0 && onSegment(p1, p4, p2)) return true;
  if (o3 === 0 && onSegment(p3, p1, p4)) return true;
  if (o4 === 0 && onSegment(p3, p2, p4)) return true;
  return false;
}

/** Any two non-adjacent edges touching makes the ring non-simple. */
export function ringSelfIntersects(ring: LinearRing): boolean {
  const n = ring.length;
  for (let i = 0; i < n; i++) {
    const a1 = ring[i];
    const a2 = ring[(i + 1) % n];
    for (let j = i + 1; j < n; j++) {
      if (j === i + 1 || (i === 0 && j === n - 1)) continue;
      if (segmentsIntersect(a1, a2, ring[j], ring[(j + 1) % n])) return true;
    }
  }
  return false;
}

/** Returns why a (normalized) ring is unusable, or null when it is a valid simple ring. */
export function ringProblem(ring: LinearRing): string | null {
  for (const [lon, lat] of ring) {
    if (!Number.isFinite(lon) || !Number.isFinite(lat)) return 'non-finite coordinate';
    if (lat < -90 || lat > 90) return `latitude ${lat} out of range`;
    if (lon < -180 || lon > 180) return `longitude ${lon} out of range`;
  }
  if (ring.length < 3) return `ring has ${ring.length} distinct points, need at least 3`;
  if (ringArea(ring) < EPSILON) return 'ring has zero area';
  if (ringSelfIntersects(ring)) return 'ring self-intersects';
  return null;
}
