import type { LngLat, PositionSample, Zone } from '@seabed/shared';

export const T0 = Date.UTC(2026, 0, 1, 0, 0, 0);

export function at(minutes: number): number {
  return T0 + minutes * 60_000;
}

export function squareRing(minLon: number, minLat: number, size: number): LngLat[] {
  return [
    [minLon, minLat],
    [minLon + size, minLat],
    [minLon + size, minLat + size],
    [minLon, minLat + size],
  ];
}

export function squareZone(id: string, minLon: number, minLat: number, size: number, extra: Partial<Zone> = {}): Zone {
  return {
    id,
    name: `Zone ${id}`,
    type: 'restricted',
    geometry: { type: 'Polygon', coordinates: [squareRing(minLon, minLat, size)] },
    ...extra,
  };
}

export function sample(auvId: string, lon: number, lat: number, minutes: number, depth = 100): PositionSample {
  return { auvId, latitude: lat, longitude: lon, depth, timestamp: at(minutes) };
}

/** mulberry32 — small deterministic PRNG so generated cases are reproducible */
export function seeded(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Star-shaped (hence simple) polygon around a center. */
export function starRing(rand: () => number, cx: number, cy: number, maxRadius: number): LngLat[] {
  const n = 3 + Math.floor(rand() * 10);
  const angles = Array.from({ length: n }, () => rand() * Math.PI * 2).sort((x, y) => x - y);
  return angles.map((theta) => {
    const r = maxRadius * (0.3 + 0.7 * rand());
    return [cx + r * Math.cos(theta), cy + r * Math.sin(theta)] as const;
  });
}
