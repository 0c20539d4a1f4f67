import { describe, expect, test } from 'vitest';
import type { ZoneGeometry } from '@seabed/shared';
import {
  geometryArea,
  geometryBounds,
  normalizeRing,
  pointInGeometry,
  pointInPolygon,
  pointInRing,
  ringProblem,
  ringSelfIntersects,
  windingNumber,
} from '../src/geofence/geometry.js';
import { seeded, squareRing, starRing } from './fixtures.js';

describe('geometry', () => {
  test('crossing number agrees with winding number on random simple polygons', () => {
    const rand = seeded(20260101);
    let checked = 0;
    for (let p = 0; p < 200; p++) {
      const ring = starRing(rand, rand() * 20 - 10, rand() * 20 - 10, 0.5 + rand() * 3);
      for (let k = 0; k < 50; k++) {
        const lon = -14 + rand() * 28;
        const lat = -14 + rand() * 28;
        expect(pointInRing(lon, lat, ring)).toBe(windingNumber(lon, lat, ring) !== 0);
        checked++;
      }
    }
    expect(checked).toBe(10_000);
  });

  test('a point inside a hole is outside the polygon', () => {
    const rings = [squareRing(0, 0, 10), squareRing(4, 4, 2)];
    expect(pointInPolygon(5, 5, rings)).toBe(false);
    expect(pointInPolygon(2, 2, rings)).toBe(true);
    expect(pointInPolygon(11, 5, rings)).toBe(false);
  });

  test('multi-polygon matches when any part contains the point', () => {
    const geometry: ZoneGeometry = {
      type: 'MultiPolygon',
      coordinates: [[squareRing(0, 0, 1)], [squareRing(10, 10, 1)]],
    };
    expect(pointInGeometry(10.5, 10.5, geometry)).toBe(true);
    expect(pointInGeometry(0.5, 0.5, geometry)).toBe(true);
    expect(pointInGeometry(5, 5, geometry)).toBe(false);
  });

  test('normalizeRing drops the closing vertex and repeated points', () => {
    expect(normalizeRing([[0, 0], [1, 0], [1, 0], [1, 1], [0, 0]])).toEqual([[0, 0], [1, 0], [1, 1]]);
  });

  test('ringSelfIntersects detects a bow tie', () => {
    expect(ringSelfIntersects([[0, 0], [2, 2], [2, 0], [0, 2]])).toBe(true);
    expect(ringSelfIntersects(squareRing(0, 0, 10))).toBe(false);
  });

  test('ringProblem reports degenerate rings', () => {
    expect(ringProblem([[0, 0], [1, 1]])).toBe('ring has 2 distinct points, need at least 3');
    expect(ringProblem([[0, 0], [1, 1], [2, 2]])).toBe('ring has zero area');
    expect(ringProblem([[0, 0], [200, 0], [0, 1]])).toBe('longitude 200 out of range');
    expect(ringProblem(squareRing(0, 0, 1))).toBeNull();
  });

  test('area subtracts holes and bounds ignore them', () => {
    const geometry: ZoneGeometry = { type: 'Polygon', coordinates: [squareRing(0, 0, 10), squareRing(4, 4, 2)] };
    expect(geometryArea(geometry)).toBe(96);
    expect(geometryBounds(geometry)).toEqual({ minLat: 0, minLon: 0, maxLat: 10, maxLon: 10 });
  });
});
