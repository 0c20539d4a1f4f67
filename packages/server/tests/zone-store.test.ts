import { describe, expect, test } from 'vitest';
import type { Zone } from '@seabed/shared';
import { ZoneStore } from '../src/geofence/zone-store.js';
import { squareZone } from './fixtures.js';

const twoPointZone: Zone = {
  id: 'BAD',
  name: 'Degenerate',
  type: 'restricted',
  geometry: { type: 'Polygon', coordinates: [[[0, 0], [1, 1]]] },
};

describe('ZoneStore', () => {
  test('a rejected load keeps the previous working set', () => {
    const store = new ZoneStore();
    expect(store.loadZones([squareZone('Z1', 0, 0, 1)]).ok).toBe(true);

    const result = store.loadZones([squareZone('Z2', 5, 5, 1), twoPointZone]);
    expect(result).toEqual({
      ok: false,
      error: {
        message: 'Rejected zone load: 1 issue(s)',
        zoneIds: ['BAD'],
        issues: [{
          kind: 'invalid_geometry',
          zoneId: 'BAD',
          reason: 'polygon 0 exterior ring: ring has 2 distinct points, need at least 3',
        }],
      },
    });
    expect(store.current().version).toBe(1);
    expect(store.getZones().map(z => z.id)).toEqual(['Z1']);
  });

  test('rejects duplicate ids', () => {
    const result = new ZoneStore().loadZones([squareZone('Z1', 0, 0, 1), squareZone('Z1', 2, 2, 1)]);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.issues).toEqual([{ kind: 'duplicate_id', zoneId: 'Z1' }]);
  });

  test('rejects self-intersecting rings and inverted depth bands', () => {
    const bowTie: Zone = {
      id: 'TIE',
      name: 'Bow tie',
      type: 'sensitive',
      geometry: { type: 'Polygon', coordinates: [[[0, 0], [4, 2], [4, 0], [0, 3]]] },
    };
    const inverted = squareZone('INV', 0, 0, 1, { depthMin: 50, depthMax: 10 });
    const result = new ZoneStore().loadZones([bowTie, inverted]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.zoneIds).toEqual(['TIE', 'INV']);
      expect(result.error.issues).toEqual([
        { kind: 'invalid_geometry', zoneId: 'TIE', reason: 'polygon 0 exterior ring: ring self-intersects' },
        { kind: 'invalid_zone', zoneId: 'INV', reason: 'depth band [50, 10] is inverted' },
      ]);
    }
  });

  test('reports index build failures', () => {
    const result = new ZoneStore({ cellSizeDegrees: 0 }).loadZones([squareZone('Z1', 0, 0, 1)]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Spatial index build failed: invalid cell size 0');
      expect(result.error.zoneIds).toEqual([]);
    }
  });

  test('stores closed rings without the closing vertex', () => {
    const store = new ZoneStore();
    const closed: Zone = {
      id: 'C',
      name: 'Closed',
      type: 'monitoring',
      geometry: { type: 'Polygon', coordinates: [[[0, 0], [1, 0], [1, 1], [0, 1], [0, 0]]] },
    };
    expect(store.loadZones([closed]).ok).toBe(true);
    expect(store.getZone('C')?.geometry.coordinates).toEqual([[[0, 0], [1, 0], [1, 1], [0, 1]]]);
    expect(store.current().version).toBe(1);
  });
});
