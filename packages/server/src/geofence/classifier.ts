import type { PositionSample, Zone } from '@seabed/shared';
import { pointInGeometry } from './geometry.js';
import type { ZoneSnapshot } from './zone-store.js';

export interface ZoneMatch {
  zoneId: string;
  zone: Zone;
  // Inside the footprint but outside the zone's depth band
  depthViolation: boolean;
}

export type ClassifiablePosition = Pick<PositionSample, 'latitude' | 'longitude' | 'depth'>;

export function outsideDepthBand(zone: Zone, depth: number): boolean {
  if (zone.depthMin !== undefined && depth < zone.depthMin) return true;
  if (zone.depthMax !== undefined && depth > zone.depthMax) return true;
  return false;
}

/**
 * Exact membership test over spatial-index candidates. Leaving the depth band
 * flags the match instead of dropping it, so dwell accounting is continuous.
 */
export class MembershipClassifier {
  constructor(private readonly snapshot: () => ZoneSnapshot) {}

  classify(position: ClassifiablePosition, snapshot: ZoneSnapshot = this.snapshot()): ZoneMatch[] {
    const matches: ZoneMatch[] = [];
    for (const zoneId of snapshot.index.queryCandidates(position.latitude, position.longitude)) {
      const zone = snapshot.zones.get(zoneId);
      if (!zone) continue;
      if (!pointInGeometry(position.longitude, position.latitude, zone.geometry)) continue;
      matches.push({ zoneId, zone, depthViolation: outsideDepthBand(zone, position.depth) });
    }
    return matches;
  }
}
