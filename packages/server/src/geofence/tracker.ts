// ============================================================================
// Zone Membership Tracker — per (auvId, zoneId) state machine
// ============================================================================
//
//   ABSENT --entry--> ACTIVE(compliant -> warning -> violation) --exit--> ABSENT
//
// Memberships are owned here; every other component gets copies.

import type { ComplianceStatus, PositionSample, SampleError, Zone, ZoneMembership } from '@seabed/shared';
import type { ZoneMatch } from './classifier.js';

export type ExitReason = 'left_zone' | 'zone_removed';

export type MembershipTransition =
  | { kind: 'entry'; membership: ZoneMembership; depthViolation: boolean }
  | { kind: 'exit'; membership: ZoneMembership; at: number; reason: ExitReason };

interface VehicleState {
  lastSample: PositionSample;
  memberships: Map<string, ZoneMembership>;
}

const MS_PER_MINUTE = 60_000;

function elapsedMinutes(from: number, to: number): number {
  return (to - from) / MS_PER_MINUTE;
}

export class MembershipTracker {
  private vehicles = new Map<string, VehicleState>();

  /** Samples at or before the last accepted timestamp for the vehicle are stale. */
  checkFreshness(sample: PositionSample): SampleError | null {
    const state = this.vehicles.get(sample.auvId);
    if (state && sample.timestamp <= state.lastSample.timestamp) {
      return {
        kind: 'stale_sample',
        auvId: sample.auvId,
        timestamp: sample.timestamp,
        lastTimestamp: state.lastSample.timestamp,
      };
    }
    return null;
  }

  /**
   * Diffs this round's matches against the vehicle's active memberships.
   * Callers must have passed the sample through checkFreshness first.
   */
  apply(sample: PositionSample, matches: readonly ZoneMatch[], zoneExists: (zoneId: string) => boolean): MembershipTransition[] {
    let state = this.vehicles.get(sample.auvId);
    if (!state) {
      state = { lastSample: sample, memberships: new Map() };
      this.vehicles.set(sample.auvId, state);
    }

    const transitions: MembershipTransition[] = [];
    const matched = new Set<string>();

    for (const match of matches) {
      matched.add(match.zoneId);
      const existing = state.memberships.get(match.zoneId);
      if (existing) {
        existing.cumulativeDurationMinutes = Math.max(
          existing.cumulativeDurationMinutes,
          elapsedMinutes(existing.entryTime, sample.timestamp),
        );
        existing.lastSeenTime = sample.timestamp;
        existing.depthViolation = match.depthViolation;
        // A reload may have renamed or retyped the zone
        existing.zoneName = match.zone.name;
        existing.zoneType = match.zone.type;
        continue;
      }
      const membership: ZoneMembership = {
        auvId: sample.auvId,
        zoneId: match.zoneId,
        zoneName: match.zone.name,
        zoneType: match.zone.type,
        entryTime: sample.timestamp,
        lastSeenTime: sample.timestamp,
        cumulativeDurationMinutes: 0,
        status: 'compliant',
        depthViolation: match.depthViolation,
      };
      state.memberships.set(match.zoneId, membership);
      transitions.push({ kind: 'entry', membership: { ...membership }, depthViolation: match.depthViolation });
    }

    for (const zoneId of [...state.memberships.keys()]) {
      if (matched.has(zoneId)) continue;
      const exit = this.close(sample.auvId, zoneId, sample.timestamp, zoneExists(zoneId) ? 'left_zone' : 'zone_removed');
      if (exit) transitions.push(exit);
    }

    state.lastSample = sample;
    return transitions;
  }

  /** Re-derives dwell time from the clock without a new sample. */
  advance(auvId: string, zone: Pick<Zone, 'id' | 'name' | 'type'>, now: number): ZoneMembership | undefined {
    const membership = this.vehicles.get(auvId)?.memberships.get(zone.id);
    if (!membership) return undefined;
    membership.zoneName = zone.name;
    membership.zoneType = zone.type;
    membership.cumulativeDurationMinutes = Math.max(
      membership.cumulativeDurationMinutes,
      elapsedMinutes(membership.entryTime, now),
    );
    return { ...membership };
  }

  close(auvId: string, zoneId: string, at: number, reason: ExitReason): MembershipTransition | null {
    const state = this.vehicles.get(auvId);
    const membership = state?.memberships.get(zoneId);
    if (!state || !membership) return null;
    membership.cumulativeDurationMinutes = Math.max(
      membership.cumulativeDurationMinutes,
      elapsedMinutes(membership.entryTime, at),
    );
    state.memberships.delete(zoneId);
    return { kind: 'exit', membership: { ...membership }, at, reason };
  }

  /** Status only ever moves forward while the membership lives. */
  promote(auvId: string, zoneId: string, status: ComplianceStatus): void {
    const membership = this.vehicles.get(auvId)?.memberships.get(zoneId);
    if (membership) membership.status = status;
  }

  memberships(auvId: string): ZoneMembership[] {
    const state = this.vehicles.get(auvId);
    if (!state) return [];
    return [...state.memberships.values()].map(m => ({ ...m }));
  }

  lastSample(auvId: string): PositionSample | null {
    return this.vehicles.get(auvId)?.lastSample ?? null;
  }

  trackedVehicles(): string[] {
    return [...this.vehicles.keys()];
  }

  /** Vehicles holding at least one active membership. */
  activeVehicles(): string[] {
    const out: string[] = [];
    for (const [auvId, state] of this.vehicles) {
      if (state.memberships.size > 0) out.push(auvId);
    }
    return out;
  }
}
