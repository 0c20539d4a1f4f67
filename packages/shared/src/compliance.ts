// ============================================================================
// Telemetry, Membership & Compliance Event Types
// ============================================================================

import type { ZoneType } from './zones.js';

export interface PositionSample {
  auvId: string;
  latitude: number;
  longitude: number;
  depth: number; // meters, positive down
  timestamp: number; // epoch ms
}

export interface EventPosition {
  latitude: number;
  longitude: number;
  depth: number;
}

export const COMPLIANCE_STATUSES = ['compliant', 'warning', 'violation'] as const;
export type ComplianceStatus = typeof COMPLIANCE_STATUSES[number];

export const COMPLIANCE_EVENT_TYPES = ['entry', 'exit', 'warning', 'violation'] as const;
export type ComplianceEventType = typeof COMPLIANCE_EVENT_TYPES[number];

export function isComplianceStatus(value: unknown): value is ComplianceStatus {
  return typeof value === 'string' && COMPLIANCE_STATUSES.some((s) => s === value);
}

export function isComplianceEventType(value: unknown): value is ComplianceEventType {
  return typeof value === 'string' && COMPLIANCE_EVENT_TYPES.some((t) => t === value);
}

/** Ordering used for "worst status wins" and monotonic promotion */
export const STATUS_RANK: Record<ComplianceStatus, number> = {
  compliant: 0,
  warning: 1,
  violation: 2,
};

export interface ZoneMembership {
  auvId: string;
  zoneId: string;
  zoneName: string;
  zoneType: ZoneType;
  entryTime: number;
  lastSeenTime: number;
  cumulativeDurationMinutes: number;
  status: ComplianceStatus;
  depthViolation: boolean;
}

export interface ComplianceEvent {
  auvId: string;
  zoneId: string;
  zoneName: string;
  zoneType: ZoneType;
  type: ComplianceEventType;
  timestamp: number;
  position: EventPosition;
  durationMinutes: number;
  // Membership status after the event was applied
  status: ComplianceStatus;
  detail?: string;
}

export interface StoredComplianceEvent extends ComplianceEvent {
  id: number;
}

export interface AuvStatus {
  auvId: string;
  memberships: ZoneMembership[];
  overallStatus: ComplianceStatus;
  totalActiveMinutes: number;
  lastSample: PositionSample | null;
}

export type SampleField = 'auvId' | 'latitude' | 'longitude' | 'depth' | 'timestamp';

export type SampleError =
  | { kind: 'invalid_sample'; field: SampleField; message: string }
  | { kind: 'stale_sample'; auvId: string; timestamp: number; lastTimestamp: number };

export interface EventQuery {
  auvId?: string;
  zoneId?: string;
  type?: ComplianceEventType;
  from?: number;
  to?: number;
  limit?: number;
  offset?: number;
}

export interface ComplianceReport {
  auvId: string;
  from: number;
  to: number;
  totalViolations: number;
  totalWarnings: number;
  zonesVisited: string[];
  totalTimeInZonesMinutes: number;
  events: StoredComplianceEvent[];
}

export interface ComplianceStatistics {
  from: number;
  to: number;
  totalEvents: number;
  byType: Record<ComplianceEventType, number>;
  byStatus: Record<ComplianceStatus, number>;
  uniqueVehicles: number;
  uniqueZones: number;
  // Percentage of events whose status is compliant; 0 when there are none
  complianceRate: number;
}
