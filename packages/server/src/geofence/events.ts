import type { ComplianceEvent, ComplianceEventType, ComplianceStatus, EventPosition, ZoneMembership } from '@seabed/shared';

export type EventSink = (event: ComplianceEvent) => void;

export interface EventDraft {
  membership: ZoneMembership;
  type: ComplianceEventType;
  timestamp: number;
  position: EventPosition;
  status?: ComplianceStatus;
  detail?: string;
}

/**
 * Output boundary. Packages detections into immutable events and hands them
 * to the caller's sink; delivery guarantees belong to the sink.
 */
export class ComplianceEventEmitter {
  constructor(private readonly sink?: EventSink) {}

  build(draft: EventDraft): ComplianceEvent {
    const { membership } = draft;
    const event: ComplianceEvent = {
      auvId: membership.auvId,
      zoneId: membership.zoneId,
      zoneName: membership.zoneName,
      zoneType: membership.zoneType,
      type: draft.type,
      timestamp: draft.timestamp,
      position: { ...draft.position },
      durationMinutes: membership.cumulativeDurationMinutes,
      status: draft.status ?? membership.status,
    };
    if (draft.detail !== undefined) event.detail = draft.detail;
    return Object.freeze(event);
  }

  publish(events: readonly ComplianceEvent[]): void {
    if (!this.sink) return;
    for (const event of events) this.sink(event);
  }
}
