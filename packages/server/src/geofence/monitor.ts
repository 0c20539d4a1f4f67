// ============================================================================
// Duration / Violation Monitor — dwell time against zone budgets
// ============================================================================

import type { ComplianceStatus, Zone, ZoneMembership } from '@seabed/shared';
import { STATUS_RANK } from '@seabed/shared';

export const DEFAULT_WARNING_RATIO = 0.8;

export interface ThresholdCrossing {
  status: Exclude<ComplianceStatus, 'compliant'>;
  ratio: number;
  detail: string;
}

function formatMinutes(minutes: number): string {
  return Number.isInteger(minutes) ? String(minutes) : minutes.toFixed(1);
}

export class DurationMonitor {
  readonly warningRatio: number;

  constructor(warningRatio = DEFAULT_WARNING_RATIO) {
    if (!(warningRatio > 0 && warningRatio < 1)) {
      throw new RangeError(`warningRatio must be between 0 and 1 (exclusive), got ${warningRatio}`);
    }
    this.warningRatio = warningRatio;
  }

  /** Zones without a budget, and safe zones, never leave compliant. */
  statusFor(cumulativeDurationMinutes: number, zone: Zone): ComplianceStatus {
    const budget = zone.maxDurationMinutes;
    if (zone.type === 'safe' || budget === undefined) return 'compliant';
    const ratio = cumulativeDurationMinutes / budget;
    if (ratio >= 1) return 'violation';
    if (ratio >= this.warningRatio) return 'warning';
    return 'compliant';
  }

  /**
   * Returns a crossing only when the status moves forward; evaluating a
   * membership that already sits in its current band yields nothing.
   */
  evaluate(membership: ZoneMembership, zone: Zone): ThresholdCrossing | null {
    const next = this.statusFor(membership.cumulativeDurationMinutes, zone);
    if (next === 'compliant' || STATUS_RANK[next] <= STATUS_RANK[membership.status]) return null;

    const budget = zone.maxDurationMinutes ?? Infinity;
    const ratio = membership.cumulativeDurationMinutes / budget;
    const detail = next === 'violation'
      ? `Exceeded maximum duration of ${formatMinutes(budget)} min in ${zone.type} zone`
      : `Approaching time limit in ${zone.type} zone: ${formatMinutes(membership.cumulativeDurationMinutes)} of ${formatMinutes(budget)} min`;
    return { status: next, ratio, detail };
  }
}
