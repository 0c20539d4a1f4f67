import { describe, expect, test } from 'vitest';
import type { ZoneMembership } from '@seabed/shared';
import { DurationMonitor } from '../src/geofence/monitor.js';
import { squareZone } from './fixtures.js';

function membership(minutes: number, status: ZoneMembership['status'] = 'compliant'): ZoneMembership {
  return {
    auvId: 'A1',
    zoneId: 'Z1',
    zoneName: 'Zone Z1',
    zoneType: 'restricted',
    entryTime: 0,
    lastSeenTime: 0,
    cumulativeDurationMinutes: minutes,
    status,
    depthViolation: false,
  };
}

describe('DurationMonitor', () => {
  const zone = squareZone('Z1', 0, 0, 1, { maxDurationMinutes: 30 });

  test('rejects ratios outside (0, 1)', () => {
    expect(() => new DurationMonitor(1)).toThrow(RangeError);
    expect(() => new DurationMonitor(0)).toThrow(RangeError);
    expect(new DurationMonitor().warningRatio).toBe(0.8);
  });

  test('maps dwell time to a status band', () => {
    const monitor = new DurationMonitor();
    expect(monitor.statusFor(23, zone)).toBe('compliant');
    expect(monitor.statusFor(24, zone)).toBe('warning');
    expect(monitor.statusFor(30, zone)).toBe('violation');
  });

  test('safe zones and zones without a budget stay compliant', () => {
    const monitor = new DurationMonitor();
    expect(monitor.statusFor(1000, squareZone('S', 0, 0, 1, { type: 'safe', maxDurationMinutes: 10 }))).toBe('compliant');
    expect(monitor.statusFor(1000, squareZone('N', 0, 0, 1))).toBe('compliant');
  });

  test('only reports forward crossings', () => {
    const monitor = new DurationMonitor();
    expect(monitor.evaluate(membership(24.5), zone)).toEqual({
      status: 'warning',
      ratio: 24.5 / 30,
      detail: 'Approaching time limit in restricted zone: 24.5 of 30 min',
    });
    expect(monitor.evaluate(membership(26, 'warning'), zone)).toBeNull();
    expect(monitor.evaluate(membership(31, 'warning'), zone)).toEqual({
      status: 'violation',
      ratio: 31 / 30,
      detail: 'Exceeded maximum duration of 30 min in restricted zone',
    });
    expect(monitor.evaluate(membership(40, 'violation'), zone)).toBeNull();
  });
});
