// ============================================================================
// Compliance Service — hosts the engine: locking, persistence, scheduling
// ============================================================================

import { EventEmitter } from 'events';
import type { ComplianceEvent, PositionSample, Result, SampleError, Zone, ZoneLoadError } from '@seabed/shared';
import { ok, err } from '@seabed/shared';
import { ComplianceEngine, type ComplianceEngineOptions } from '../geofence/engine.js';
import type { ComplianceStore } from './store.js';
import { KeyedLock } from './keyed-lock.js';

export type ZoneReplaceError =
  | { kind: 'rejected'; error: ZoneLoadError }
  | { kind: 'persistence_failed'; message: string };

export interface ComplianceServiceOptions {
  store: ComplianceStore;
  engine?: Omit<ComplianceEngineOptions, 'sink'>;
  sweepIntervalMs?: number;
  now?: () => number;
}

/**
 * Events:
 *  - 'compliance_event' (event)      every event the engine emits, after it is persisted
 *  - 'zones_loaded' (count)          a catalog replaced the working set
 *  - 'stale_sample' (error)          an out-of-order or duplicate sample was dropped
 *  - 'persistence_error' (err, event?)   an event or the zone catalog could not be written
 *  - 'sweep_error' (err, auvId)      a vehicle's sweep threw; the sweep moved on
 */
export class ComplianceService extends EventEmitter {
  readonly engine: ComplianceEngine;
  private readonly store: ComplianceStore;
  private readonly lock = new KeyedLock();
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private sweepInFlight: Promise<ComplianceEvent[]> | null = null;

  constructor(options: ComplianceServiceOptions) {
    super();
    this.store = options.store;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60000;
    this.now = options.now ?? (() => Date.now());
    this.engine = new ComplianceEngine({ ...options.engine, sink: event => this.record(event) });
  }

  // === Zones ===

  /** Loads the persisted catalog into the engine (start-up path). */
  restoreZones(): Result<number, ZoneLoadError> {
    const stored = this.store.loadZones();
    if (!stored.ok) {
      const message = `Stored zone catalog is unreadable: ${stored.error.map(i => `${i.path} ${i.message}`).join('; ')}`;
      console.warn(`[Compliance] ${message}`);
      return err({ message, zoneIds: [], issues: [] });
    }
    const loaded = this.engine.loadZones(stored.value);
    if (!loaded.ok) {
      console.warn(`[Compliance] ${loaded.error.message} (${loaded.error.zoneIds.join(', ')})`);
      return loaded;
    }
    console.log(`[Compliance] Restored ${stored.value.length} zones`);
    this.emit('zones_loaded', stored.value.length);
    return ok(stored.value.length);
  }

  /**
   * Swaps the engine's working set, then persists it. A failed write rolls
   * the engine back to the catalog it had, so memory and disk never diverge.
   */
  replaceZones(zones: readonly Zone[]): Result<number, ZoneReplaceError> {
    const previous = this.engine.getZones();
    const loaded = this.engine.loadZones(zones);
    if (!loaded.ok) {
      console.warn(`[Compliance] ${loaded.error.message} (${loaded.error.zoneIds.join(', ')})`);
      return err({ kind: 'rejected', error: loaded.error });
    }
    try {
      this.store.saveZones(this.engine.getZones());
    } catch (e) {
      const rollback = this.engine.loadZones(previous);
      if (!rollback.ok) console.error(`[Compliance] Rolling back the zone catalog failed: ${rollback.error.message}`);
      const message = `Failed to persist zone catalog: ${e instanceof Error ? e.message : String(e)}`;
      console.error(`[Compliance] ${message}`);
      this.emit('persistence_error', e);
      return err({ kind: 'persistence_failed', message });
    }
    console.log(`[Compliance] Loaded ${zones.length} zones`);
    this.emit('zones_loaded', zones.length);
    return ok(zones.length);
  }

  // === Telemetry ===

  ingest(sample: PositionSample): Promise<Result<ComplianceEvent[], SampleError>> {
    return this.lock.run(sample.auvId, () => {
      const result = this.engine.process(sample);
      if (!result.ok && result.error.kind === 'stale_sample') {
        console.warn(`[Compliance] Stale sample for ${sample.auvId}: ${result.error.timestamp} <= ${result.error.lastTimestamp}`);
        this.emit('stale_sample', result.error);
      }
      return result;
    });
  }

  /** Every sample still goes through its vehicle's lock, in array order per vehicle. */
  ingestBatch(samples: readonly PositionSample[]): Promise<Result<ComplianceEvent[], SampleError>[]> {
    return Promise.all(samples.map(sample => this.ingest(sample)));
  }

  // === Sweep ===

  /** Takes each vehicle's lock in turn, so a sweep never races that vehicle's ingestion. */
  async sweep(now: number = this.now()): Promise<ComplianceEvent[]> {
    const events: ComplianceEvent[] = [];
    for (const auvId of this.engine.activeVehicles()) {
      try {
        events.push(...await this.lock.run(auvId, () => this.engine.sweepVehicle(auvId, now)));
      } catch (e) {
        // A failing vehicle is skipped; the others are still swept
        console.error(`[Compliance] Sweep failed for ${auvId}:`, e);
        this.emit('sweep_error', e, auvId);
      }
    }
    return events;
  }

  start(): void {
    if (this.sweepTimer || this.sweepIntervalMs <= 0) return;
    this.sweepTimer = setInterval(() => {
      void this.scheduledSweep();
    }, this.sweepIntervalMs);
    console.log(`[Compliance] Sweep scheduled every ${this.sweepIntervalMs} ms`);
  }

  stop(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  get running(): boolean {
    return this.sweepTimer !== null;
  }

  private async scheduledSweep(): Promise<void> {
    // A slow sweep is never stacked with the next tick
    if (this.sweepInFlight) return;
    this.sweepInFlight = this.sweep();
    try {
      const events = await this.sweepInFlight;
      if (events.length > 0) console.log(`[Compliance] Sweep produced ${events.length} event(s)`);
    } catch (e) {
      console.error('[Compliance] Sweep failed:', e);
    } finally {
      this.sweepInFlight = null;
    }
  }

  // === Event sink ===

  private record(event: ComplianceEvent): void {
    try {
      this.store.saveEvents([event]);
    } catch (e) {
      console.error(`[Compliance] Failed to persist ${event.type} event for ${event.auvId}/${event.zoneId}:`, e);
      this.emit('persistence_error', e, event);
    }
    this.emit('compliance_event', event);
  }
}
