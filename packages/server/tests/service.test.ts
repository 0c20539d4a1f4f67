import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import type { ComplianceEvent, SampleError, Zone } from '@seabed/shared';
import { ComplianceStore } from '../src/compliance/store.js';
import { ComplianceService } from '../src/compliance/service.js';
import { T0, at, sample, squareZone } from './fixtures.js';

describe('ComplianceService', () => {
  let store: ComplianceStore;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new ComplianceStore();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  test('persists accepted catalogs and restores them', () => {
    const service = new ComplianceService({ store });
    const loaded = vi.fn();
    service.on('zones_loaded', loaded);
    expect(service.replaceZones([squareZone('Z1', 0, 0, 1)])).toEqual({ ok: true, value: 1 });
    expect(loaded).toHaveBeenCalledWith(1);

    const restarted = new ComplianceService({ store });
    expect(restarted.restoreZones()).toEqual({ ok: true, value: 1 });
    expect(restarted.engine.getZones().map(z => z.id)).toEqual(['Z1']);
  });

  test('a rejected catalog is neither applied nor persisted', () => {
    const service = new ComplianceService({ store });
    service.replaceZones([squareZone('Z1', 0, 0, 1)]);
    const bad: Zone = { id: 'BAD', name: 'Bad', type: 'safe', geometry: { type: 'Polygon', coordinates: [[[0, 0], [1, 1]]] } };
    const result = service.replaceZones([bad]);
    expect(result.ok).toBe(false);
    expect(service.engine.getZones().map(z => z.id)).toEqual(['Z1']);
    const stored = store.loadZones();
    expect(stored.ok ? stored.value.map(z => z.id) : null).toEqual(['Z1']);
  });

  test('a failed catalog write rolls the engine back', () => {
    const service = new ComplianceService({ store });
    service.replaceZones([squareZone('Z1', 0, 0, 1)]);
    vi.spyOn(store, 'saveZones').mockImplementation(() => {
      throw new Error('disk full');
    });
    const failed = vi.fn();
    const loaded = vi.fn();
    service.on('persistence_error', failed);
    service.on('zones_loaded', loaded);

    expect(service.replaceZones([squareZone('Z2', 5, 5, 1)])).toEqual({
      ok: false,
      error: { kind: 'persistence_failed', message: 'Failed to persist zone catalog: disk full' },
    });
    expect(service.engine.getZones().map(z => z.id)).toEqual(['Z1']);
    expect(failed).toHaveBeenCalledTimes(1);
    expect(loaded).not.toHaveBeenCalled();
  });

  test('ingest emits and persists events', async () => {
    const service = new ComplianceService({ store });
    service.replaceZones([squareZone('Z1', 0, 0, 1)]);
    const seen: ComplianceEvent[] = [];
    service.on('compliance_event', (event: ComplianceEvent) => seen.push(event));

    const [first, second] = await Promise.all([
      service.ingest(sample('A1', 0.5, 0.5, 0)),
      service.ingest(sample('A1', 3, 3, 1)),
    ]);
    expect(first.ok && first.value.map(e => e.type)).toEqual(['entry']);
    expect(second.ok && second.value.map(e => e.type)).toEqual(['exit']);
    expect(seen.map(e => e.type)).toEqual(['entry', 'exit']);
    expect(store.listEvents().map(e => e.type)).toEqual(['entry', 'exit']);
  });

  test('stale samples are reported and dropped', async () => {
    const service = new ComplianceService({ store });
    service.replaceZones([squareZone('Z1', 0, 0, 1)]);
    const stale = vi.fn();
    service.on('stale_sample', stale);

    await service.ingest(sample('A1', 0.5, 0.5, 5));
    const result = await service.ingest(sample('A1', 0.5, 0.5, 5));
    const expected: SampleError = { kind: 'stale_sample', auvId: 'A1', timestamp: at(5), lastTimestamp: at(5) };
    expect(result).toEqual({ ok: false, error: expected });
    expect(stale).toHaveBeenCalledWith(expected);
  });

  test('events still go out when persisting them fails', async () => {
    const service = new ComplianceService({ store });
    service.replaceZones([squareZone('Z1', 0, 0, 1)]);
    vi.spyOn(store, 'saveEvents').mockImplementation(() => {
      throw new Error('disk full');
    });
    const failed = vi.fn();
    const emitted = vi.fn();
    service.on('persistence_error', failed);
    service.on('compliance_event', emitted);

    await service.ingest(sample('A1', 0.5, 0.5, 0));
    expect(failed).toHaveBeenCalledTimes(1);
    expect(emitted).toHaveBeenCalledTimes(1);
  });

  test('batches keep per-vehicle order and report each sample', async () => {
    const service = new ComplianceService({ store });
    service.replaceZones([squareZone('Z1', 0, 0, 1)]);

    const results = await service.ingestBatch([
      sample('A1', 0.5, 0.5, 0),
      sample('B1', 0.5, 0.5, 0),
      sample('A1', 3, 3, 1),
      sample('A1', 0.5, 0.5, 1),
    ]);
    expect(results.map(r => (r.ok ? r.value.map(e => `${e.auvId}:${e.type}`) : r.error.kind))).toEqual([
      ['A1:entry'],
      ['B1:entry'],
      ['A1:exit'],
      'stale_sample',
    ]);
    expect(store.listEvents()).toHaveLength(3);
  });

  test('a vehicle whose sweep throws does not stop the others', async () => {
    const service = new ComplianceService({ store });
    service.replaceZones([squareZone('Z1', 0, 0, 1, { maxDurationMinutes: 30 })]);
    await service.ingest(sample('A1', 0.5, 0.5, 0));
    await service.ingest(sample('B1', 0.5, 0.5, 0));
    const sweepErrors = vi.fn();
    service.on('sweep_error', sweepErrors);
    service.on('compliance_event', (event: ComplianceEvent) => {
      if (event.auvId === 'A1' && event.type === 'violation') throw new Error('listener failed');
    });

    const events = await service.sweep(at(31));
    expect(events.map(e => `${e.auvId}:${e.type}`)).toEqual(['B1:violation']);
    expect(sweepErrors).toHaveBeenCalledWith(expect.any(Error), 'A1');
  });

  test('manual sweeps use the given clock', async () => {
    const service = new ComplianceService({ store });
    service.replaceZones([squareZone('Z1', 0, 0, 1, { maxDurationMinutes: 30 })]);
    await service.ingest(sample('A1', 0.5, 0.5, 0));
    const events = await service.sweep(at(31));
    expect(events.map(e => e.type)).toEqual(['violation']);
    expect(store.listEvents({ type: 'violation' })).toHaveLength(1);
  });

  test('the scheduler sweeps on its interval', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    const service = new ComplianceService({ store, sweepIntervalMs: 60_000 });
    service.replaceZones([squareZone('Z1', 0, 0, 1, { maxDurationMinutes: 5 })]);
    const types: string[] = [];
    service.on('compliance_event', (event: ComplianceEvent) => types.push(event.type));

    await service.ingest(sample('A1', 0.5, 0.5, 0));
    service.start();
    expect(service.running).toBe(true);

    await vi.advanceTimersByTimeAsync(3 * 60_000);
    expect(types).toEqual(['entry']);
    await vi.advanceTimersByTimeAsync(60_000);
    expect(types).toEqual(['entry', 'warning']);
    await vi.advanceTimersByTimeAsync(60_000);
    expect(types).toEqual(['entry', 'warning', 'violation']);

    service.stop();
    expect(service.running).toBe(false);
  });

  test('a non-positive interval never schedules', () => {
    const service = new ComplianceService({ store, sweepIntervalMs: 0 });
    service.start();
    expect(service.running).toBe(false);
  });
});
