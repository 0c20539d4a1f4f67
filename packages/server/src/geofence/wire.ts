// ============================================================================
// Wire parsing — zone catalogs (plain or GeoJSON) and telemetry payloads
// ============================================================================

import { z } from 'zod';
import type { LinearRing, PolygonRings, PositionSample, Result, Zone, ZoneType } from '@seabed/shared';
import { ZONE_TYPES, ok, err } from '@seabed/shared';

export interface ParseIssue {
  path: string;
  message: string;
}

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First key present wins; GIS exports use snake_case, our API camelCase. */
function pick(record: Fields, ...keys: string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined && record[key] !== null) return record[key];
  }
  return undefined;
}

// GeoJSON positions may carry a third (altitude) ordinate; it is dropped.
const positionSchema = z.array(z.number()).min(2).transform(([lon, lat]) => [lon, lat] as const);
const ringSchema = z.array(positionSchema);
const polygonSchema = z.array(ringSchema).min(1);

export const geometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: polygonSchema }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(polygonSchema).min(1) }),
]);

function normalizeZoneRecord(value: unknown): unknown {
  if (!isRecord(value)) return value;
  let source: Fields = value;
  let featureId: unknown;
  if (value.type === 'Feature' && isRecord(value.properties)) {
    source = { ...value.properties, geometry: value.geometry };
    // GeoJSON allows numeric feature ids
    featureId = typeof value.id === 'number' ? String(value.id) : value.id;
  }

  const hours = pick(source, 'max_duration_hours', 'maxDurationHours');
  const minutes = pick(source, 'maxDurationMinutes', 'max_duration_minutes');
  return {
    id: pick(source, 'id', 'zone_id', 'zoneId') ?? featureId,
    name: pick(source, 'name', 'zone_name', 'zoneName'),
    type: pick(source, 'type', 'zone_type', 'zoneType'),
    maxDurationMinutes: minutes ?? (typeof hours === 'number' ? hours * 60 : hours),
    depthMin: pick(source, 'depthMin', 'depth_min'),
    depthMax: pick(source, 'depthMax', 'depth_max'),
    geometry: pick(source, 'geometry'),
  };
}

export const zoneSchema = z.preprocess(normalizeZoneRecord, z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  type: z.enum(ZONE_TYPES),
  maxDurationMinutes: z.number().positive().optional(),
  depthMin: z.number().nonnegative().optional(),
  depthMax: z.number().nonnegative().optional(),
  geometry: geometrySchema,
}));

function unwrapCatalog(payload: unknown): unknown {
  if (Array.isArray(payload)) return payload;
  if (isRecord(payload)) {
    if (payload.type === 'FeatureCollection') return payload.features;
    if (Array.isArray(payload.zones)) return payload.zones;
  }
  return payload;
}

function toIssues(error: z.ZodError): ParseIssue[] {
  return error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
}

export function parseZoneCatalog(payload: unknown): Result<Zone[], ParseIssue[]> {
  const parsed = z.array(zoneSchema).safeParse(unwrapCatalog(payload));
  if (!parsed.success) return err(toIssues(parsed.error));
  return ok(parsed.data);
}

export interface ZoneFeatureProperties {
  id: string;
  name: string;
  type: ZoneType;
  maxDurationMinutes?: number;
  depthMin?: number;
  depthMax?: number;
}

export type FeatureGeometry =
  | { type: 'Polygon'; coordinates: number[][][] }
  | { type: 'MultiPolygon'; coordinates: number[][][][] };

export interface ZoneFeature {
  type: 'Feature';
  id: string;
  properties: ZoneFeatureProperties;
  geometry: FeatureGeometry;
}

export interface ZoneFeatureCollection {
  type: 'FeatureCollection';
  features: ZoneFeature[];
}

// Stored rings are open; GeoJSON repeats the first position at the end.
function closedRing(ring: LinearRing): number[][] {
  const out = ring.map(([lon, lat]) => [lon, lat]);
  if (out.length > 0) out.push([...out[0]]);
  return out;
}

function closedPolygon(rings: PolygonRings): number[][][] {
  return rings.map(closedRing);
}

/** Inverse of parseZoneCatalog for a GeoJSON consumer. */
export function toFeatureCollection(zones: readonly Zone[]): ZoneFeatureCollection {
  return {
    type: 'FeatureCollection',
    features: zones.map((zone): ZoneFeature => {
      const properties: ZoneFeatureProperties = { id: zone.id, name: zone.name, type: zone.type };
      if (zone.maxDurationMinutes !== undefined) properties.maxDurationMinutes = zone.maxDurationMinutes;
      if (zone.depthMin !== undefined) properties.depthMin = zone.depthMin;
      if (zone.depthMax !== undefined) properties.depthMax = zone.depthMax;
      const geometry: FeatureGeometry = zone.geometry.type === 'Polygon'
        ? { type: 'Polygon', coordinates: closedPolygon(zone.geometry.coordinates) }
        : { type: 'MultiPolygon', coordinates: zone.geometry.coordinates.map(closedPolygon) };
      return { type: 'Feature', id: zone.id, properties, geometry };
    }),
  };
}

const timestampSchema = z.union([
  z.number(),
  z.string().datetime({ offset: true }).transform(s => Date.parse(s)),
]);

const sampleSchema = z.object({
  auvId: z.string().min(1),
  latitude: z.number(),
  longitude: z.number(),
  depth: z.number(),
  timestamp: timestampSchema.optional(),
});

/**
 * Shapes a telemetry payload. Range checks stay with the engine so the
 * rejected field is reported the same way for every transport.
 */
export function parseSample(payload: unknown, receivedAt: number = Date.now()): Result<PositionSample, ParseIssue[]> {
  const record = isRecord(payload) ? payload : {};
  const parsed = sampleSchema.safeParse({
    auvId: pick(record, 'auvId', 'auv_id'),
    latitude: pick(record, 'latitude', 'lat'),
    longitude: pick(record, 'longitude', 'lon', 'lng'),
    depth: pick(record, 'depth'),
    timestamp: pick(record, 'timestamp'),
  });
  if (!parsed.success) return err(toIssues(parsed.error));
  return ok({ ...parsed.data, timestamp: parsed.data.timestamp ?? receivedAt });
}
