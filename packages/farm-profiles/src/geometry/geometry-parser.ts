/**
 * Geometry Parser
 *
 * Turns raw caller input into the canonical, frozen Geometry representation
 * used throughout extraction. Raw coordinates are (lat, lon) pairs.
 *
 * DISPATCH ORDER:
 * 1. [lat, lon]                      → Point
 * 2. [[lat, lon], ...]               → MultiPoint
 * 3. [[[lat, lon], ...], ...]        → Polygon (first ring exterior)
 *
 * Anything else is rejected with InvalidGeometryError; nothing is coerced.
 * Parsing a geometry this module produced returns the same object.
 */

import { centerOfMass, centroid } from '@turf/turf';
import type { Geometry as GeoJSONGeometry, Position } from 'geojson';
import { InvalidGeometryError } from '../core/errors.js';
import type {
  Geometry,
  LatLon,
  MultiPointGeometry,
  PointGeometry,
  PolygonGeometry,
} from '../core/types/geometry.js';
import type { CentroidCoordinates } from '../core/types/query-service.js';

type NumberPair = readonly [number, number];

const canonicalGeometries = new WeakSet<object>();

function isCanonicalGeometry(value: unknown): value is Geometry {
  return typeof value === 'object' && value !== null && canonicalGeometries.has(value);
}

function isNumberPair(value: unknown): value is NumberPair {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number'
  );
}

function isRing(value: unknown): value is readonly NumberPair[] {
  return Array.isArray(value) && value.length > 0 && value.every(isNumberPair);
}

function register<T extends Geometry>(geometry: T): T {
  Object.freeze(geometry);
  canonicalGeometries.add(geometry);
  return geometry;
}

function toLatLon(lat: number, lon: number, input: unknown): LatLon {
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    throw new InvalidGeometryError(`Coordinates must be finite numbers, got (${lat}, ${lon})`, input);
  }
  if (lat < -90 || lat > 90) {
    throw new InvalidGeometryError(`Latitude ${lat} outside [-90, 90]`, input);
  }
  if (lon < -180 || lon > 180) {
    throw new InvalidGeometryError(`Longitude ${lon} outside [-180, 180]`, input);
  }
  return Object.freeze({ lat, lon });
}

function samePosition(a: LatLon, b: LatLon): boolean {
  return a.lat === b.lat && a.lon === b.lon;
}

// ============================================================================
// Variant Parsers
// ============================================================================

export function parsePoint(lat: number, lon: number): PointGeometry {
  return register({ kind: 'Point', coordinates: toLatLon(lat, lon, [lat, lon]) });
}

export function parseMultiPoint(coords: readonly NumberPair[]): MultiPointGeometry {
  if (coords.length === 0) {
    throw new InvalidGeometryError('MultiPoint needs at least one coordinate', coords);
  }
  const coordinates = coords.map(([lat, lon]) => toLatLon(lat, lon, coords));
  return register({ kind: 'MultiPoint', coordinates: Object.freeze(coordinates) });
}

export function parsePolygon(rings: readonly (readonly NumberPair[])[]): PolygonGeometry {
  if (rings.length === 0) {
    throw new InvalidGeometryError('Polygon needs an exterior ring', rings);
  }

  const closedRings = rings.map((ring, ringIndex) => {
    const positions = ring.map(([lat, lon]) => toLatLon(lat, lon, rings));
    const first = positions[0];
    const last = positions[positions.length - 1];
    if (first === undefined || last === undefined) {
      throw new InvalidGeometryError(`Ring ${ringIndex} is empty`, rings);
    }

    const closed = samePosition(first, last) ? positions : [...positions, first];
    // closed ring repeats its first position once
    if (closed.length < 4) {
      throw new InvalidGeometryError(
        `Ring ${ringIndex} needs at least 3 distinct positions, got ${closed.length - 1}`,
        rings
      );
    }
    return Object.freeze(closed);
  });

  return register({ kind: 'Polygon', rings: Object.freeze(closedRings) });
}

/**
 * Parse raw input into a canonical geometry
 *
 * @throws {InvalidGeometryError} For any unrecognized shape or out-of-range coordinate
 */
export function parseGeometry(raw: unknown): Geometry {
  if (isCanonicalGeometry(raw)) {
    return raw;
  }

  if (!Array.isArray(raw)) {
    throw new InvalidGeometryError(
      `Unrecognized geometry: expected a coordinate sequence, got ${raw === null ? 'null' : typeof raw}`,
      raw
    );
  }

  if (isNumberPair(raw)) {
    return parsePoint(raw[0], raw[1]);
  }

  if (raw.length > 0 && raw.every(isNumberPair)) {
    return parseMultiPoint(raw);
  }

  if (raw.length > 0 && raw.every(isRing)) {
    return parsePolygon(raw);
  }

  throw new InvalidGeometryError('Unrecognized geometry: not a point, multipoint or polygon', raw);
}

// ============================================================================
// GeoJSON Conversion
// ============================================================================

function toPosition(coordinate: LatLon): Position {
  return [coordinate.lon, coordinate.lat];
}

/**
 * Convert to GeoJSON (lon, lat axis order)
 */
export function toGeoJSON(geometry: Geometry): GeoJSONGeometry {
  switch (geometry.kind) {
    case 'Point':
      return { type: 'Point', coordinates: toPosition(geometry.coordinates) };
    case 'MultiPoint':
      return { type: 'MultiPoint', coordinates: geometry.coordinates.map(toPosition) };
    case 'Polygon':
      return { type: 'Polygon', coordinates: geometry.rings.map((ring) => ring.map(toPosition)) };
  }
}

/**
 * Geometric centre as (lon, lat). Polygons use the area-weighted centre, so
 * extra vertices along one edge do not pull it; points and multipoints use
 * the mean position.
 */
export function geometryCenter(geometry: Geometry): CentroidCoordinates | null {
  const geojson = toGeoJSON(geometry);
  const center = geometry.kind === 'Polygon' ? centerOfMass(geojson) : centroid(geojson);
  const [lon, lat] = center.geometry.coordinates;
  return lon === undefined || lat === undefined ? null : [lon, lat];
}
