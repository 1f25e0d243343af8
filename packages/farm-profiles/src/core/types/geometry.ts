/**
 * Canonical geometry types
 *
 * Every geometry handed to the extraction engine is one of these frozen
 * variants. Coordinates are stored as (lat, lon) pairs, the order callers
 * supply them in; conversion to GeoJSON (lon, lat) happens at the query
 * service boundary.
 */

export interface LatLon {
  readonly lat: number;
  readonly lon: number;
}

export interface PointGeometry {
  readonly kind: 'Point';
  readonly coordinates: LatLon;
}

export interface MultiPointGeometry {
  readonly kind: 'MultiPoint';
  readonly coordinates: readonly LatLon[];
}

/**
 * Polygon with closed rings. The first ring is the exterior boundary,
 * any further rings are holes.
 */
export interface PolygonGeometry {
  readonly kind: 'Polygon';
  readonly rings: readonly (readonly LatLon[])[];
}

export type Geometry = PointGeometry | MultiPointGeometry | PolygonGeometry;

export type GeometryKind = Geometry['kind'];
