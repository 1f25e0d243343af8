/**
 * Geospatial query service contract
 *
 * The extraction engine never talks to a remote catalogue directly. It builds
 * serializable image/collection references and asks a GeospatialQueryService
 * to evaluate them. Every evaluation comes back as a RemoteValue: a lazy
 * handle that is turned into a local value only by calling `resolve()`.
 *
 * `resolve()` yields null for an absent result (no pixels, no intersecting
 * feature, masked value) and rejects with RemoteQueryError when the service
 * fails.
 */

import type { Geometry } from './geometry.js';
import type { ReducerName, TerrainDerivation } from './dataset.js';

export interface RemoteValue<T> {
  resolve(): Promise<T | null>;
}

/** Half-open date range, ISO dates, `end` exclusive */
export interface DateRange {
  readonly start: string;
  readonly end: string;
}

export interface ImageCollectionRef {
  readonly kind: 'collection';
  readonly assetId: string;
  readonly dateRange?: DateRange;
}

export type CompositeMethod = 'sum' | 'mean';

export type ImageRef =
  | { readonly kind: 'image'; readonly assetId: string }
  | {
      readonly kind: 'composite';
      readonly collection: ImageCollectionRef;
      readonly band: string;
      readonly method: CompositeMethod;
    }
  | {
      readonly kind: 'terrain';
      readonly source: ImageRef;
      readonly band: string;
      readonly derivation: TerrainDerivation;
    };

export interface RasterReduceRequest {
  readonly image: ImageRef;
  readonly band: string;
  readonly geometry: Geometry;
  readonly scale: number;
  readonly reducer: ReducerName;
}

export interface FeatureCollectionRef {
  readonly kind: 'feature-collection';
  readonly assetId: string;
}

export type FeatureFieldValue = string | number | boolean | null;

export interface RemoteFeature {
  readonly id?: string | number;
  readonly properties: Readonly<Record<string, FeatureFieldValue>>;
}

/** (x, y) = (longitude, latitude) */
export type CentroidCoordinates = readonly [number, number];

export interface GeospatialQueryService {
  /** Restrict a collection to one calendar year */
  filterImageCollectionByYear(collection: ImageCollectionRef, year: number): ImageCollectionRef;

  reduceRasterRegion(request: RasterReduceRequest): RemoteValue<number>;

  firstIntersectingFeature(collection: FeatureCollectionRef, geometry: Geometry): RemoteValue<RemoteFeature>;

  featureField(feature: RemoteFeature, name: string): FeatureFieldValue;

  /** Geometry area in square metres */
  geometryArea(geometry: Geometry): RemoteValue<number>;

  geometryCentroid(geometry: Geometry): RemoteValue<CentroidCoordinates>;
}
