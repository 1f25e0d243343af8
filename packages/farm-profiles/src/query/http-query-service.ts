/**
 * HTTP Query Service
 *
 * GeospatialQueryService backed by a geospatial query gateway that evaluates
 * image/feature references server-side.
 *
 * ENDPOINTS:
 * - POST {baseUrl}/raster/reduce             → { value: number | null }
 * - POST {baseUrl}/vector/first-intersecting → { feature: { properties } | null }
 *
 * Area and centroid are computed locally with turf (geodesic area in m²,
 * area-weighted centre for polygons); they need no round-trip.
 */

import { area } from '@turf/turf';
import { z } from 'zod';
import { MAX_PIXELS } from '../core/constants.js';
import { RemoteQueryError, type RemoteQueryFailureReason } from '../core/errors.js';
import {
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
} from '../core/http-client.js';
import type { Geometry } from '../core/types/geometry.js';
import type {
  CentroidCoordinates,
  FeatureCollectionRef,
  FeatureFieldValue,
  GeospatialQueryService,
  ImageCollectionRef,
  RasterReduceRequest,
  RemoteFeature,
  RemoteValue,
} from '../core/types/query-service.js';
import { createLogger } from '../core/utils/logger.js';
import { geometryCenter, toGeoJSON } from '../geometry/geometry-parser.js';
import { lazyRemoteValue, resolvedRemoteValue } from './remote-value.js';

const log = createLogger('http-query-service');

// ============================================================================
// Response Schemas
// ============================================================================

const ReduceResponseSchema = z.object({
  value: z.number().finite().nullable(),
});

const FieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const FeatureResponseSchema = z.object({
  feature: z
    .object({
      id: z.union([z.string(), z.number()]).optional(),
      properties: z.record(z.string(), FieldValueSchema),
    })
    .nullable(),
});

export interface HttpQueryServiceOptions {
  /** Gateway root, e.g. https://gateway.example.org/v1 */
  readonly baseUrl: string;
  readonly client?: HTTPClient;
}

function failureReason(error: Error): RemoteQueryFailureReason {
  if (error instanceof HTTPTimeoutError) return 'timeout';
  if (error instanceof HTTPNetworkError) return 'unreachable';
  if (error instanceof HTTPJSONParseError) return 'malformed';
  if (error instanceof HTTPError) return error.statusCode >= 500 ? 'unreachable' : 'rejected';
  return 'unreachable';
}

export class HttpQueryService implements GeospatialQueryService {
  private readonly baseUrl: string;
  private readonly client: HTTPClient;

  constructor(options: HttpQueryServiceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.client = options.client ?? new HTTPClient();
  }

  filterImageCollectionByYear(collection: ImageCollectionRef, year: number): ImageCollectionRef {
    return {
      ...collection,
      dateRange: { start: `${year}-01-01`, end: `${year + 1}-01-01` },
    };
  }

  reduceRasterRegion(request: RasterReduceRequest): RemoteValue<number> {
    return lazyRemoteValue(async () => {
      const body = await this.post('reduceRasterRegion', '/raster/reduce', {
        image: request.image,
        band: request.band,
        geometry: toGeoJSON(request.geometry),
        scale: request.scale,
        reducer: request.reducer,
        maxPixels: MAX_PIXELS,
      });
      return this.validate('reduceRasterRegion', ReduceResponseSchema, body).value;
    });
  }

  firstIntersectingFeature(collection: FeatureCollectionRef, geometry: Geometry): RemoteValue<RemoteFeature> {
    return lazyRemoteValue(async () => {
      const body = await this.post('firstIntersectingFeature', '/vector/first-intersecting', {
        collection: collection.assetId,
        geometry: toGeoJSON(geometry),
      });
      return this.validate('firstIntersectingFeature', FeatureResponseSchema, body).feature;
    });
  }

  featureField(feature: RemoteFeature, name: string): FeatureFieldValue {
    return Object.prototype.hasOwnProperty.call(feature.properties, name)
      ? feature.properties[name] ?? null
      : null;
  }

  geometryArea(geometry: Geometry): RemoteValue<number> {
    return resolvedRemoteValue(area(toGeoJSON(geometry)));
  }

  geometryCentroid(geometry: Geometry): RemoteValue<CentroidCoordinates> {
    return resolvedRemoteValue(geometryCenter(geometry));
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private async post(operation: string, path: string, body: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    try {
      return await this.client.requestJSON(url, { method: 'POST', body });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const reason = failureReason(cause);
      log.debug('Gateway request failed', { operation, url, reason, error: cause.message });
      throw new RemoteQueryError(`${operation} failed: ${cause.message}`, reason, operation, cause);
    }
  }

  private validate<S extends z.ZodTypeAny>(operation: string, schema: S, body: unknown): z.output<S> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new RemoteQueryError(
        `${operation} returned an unexpected payload: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
          .join('; ')}`,
        'malformed',
        operation
      );
    }
    return parsed.data;
  }
}
