/**
 * Extraction strategies, one per dataset type
 *
 * Each strategy turns (geometry, config) into a transformed scalar through
 * the query service. Dispatch happens on the config's `type` tag; strategies
 * never inspect the shape of what the service returns.
 */

import { RemoteQueryError } from '../core/errors.js';
import type {
  DatasetConfig,
  DatasetType,
  RasterDatasetConfig,
  VectorDatasetConfig,
} from '../core/types/dataset.js';
import type { Geometry } from '../core/types/geometry.js';
import type {
  FeatureFieldValue,
  GeospatialQueryService,
  ImageRef,
  RasterReduceRequest,
} from '../core/types/query-service.js';
import { applyRasterTransforms, applyVectorTransforms } from './transforms.js';

export interface ExtractionContext {
  readonly queryService: GeospatialQueryService;
  /** Calendar year for temporal datasets; null selects the plain image */
  readonly year: number | null;
}

export interface ExtractionStrategy<C extends DatasetConfig> {
  extract(geometry: Geometry, config: C, context: ExtractionContext): Promise<number | null>;
}

export type StrategyTable = {
  readonly [T in DatasetType]: ExtractionStrategy<Extract<DatasetConfig, { type: T }>>;
};

// ============================================================================
// Raster
// ============================================================================

/**
 * Build the reduce request for a raster dataset
 *
 * Temporal datasets with a year become a yearly composite of the selected
 * band: `sum` reducers produce a yearly total, every other reducer a mean.
 */
export function buildRasterRequest(
  geometry: Geometry,
  config: RasterDatasetConfig,
  context: ExtractionContext
): RasterReduceRequest {
  let image: ImageRef;
  if (config.temporal && context.year !== null) {
    const collection = context.queryService.filterImageCollectionByYear(
      { kind: 'collection', assetId: config.asset_id },
      context.year
    );
    image = {
      kind: 'composite',
      collection,
      band: config.band,
      method: config.reducer === 'sum' ? 'sum' : 'mean',
    };
  } else {
    image = { kind: 'image', assetId: config.asset_id };
  }

  let band = config.band;
  if (config.terrain !== undefined) {
    image = { kind: 'terrain', source: image, band: config.band, derivation: config.terrain };
    band = config.terrain;
  }

  return {
    image,
    band,
    geometry,
    scale: config.scale,
    reducer: config.reducer,
  };
}

export const rasterStrategy: ExtractionStrategy<RasterDatasetConfig> = {
  async extract(geometry, config, context) {
    const request = buildRasterRequest(geometry, config, context);
    const value = await context.queryService.reduceRasterRegion(request).resolve();
    return applyRasterTransforms(value, config);
  },
};

// ============================================================================
// Vector
// ============================================================================

/**
 * Raw value of the configured field on the first feature intersecting the geometry
 */
export async function readVectorField(
  geometry: Geometry,
  config: VectorDatasetConfig,
  queryService: GeospatialQueryService
): Promise<FeatureFieldValue> {
  const feature = await queryService
    .firstIntersectingFeature({ kind: 'feature-collection', assetId: config.asset_id }, geometry)
    .resolve();

  if (feature === null) {
    return null;
  }
  return queryService.featureField(feature, config.field);
}

function toNumber(value: FeatureFieldValue, config: VectorDatasetConfig): number | null {
  if (value === null) {
    return null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0 && Number.isFinite(Number(value))) {
    return Number(value);
  }
  throw new RemoteQueryError(
    `Field '${config.field}' of ${config.asset_id} is not numeric: ${JSON.stringify(value)}`,
    'malformed',
    'featureField'
  );
}

export const vectorStrategy: ExtractionStrategy<VectorDatasetConfig> = {
  async extract(geometry, config, context) {
    const raw = await readVectorField(geometry, config, context.queryService);
    return applyVectorTransforms(toNumber(raw, config), config);
  },
};

export const DEFAULT_STRATEGIES: StrategyTable = {
  raster: rasterStrategy,
  vector: vectorStrategy,
};

export function runStrategy(
  strategies: StrategyTable,
  geometry: Geometry,
  config: DatasetConfig,
  context: ExtractionContext
): Promise<number | null> {
  switch (config.type) {
    case 'raster':
      return strategies.raster.extract(geometry, config, context);
    case 'vector':
      return strategies.vector.extract(geometry, config, context);
  }
}
