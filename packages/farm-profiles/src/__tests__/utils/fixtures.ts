/**
 * Test Fixtures
 *
 * SCOPE: Dataset definitions, raster readings and component stacks shared
 * across unit tests.
 *
 * TYPE SAFETY: Built through the same constructors production code uses.
 */

import type { FarmProfile } from '../../core/types/profile.js';
import { Logger } from '../../core/utils/logger.js';
import { ExtractionEngine } from '../../extraction/extraction-engine.js';
import { DatasetRegistry, type DatasetDefinitions } from '../../registry/dataset-registry.js';
import { TextureMap } from '../../registry/texture-map.js';
import { BulkOrchestrator } from '../../services/bulk-orchestrator.js';
import { FarmProfileBuilder } from '../../services/farm-profile-builder.js';
import { FarmProfileUpdater } from '../../services/farm-profile-updater.js';
import { FakeQueryService, type FakeQueryServiceOptions } from './fake-query-service.js';

// ============================================================================
// Datasets
// ============================================================================

export const ASSETS = {
  rainfall: 'test/rainfall',
  temperature: 'test/lst',
  dem: 'test/dem',
  soilPh: 'test/soil-ph',
  soilTexture: 'test/soil-texture',
} as const;

/**
 * Same shape and transforms as config/datasets.yaml, with short asset ids
 */
export const TEST_DATASETS: DatasetDefinitions = {
  rainfall: {
    type: 'raster',
    asset_id: ASSETS.rainfall,
    band: 'precipitation',
    scale: 5566,
    reducer: 'sum',
    temporal: true,
    post_process: 'round_int',
  },
  temperature: {
    type: 'raster',
    asset_id: ASSETS.temperature,
    band: 'LST_Day_1km',
    scale: 1000,
    reducer: 'mean',
    temporal: true,
    scale_factor: 0.02,
    offset: -273.15,
    bias_correction: -4.43,
    post_process: 'round_1dp',
  },
  elevation: {
    type: 'raster',
    asset_id: ASSETS.dem,
    band: 'elevation',
    scale: 30,
    reducer: 'mean',
  },
  dem: {
    type: 'raster',
    asset_id: ASSETS.dem,
    band: 'elevation',
    scale: 30,
    reducer: 'mean',
    terrain: 'slope',
  },
  soil_ph: {
    type: 'raster',
    asset_id: ASSETS.soilPh,
    band: 'b0',
    scale: 250,
    reducer: 'mean',
    scale_factor: 0.1,
    post_process: 'round_1dp',
  },
  soil_texture: {
    type: 'vector',
    asset_id: ASSETS.soilTexture,
    field: 'texture',
  },
};

/**
 * Raw readings that produce rainfall 1500, temperature 22, elevation 50,
 * slope 3.1 and pH 6.5
 */
export const RASTER_READINGS: Readonly<Record<string, number | null>> = {
  [`${ASSETS.rainfall}:precipitation`]: 1500.4,
  [`${ASSETS.temperature}:LST_Day_1km`]: 14979,
  [`${ASSETS.dem}:elevation`]: 50.4,
  [`${ASSETS.dem}:slope`]: 3.14,
  [`${ASSETS.soilPh}:b0`]: 65,
};

// ============================================================================
// Geometry
// ============================================================================

/**
 * Axis-aligned square as raw (lat, lon) input, south-west corner first
 */
export function squareRing(lat: number, lon: number, size: number): [number, number][] {
  return [
    [lat, lon],
    [lat, lon + size],
    [lat + size, lon + size],
    [lat + size, lon],
    [lat, lon],
  ];
}

/** GeoJSON polygon covering the same square */
export function squareFeatureGeometry(lat: number, lon: number, size: number): {
  type: 'Polygon';
  coordinates: number[][][];
} {
  return {
    type: 'Polygon',
    coordinates: [squareRing(lat, lon, size).map(([pointLat, pointLon]) => [pointLon, pointLat])],
  };
}

// ============================================================================
// Component Stack
// ============================================================================

/** Logger that drops everything; spy on its methods to assert on logging */
export class SilentLogger extends Logger {
  constructor() {
    super({ level: 'debug', service: 'test', pretty: true });
  }

  debug(): void {
    return undefined;
  }

  info(): void {
    return undefined;
  }

  warn(): void {
    return undefined;
  }

  error(): void {
    return undefined;
  }
}

export interface TestStack {
  readonly service: FakeQueryService;
  readonly logger: SilentLogger;
  readonly engine: ExtractionEngine;
  readonly builder: FarmProfileBuilder;
  readonly updater: FarmProfileUpdater;
  readonly orchestrator: BulkOrchestrator;
}

export function createTestStack(
  options: FakeQueryServiceOptions = { rasterValues: RASTER_READINGS },
  definitions: DatasetDefinitions = TEST_DATASETS
): TestStack {
  const service = new FakeQueryService(options);
  const logger = new SilentLogger();
  const engine = new ExtractionEngine({
    queryService: service,
    datasets: DatasetRegistry.fromDefinitions({ datasets: definitions }),
    textures: new TextureMap(),
    logger,
  });
  const builder = new FarmProfileBuilder({ engine, logger });
  const updater = new FarmProfileUpdater({ engine, builder, logger });
  const orchestrator = new BulkOrchestrator({ builder, updater, logger });
  return { service, logger, engine, builder, updater, orchestrator };
}

// ============================================================================
// Profiles
// ============================================================================

export function sampleProfile(overrides: Partial<Omit<FarmProfile, 'status' | 'error'>> = {}): FarmProfile {
  return {
    id: 'farm-1',
    year: 2023,
    rainfall_mm: 1200,
    temperature_celsius: 20,
    elevation_m: 340,
    slope_degrees: 2.5,
    soil_ph: 6.1,
    soil_texture_id: 4,
    area_ha: 12.5,
    latitude: 10,
    longitude: 20,
    coastal: false,
    attributes: { owner: 'test-owner' },
    ...overrides,
    status: 'success',
  };
}
