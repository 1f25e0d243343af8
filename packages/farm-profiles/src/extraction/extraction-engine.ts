/**
 * Extraction Engine
 *
 * Turns a dataset name + geometry into a schema-compliant scalar. Generic
 * raster/vector extraction is driven entirely by the dataset registry; the
 * typed wrappers fix each profile attribute's final precision and type.
 *
 * SCHEMA (data dictionary):
 * - getRainfall()    → integer mm
 * - getTemperature() → integer °C
 * - getElevation()   → integer m
 * - getSoilPh()      → 1 decimal
 * - getSlope()       → 1 decimal degrees
 * - getAreaHa()      → 3 decimals ha
 * - getCentroid()    → 6 decimals lat/lon
 * - getTextureId()   → texture class 1–12
 *
 * FAILURE POLICY:
 * - Invalid geometry and unknown datasets throw
 * - RemoteQueryError during dataset extraction degrades to null (logged)
 * - Area and centroid failures propagate
 */

import { DEFAULT_YEAR, SQUARE_METRES_PER_HECTARE } from '../core/constants.js';
import { DatasetConfigError, RemoteQueryError } from '../core/errors.js';
import type { DatasetConfig, RasterDatasetConfig, VectorDatasetConfig } from '../core/types/dataset.js';
import type { Geometry } from '../core/types/geometry.js';
import type { TextureClassId } from '../core/types/profile.js';
import type { FeatureFieldValue, GeospatialQueryService } from '../core/types/query-service.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { parseGeometry } from '../geometry/geometry-parser.js';
import type { DatasetRegistry } from '../registry/dataset-registry.js';
import type { TextureMap } from '../registry/texture-map.js';
import { DEFAULT_STRATEGIES, readVectorField, runStrategy, type StrategyTable } from './strategies.js';
import { roundTo } from './transforms.js';

/** Registry names the typed wrappers read */
export const DATASET_NAMES = {
  rainfall: 'rainfall',
  temperature: 'temperature',
  elevation: 'elevation',
  slope: 'dem',
  soilPh: 'soil_ph',
  soilTexture: 'soil_texture',
} as const;

export interface Centroid {
  readonly latitude: number;
  readonly longitude: number;
}

export interface ExtractionEngineOptions {
  readonly queryService: GeospatialQueryService;
  readonly datasets: DatasetRegistry;
  readonly textures: TextureMap;
  /** Year for temporal wrappers called without one (default: 2024) */
  readonly defaultYear?: number;
  readonly strategies?: StrategyTable;
  readonly logger?: Logger;
}

function roundOrNull(value: number | null, decimals: number): number | null {
  return value === null ? null : roundTo(value, decimals);
}

export class ExtractionEngine {
  private readonly queryService: GeospatialQueryService;
  private readonly datasets: DatasetRegistry;
  private readonly textures: TextureMap;
  private readonly strategies: StrategyTable;
  private readonly logger: Logger;
  readonly defaultYear: number;

  constructor(options: ExtractionEngineOptions) {
    this.queryService = options.queryService;
    this.datasets = options.datasets;
    this.textures = options.textures;
    this.strategies = options.strategies ?? DEFAULT_STRATEGIES;
    this.logger = options.logger ?? createLogger('extraction');
    this.defaultYear = options.defaultYear ?? DEFAULT_YEAR;
  }

  // ==========================================================================
  // Generic Extraction
  // ==========================================================================

  /**
   * Extract any configured dataset, dispatching on its type
   */
  async extract(geometry: unknown, datasetName: string, year: number | null = null): Promise<number | null> {
    const config = this.datasets.get(datasetName);
    return this.run(parseGeometry(geometry), config, year);
  }

  async extractRaster(geometry: unknown, datasetName: string, year: number | null = null): Promise<number | null> {
    const config = this.rasterConfig(datasetName);
    return this.run(parseGeometry(geometry), config, year);
  }

  async extractVector(geometry: unknown, datasetName: string): Promise<number | null> {
    const config = this.vectorConfig(datasetName);
    return this.run(parseGeometry(geometry), config, null);
  }

  private async run(geometry: Geometry, config: DatasetConfig, year: number | null): Promise<number | null> {
    try {
      return await runStrategy(this.strategies, geometry, config, {
        queryService: this.queryService,
        year,
      });
    } catch (error) {
      if (error instanceof RemoteQueryError) {
        this.logger.warn('Remote query failed, treating value as unavailable', {
          dataset: config.name,
          reason: error.reason,
          error: error.message,
        });
        return null;
      }
      throw error;
    }
  }

  private rasterConfig(name: string): RasterDatasetConfig {
    const config = this.datasets.get(name);
    if (config.type !== 'raster') {
      throw new DatasetConfigError(`Dataset '${name}' is ${config.type}, expected raster`);
    }
    return config;
  }

  private vectorConfig(name: string): VectorDatasetConfig {
    const config = this.datasets.get(name);
    if (config.type !== 'vector') {
      throw new DatasetConfigError(`Dataset '${name}' is ${config.type}, expected vector`);
    }
    return config;
  }

  // ==========================================================================
  // Typed Wrappers
  // ==========================================================================

  /** Annual rainfall (mm), integer */
  async getRainfall(geometry: unknown, year?: number | null): Promise<number | null> {
    const value = await this.extractRaster(geometry, DATASET_NAMES.rainfall, year ?? this.defaultYear);
    return roundOrNull(value, 0);
  }

  /** Mean annual temperature (°C), integer */
  async getTemperature(geometry: unknown, year?: number | null): Promise<number | null> {
    const value = await this.extractRaster(geometry, DATASET_NAMES.temperature, year ?? this.defaultYear);
    return roundOrNull(value, 0);
  }

  /** Mean elevation (m), integer */
  async getElevation(geometry: unknown): Promise<number | null> {
    return roundOrNull(await this.extractRaster(geometry, DATASET_NAMES.elevation), 0);
  }

  /** Soil pH, 1 decimal. Low-confidence source. */
  async getSoilPh(geometry: unknown): Promise<number | null> {
    return roundOrNull(await this.extractRaster(geometry, DATASET_NAMES.soilPh), 1);
  }

  /** Mean terrain slope (degrees) derived from the DEM, 1 decimal */
  async getSlope(geometry: unknown): Promise<number | null> {
    return roundOrNull(await this.extractRaster(geometry, DATASET_NAMES.slope), 1);
  }

  // ==========================================================================
  // Soil Texture
  // ==========================================================================

  /**
   * Raw soil texture reading: a label from a vector source, or a number from
   * a raster source.
   *
   * Vector lookups whose remote query fails are logged and reported as null,
   * since a missing texture asset and an unreachable service look the same
   * to callers. Other errors propagate.
   */
  async getTexture(geometry: unknown, year: number | null = null): Promise<FeatureFieldValue> {
    const config = this.datasets.get(DATASET_NAMES.soilTexture);
    if (config.type === 'raster') {
      return this.extractRaster(geometry, config.name, year);
    }

    const parsed = parseGeometry(geometry);
    try {
      return await readVectorField(parsed, config, this.queryService);
    } catch (error) {
      if (!(error instanceof RemoteQueryError)) {
        throw error;
      }
      this.logger.warn('Could not extract soil texture', {
        dataset: config.name,
        reason: error.reason,
        error: error.message,
      });
      return null;
    }
  }

  /**
   * Texture class id (1–12), or null when there is no classification
   */
  async getTextureId(geometry: unknown, year: number | null = null): Promise<TextureClassId | null> {
    const config = this.datasets.get(DATASET_NAMES.soilTexture);
    const reading = await this.getTexture(geometry, year);

    if (reading === null || typeof reading === 'boolean') {
      return null;
    }

    if (typeof reading === 'number') {
      // Only categorical rasters carry class ids; measurements have no class
      if (config.type === 'raster' && config.categorical === true && this.textures.isClassId(reading)) {
        return reading;
      }
      this.logger.debug('Numeric texture reading has no class mapping', {
        dataset: config.name,
        value: reading,
      });
      return null;
    }

    return this.textures.lookup(reading);
  }

  // ==========================================================================
  // Geometric Attributes
  // ==========================================================================

  /** Geometry area in hectares, 3 decimals */
  async getAreaHa(geometry: unknown): Promise<number | null> {
    const squareMetres = await this.queryService.geometryArea(parseGeometry(geometry)).resolve();
    return squareMetres === null ? null : roundTo(squareMetres / SQUARE_METRES_PER_HECTARE, 3);
  }

  /** Geometry centroid, 6 decimals */
  async getCentroid(geometry: unknown): Promise<Centroid | null> {
    const coordinates = await this.queryService.geometryCentroid(parseGeometry(geometry)).resolve();
    if (coordinates === null) {
      return null;
    }

    const [longitude, latitude] = coordinates;
    return { latitude: roundTo(latitude, 6), longitude: roundTo(longitude, 6) };
  }
}
