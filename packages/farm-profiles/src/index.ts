/**
 * Farm Profiles - Environmental profiles for farm geometries
 *
 * farm-profiles provides:
 * - Geometry parsing into a canonical point/multipoint/polygon form
 * - A declarative dataset registry (YAML) for raster and vector sources
 * - Registry-driven extraction through a geospatial query service
 * - Profile building, selective/full updates, and bounded bulk runs
 * - Tabular (CSV) export
 *
 * @packageDocumentation
 */

// Types
export * from './core/types/index.js';

// Errors
export {
  DatasetConfigError,
  InvalidGeometryError,
  ItemTimeoutError,
  RemoteQueryError,
  UnknownDatasetError,
  getErrorMessage,
  type RemoteQueryFailureReason,
} from './core/errors.js';

// Constants
export {
  COASTAL_MAX_ELEVATION_M,
  COASTAL_MAX_RAINFALL_MM,
  COASTAL_MIN_RAINFALL_MM,
  DEFAULT_MAX_WORKERS,
  DEFAULT_YEAR,
  FIELD_DOMAINS,
  type FieldDomain,
} from './core/constants.js';

// Logging
export { Logger, createLogger, logger, type LogLevel, type LogMetadata } from './core/utils/logger.js';

// Geometry
export {
  parseGeometry,
  parseMultiPoint,
  parsePoint,
  parsePolygon,
  geometryCenter,
  toGeoJSON,
} from './geometry/geometry-parser.js';

// Registry
export {
  DEFAULT_DATASETS_PATH,
  DatasetRegistry,
  loadDatasetRegistry,
  loadDefaultDatasetRegistry,
  type DatasetDefinitions,
} from './registry/dataset-registry.js';
export { TextureMap, normalizeTextureName } from './registry/texture-map.js';

// Extraction
export {
  DATASET_NAMES,
  ExtractionEngine,
  type Centroid,
  type ExtractionEngineOptions,
} from './extraction/extraction-engine.js';
export {
  DEFAULT_STRATEGIES,
  buildRasterRequest,
  type ExtractionContext,
  type ExtractionStrategy,
  type StrategyTable,
} from './extraction/strategies.js';
export { roundTo } from './extraction/transforms.js';

// Query services
export {
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
  type HTTPClientConfig,
} from './core/http-client.js';
export { HttpQueryService, type HttpQueryServiceOptions } from './query/http-query-service.js';
export { lazyRemoteValue, resolvedRemoteValue } from './query/remote-value.js';

// Services
export { FarmProfileBuilder, type FarmProfileBuilderOptions } from './services/farm-profile-builder.js';
export { FarmProfileUpdater, type FarmProfileUpdaterOptions } from './services/farm-profile-updater.js';
export { BulkOrchestrator, type BulkOrchestratorOptions } from './services/bulk-orchestrator.js';
export type {
  BulkCreateItem,
  BulkCreateOptions,
  BulkProgress,
  BulkUpdateOptions,
  GeometryLookup,
} from './services/bulk-orchestrator.types.js';
export { runWorkerPool, type TaskOutcome, type WorkerPoolOptions } from './services/worker-pool.js';
export { deriveCoastal, findDomainViolations } from './services/profile-records.js';

// Export
export { toCSV, toRows, type CellValue, type ProfileRow, type TabularExport } from './export/tabular.js';
