/**
 * Farm Profiles Core Types - Barrel Export
 */

export type {
  LatLon,
  PointGeometry,
  MultiPointGeometry,
  PolygonGeometry,
  Geometry,
  GeometryKind,
} from './geometry.js';

export {
  REDUCER_NAMES,
  POST_PROCESS_RULES,
  type DatasetType,
  type ReducerName,
  type PostProcessRule,
  type TerrainDerivation,
  type RasterDatasetConfig,
  type VectorDatasetConfig,
  type DatasetConfig,
} from './dataset.js';

export type {
  RemoteValue,
  DateRange,
  ImageCollectionRef,
  CompositeMethod,
  ImageRef,
  RasterReduceRequest,
  FeatureCollectionRef,
  FeatureFieldValue,
  RemoteFeature,
  CentroidCoordinates,
  GeospatialQueryService,
} from './query-service.js';

export {
  PROFILE_FIELDS,
  TEMPORAL_FIELDS,
  isProfileField,
  type FarmId,
  type TextureClassId,
  type PassThroughValue,
  type PassThroughAttributes,
  type EnvironmentalFields,
  type ProfileField,
  type ProfileStatus,
  type SuccessfulFarmProfile,
  type FailedFarmProfile,
  type FarmProfile,
} from './profile.js';
