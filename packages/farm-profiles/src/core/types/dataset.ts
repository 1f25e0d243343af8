/**
 * Dataset descriptor types
 *
 * A dataset config tells the extraction engine where a variable lives in the
 * remote catalogue and how to turn the reduced value into a schema value.
 * Configs are frozen at registry construction and never mutated.
 */

export type DatasetType = 'raster' | 'vector';

export const REDUCER_NAMES = ['mean', 'sum', 'median', 'min', 'max'] as const;

export type ReducerName = (typeof REDUCER_NAMES)[number];

export const POST_PROCESS_RULES = ['none', 'round_int', 'round_1dp', 'round_2dp', 'round_3dp'] as const;

export type PostProcessRule = (typeof POST_PROCESS_RULES)[number];

/** Terrain derivations the query service can apply to an elevation image */
export type TerrainDerivation = 'slope';

interface DatasetConfigBase {
  readonly name: string;
  readonly asset_id: string;
  readonly description?: string;
  /** Multiplicative transform, applied first */
  readonly scale_factor?: number;
  readonly post_process?: PostProcessRule;
}

export interface RasterDatasetConfig extends DatasetConfigBase {
  readonly type: 'raster';
  readonly band: string;
  /** Spatial resolution of the region reduction, in metres */
  readonly scale: number;
  /**
   * Reducer over the region. Also picks the temporal composite
   * (sum → yearly total, anything else → mean).
   */
  readonly reducer: ReducerName;
  readonly temporal: boolean;
  readonly offset?: number;
  /** Additive correction applied after `offset` */
  readonly bias_correction?: number;
  readonly terrain?: TerrainDerivation;
  /** Pixel values are texture class identifiers rather than measurements */
  readonly categorical?: boolean;
}

export interface VectorDatasetConfig extends DatasetConfigBase {
  readonly type: 'vector';
  readonly field: string;
}

export type DatasetConfig = RasterDatasetConfig | VectorDatasetConfig;
