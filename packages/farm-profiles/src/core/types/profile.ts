/**
 * Farm profile record types
 *
 * Field names follow the data dictionary (snake_case columns) so records can
 * be exported row-for-row without renaming.
 */

export type FarmId = string | number;

export type TextureClassId = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12;

/** Caller-supplied values carried through builds and updates untouched */
export type PassThroughValue =
  | string
  | number
  | boolean
  | null
  | readonly PassThroughValue[]
  | { readonly [key: string]: PassThroughValue };

export type PassThroughAttributes = Readonly<Record<string, PassThroughValue>>;

export interface EnvironmentalFields {
  /** Integer, mm, domain [1000, 3000] */
  readonly rainfall_mm: number | null;
  /** Integer, °C, domain [15, 30] */
  readonly temperature_celsius: number | null;
  /** Integer, m, domain [0, 2963] */
  readonly elevation_m: number | null;
  /** 1 decimal, degrees, domain [0, 90] */
  readonly slope_degrees: number | null;
  /** 1 decimal, domain [4.0, 8.5]; low-confidence source */
  readonly soil_ph: number | null;
  readonly soil_texture_id: TextureClassId | null;
  /** 3 decimals, ha, domain [0, 100] */
  readonly area_ha: number | null;
  /** 6 decimals */
  readonly latitude: number | null;
  /** 6 decimals */
  readonly longitude: number | null;
  readonly coastal: boolean;
}

export type ProfileField = keyof EnvironmentalFields;

export const PROFILE_FIELDS: readonly ProfileField[] = [
  'rainfall_mm',
  'temperature_celsius',
  'elevation_m',
  'slope_degrees',
  'soil_ph',
  'soil_texture_id',
  'area_ha',
  'latitude',
  'longitude',
  'coastal',
];

/** Fields that depend on the profile year */
export const TEMPORAL_FIELDS: readonly ProfileField[] = ['rainfall_mm', 'temperature_celsius'];

export type ProfileStatus = 'success' | 'failed';

interface FarmProfileBase extends EnvironmentalFields {
  readonly id: FarmId;
  readonly year: number;
  readonly attributes: PassThroughAttributes;
}

export interface SuccessfulFarmProfile extends FarmProfileBase {
  readonly status: 'success';
}

export interface FailedFarmProfile extends FarmProfileBase {
  readonly status: 'failed';
  readonly error: string;
}

export type FarmProfile = SuccessfulFarmProfile | FailedFarmProfile;

export function isProfileField(name: string): name is ProfileField {
  return PROFILE_FIELDS.some((field) => field === name);
}
