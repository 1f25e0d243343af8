/**
 * Farm profile record helpers shared by the builder, updater and bulk layer
 */

import {
  COASTAL_MAX_ELEVATION_M,
  COASTAL_MAX_RAINFALL_MM,
  COASTAL_MIN_RAINFALL_MM,
  FIELD_DOMAINS,
} from '../core/constants.js';
import type {
  EnvironmentalFields,
  FailedFarmProfile,
  FarmId,
  FarmProfile,
  PassThroughAttributes,
  PassThroughValue,
  SuccessfulFarmProfile,
} from '../core/types/profile.js';

export const EMPTY_FIELDS: EnvironmentalFields = Object.freeze({
  rainfall_mm: null,
  temperature_celsius: null,
  elevation_m: null,
  slope_degrees: null,
  soil_ph: null,
  soil_texture_id: null,
  area_ha: null,
  latitude: null,
  longitude: null,
  coastal: false,
});

/**
 * Low-lying, wet sites. Unknown inputs mean not coastal.
 */
export function deriveCoastal(elevationM: number | null, rainfallMm: number | null): boolean {
  if (elevationM === null || rainfallMm === null) {
    return false;
  }
  return (
    elevationM < COASTAL_MAX_ELEVATION_M &&
    rainfallMm >= COASTAL_MIN_RAINFALL_MM &&
    rainfallMm <= COASTAL_MAX_RAINFALL_MM
  );
}

/** Environmental fields of a profile, without identity or status */
export function fieldsOf(profile: FarmProfile): EnvironmentalFields {
  return {
    rainfall_mm: profile.rainfall_mm,
    temperature_celsius: profile.temperature_celsius,
    elevation_m: profile.elevation_m,
    slope_degrees: profile.slope_degrees,
    soil_ph: profile.soil_ph,
    soil_texture_id: profile.soil_texture_id,
    area_ha: profile.area_ha,
    latitude: profile.latitude,
    longitude: profile.longitude,
    coastal: profile.coastal,
  };
}

export function successfulProfile(
  id: FarmId,
  year: number,
  fields: EnvironmentalFields,
  attributes: PassThroughAttributes
): SuccessfulFarmProfile {
  return { id, year, ...fields, attributes, status: 'success' };
}

export function failedProfile(
  id: FarmId,
  year: number,
  attributes: PassThroughAttributes,
  error: string,
  fields: EnvironmentalFields = EMPTY_FIELDS
): FailedFarmProfile {
  return { id, year, ...fields, attributes, status: 'failed', error };
}

type DomainField = keyof typeof FIELD_DOMAINS;

const DOMAIN_FIELDS: readonly DomainField[] = [
  'rainfall_mm',
  'temperature_celsius',
  'elevation_m',
  'slope_degrees',
  'soil_ph',
  'area_ha',
  'latitude',
  'longitude',
];

/**
 * Fields whose value falls outside the data dictionary domain
 */
export function findDomainViolations(fields: EnvironmentalFields): string[] {
  const violations: string[] = [];
  for (const name of DOMAIN_FIELDS) {
    const value = fields[name];
    const { min, max } = FIELD_DOMAINS[name];
    if (value !== null && (value < min || value > max)) {
      violations.push(`${name}=${value} outside [${min}, ${max}]`);
    }
  }
  return violations;
}

// ============================================================================
// Pass-through Attributes
// ============================================================================

export function isPassThroughValue(value: unknown): value is PassThroughValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (value === null) return true;
      return Array.isArray(value)
        ? value.every(isPassThroughValue)
        : Object.values(value).every(isPassThroughValue);
    default:
      return false;
  }
}

/**
 * Keep every key except the excluded ones; values that cannot be carried
 * (functions, undefined, non-finite numbers) are reported in `dropped`.
 */
export function collectAttributes(
  source: Readonly<Record<string, unknown>>,
  exclude: readonly string[]
): { attributes: PassThroughAttributes; dropped: string[] } {
  const attributes: Record<string, PassThroughValue> = {};
  const dropped: string[] = [];

  for (const [key, value] of Object.entries(source)) {
    if (exclude.includes(key)) continue;
    if (isPassThroughValue(value)) {
      attributes[key] = value;
    } else {
      dropped.push(key);
    }
  }

  return { attributes, dropped };
}
