/**
 * Shared constants for farm profile extraction
 */

/** Year used by the temporal wrappers when the caller supplies none */
export const DEFAULT_YEAR = 2024;

export const DEFAULT_MAX_WORKERS = 4;

/** Square metres per hectare */
export const SQUARE_METRES_PER_HECTARE = 10_000;

/** Maximum pixels a single region reduction may touch */
export const MAX_PIXELS = 1e9;

// ============================================================================
// Coastal Derivation
// ============================================================================

export const COASTAL_MAX_ELEVATION_M = 100;
export const COASTAL_MIN_RAINFALL_MM = 500;
export const COASTAL_MAX_RAINFALL_MM = 3000;

// ============================================================================
// Data Dictionary Domains
// ============================================================================

export interface FieldDomain {
  readonly min: number;
  readonly max: number;
}

export const FIELD_DOMAINS = {
  rainfall_mm: { min: 1000, max: 3000 },
  temperature_celsius: { min: 15, max: 30 },
  elevation_m: { min: 0, max: 2963 },
  slope_degrees: { min: 0, max: 90 },
  soil_ph: { min: 4.0, max: 8.5 },
  area_ha: { min: 0, max: 100 },
  latitude: { min: -90, max: 90 },
  longitude: { min: -180, max: 180 },
} as const satisfies Record<string, FieldDomain>;
