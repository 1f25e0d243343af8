/**
 * Farm Profile Updater
 *
 * Refreshes an existing profile, either selectively or in full.
 *
 * SELECTIVE (`fields` non-empty): only temporal fields (rainfall_mm,
 * temperature_celsius) are recomputed for the new year. Year-invariant fields
 * named in `fields` are left as they are. `coastal` follows its inputs.
 *
 * FULL (`fields` null/undefined/empty): every field is recomputed.
 *
 * `id` and pass-through attributes are always carried over; `year` is always
 * the year passed in. A failed recomputation keeps the previous values.
 */

import { getErrorMessage } from '../core/errors.js';
import type { Geometry } from '../core/types/geometry.js';
import {
  TEMPORAL_FIELDS,
  isProfileField,
  type EnvironmentalFields,
  type FarmProfile,
  type ProfileField,
} from '../core/types/profile.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { ExtractionEngine } from '../extraction/extraction-engine.js';
import { parseGeometry } from '../geometry/geometry-parser.js';
import type { FarmProfileBuilder } from './farm-profile-builder.js';
import { deriveCoastal, failedProfile, fieldsOf, successfulProfile } from './profile-records.js';

type TemporalField = 'rainfall_mm' | 'temperature_celsius';

type TemporalExtractor = (engine: ExtractionEngine, geometry: Geometry, year: number) => Promise<number | null>;

const TEMPORAL_EXTRACTORS: Record<TemporalField, TemporalExtractor> = {
  rainfall_mm: (engine, geometry, year) => engine.getRainfall(geometry, year),
  temperature_celsius: (engine, geometry, year) => engine.getTemperature(geometry, year),
};

function isTemporalField(field: ProfileField): field is TemporalField {
  return TEMPORAL_FIELDS.includes(field);
}

export interface FarmProfileUpdaterOptions {
  readonly engine: ExtractionEngine;
  readonly builder: FarmProfileBuilder;
  readonly logger?: Logger;
}

export class FarmProfileUpdater {
  private readonly engine: ExtractionEngine;
  private readonly builder: FarmProfileBuilder;
  private readonly logger: Logger;

  constructor(options: FarmProfileUpdaterOptions) {
    this.engine = options.engine;
    this.builder = options.builder;
    this.logger = options.logger ?? createLogger('profile-updater');
  }

  /**
   * @throws {InvalidGeometryError} If the geometry cannot be parsed
   */
  async update(
    existing: FarmProfile,
    geometry: unknown,
    fields: readonly string[] | null | undefined,
    year: number
  ): Promise<FarmProfile> {
    const parsed = parseGeometry(geometry);
    const selection = fields === null || fields === undefined || fields.length === 0 ? null : fields;
    const full = selection === null;

    try {
      const refreshed =
        selection === null
          ? await this.builder.computeFields(parsed, year)
          : await this.recomputeTemporal(existing, parsed, this.temporalFieldsIn(selection), year);

      this.builder.reportDomainViolations(existing.id, refreshed);
      return successfulProfile(existing.id, year, refreshed, existing.attributes);
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.error('Profile update failed', { farmId: existing.id, year, full, error: message });
      return failedProfile(existing.id, year, existing.attributes, message, fieldsOf(existing));
    }
  }

  private temporalFieldsIn(fields: readonly string[]): TemporalField[] {
    const selected: TemporalField[] = [];
    for (const name of fields) {
      if (!isProfileField(name)) {
        this.logger.warn('Ignoring unknown profile field', { field: name });
      } else if (!isTemporalField(name)) {
        this.logger.debug('Skipping year-invariant field', { field: name });
      } else if (!selected.includes(name)) {
        selected.push(name);
      }
    }
    return selected;
  }

  private async recomputeTemporal(
    existing: FarmProfile,
    geometry: Geometry,
    selected: readonly TemporalField[],
    year: number
  ): Promise<EnvironmentalFields> {
    const current = fieldsOf(existing);
    const changes: Partial<Record<TemporalField, number | null>> = {};

    for (const field of selected) {
      changes[field] = await TEMPORAL_EXTRACTORS[field](this.engine, geometry, year);
    }

    const merged: EnvironmentalFields = { ...current, ...changes };
    if (selected.includes('rainfall_mm')) {
      return { ...merged, coastal: deriveCoastal(merged.elevation_m, merged.rainfall_mm) };
    }
    return merged;
  }
}
