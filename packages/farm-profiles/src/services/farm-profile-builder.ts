/**
 * Farm Profile Builder
 *
 * Composes one profile record from independent attribute extractions plus
 * the derived `coastal` flag. Extractions run one after another; only the
 * bulk layer parallelizes, across farms.
 *
 * Geometry errors are caller errors and are thrown. Every other failure is
 * returned as a `failed` record.
 */

import { getErrorMessage } from '../core/errors.js';
import type { Geometry } from '../core/types/geometry.js';
import type {
  EnvironmentalFields,
  FarmId,
  FarmProfile,
  PassThroughAttributes,
} from '../core/types/profile.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { ExtractionEngine } from '../extraction/extraction-engine.js';
import { parseGeometry } from '../geometry/geometry-parser.js';
import {
  deriveCoastal,
  failedProfile,
  findDomainViolations,
  successfulProfile,
} from './profile-records.js';

export interface FarmProfileBuilderOptions {
  readonly engine: ExtractionEngine;
  readonly logger?: Logger;
}

export class FarmProfileBuilder {
  private readonly engine: ExtractionEngine;
  private readonly logger: Logger;

  constructor(options: FarmProfileBuilderOptions) {
    this.engine = options.engine;
    this.logger = options.logger ?? createLogger('profile-builder');
  }

  /**
   * Build a profile for one farm
   *
   * @param attributes - Pass-through values copied onto the record verbatim
   * @throws {InvalidGeometryError} If the geometry cannot be parsed
   */
  async build(
    geometry: unknown,
    year: number,
    farmId: FarmId,
    attributes: PassThroughAttributes = {}
  ): Promise<FarmProfile> {
    const parsed = parseGeometry(geometry);

    try {
      const fields = await this.computeFields(parsed, year);
      this.reportDomainViolations(farmId, fields);
      return successfulProfile(farmId, year, fields, attributes);
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.error('Profile build failed', { farmId, year, error: message });
      return failedProfile(farmId, year, attributes, message);
    }
  }

  /**
   * Every environmental field, freshly extracted
   */
  async computeFields(geometry: Geometry, year: number): Promise<EnvironmentalFields> {
    const rainfall_mm = await this.engine.getRainfall(geometry, year);
    const temperature_celsius = await this.engine.getTemperature(geometry, year);
    const elevation_m = await this.engine.getElevation(geometry);
    const slope_degrees = await this.engine.getSlope(geometry);
    const soil_ph = await this.engine.getSoilPh(geometry);
    const soil_texture_id = await this.engine.getTextureId(geometry);
    const area_ha = await this.engine.getAreaHa(geometry);
    const centroid = await this.engine.getCentroid(geometry);

    return {
      rainfall_mm,
      temperature_celsius,
      elevation_m,
      slope_degrees,
      soil_ph,
      soil_texture_id,
      area_ha,
      latitude: centroid?.latitude ?? null,
      longitude: centroid?.longitude ?? null,
      coastal: deriveCoastal(elevation_m, rainfall_mm),
    };
  }

  reportDomainViolations(farmId: FarmId, fields: EnvironmentalFields): void {
    const violations = findDomainViolations(fields);
    if (violations.length > 0) {
      this.logger.warn('Profile values outside data dictionary domain', { farmId, violations });
    }
  }
}
