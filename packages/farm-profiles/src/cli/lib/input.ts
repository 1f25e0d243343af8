/**
 * Input file loading for bulk commands
 *
 * Files are JSON. Profiles are validated against the record shape the
 * library produces; geometries and bulk items stay `unknown` until the
 * geometry parser sees them.
 *
 * @module cli/lib/input
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { FarmProfile, PassThroughValue, TextureClassId } from '../../core/types/profile.js';
import type { BulkCreateItem } from '../../services/bulk-orchestrator.types.js';
import { isPassThroughValue } from '../../services/profile-records.js';

export class InputFileError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(`${source}: ${message}`);
    this.name = 'InputFileError';
  }
}

function isTextureClassId(value: unknown): value is TextureClassId {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 12;
}

const NullableNumber = z.number().finite().nullable();

const ProfileFieldsShape = {
  id: z.union([z.string().min(1), z.number().finite()]),
  year: z.number().int(),
  rainfall_mm: NullableNumber,
  temperature_celsius: NullableNumber,
  elevation_m: NullableNumber,
  slope_degrees: NullableNumber,
  soil_ph: NullableNumber,
  soil_texture_id: z.custom<TextureClassId>(isTextureClassId).nullable().default(null),
  area_ha: NullableNumber,
  latitude: NullableNumber,
  longitude: NullableNumber,
  coastal: z.boolean(),
  attributes: z.record(z.string(), z.custom<PassThroughValue>(isPassThroughValue)).default({}),
};

const FarmProfileSchema = z.discriminatedUnion('status', [
  z.object({ ...ProfileFieldsShape, status: z.literal('success') }),
  z.object({ ...ProfileFieldsShape, status: z.literal('failed'), error: z.string() }),
]);

const ProfileListSchema = z.array(FarmProfileSchema);

const BulkItemListSchema = z.array(z.record(z.string(), z.unknown()));

const GeometryMapSchema = z.record(z.string(), z.unknown());

export async function readJSONFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InputFileError(`cannot read file (${error instanceof Error ? error.message : String(error)})`, filePath);
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new InputFileError(`invalid JSON (${error instanceof Error ? error.message : String(error)})`, filePath);
  }
}

function validate<S extends z.ZodTypeAny>(schema: S, raw: unknown, filePath: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new InputFileError(issues.join('; '), filePath);
  }
  return parsed.data;
}

/**
 * Bulk creation input: an array of objects, one per farm
 */
export async function readBulkItems(filePath: string): Promise<BulkCreateItem[]> {
  return validate(BulkItemListSchema, await readJSONFile(filePath), filePath);
}

/**
 * Previously exported profiles (the `json` output of build/bulk-create)
 */
export async function readProfiles(filePath: string): Promise<FarmProfile[]> {
  return validate(ProfileListSchema, await readJSONFile(filePath), filePath);
}

/**
 * Geometries keyed by farm id
 */
export async function readGeometryMap(filePath: string): Promise<Record<string, unknown>> {
  return validate(GeometryMapSchema, await readJSONFile(filePath), filePath);
}

/**
 * Geometry given inline on the command line
 */
export function parseGeometryArgument(value: string): unknown {
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch (error) {
    throw new InputFileError(
      `invalid geometry JSON (${error instanceof Error ? error.message : String(error)})`,
      '--geometry'
    );
  }
}
