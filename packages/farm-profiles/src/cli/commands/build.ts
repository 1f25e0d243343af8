/**
 * Build Command
 *
 * Build a single farm profile.
 *
 * Usage:
 *   farm-profiles build --lat <n> --lon <n> [options]
 *   farm-profiles build --geometry '<json>' [options]
 *
 * Options:
 *   --id <id>          Farm identifier (default: farm)
 *   --year <n>         Profile year (default from config)
 *   --format <fmt>     Output format: json|ndjson|csv
 *
 * @module cli/commands/build
 */

import { InvalidGeometryError } from '../../core/errors.js';
import { EXIT_CODES, type CommandResult } from '../lib/exit-codes.js';
import { parseGeometryArgument } from '../lib/input.js';
import { formatProfiles, type ProfileFormat } from '../lib/output.js';
import type { Runtime } from '../lib/runtime.js';

export interface BuildOptions {
  readonly lat?: number;
  readonly lon?: number;
  readonly geometry?: string;
  readonly id?: string;
  readonly year?: number;
  readonly format?: ProfileFormat;
}

function geometryFrom(options: BuildOptions): unknown {
  if (options.geometry !== undefined) {
    return parseGeometryArgument(options.geometry);
  }
  if (options.lat !== undefined && options.lon !== undefined) {
    return [options.lat, options.lon];
  }
  throw new InvalidGeometryError('Provide --geometry, or both --lat and --lon', null);
}

export async function buildCommand(runtime: Runtime, options: BuildOptions): Promise<CommandResult> {
  const profile = await runtime.builder.build(
    geometryFrom(options),
    options.year ?? runtime.config.defaults.year,
    options.id ?? 'farm'
  );

  return {
    output: formatProfiles([profile], options.format ?? 'json'),
    exitCode: profile.status === 'success' ? EXIT_CODES.SUCCESS : EXIT_CODES.PARTIAL_FAILURE,
  };
}
