/**
 * Bulk Update Command
 *
 * Refresh existing profiles for a new year.
 *
 * Usage:
 *   farm-profiles bulk-update <profiles.json> <geometries.json> [options]
 *
 * `geometries.json` maps each farm id to its geometry.
 *
 * Options:
 *   --fields <list>          Comma-separated fields to refresh (default: all)
 *   --year <n>               New profile year (default from config)
 *   --max-workers <n>        Concurrent farms (default from config)
 *   --item-timeout <ms>      Fail a farm that takes longer than this
 *   --format <fmt>           Output format: json|ndjson|csv
 *
 * @module cli/commands/bulk-update
 */

import { createLogger } from '../../core/utils/logger.js';
import { EXIT_CODES, type CommandResult } from '../lib/exit-codes.js';
import { readGeometryMap, readProfiles } from '../lib/input.js';
import { formatProfiles, type ProfileFormat } from '../lib/output.js';
import type { Runtime } from '../lib/runtime.js';

const log = createLogger('cli');

export interface BulkUpdateCommandOptions {
  readonly fields?: string;
  readonly year?: number;
  readonly maxWorkers?: number;
  readonly itemTimeout?: number;
  readonly format?: ProfileFormat;
}

/** "rainfall_mm, temperature_celsius" → ['rainfall_mm', 'temperature_celsius'] */
export function parseFieldList(value: string | undefined): string[] | null {
  if (value === undefined) return null;
  const fields = value
    .split(',')
    .map((field) => field.trim())
    .filter((field) => field.length > 0);
  return fields.length > 0 ? fields : null;
}

export async function bulkUpdateCommand(
  runtime: Runtime,
  profilesPath: string,
  geometriesPath: string,
  options: BulkUpdateCommandOptions = {}
): Promise<CommandResult> {
  const profiles = await readProfiles(profilesPath);
  const geometries = await readGeometryMap(geometriesPath);
  const { defaults } = runtime.config;

  const updated = await runtime.orchestrator.bulkUpdate(profiles, geometries, {
    fields: parseFieldList(options.fields),
    year: options.year ?? defaults.year,
    maxWorkers: options.maxWorkers ?? defaults.maxWorkers,
    itemTimeoutMs: options.itemTimeout ?? defaults.itemTimeoutMs ?? undefined,
    onProgress: (progress) =>
      log.debug('Farm updated', {
        farmId: progress.farmId,
        status: progress.status,
        progress: `${progress.completed}/${progress.total}`,
      }),
  });

  const failed = updated.some((profile) => profile.status === 'failed');
  return {
    output: formatProfiles(updated, options.format ?? 'json'),
    exitCode: failed ? EXIT_CODES.PARTIAL_FAILURE : EXIT_CODES.SUCCESS,
  };
}
