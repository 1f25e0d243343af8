/**
 * Bulk Create Command
 *
 * Build profiles for every farm in a JSON array.
 *
 * Usage:
 *   farm-profiles bulk-create <input.json> [options]
 *
 * Options:
 *   --geometry-field <key>   Key holding each geometry (default: geometry)
 *   --id-field <key>         Key holding each farm id (default: farm_id)
 *   --year <n>               Profile year (default from config)
 *   --max-workers <n>        Concurrent farms (default from config)
 *   --item-timeout <ms>      Fail a farm that takes longer than this
 *   --format <fmt>           Output format: json|ndjson|csv
 *
 * @module cli/commands/bulk-create
 */

import { createLogger } from '../../core/utils/logger.js';
import { EXIT_CODES, type CommandResult } from '../lib/exit-codes.js';
import { readBulkItems } from '../lib/input.js';
import { formatProfiles, type ProfileFormat } from '../lib/output.js';
import type { Runtime } from '../lib/runtime.js';

const log = createLogger('cli');

export interface BulkCreateCommandOptions {
  readonly geometryField?: string;
  readonly idField?: string;
  readonly year?: number;
  readonly maxWorkers?: number;
  readonly itemTimeout?: number;
  readonly format?: ProfileFormat;
}

export async function bulkCreateCommand(
  runtime: Runtime,
  inputPath: string,
  options: BulkCreateCommandOptions = {}
): Promise<CommandResult> {
  const items = await readBulkItems(inputPath);
  const { defaults } = runtime.config;

  const profiles = await runtime.orchestrator.bulkCreate(items, {
    geometryField: options.geometryField,
    idField: options.idField,
    year: options.year ?? defaults.year,
    maxWorkers: options.maxWorkers ?? defaults.maxWorkers,
    itemTimeoutMs: options.itemTimeout ?? defaults.itemTimeoutMs ?? undefined,
    onProgress: (progress) =>
      log.debug('Farm processed', {
        farmId: progress.farmId,
        status: progress.status,
        progress: `${progress.completed}/${progress.total}`,
      }),
  });

  const failed = profiles.some((profile) => profile.status === 'failed');
  return {
    output: formatProfiles(profiles, options.format ?? 'json'),
    exitCode: failed ? EXIT_CODES.PARTIAL_FAILURE : EXIT_CODES.SUCCESS,
  };
}
