/**
 * Bulk Orchestrator
 *
 * Builds or updates many farm profiles with bounded concurrency.
 *
 * DESIGN:
 * - Output always has one record per input, in input order
 * - A failing item becomes a `failed` record; siblings are unaffected
 * - Invalid or missing geometry fails only its own item
 * - `itemTimeoutMs` fails a stalled item without cancelling others
 *
 * USAGE:
 * ```typescript
 * const orchestrator = new BulkOrchestrator({ builder, updater });
 * const profiles = await orchestrator.bulkCreate(farms, { year: 2024, maxWorkers: 8 });
 * ```
 */

import { DEFAULT_MAX_WORKERS, DEFAULT_YEAR } from '../core/constants.js';
import { InvalidGeometryError, getErrorMessage } from '../core/errors.js';
import type { FarmId, FarmProfile, PassThroughAttributes } from '../core/types/profile.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type {
  BulkCreateItem,
  BulkCreateOptions,
  BulkProgress,
  BulkUpdateOptions,
  GeometryLookup,
} from './bulk-orchestrator.types.js';
import type { FarmProfileBuilder } from './farm-profile-builder.js';
import type { FarmProfileUpdater } from './farm-profile-updater.js';
import { collectAttributes, failedProfile, fieldsOf } from './profile-records.js';
import { runWorkerPool, type TaskOutcome } from './worker-pool.js';

export interface BulkOrchestratorOptions {
  readonly builder: FarmProfileBuilder;
  readonly updater: FarmProfileUpdater;
  readonly logger?: Logger;
}

interface PreparedCreate {
  readonly farmId: FarmId;
  readonly geometry: unknown;
  readonly attributes: PassThroughAttributes;
}

function isFarmId(value: unknown): value is FarmId {
  return (typeof value === 'string' && value.length > 0) || (typeof value === 'number' && Number.isFinite(value));
}

function isGeometryMap(geometries: GeometryLookup): geometries is ReadonlyMap<FarmId, unknown> {
  return geometries instanceof Map;
}

function lookupGeometry(geometries: GeometryLookup, id: FarmId): unknown {
  if (isGeometryMap(geometries)) {
    return geometries.has(id) ? geometries.get(id) : geometries.get(String(id));
  }
  const key = String(id);
  return Object.prototype.hasOwnProperty.call(geometries, key) ? geometries[key] : undefined;
}

export class BulkOrchestrator {
  private readonly builder: FarmProfileBuilder;
  private readonly updater: FarmProfileUpdater;
  private readonly logger: Logger;

  constructor(options: BulkOrchestratorOptions) {
    this.builder = options.builder;
    this.updater = options.updater;
    this.logger = options.logger ?? createLogger('bulk-orchestrator');
  }

  /**
   * Build one profile per input item
   */
  async bulkCreate(items: readonly BulkCreateItem[], options: BulkCreateOptions = {}): Promise<FarmProfile[]> {
    const geometryField = options.geometryField ?? 'geometry';
    const idField = options.idField ?? 'farm_id';
    const year = options.year ?? DEFAULT_YEAR;

    const prepared = items.map((item, index) => this.prepareCreate(item, index, geometryField, idField));

    this.logger.info('Bulk create started', { items: items.length, year, maxWorkers: this.workers(options) });

    const outcomes = await runWorkerPool(
      prepared,
      (entry) => {
        if (entry.geometry === undefined) {
          throw new InvalidGeometryError(`Item has no '${geometryField}' value`, undefined);
        }
        return this.builder.build(entry.geometry, year, entry.farmId, entry.attributes);
      },
      {
        concurrency: this.workers(options),
        taskTimeoutMs: options.itemTimeoutMs,
        logger: this.logger,
        onSettled: this.progressReporter(prepared.map((entry) => entry.farmId), options.onProgress),
      }
    );

    const profiles = outcomes.map((outcome, index) => {
      const entry = prepared[index];
      return outcome.ok ? outcome.value : failedProfile(entry.farmId, year, entry.attributes, getErrorMessage(outcome.error));
    });

    this.logSummary('Bulk create finished', profiles);
    return profiles;
  }

  /**
   * Update every profile using the geometry stored under its id
   */
  async bulkUpdate(
    profiles: readonly FarmProfile[],
    geometries: GeometryLookup,
    options: BulkUpdateOptions = {}
  ): Promise<FarmProfile[]> {
    const year = options.year ?? DEFAULT_YEAR;
    const fields = options.fields ?? null;

    this.logger.info('Bulk update started', {
      items: profiles.length,
      year,
      fields: fields === null || fields.length === 0 ? 'all' : fields.join(','),
      maxWorkers: this.workers(options),
    });

    const outcomes = await runWorkerPool(
      profiles,
      (existing) => {
        const geometry = lookupGeometry(geometries, existing.id);
        if (geometry === undefined) {
          throw new InvalidGeometryError(`No geometry supplied for farm '${existing.id}'`, undefined);
        }
        return this.updater.update(existing, geometry, fields, year);
      },
      {
        concurrency: this.workers(options),
        taskTimeoutMs: options.itemTimeoutMs,
        logger: this.logger,
        onSettled: this.progressReporter(profiles.map((profile) => profile.id), options.onProgress),
      }
    );

    const updated = outcomes.map((outcome, index) => {
      const existing = profiles[index];
      return outcome.ok
        ? outcome.value
        : failedProfile(existing.id, year, existing.attributes, getErrorMessage(outcome.error), fieldsOf(existing));
    });

    this.logSummary('Bulk update finished', updated);
    return updated;
  }

  private prepareCreate(item: BulkCreateItem, index: number, geometryField: string, idField: string): PreparedCreate {
    const rawId = item[idField];
    const farmId = isFarmId(rawId) ? rawId : index;
    const { attributes, dropped } = collectAttributes(item, [geometryField, idField]);

    if (dropped.length > 0) {
      this.logger.warn('Dropping attributes that cannot be carried through', { farmId, keys: dropped });
    }

    return { farmId, geometry: item[geometryField], attributes };
  }

  private workers(options: { readonly maxWorkers?: number }): number {
    return options.maxWorkers ?? DEFAULT_MAX_WORKERS;
  }

  private progressReporter(
    ids: readonly FarmId[],
    onProgress: ((progress: BulkProgress) => void) | undefined
  ): ((index: number, outcome: TaskOutcome<FarmProfile>) => void) | undefined {
    if (onProgress === undefined) {
      return undefined;
    }

    let completed = 0;
    return (index, outcome) => {
      completed++;
      onProgress({
        index,
        farmId: ids[index],
        status: outcome.ok ? outcome.value.status : 'failed',
        completed,
        total: ids.length,
      });
    };
  }

  private logSummary(message: string, profiles: readonly FarmProfile[]): void {
    const failed = profiles.filter((profile) => profile.status === 'failed').length;
    this.logger.info(message, { total: profiles.length, succeeded: profiles.length - failed, failed });
  }
}
