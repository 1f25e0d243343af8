/**
 * Dataset Registry
 *
 * Read-only table of dataset descriptors, keyed by dataset name. Loaded once
 * at startup (from YAML) and passed to the components that need it.
 *
 * FILE FORMAT:
 * ```yaml
 * version: 1
 * datasets:
 *   rainfall:
 *     type: raster
 *     asset_id: UCSB-CHG/CHIRPS/DAILY
 *     band: precipitation
 *     scale: 5566
 *     reducer: sum
 *     temporal: true
 * ```
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DatasetConfigError, UnknownDatasetError } from '../core/errors.js';
import { POST_PROCESS_RULES, REDUCER_NAMES, type DatasetConfig } from '../core/types/dataset.js';
import { logger } from '../core/utils/logger.js';

// ============================================================================
// Schemas
// ============================================================================

const ReducerSchema = z.enum(REDUCER_NAMES);

const PostProcessSchema = z.enum(POST_PROCESS_RULES);

const RasterEntrySchema = z
  .object({
    type: z.literal('raster'),
    asset_id: z.string().min(1),
    band: z.string().min(1),
    scale: z.number().positive(),
    reducer: ReducerSchema.default('mean'),
    temporal: z.boolean().default(false),
    scale_factor: z.number().finite().optional(),
    offset: z.number().finite().optional(),
    bias_correction: z.number().finite().optional(),
    post_process: PostProcessSchema.optional(),
    terrain: z.literal('slope').optional(),
    categorical: z.boolean().optional(),
    description: z.string().optional(),
  })
  .strict();

const VectorEntrySchema = z
  .object({
    type: z.literal('vector'),
    asset_id: z.string().min(1),
    field: z.string().min(1),
    scale_factor: z.number().finite().optional(),
    post_process: PostProcessSchema.optional(),
    description: z.string().optional(),
  })
  .strict();

const DatasetEntrySchema = z.discriminatedUnion('type', [RasterEntrySchema, VectorEntrySchema]);

const DatasetFileSchema = z.object({
  version: z.literal(1).optional(),
  datasets: z.record(z.string().min(1), DatasetEntrySchema),
});

export type DatasetDefinitions = z.input<typeof DatasetFileSchema>['datasets'];

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

// ============================================================================
// Registry
// ============================================================================

export class DatasetRegistry {
  private readonly configs: ReadonlyMap<string, DatasetConfig>;

  constructor(configs: Iterable<DatasetConfig>) {
    const byName = new Map<string, DatasetConfig>();
    for (const config of configs) {
      if (byName.has(config.name)) {
        throw new DatasetConfigError(`Duplicate dataset '${config.name}'`);
      }
      byName.set(config.name, Object.freeze({ ...config }));
    }
    this.configs = byName;
  }

  /**
   * Validate raw definitions (as parsed from YAML/JSON) and build a registry
   *
   * @throws {DatasetConfigError} If any entry is missing required fields
   */
  static fromDefinitions(raw: unknown): DatasetRegistry {
    const parsed = DatasetFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DatasetConfigError('Invalid dataset configuration', formatIssues(parsed.error));
    }

    return new DatasetRegistry(
      Object.entries(parsed.data.datasets).map(([name, entry]) => ({ ...entry, name }))
    );
  }

  /**
   * @throws {UnknownDatasetError} If the name is not configured
   */
  get(name: string): DatasetConfig {
    const config = this.configs.get(name);
    if (config === undefined) {
      throw new UnknownDatasetError(name, this.list());
    }
    return config;
  }

  has(name: string): boolean {
    return this.configs.has(name);
  }

  /** Dataset names in configuration order */
  list(): readonly string[] {
    return [...this.configs.keys()];
  }
}

// ============================================================================
// Loading
// ============================================================================

export const DEFAULT_DATASETS_PATH = fileURLToPath(
  new URL('../../config/datasets.yaml', import.meta.url)
);

/**
 * Load a registry from a YAML (or JSON) file
 */
export async function loadDatasetRegistry(path: string): Promise<DatasetRegistry> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new DatasetConfigError(
      `Cannot read dataset configuration ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new DatasetConfigError(
      `Cannot parse dataset configuration ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const registry = DatasetRegistry.fromDefinitions(raw);
  logger.debug('Dataset registry loaded', { path, datasets: registry.list() });
  return registry;
}

export function loadDefaultDatasetRegistry(): Promise<DatasetRegistry> {
  return loadDatasetRegistry(DEFAULT_DATASETS_PATH);
}
