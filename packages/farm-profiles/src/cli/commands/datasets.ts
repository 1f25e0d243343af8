/**
 * Datasets Command
 *
 * List the configured datasets.
 *
 * Usage:
 *   farm-profiles datasets [--format table|json]
 *
 * @module cli/commands/datasets
 */

import type { DatasetConfig } from '../../core/types/dataset.js';
import type { DatasetRegistry } from '../../registry/dataset-registry.js';
import { EXIT_CODES, type CommandResult } from '../lib/exit-codes.js';
import { formatJson, formatTable, type ListFormat, type TableColumn } from '../lib/output.js';

export interface DatasetsOptions {
  readonly format?: ListFormat;
}

const DATASET_COLUMNS: readonly TableColumn<DatasetConfig>[] = [
  { header: 'Name', value: (config) => config.name },
  { header: 'Type', value: (config) => config.type },
  { header: 'Asset', value: (config) => config.asset_id },
  {
    header: 'Band/Field',
    value: (config) => (config.type === 'raster' ? config.band : config.field),
  },
  {
    header: 'Reducer',
    value: (config) => (config.type === 'raster' ? config.reducer : '-'),
  },
  {
    header: 'Temporal',
    value: (config) => (config.type === 'raster' && config.temporal ? 'yes' : 'no'),
  },
];

export function datasetsCommand(datasets: DatasetRegistry, options: DatasetsOptions = {}): CommandResult {
  const configs = datasets.list().map((name) => datasets.get(name));
  const output =
    (options.format ?? 'table') === 'json' ? formatJson(configs) : formatTable(configs, DATASET_COLUMNS);
  return { output, exitCode: EXIT_CODES.SUCCESS };
}
