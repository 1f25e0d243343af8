/**
 * Output Formatting for CLI Commands
 *
 * Profiles render as json, ndjson or csv; the dataset listing additionally
 * renders as an aligned table.
 *
 * @module cli/lib/output
 */

import type { FarmProfile } from '../../core/types/profile.js';
import { toCSV } from '../../export/tabular.js';

export type ProfileFormat = 'json' | 'ndjson' | 'csv';

export type ListFormat = 'table' | 'json';

export const PROFILE_FORMATS: readonly ProfileFormat[] = ['json', 'ndjson', 'csv'];

export const LIST_FORMATS: readonly ListFormat[] = ['table', 'json'];

/**
 * Column definition for table output
 */
export interface TableColumn<T> {
  readonly header: string;
  readonly value: (row: T) => string;
  readonly align?: 'left' | 'right';
}

/**
 * Format rows as a table sized to its widest cells
 */
export function formatTable<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (rows.length === 0) {
    return 'No entries found.';
  }

  const cells = rows.map((row) => columns.map((col) => col.value(row)));
  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...cells.map((rowCells) => (rowCells[i] ?? '').length))
  );

  const pad = (value: string, i: number): string => {
    const width = widths[i] ?? value.length;
    return columns[i]?.align === 'right' ? value.padStart(width) : value.padEnd(width);
  };

  const headerRow = columns.map((col, i) => pad(col.header, i)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = cells.map((rowCells) => rowCells.map(pad).join(' | ').trimEnd());

  return [headerRow.trimEnd(), separator, ...dataRows].join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function formatNdjson<T>(data: readonly T[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

export function formatProfiles(profiles: readonly FarmProfile[], format: ProfileFormat): string {
  switch (format) {
    case 'json':
      return formatJson(profiles);
    case 'ndjson':
      return formatNdjson(profiles);
    case 'csv':
      return toCSV(profiles).trimEnd();
  }
}

/**
 * Print command output to stdout
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}
