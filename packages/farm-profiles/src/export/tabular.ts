/**
 * Tabular export of farm profiles
 *
 * COLUMN ORDER:
 * 1. id, year
 * 2. environmental fields, in data dictionary order
 * 3. pass-through attributes, in first-seen order across all profiles
 * 4. status, error
 *
 * Nested attribute values are written as JSON text. CSV output follows
 * RFC 4180 (CRLF line endings, quotes doubled inside quoted cells).
 */

import { PROFILE_FIELDS, type FarmProfile } from '../core/types/profile.js';

export type CellValue = string | number | boolean | null;

export type ProfileRow = Readonly<Record<string, CellValue>>;

export interface TabularExport {
  readonly columns: readonly string[];
  readonly rows: readonly ProfileRow[];
}

const LEADING_COLUMNS = ['id', 'year'] as const;
const TRAILING_COLUMNS = ['status', 'error'] as const;

function attributeColumns(profiles: readonly FarmProfile[]): string[] {
  const reserved = new Set<string>([...LEADING_COLUMNS, ...PROFILE_FIELDS, ...TRAILING_COLUMNS]);
  const seen = new Set<string>();
  for (const profile of profiles) {
    for (const key of Object.keys(profile.attributes)) {
      if (!reserved.has(key)) seen.add(key);
    }
  }
  return [...seen];
}

function toCell(value: unknown): CellValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return JSON.stringify(value);
}

/**
 * Flatten profiles into rows sharing one column set
 */
export function toRows(profiles: readonly FarmProfile[]): TabularExport {
  const extra = attributeColumns(profiles);
  const columns = [...LEADING_COLUMNS, ...PROFILE_FIELDS, ...extra, ...TRAILING_COLUMNS];

  const rows = profiles.map((profile): ProfileRow => {
    const row: Record<string, CellValue> = {
      id: profile.id,
      year: profile.year,
    };
    for (const field of PROFILE_FIELDS) {
      row[field] = profile[field];
    }
    for (const key of extra) {
      row[key] = toCell(profile.attributes[key]);
    }
    row.status = profile.status;
    row.error = profile.status === 'failed' ? profile.error : null;
    return row;
  });

  return { columns, rows };
}

function escapeCSV(value: CellValue): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Render profiles as CSV with a header row
 */
export function toCSV(profiles: readonly FarmProfile[]): string {
  const { columns, rows } = toRows(profiles);
  const lines = [
    columns.map(escapeCSV).join(','),
    ...rows.map((row) => columns.map((column) => escapeCSV(row[column] ?? null)).join(',')),
  ];
  return `${lines.join('\r\n')}\r\n`;
}
