/**
 * Soil texture lookup
 *
 * USDA texture classes keyed by normalized class name. Built once and handed
 * to the extraction engine; never queried remotely.
 */

import type { TextureClassId } from '../core/types/profile.js';

const USDA_TEXTURE_CLASSES: readonly (readonly [string, TextureClassId])[] = [
  ['sand', 1],
  ['loamy sand', 2],
  ['sandy loam', 3],
  ['loam', 4],
  ['silt loam', 5],
  ['silt', 6],
  ['sandy clay loam', 7],
  ['clay loam', 8],
  ['silty clay loam', 9],
  ['sandy clay', 10],
  ['silty clay', 11],
  ['clay', 12],
];

/** Tokens that describe a soil but carry no texture class */
const UNCLASSIFIED_TOKENS: ReadonlySet<string> = new Set(['organic', 'variable']);

export class TextureMap {
  private readonly classes: ReadonlyMap<string, TextureClassId>;

  constructor(entries: Iterable<readonly [string, TextureClassId]> = USDA_TEXTURE_CLASSES) {
    this.classes = new Map(entries);
  }

  get(name: string): TextureClassId | null {
    return this.classes.get(name) ?? null;
  }

  /** Class id for a raw source value, after normalization */
  lookup(raw: unknown): TextureClassId | null {
    const name = normalizeTextureName(raw);
    return name === null ? null : this.get(name);
  }

  /** Whether an integer reading is a valid class identifier */
  isClassId(value: number): value is TextureClassId {
    return Number.isInteger(value) && value >= 1 && value <= 12;
  }

  names(): readonly string[] {
    return [...this.classes.keys()];
  }
}

/**
 * Normalize a raw texture label
 *
 * "Clay, Clay Loam" → "clay"; "  Sandy Loam  " → "sandy loam";
 * "Organic" / "Variable" / "" / null → null.
 */
export function normalizeTextureName(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  let text = String(value).trim().toLowerCase();
  if (text.length === 0) {
    return null;
  }

  const comma = text.indexOf(',');
  if (comma !== -1) {
    text = text.slice(0, comma).trim();
  }

  if (text.length === 0 || UNCLASSIFIED_TOKENS.has(text)) {
    return null;
  }

  return text;
}
