/**
 * Bulk Orchestrator Type Definitions
 */

import type { FarmId } from '../core/types/profile.js';

// ============================================================================
// Progress
// ============================================================================

/**
 * Emitted once per settled item
 */
export interface BulkProgress {
  readonly index: number;
  readonly farmId: FarmId;
  readonly status: 'success' | 'failed';
  readonly completed: number;
  readonly total: number;
}

// ============================================================================
// Options
// ============================================================================

interface BulkRunOptions {
  /** Upper bound on concurrently running items (default 4) */
  readonly maxWorkers?: number;
  /** Fail an item that has not finished after this many milliseconds */
  readonly itemTimeoutMs?: number;
  readonly onProgress?: (progress: BulkProgress) => void;
}

export interface BulkCreateOptions extends BulkRunOptions {
  /** Key holding each item's geometry (default "geometry") */
  readonly geometryField?: string;
  /** Key holding each item's farm id (default "farm_id") */
  readonly idField?: string;
  readonly year?: number;
}

export interface BulkUpdateOptions extends BulkRunOptions {
  /** Fields to refresh; null or empty means a full refresh */
  readonly fields?: readonly string[] | null;
  readonly year?: number;
}

/**
 * Input record for bulk creation: a geometry, an optional id, and any
 * attributes to carry through
 */
export type BulkCreateItem = Readonly<Record<string, unknown>>;

/**
 * Geometries for bulk update, keyed by farm id
 */
export type GeometryLookup = ReadonlyMap<FarmId, unknown> | Readonly<Record<string, unknown>>;
