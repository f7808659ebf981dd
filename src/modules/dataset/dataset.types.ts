/**
 * Dataset Types
 * =============
 *
 * In-memory shape of a per-country indicators table.
 *
 * IMMUTABLE CONTRACT
 * ------------------
 * - Built once by the loader, frozen, never mutated afterwards
 * - entityNames / categoryLabels / matrix rows share one row order
 * - matrix is rowCount × featureCount, one Cell per feature
 */

import type { ColumnIndex } from './column.index.js';

// ═══════════════════════════════════════════════════════════════
// CELLS
// ═══════════════════════════════════════════════════════════════

/** A numeric cell: a real number, or null when no valid value was recorded. */
export type Cell = number | null;

/** The MISSING sentinel. Distinct from NaN, which only results from computation. */
export const MISSING = null;

export function isMissing(cell: Cell): cell is null {
  return cell === null;
}

// ═══════════════════════════════════════════════════════════════
// DATASET
// ═══════════════════════════════════════════════════════════════

export type MatrixRow = readonly Cell[];

export interface Dataset {
  /** Header names of the two identity columns (entity name, category label) */
  readonly identityNames: readonly [string, string];
  readonly entityNames: readonly string[];
  readonly categoryLabels: readonly string[];
  readonly featureNames: readonly string[];
  readonly matrix: readonly MatrixRow[];
  readonly columnIndex: ColumnIndex;
}

export interface DatasetSummary {
  entityCount: number;
  featureCount: number;
}
