/**
 * Analysis Types
 * ==============
 *
 * Result shapes of the analysis operations. Numeric fields may hold NaN
 * where the quantity is undefined (no values, zero variance, missing input);
 * callers check for it, nothing throws for numeric reasons.
 */

import type { Cell, MatrixRow } from '../dataset/index.js';

// ═══════════════════════════════════════════════════════════════
// STATISTICS
// ═══════════════════════════════════════════════════════════════

export interface BasicStatistics {
  mean: number;
  median: number;
  std: number;          // population standard deviation
  min: number;
  max: number;
  count: number;        // non-missing cells
}

export interface RegionStats {
  region: string;
  mean: number;
  median: number;
  std: number;
  count: number;
}

export type RegionComparator = (a: RegionStats, b: RegionStats) => number;

// ═══════════════════════════════════════════════════════════════
// ROWS & RANKING
// ═══════════════════════════════════════════════════════════════

export interface RankedEntity {
  entity: string;
  value: number;
}

export interface RegionSubset {
  entities: string[];
  rows: MatrixRow[];
}

export interface Outlier {
  entity: string;
  value: number;
  zScore: number;
}

/** Identity fields map to strings, features to their cell */
export type EntityRecord = Record<string, string | Cell>;

// ═══════════════════════════════════════════════════════════════
// CORRELATION
// ═══════════════════════════════════════════════════════════════

export type CorrelationMatrix = number[][];

export interface FeatureCorrelation {
  feature: string;
  r: number;
  n: number;            // complete pairs used
}
