/**
 * Correlation Service
 *
 * Pearson correlation over complete-case rows: a row takes part only when
 * none of the selected columns is MISSING in it.
 */

import { isMissing, type Dataset } from '../dataset/index.js';
import { clamp, mean, pearson } from './stats.utils.js';
import type { CorrelationMatrix, FeatureCorrelation } from './analysis.types.js';

function completeRows(dataset: Dataset, offsets: readonly number[]): number[][] {
  const rows: number[][] = [];
  for (const row of dataset.matrix) {
    const picked: number[] = [];
    for (const offset of offsets) {
      const cell = row[offset];
      if (isMissing(cell)) break;
      picked.push(cell);
    }
    if (picked.length === offsets.length) rows.push(picked);
  }
  return rows;
}

/**
 * k × k correlation matrix of the given features, in the given order.
 *
 * - diagonal is 1 as soon as one complete row exists
 * - an off-diagonal entry is NaN when either column is constant
 * - every entry is NaN when no complete row exists
 */
export function correlationMatrix(dataset: Dataset, features: readonly string[]): CorrelationMatrix {
  const offsets = features.map(f => dataset.columnIndex.resolve(f));
  const k = offsets.length;
  const rows = completeRows(dataset, offsets);

  if (!rows.length) {
    return offsets.map(() => offsets.map(() => NaN));
  }

  const means = offsets.map((_, j) => mean(rows.map(r => r[j])));
  const cov: number[][] = offsets.map(() => offsets.map(() => 0));
  for (const r of rows) {
    for (let a = 0; a < k; a++) {
      const da = r[a] - means[a];
      for (let b = a; b < k; b++) {
        cov[a][b] += da * (r[b] - means[b]);
      }
    }
  }

  const result: CorrelationMatrix = offsets.map(() => offsets.map(() => NaN));
  for (let a = 0; a < k; a++) {
    result[a][a] = 1;
    for (let b = a + 1; b < k; b++) {
      const denom = Math.sqrt(cov[a][a] * cov[b][b]);
      const r = denom === 0 ? NaN : clamp(cov[a][b] / denom, -1, 1);
      result[a][b] = r;
      result[b][a] = r;
    }
  }
  return result;
}

/**
 * Correlation of each feature against one target, each pair on its own
 * complete cases. Features sharing no complete row with the target are left out.
 */
export function correlateWith(
  dataset: Dataset,
  target: string,
  features: readonly string[]
): FeatureCorrelation[] {
  const targetOffset = dataset.columnIndex.resolve(target);
  const results: FeatureCorrelation[] = [];

  for (const feature of features) {
    const rows = completeRows(dataset, [targetOffset, dataset.columnIndex.resolve(feature)]);
    if (!rows.length) continue;

    results.push({
      feature,
      r: pearson(rows.map(r => r[0]), rows.map(r => r[1])),
      n: rows.length,
    });
  }
  return results;
}
