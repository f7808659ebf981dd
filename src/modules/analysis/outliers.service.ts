/**
 * Outlier Detection
 *
 * z = |value - mean| / std over the non-missing values of one feature.
 * A constant feature (std = 0) leaves z undefined for every entity and
 * reports no outliers.
 */

import { isMissing, type Dataset } from '../dataset/index.js';
import { mean, populationStd, presentValues } from './stats.utils.js';
import type { Outlier } from './analysis.types.js';

export const DEFAULT_Z_THRESHOLD = 2.0;

export function findOutliers(
  dataset: Dataset,
  feature: string,
  threshold = DEFAULT_Z_THRESHOLD
): Outlier[] {
  const offset = dataset.columnIndex.resolve(feature);
  const values = presentValues(dataset, offset);

  const mu = mean(values);
  const sigma = populationStd(values);
  if (!(sigma > 0)) return [];

  const outliers: Outlier[] = [];
  dataset.matrix.forEach((row, i) => {
    const value = row[offset];
    if (isMissing(value)) return;

    const zScore = Math.abs(value - mu) / sigma;
    if (zScore > threshold) {
      outliers.push({ entity: dataset.entityNames[i], value, zScore });
    }
  });
  return outliers;
}
