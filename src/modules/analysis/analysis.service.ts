/**
 * Analysis Service
 * ================
 *
 * Read-only queries over a loaded Dataset. Every function takes the Dataset
 * as its first argument and leaves it untouched.
 *
 * NAME LOOKUPS
 * ------------
 * - Unknown feature → ColumnNotFoundError (from ColumnIndex.resolve)
 * - Unknown entity  → findEntityIndex() returns undefined; getEntityRecord
 *   answers with an empty record, percentileRank throws EntityNotFoundError
 */

import { EntityNotFoundError } from '../../common/errors.js';
import { isMissing, type Dataset } from '../dataset/index.js';
import { max, mean, median, min, populationStd, presentValues } from './stats.utils.js';
import type {
  BasicStatistics,
  EntityRecord,
  RankedEntity,
  RegionComparator,
  RegionStats,
  RegionSubset,
} from './analysis.types.js';

export const DEFAULT_RANK_SIZE = 10;

// ═══════════════════════════════════════════════════════════════
// STATISTICS
// ═══════════════════════════════════════════════════════════════

export function basicStatistics(dataset: Dataset, feature: string): BasicStatistics {
  const values = presentValues(dataset, dataset.columnIndex.resolve(feature));

  return {
    mean: mean(values),
    median: median(values),
    std: populationStd(values),
    min: min(values),
    max: max(values),
    count: values.length,
  };
}

// ═══════════════════════════════════════════════════════════════
// RANKING
// ═══════════════════════════════════════════════════════════════

function rankedEntities(dataset: Dataset, feature: string): RankedEntity[] {
  const offset = dataset.columnIndex.resolve(feature);
  const out: RankedEntity[] = [];
  dataset.matrix.forEach((row, i) => {
    const cell = row[offset];
    if (!isMissing(cell)) out.push({ entity: dataset.entityNames[i], value: cell });
  });
  return out;
}

function take<T>(items: T[], n: number): T[] {
  return n > 0 ? items.slice(0, Math.floor(n)) : [];
}

/**
 * Highest values first. Equal values keep dataset row order.
 */
export function topN(dataset: Dataset, feature: string, n = DEFAULT_RANK_SIZE): RankedEntity[] {
  const ranked = rankedEntities(dataset, feature);
  ranked.sort((a, b) => (a.value > b.value ? -1 : a.value < b.value ? 1 : 0));
  return take(ranked, n);
}

/**
 * Lowest values first. Equal values keep dataset row order.
 */
export function bottomN(dataset: Dataset, feature: string, n = DEFAULT_RANK_SIZE): RankedEntity[] {
  const ranked = rankedEntities(dataset, feature);
  ranked.sort((a, b) => (a.value < b.value ? -1 : a.value > b.value ? 1 : 0));
  return take(ranked, n);
}

// ═══════════════════════════════════════════════════════════════
// REGIONS
// ═══════════════════════════════════════════════════════════════

export function filterByRegion(dataset: Dataset, category: string): RegionSubset {
  const subset: RegionSubset = { entities: [], rows: [] };
  dataset.categoryLabels.forEach((label, i) => {
    if (label !== category) return;
    subset.entities.push(dataset.entityNames[i]);
    subset.rows.push(dataset.matrix[i]);
  });
  return subset;
}

export const byRegionName: RegionComparator = (a, b) =>
  a.region < b.region ? -1 : a.region > b.region ? 1 : 0;

/**
 * Highest mean first; NaN means (e.g. a region holding both +inf and -inf) go last
 */
export const byMeanDescending: RegionComparator = (a, b) => {
  const aNaN = Number.isNaN(a.mean);
  const bNaN = Number.isNaN(b.mean);
  if (aNaN || bNaN) return aNaN === bNaN ? 0 : aNaN ? 1 : -1;
  return a.mean > b.mean ? -1 : a.mean < b.mean ? 1 : 0;
};

/**
 * Per-region statistics of one feature.
 * Regions without a single value are left out. Ordered by region name unless
 * a comparator is given.
 */
export function compareRegions(
  dataset: Dataset,
  feature: string,
  compare: RegionComparator = byRegionName
): RegionStats[] {
  const offset = dataset.columnIndex.resolve(feature);

  const groups = new Map<string, number[]>();
  dataset.categoryLabels.forEach((label, i) => {
    const values = groups.get(label) ?? [];
    groups.set(label, values);
    const cell = dataset.matrix[i][offset];
    if (!isMissing(cell)) values.push(cell);
  });

  const results: RegionStats[] = [];
  for (const [region, values] of groups) {
    if (!values.length) continue;
    results.push({
      region,
      mean: mean(values),
      median: median(values),
      std: populationStd(values),
      count: values.length,
    });
  }

  return results.sort(compare);
}

// ═══════════════════════════════════════════════════════════════
// ENTITIES
// ═══════════════════════════════════════════════════════════════

/**
 * Row of the first entity with this exact name, or undefined
 */
export function findEntityIndex(dataset: Dataset, name: string): number | undefined {
  const idx = dataset.entityNames.indexOf(name);
  return idx === -1 ? undefined : idx;
}

/**
 * All fields of one entity. Unknown entity → empty record.
 */
export function getEntityRecord(dataset: Dataset, name: string): EntityRecord {
  const idx = findEntityIndex(dataset, name);
  if (idx === undefined) return {};

  const record: EntityRecord = {};
  const row = dataset.matrix[idx];
  for (const feature of dataset.featureNames) {
    record[feature] = row[dataset.columnIndex.resolve(feature)];
  }

  // Identity fields win over a feature sharing their header name
  const [nameColumn, labelColumn] = dataset.identityNames;
  record[nameColumn] = dataset.entityNames[idx];
  record[labelColumn] = dataset.categoryLabels[idx];
  return record;
}

/**
 * Share (0..100) of non-missing values strictly below the entity's value.
 * NaN when the entity's own value is missing.
 */
export function percentileRank(dataset: Dataset, name: string, feature: string): number {
  const offset = dataset.columnIndex.resolve(feature);
  const idx = findEntityIndex(dataset, name);
  if (idx === undefined) {
    throw new EntityNotFoundError(name);
  }

  const value = dataset.matrix[idx][offset];
  if (isMissing(value)) return NaN;

  const values = presentValues(dataset, offset);
  const below = values.filter(v => v < value).length;
  return (below / values.length) * 100;
}
