/**
 * Report Builder
 * ==============
 *
 * Renders the seven-section text report:
 *   1. basic statistics of the target
 *   2. top N / 3. bottom N entities by the target
 *   4. regional means, highest first
 *   5. correlation of each factor with the target
 *   6. full record and percentile rank of the focus entity
 *   7. z-score outliers of the outlier feature
 */

import type { Cell, Dataset } from '../dataset/index.js';
import {
  basicStatistics,
  bottomN,
  byMeanDescending,
  compareRegions,
  getEntityRecord,
  percentileRank,
  topN,
} from '../analysis/analysis.service.js';
import { correlateWith } from '../analysis/correlation.service.js';
import { findOutliers } from '../analysis/outliers.service.js';
import type { BasicStatistics, RankedEntity } from '../analysis/analysis.types.js';
import type { ReportConfig } from './report.config.js';

const RULE = '='.repeat(80);
const SECTION_RULE = '-'.repeat(60);
const STAT_KEYS: readonly (keyof BasicStatistics)[] = ['mean', 'median', 'std', 'min', 'max', 'count'];

export function formatValue(value: Cell | string | undefined, digits: number): string {
  if (value === null || value === undefined) return 'n/a';
  if (typeof value === 'string') return value;
  return Number.isNaN(value) ? 'NaN' : value.toFixed(digits);
}

function section(lines: string[], title: string): void {
  lines.push('', title, SECTION_RULE);
}

function capitalize(key: string): string {
  return key.charAt(0).toUpperCase() + key.slice(1);
}

function rankingLines(items: RankedEntity[]): string[] {
  return items.map(
    (item, i) => `  ${String(i + 1).padStart(2)}. ${item.entity.padEnd(30)} ${formatValue(item.value, 3)}`
  );
}

export function buildReport(dataset: Dataset, config: ReportConfig): string[] {
  const { target } = config;
  const lines: string[] = ['', RULE, config.title, RULE];

  // 1. Basic statistics
  section(lines, `1. BASIC STATISTICS FOR ${target.toUpperCase()}`);
  const stats = basicStatistics(dataset, target);
  for (const key of STAT_KEYS) {
    lines.push(`  ${capitalize(key)}: ${formatValue(stats[key], 4)}`);
  }

  // 2-3. Rankings
  section(lines, `2. TOP ${config.rankSize} BY ${target.toUpperCase()}`);
  lines.push(...rankingLines(topN(dataset, target, config.rankSize)));

  section(lines, `3. BOTTOM ${config.rankSize} BY ${target.toUpperCase()}`);
  lines.push(...rankingLines(bottomN(dataset, target, config.rankSize)));

  // 4. Regions
  section(lines, `4. ${target.toUpperCase()} BY REGION`);
  for (const region of compareRegions(dataset, target, byMeanDescending)) {
    lines.push(
      `  ${region.region.padEnd(35)} Mean: ${formatValue(region.mean, 3)} (±${formatValue(region.std, 3)})`
    );
  }

  // 5. Correlation
  section(lines, '5. CORRELATION ANALYSIS');
  lines.push(`  Analyzing correlations with ${target}...`);
  for (const { feature, r } of correlateWith(dataset, target, config.factors)) {
    lines.push(`  ${feature.padEnd(35)} r = ${formatValue(r, 3)}`);
  }

  // 6. Focus entity
  section(lines, `6. DETAILED DATA FOR ${config.focusEntity.toUpperCase()}`);
  const record = getEntityRecord(dataset, config.focusEntity);
  if (Object.keys(record).length > 0) {
    const [nameColumn, labelColumn] = dataset.identityNames;
    lines.push(`  ${nameColumn}: ${formatValue(record[nameColumn], 3)}`);
    lines.push(`  ${labelColumn}: ${formatValue(record[labelColumn], 3)}`);
    for (const feature of config.focusFeatures) {
      lines.push(`  ${feature}: ${formatValue(record[feature], 3)}`);
    }
    const percentile = percentileRank(dataset, config.focusEntity, target);
    lines.push(`  Percentile rank: ${formatValue(percentile, 1)}%`);
  }

  // 7. Outliers
  section(lines, `7. OUTLIER DETECTION FOR ${config.outlierFeature.toUpperCase()}`);
  const outliers = findOutliers(dataset, config.outlierFeature, config.outlierThreshold);
  if (outliers.length > 0) {
    lines.push(`  Found ${outliers.length} outliers:`);
    for (const o of outliers.slice(0, config.maxOutliersShown)) {
      lines.push(
        `  ${o.entity.padEnd(30)} Value: ${formatValue(o.value, 3)}, Z-score: ${formatValue(o.zScore, 2)}`
      );
    }
  }

  lines.push('', RULE);
  return lines;
}
