/**
 * Report Configuration
 *
 * Columns and entity the fixed demo report is built around.
 */

import { DEFAULT_RANK_SIZE } from '../analysis/analysis.service.js';
import { DEFAULT_Z_THRESHOLD } from '../analysis/outliers.service.js';

export interface ReportConfig {
  title: string;
  target: string;                 // feature ranked, grouped and correlated against
  factors: string[];              // features correlated with the target
  focusEntity: string;
  focusFeatures: string[];        // features printed for the focus entity
  outlierFeature: string;
  outlierThreshold: number;
  rankSize: number;
  maxOutliersShown: number;
}

export const defaultReportConfig: ReportConfig = {
  title: 'WORLD HAPPINESS REPORT DATA ANALYSIS',
  target: 'Ladder score',
  factors: [
    'Logged GDP per capita',
    'Social support',
    'Healthy life expectancy',
    'Freedom to make life choices',
    'Generosity',
    'Perceptions of corruption',
  ],
  focusEntity: 'India',
  focusFeatures: [
    'Ladder score',
    'Logged GDP per capita',
    'Social support',
    'Healthy life expectancy',
  ],
  outlierFeature: 'Logged GDP per capita',
  outlierThreshold: DEFAULT_Z_THRESHOLD,
  rankSize: DEFAULT_RANK_SIZE,
  maxOutliersShown: 5,
};
