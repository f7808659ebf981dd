/**
 * Report entrypoint
 *
 * Loads DATA_FILE and prints the fixed analysis report.
 * Run: npx tsx src/report.ts
 */

import { env } from './config/env.js';
import { describeDataset, loadDataset } from './modules/dataset/index.js';
import { buildReport, defaultReportConfig } from './modules/report/index.js';

function run(): void {
  const dataset = loadDataset(env.DATA_FILE);
  const { entityCount, featureCount } = describeDataset(dataset);
  console.log(`[Dataset] Loaded data: ${entityCount} countries, ${featureCount} features`);

  console.log(buildReport(dataset, defaultReportConfig).join('\n'));
}

try {
  run();
} catch (err) {
  console.error('[Report] Failed:', err instanceof Error ? err.message : err);
  process.exit(1);
}
