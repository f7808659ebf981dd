/**
 * HTTP entrypoint
 *
 * Loads the dataset once, then serves the read-only analysis API.
 * Run: npx tsx src/server.ts
 */

import { env } from './config/env.js';
import { buildApp } from './app.js';
import { describeDataset, loadDataset } from './modules/dataset/index.js';

async function main(): Promise<void> {
  console.log(`[BOOT] Loading dataset from ${env.DATA_FILE}...`);
  const dataset = loadDataset(env.DATA_FILE);
  const { entityCount, featureCount } = describeDataset(dataset);
  console.log(`[BOOT] Loaded data: ${entityCount} countries, ${featureCount} features`);

  const app = buildApp(dataset, {
    logger: { level: env.LOG_LEVEL },
    corsOrigins: env.CORS_ORIGINS,
    exposeErrors: env.NODE_ENV !== 'production',
  });

  const shutdown = async (signal: string) => {
    console.log(`[BOOT] ${signal} received, closing server`);
    await app.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(err => {
        console.error('[BOOT] Shutdown failed:', err);
        process.exit(1);
      });
    });
  }

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[BOOT] ✅ Analysis API listening on ${env.HOST}:${env.PORT}`);
}

main().catch(err => {
  console.error('[BOOT] Failed to start:', err);
  process.exit(1);
});
