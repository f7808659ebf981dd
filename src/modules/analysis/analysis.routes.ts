/**
 * Analysis Routes
 * ===============
 *
 * Read-only API over the Dataset loaded at boot.
 *
 * ENDPOINTS (prefix /api/analysis):
 *   GET  /features                           - Identity and feature names
 *   GET  /stats/:feature                     - Basic statistics
 *   GET  /top/:feature?n=                    - Highest values
 *   GET  /bottom/:feature?n=                 - Lowest values
 *   GET  /regions/:feature?sort=label|mean   - Per-region statistics
 *   GET  /region/:category                   - Entities of one region
 *   POST /correlation                        - Correlation matrix
 *   POST /correlation/target                 - Features vs one target
 *   GET  /outliers/:feature?threshold=       - Z-score outliers
 *   GET  /entity/:name                       - Full record of an entity
 *   GET  /entity/:name/percentile/:feature   - Percentile rank
 *
 * NaN results serialize as null.
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../common/errors.js';
import type { Dataset } from '../dataset/index.js';
import {
  DEFAULT_RANK_SIZE,
  basicStatistics,
  bottomN,
  byMeanDescending,
  byRegionName,
  compareRegions,
  filterByRegion,
  getEntityRecord,
  percentileRank,
  topN,
} from './analysis.service.js';
import { correlateWith, correlationMatrix } from './correlation.service.js';
import { DEFAULT_Z_THRESHOLD, findOutliers } from './outliers.service.js';

export interface AnalysisRoutesOptions {
  dataset: Dataset;
}

// ═══════════════════════════════════════════════════════════════
// REQUEST SCHEMAS
// ═══════════════════════════════════════════════════════════════

const RankQuery = z.object({
  n: z.coerce.number().int().nonnegative().default(DEFAULT_RANK_SIZE),
});

const RegionsQuery = z.object({
  sort: z.enum(['label', 'mean']).default('label'),
});

const OutliersQuery = z.object({
  threshold: z.coerce.number().default(DEFAULT_Z_THRESHOLD),
});

const CorrelationBody = z.object({
  features: z.array(z.string().min(1)).min(1),
});

const TargetCorrelationBody = z.object({
  target: z.string().min(1),
  features: z.array(z.string().min(1)).min(1),
});

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new ValidationError(issues);
  }
  return parsed.data;
}

// ═══════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════

export const analysisRoutes: FastifyPluginAsync<AnalysisRoutesOptions> = async (fastify, opts) => {
  const { dataset } = opts;

  fastify.get('/features', async () => ({
    ok: true,
    identity: dataset.identityNames,
    features: dataset.featureNames,
  }));

  fastify.get<{ Params: { feature: string } }>('/stats/:feature', async (request) => {
    const { feature } = request.params;
    return { ok: true, feature, stats: basicStatistics(dataset, feature) };
  });

  fastify.get<{ Params: { feature: string }; Querystring: Record<string, string> }>(
    '/top/:feature',
    async (request) => {
      const { feature } = request.params;
      const { n } = validate(RankQuery, request.query);
      return { ok: true, feature, items: topN(dataset, feature, n) };
    }
  );

  fastify.get<{ Params: { feature: string }; Querystring: Record<string, string> }>(
    '/bottom/:feature',
    async (request) => {
      const { feature } = request.params;
      const { n } = validate(RankQuery, request.query);
      return { ok: true, feature, items: bottomN(dataset, feature, n) };
    }
  );

  fastify.get<{ Params: { feature: string }; Querystring: Record<string, string> }>(
    '/regions/:feature',
    async (request) => {
      const { feature } = request.params;
      const { sort } = validate(RegionsQuery, request.query);
      const regions = compareRegions(dataset, feature, sort === 'mean' ? byMeanDescending : byRegionName);
      return { ok: true, feature, regions };
    }
  );

  fastify.get<{ Params: { category: string } }>('/region/:category', async (request) => {
    const { category } = request.params;
    const { entities, rows } = filterByRegion(dataset, category);
    return { ok: true, category, count: entities.length, entities, rows };
  });

  fastify.post('/correlation', async (request) => {
    const { features } = validate(CorrelationBody, request.body);
    return { ok: true, features, matrix: correlationMatrix(dataset, features) };
  });

  fastify.post('/correlation/target', async (request) => {
    const { target, features } = validate(TargetCorrelationBody, request.body);
    return { ok: true, target, correlations: correlateWith(dataset, target, features) };
  });

  fastify.get<{ Params: { feature: string }; Querystring: Record<string, string> }>(
    '/outliers/:feature',
    async (request) => {
      const { feature } = request.params;
      const { threshold } = validate(OutliersQuery, request.query);
      const outliers = findOutliers(dataset, feature, threshold);
      return { ok: true, feature, threshold, count: outliers.length, outliers };
    }
  );

  fastify.get<{ Params: { name: string } }>('/entity/:name', async (request) => {
    const { name } = request.params;
    const record = getEntityRecord(dataset, name);
    return { ok: true, found: Object.keys(record).length > 0, record };
  });

  fastify.get<{ Params: { name: string; feature: string } }>(
    '/entity/:name/percentile/:feature',
    async (request) => {
      const { name, feature } = request.params;
      return { ok: true, entity: name, feature, percentile: percentileRank(dataset, name, feature) };
    }
  );
};

export default analysisRoutes;
