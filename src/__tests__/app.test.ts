/**
 * Analysis API Tests
 *
 * Exercises the routes in process with app.inject() over the sample dataset.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import path from 'path';
import { fileURLToPath } from 'url';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { loadDataset } from '../modules/dataset/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const SAMPLE_CSV = path.resolve(__dirname, '../modules/dataset/__tests__/fixtures/sample.csv');

const LADDER = encodeURIComponent('Ladder score');
const GDP = encodeURIComponent('Logged GDP per capita');
const SOCIAL = encodeURIComponent('Social support');

describe('Analysis API', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = buildApp(loadDataset(SAMPLE_CSV));
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /api/health reports the dataset shape', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, dataset: { entityCount: 6, featureCount: 3 } });
  });

  it('GET /features lists identity and feature names', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/analysis/features' });

    expect(res.json()).toEqual({
      ok: true,
      identity: ['Country name', 'Regional indicator'],
      features: ['Ladder score', 'Logged GDP per capita', 'Social support'],
    });
  });

  describe('statistics and ranking', () => {

    it('GET /stats/:feature', async () => {
      const res = await app.inject({ method: 'GET', url: `/api/analysis/stats/${LADDER}` });
      const body = res.json();

      expect(res.statusCode).toBe(200);
      expect(body.feature).toBe('Ladder score');
      expect(body.stats.count).toBe(6);
      expect(body.stats.mean).toBeCloseTo(5.75, 10);
      expect(body.stats.median).toBeCloseTo(5.6, 10);
      expect(body.stats.min).toBe(3.9);
      expect(body.stats.max).toBe(7.5);
    });

    it('GET /top/:feature honours n', async () => {
      const res = await app.inject({ method: 'GET', url: `/api/analysis/top/${LADDER}?n=2` });

      expect(res.json().items).toEqual([
        { entity: 'Avalon', value: 7.5 },
        { entity: 'Brenmark', value: 7.1 },
      ]);
    });

    it('GET /bottom/:feature skips missing cells', async () => {
      const res = await app.inject({ method: 'GET', url: `/api/analysis/bottom/${GDP}` });
      const items: { entity: string }[] = res.json().items;

      expect(items.map(i => i.entity)).toEqual(['Fenwick, Upper', 'Dunmore', 'Elstree', 'Brenmark', 'Avalon']);
    });

    it('rejects a negative n', async () => {
      const res = await app.inject({ method: 'GET', url: `/api/analysis/top/${LADDER}?n=-1` });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ ok: false, error: 'VALIDATION_ERROR' });
    });

    it('answers 404 for an unknown feature', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/analysis/stats/Happiness' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        ok: false,
        error: 'COLUMN_NOT_FOUND',
        message: 'Column "Happiness" not found: unknown column',
      });
    });
  });

  describe('regions', () => {

    it('GET /regions/:feature orders by name by default', async () => {
      const res = await app.inject({ method: 'GET', url: `/api/analysis/regions/${LADDER}` });
      const regions: { region: string }[] = res.json().regions;

      expect(regions.map(r => r.region)).toEqual(['East Coast', 'North Reach', 'South Basin']);
    });

    it('GET /regions/:feature?sort=mean orders by mean, highest first', async () => {
      const res = await app.inject({ method: 'GET', url: `/api/analysis/regions/${LADDER}?sort=mean` });
      const regions: { region: string; count: number }[] = res.json().regions;

      expect(regions.map(r => r.region)).toEqual(['North Reach', 'South Basin', 'East Coast']);
      expect(regions.map(r => r.count)).toEqual([2, 2, 2]);
    });

    it('GET /region/:category returns entities and rows', async () => {
      const res = await app.inject({ method: 'GET', url: `/api/analysis/region/${encodeURIComponent('South Basin')}` });

      expect(res.json()).toEqual({
        ok: true,
        category: 'South Basin',
        count: 2,
        entities: ['Corvia', 'Dunmore'],
        rows: [
          [5.2, null, 0.8],
          [4.8, 8.9, null],
        ],
      });
    });
  });

  describe('correlation', () => {

    it('POST /correlation returns [[1]] for one feature', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/analysis/correlation',
        payload: { features: ['Ladder score'] },
      });

      expect(res.json()).toEqual({ ok: true, features: ['Ladder score'], matrix: [[1]] });
    });

    it('POST /correlation rejects an empty feature list', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/analysis/correlation',
        payload: { features: [] },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('VALIDATION_ERROR');
    });

    it('POST /correlation/target correlates factors with the target', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/analysis/correlation/target',
        payload: { target: 'Ladder score', features: ['Logged GDP per capita', 'Social support'] },
      });
      const correlations: { feature: string; r: number; n: number }[] = res.json().correlations;

      expect(correlations.map(c => c.n)).toEqual([5, 5]);
      expect(correlations[0].r).toBeCloseTo(0.97544, 4);
      expect(correlations[1].r).toBeCloseTo(0.96667, 4);
    });
  });

  describe('outliers', () => {

    it('GET /outliers/:feature uses a threshold of 2 by default', async () => {
      const res = await app.inject({ method: 'GET', url: `/api/analysis/outliers/${GDP}` });

      expect(res.json()).toMatchObject({ ok: true, threshold: 2, count: 0, outliers: [] });
    });

    it('GET /outliers/:feature?threshold=1.5', async () => {
      const res = await app.inject({ method: 'GET', url: `/api/analysis/outliers/${GDP}?threshold=1.5` });
      const body = res.json();

      expect(body.count).toBe(1);
      expect(body.outliers[0].entity).toBe('Fenwick, Upper');
      expect(body.outliers[0].value).toBe(7.2);
      expect(body.outliers[0].zScore).toBeCloseTo(1.71077, 4);
    });
  });

  describe('entities', () => {

    it('GET /entity/:name returns the full record', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/analysis/entity/Dunmore' });

      expect(res.json()).toEqual({
        ok: true,
        found: true,
        record: {
          'Country name': 'Dunmore',
          'Regional indicator': 'South Basin',
          'Ladder score': 4.8,
          'Logged GDP per capita': 8.9,
          'Social support': null,
        },
      });
    });

    it('GET /entity/:name returns an empty record when unknown', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/analysis/entity/Nowhere' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ ok: true, found: false, record: {} });
    });

    it('GET /entity/:name/percentile/:feature', async () => {
      const res = await app.inject({ method: 'GET', url: `/api/analysis/entity/Avalon/percentile/${LADDER}` });

      expect(res.json().percentile).toBeCloseTo(500 / 6, 10);
    });

    it('serializes the percentile of a missing value as null', async () => {
      const res = await app.inject({ method: 'GET', url: `/api/analysis/entity/Dunmore/percentile/${SOCIAL}` });

      expect(res.statusCode).toBe(200);
      expect(res.json().percentile).toBeNull();
    });

    it('answers 404 for an unknown entity', async () => {
      const res = await app.inject({ method: 'GET', url: `/api/analysis/entity/Nowhere/percentile/${LADDER}` });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toMatchObject({ ok: false, error: 'ENTITY_NOT_FOUND' });
    });
  });

  it('answers 404 for an unknown route', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/nothing-here' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });
});
