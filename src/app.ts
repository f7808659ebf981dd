import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { AppError } from './common/errors.js';
import { describeDataset, type Dataset } from './modules/dataset/index.js';
import { analysisRoutes } from './modules/analysis/index.js';

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  corsOrigins?: string;
  exposeErrors?: boolean;
}

/**
 * Build Fastify Application over one loaded Dataset
 */
export function buildApp(dataset: Dataset, options: BuildAppOptions = {}): FastifyInstance {
  const { logger = false, corsOrigins = '*', exposeErrors = true } = options;

  const app = Fastify({ logger });

  // CORS
  app.register(cors, {
    origin: corsOrigins === '*' ? true : corsOrigins.split(','),
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation / body parsing errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: statusCode >= 500 ? 'INTERNAL_ERROR' : err.code,
      message: exposeErrors ? err.message : 'Internal server error',
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    dataset: describeDataset(dataset),
    timestamp: new Date().toISOString(),
  }));

  app.register(analysisRoutes, { prefix: '/api/analysis', dataset });

  return app;
}
