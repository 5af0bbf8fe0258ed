import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { AppError, NotFoundError } from './common/errors.js';
import type { Env } from './config/env.js';
import type { MarketDataService } from './modules/market-data/index.js';
import { registerPortfolioRoutes } from './modules/portfolio-engine/index.js';
import type { RegimeThresholds } from './modules/portfolio-engine/index.js';
import type { WeightsService } from './modules/weights/index.js';

export interface AppDeps {
  market: MarketDataService;
  weights: WeightsService;
  thresholds?: RegimeThresholds;
}

export type AppConfig = Pick<Env, 'LOG_LEVEL' | 'CORS_ORIGINS' | 'NODE_ENV'>;

/**
 * Build Fastify Application
 */
export function buildApp(config: AppConfig, deps: AppDeps): FastifyInstance {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: config.CORS_ORIGINS === '*' ? true : config.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      app.log.warn(`[API] ${err.code}: ${err.message}`);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify's own 4xx (e.g. malformed JSON body)
    const statusCode = err.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        ok: false,
        error: 'BAD_REQUEST',
        message: err.message,
      });
    }

    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: config.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    const err = new NotFoundError('Route not found');
    reply.status(err.statusCode).send({
      ok: false,
      error: err.code,
      message: err.message,
    });
  });

  app.register(async (fastify) => {
    await registerPortfolioRoutes(fastify, deps);
  });

  return app;
}
