import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { env as processEnv, type Env } from './config/env.js';
import { AppError } from './common/errors.js';
import { fromFastifyLogger } from './common/logger.js';
import { describeEgress, buildNetworkConfig } from './modules/network/index.js';
import {
  createEtfStrategyModule,
  registerEtfStrategyModule,
  type CreateEtfStrategyModuleOptions,
} from './modules/etf-strategy/index.js';

export interface BuildAppOptions {
  env?: Env;
  // Overrides for the ETF strategy module (tests pass a fake transport or registry)
  etf?: Omit<CreateEtfStrategyModuleOptions, 'env' | 'logger'>;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const env = options.env ?? processEnv;

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof ZodError) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.issues.map(i => `${i.path.join('.') || '(body)'}: ${i.message}`).join('; '),
      });
    }

    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        app.log.error({ code: err.code, err: err.message }, 'Request failed');
      }
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    app.log.error(err);
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: statusCode >= 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST',
      message: env.NODE_ENV === 'production' && statusCode >= 500 ? 'Internal server error' : err.message,
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
    mode: env.DATA_MODE,
    egress: describeEgress(buildNetworkConfig(env)),
    timestamp: new Date().toISOString(),
  }));

  const etf = createEtfStrategyModule({
    ...options.etf,
    env,
    logger: fromFastifyLogger(app.log),
  });

  app.register(async (fastify) => {
    await registerEtfStrategyModule(fastify, etf);
    fastify.log.info('ETF strategy registered at /api/etf-strategy/*');
  });

  return app;
}
