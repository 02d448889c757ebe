import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env as processEnv, parseCorsOrigins, type Env } from './config/env.js';
import { isAppError, ValidationError } from './common/errors.js';
import { defaultClock, type Clock } from './core/host.deps.js';
import {
  ObservationService,
  registerObservationRoutes,
  type ObservationStore,
} from './modules/observation/index.js';

export interface BuildAppOptions {
  store: ObservationStore;
  config?: Env;
  clock?: Clock;
}

export const WELCOME_PAYLOAD = {
  message: 'Welcome to the WildVision Observations Backend!',
  endpoints: {
    'Add Observation': '/api/add_observation (POST)',
    'Get All Observations': '/api/get_observations (GET)',
    'Get Single Observation': '/api/get_observation/<id> (GET)',
    'Delete Observation': '/api/delete_observation/<id> (DELETE)',
  },
} as const;

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions): FastifyInstance {
  const config = options.config ?? processEnv;

  const app = Fastify({
    logger: config.NODE_ENV === 'test' ? false : { level: config.LOG_LEVEL },
    trustProxy: true,
    requestTimeout: config.REQUEST_TIMEOUT_MS,
  });

  const service = new ObservationService({
    store: options.store,
    logger: app.log,
    clock: options.clock ?? defaultClock,
  });

  // CORS
  app.register(cors, {
    origin: parseCorsOrigins(config.CORS_ORIGINS),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((fastifyErr: FastifyError, req, reply) => {
    // Empty body sent as application/json never reaches the schema
    const err =
      fastifyErr.code === 'FST_ERR_CTP_EMPTY_JSON_BODY'
        ? new ValidationError('No data provided')
        : fastifyErr;

    if (isAppError(err)) {
      if (err.statusCode >= 500) {
        req.log.error({ err, code: err.code }, err.message);
      } else {
        req.log.info({ code: err.code }, err.message);
      }
      return reply.status(err.statusCode).send({
        status: 'error',
        message: err.message,
      });
    }

    // Fastify client errors: malformed JSON, unsupported media type, body too large
    const statusCode = err.statusCode ?? 500;
    if (err.validation || (statusCode >= 400 && statusCode < 500)) {
      req.log.info({ code: err.code }, err.message);
      return reply.status(err.validation ? 400 : statusCode).send({
        status: 'error',
        message: err.message,
      });
    }

    req.log.error({ err }, 'Unhandled error');
    return reply.status(500).send({
      status: 'error',
      message: 'Internal server error',
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      status: 'error',
      message: 'Route not found',
    });
  });

  app.get('/', async () => WELCOME_PAYLOAD);

  // Unauthenticated so that load balancers can probe it
  app.get('/api/health', async (_req, reply) => {
    const up = await service.checkHealth();
    if (!up) {
      return reply.status(503).send({
        status: 'error',
        message: 'Database unavailable',
        database: 'down',
      });
    }
    return reply.send({ status: 'success', database: 'up' });
  });

  app.register(registerObservationRoutes, {
    service,
    apiKey: config.API_KEY,
  });

  if (!config.API_KEY) {
    app.log.warn('[BOOT] API_KEY is not set, every protected endpoint will answer 401');
  }

  return app;
}
