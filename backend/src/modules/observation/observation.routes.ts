/**
 * Observation Routes
 * ==================
 *
 * POST   /api/add_observation
 * GET    /api/get_observations
 * GET    /api/get_observation/:id
 * DELETE /api/delete_observation/:id
 *
 * All four sit behind the API key guard. Failures are thrown and rendered
 * by the global error handler.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { apiKeyHook } from '../../core/auth/api-key.guard.js';
import type { ObservationService } from './observation.service.js';

export interface ObservationRoutesOptions {
  service: ObservationService;
  apiKey: string | undefined;
}

interface IdParams {
  id: string;
}

export async function registerObservationRoutes(
  app: FastifyInstance,
  opts: ObservationRoutesOptions,
): Promise<void> {
  const { service } = opts;

  app.addHook('onRequest', apiKeyHook(opts.apiKey));

  app.post('/api/add_observation', async (req: FastifyRequest, reply: FastifyReply) => {
    const id = await service.add(req.body);

    return reply.status(201).send({
      status: 'success',
      message: 'Observation added successfully',
      id,
    });
  });

  app.get('/api/get_observations', async (_req: FastifyRequest, reply: FastifyReply) => {
    const observations = await service.listAll();

    return reply.send({
      status: 'success',
      observations,
    });
  });

  app.get<{ Params: IdParams }>('/api/get_observation/:id', async (req, reply) => {
    const observation = await service.getById(req.params.id);

    return reply.send({
      status: 'success',
      observation,
    });
  });

  app.delete<{ Params: IdParams }>('/api/delete_observation/:id', async (req, reply) => {
    await service.deleteById(req.params.id);

    return reply.send({
      status: 'success',
      message: 'Observation deleted successfully',
    });
  });

  app.log.info('[Observation] Routes registered at /api/*');
}
