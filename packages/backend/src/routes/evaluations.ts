import { FastifyInstance } from 'fastify';
import { IdParamsSchema } from '../schemas/common.schema.js';
import { TeamQuerySchema } from '../schemas/tasks.schema.js';
import {
  CreateEvaluationSchema,
  UpdateEvaluationSchema,
} from '../schemas/evaluations.schema.js';
import * as evaluationsService from '../services/evaluations.service.js';
import { actorFrom } from '../plugins/auth.plugin.js';

export async function evaluationsRoutes(fastify: FastifyInstance) {
  fastify.addHook('onRequest', fastify.authenticate);

  /**
   * GET /api/evaluations?teamId=...
   * A team's evaluations the caller may see
   */
  fastify.get('/api/evaluations', async (request, reply) => {
    const { teamId } = TeamQuerySchema.parse(request.query);
    const data = await evaluationsService.listTeamEvaluations(actorFrom(request), teamId);
    return reply.send({ data });
  });

  fastify.post('/api/evaluations', async (request, reply) => {
    const input = CreateEvaluationSchema.parse(request.body);
    const evaluation = await evaluationsService.createEvaluation(actorFrom(request), input);
    return reply.status(201).send(evaluation);
  });

  fastify.get('/api/evaluations/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const evaluation = await evaluationsService.getEvaluation(actorFrom(request), id);
    return reply.send(evaluation);
  });

  fastify.put('/api/evaluations/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const input = UpdateEvaluationSchema.parse(request.body);
    const evaluation = await evaluationsService.updateEvaluation(actorFrom(request), id, input);
    return reply.send(evaluation);
  });

  fastify.delete('/api/evaluations/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    await evaluationsService.deleteEvaluation(actorFrom(request), id);
    return reply.status(204).send();
  });
}
