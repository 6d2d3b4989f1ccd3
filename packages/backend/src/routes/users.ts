import { FastifyInstance } from 'fastify';
import { IdParamsSchema } from '../schemas/common.schema.js';
import {
  UpdateProfileSchema,
  UpdateUserStatusSchema,
  UserListQuerySchema,
} from '../schemas/user.schema.js';
import * as authService from '../services/auth.service.js';
import * as usersService from '../services/users.service.js';
import * as evaluationsService from '../services/evaluations.service.js';
import { actorFrom } from '../plugins/auth.plugin.js';

export async function userRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', fastify.authenticate);

  /**
   * GET /api/users
   * List users with pagination and search. Admins may add ?includeInactive=true.
   */
  fastify.get('/api/users', { onRequest: [fastify.requireAdmin] }, async (request, reply) => {
    const query = UserListQuerySchema.parse(request.query);
    const result = await usersService.listUsers(actorFrom(request), query);
    return reply.send(result);
  });

  /**
   * PUT /api/users/me
   * Update own profile
   */
  fastify.put('/api/users/me', async (request, reply) => {
    const input = UpdateProfileSchema.parse(request.body);
    const user = await usersService.updateProfile(request.user.sub, input);
    return reply.send({ user });
  });

  /**
   * GET /api/users/:id
   */
  fastify.get('/api/users/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const user = await authService.getUserById(id);
    return reply.send({ user });
  });

  /**
   * PUT /api/users/:id/status
   * Enable or disable an account (admin only)
   */
  fastify.put(
    '/api/users/:id/status',
    { onRequest: [fastify.requireAdmin] },
    async (request, reply) => {
      const { id } = IdParamsSchema.parse(request.params);
      const { isActive } = UpdateUserStatusSchema.parse(request.body);
      const user = await usersService.setUserActive(actorFrom(request), id, isActive);
      return reply.send({ user });
    }
  );

  /**
   * GET /api/users/:id/evaluations
   * Evaluations about a user that the caller may see
   */
  fastify.get('/api/users/:id/evaluations', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const data = await evaluationsService.listEvaluationsForSubject(actorFrom(request), id);
    return reply.send({ data });
  });

  /**
   * GET /api/users/:id/evaluations/given
   */
  fastify.get('/api/users/:id/evaluations/given', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const data = await evaluationsService.listEvaluationsByEvaluator(actorFrom(request), id);
    return reply.send({ data });
  });

  /**
   * GET /api/users/:id/evaluations/statistics
   */
  fastify.get('/api/users/:id/evaluations/statistics', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const stats = await evaluationsService.getEvaluationStatistics(actorFrom(request), id);
    return reply.send(stats);
  });
}
