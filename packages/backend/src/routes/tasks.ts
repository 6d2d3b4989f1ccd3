import { FastifyInstance } from 'fastify';
import { IdParamsSchema } from '../schemas/common.schema.js';
import {
  AssignTaskSchema,
  CreateTaskSchema,
  TaskFiltersSchema,
  TeamQuerySchema,
  UpdateTaskSchema,
} from '../schemas/tasks.schema.js';
import * as tasksService from '../services/tasks.service.js';
import { actorFrom } from '../plugins/auth.plugin.js';

export async function tasksRoutes(fastify: FastifyInstance) {
  fastify.addHook('onRequest', fastify.authenticate);

  /**
   * GET /api/tasks?teamId=...
   * List a team's tasks with filters and pagination
   */
  fastify.get('/api/tasks', async (request, reply) => {
    const filters = TaskFiltersSchema.parse(request.query);
    const result = await tasksService.listTasks(actorFrom(request), filters);
    return reply.send(result);
  });

  /**
   * GET /api/tasks/my
   * Tasks the caller created or is assigned to
   */
  fastify.get('/api/tasks/my', async (request, reply) => {
    const data = await tasksService.listMyTasks(actorFrom(request));
    return reply.send({ data });
  });

  fastify.get('/api/tasks/overdue', async (request, reply) => {
    const { teamId } = TeamQuerySchema.parse(request.query);
    const data = await tasksService.listOverdueTasks(actorFrom(request), teamId);
    return reply.send({ data });
  });

  fastify.get('/api/tasks/statistics', async (request, reply) => {
    const { teamId } = TeamQuerySchema.parse(request.query);
    const stats = await tasksService.getTeamStatistics(actorFrom(request), teamId);
    return reply.send(stats);
  });

  fastify.get('/api/tasks/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const task = await tasksService.getTask(actorFrom(request), id);
    return reply.send(task);
  });

  fastify.post('/api/tasks', async (request, reply) => {
    const input = CreateTaskSchema.parse(request.body);
    const task = await tasksService.createTask(actorFrom(request), input);
    return reply.status(201).send(task);
  });

  fastify.put('/api/tasks/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const input = UpdateTaskSchema.parse(request.body);
    const task = await tasksService.updateTask(actorFrom(request), id, input);
    return reply.send(task);
  });

  fastify.post('/api/tasks/:id/assign', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const { assigneeId } = AssignTaskSchema.parse(request.body);
    const task = await tasksService.assignTask(actorFrom(request), id, assigneeId);
    return reply.send(task);
  });

  /**
   * POST /api/tasks/:id/complete
   * Mark a task as DONE
   */
  fastify.post('/api/tasks/:id/complete', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const task = await tasksService.completeTask(actorFrom(request), id);
    return reply.send(task);
  });

  fastify.delete('/api/tasks/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    await tasksService.deleteTask(actorFrom(request), id);
    return reply.status(204).send();
  });
}
