import { FastifyInstance } from 'fastify';
import { IdParamsSchema } from '../schemas/common.schema.js';
import { CreateCommentSchema, UpdateCommentSchema } from '../schemas/comments.schema.js';
import * as commentsService from '../services/comments.service.js';
import { actorFrom } from '../plugins/auth.plugin.js';

export async function commentsRoutes(fastify: FastifyInstance) {
  fastify.addHook('onRequest', fastify.authenticate);

  fastify.get('/api/tasks/:id/comments', async (request, reply) => {
    const { id: taskId } = IdParamsSchema.parse(request.params);
    const data = await commentsService.listComments(actorFrom(request), taskId);
    return reply.send({ data });
  });

  fastify.post('/api/tasks/:id/comments', async (request, reply) => {
    const { id: taskId } = IdParamsSchema.parse(request.params);
    const input = CreateCommentSchema.parse(request.body);
    const comment = await commentsService.createComment(actorFrom(request), taskId, input);
    return reply.status(201).send(comment);
  });

  fastify.get('/api/comments/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const comment = await commentsService.getComment(actorFrom(request), id);
    return reply.send(comment);
  });

  fastify.put('/api/comments/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const input = UpdateCommentSchema.parse(request.body);
    const comment = await commentsService.updateComment(actorFrom(request), id, input);
    return reply.send(comment);
  });

  fastify.delete('/api/comments/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    await commentsService.deleteComment(actorFrom(request), id);
    return reply.status(204).send();
  });
}
