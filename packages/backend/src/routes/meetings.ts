import { FastifyInstance } from 'fastify';
import { IdParamsSchema } from '../schemas/common.schema.js';
import {
  CreateMeetingSchema,
  MeetingListQuerySchema,
  UpdateMeetingSchema,
} from '../schemas/meetings.schema.js';
import * as meetingsService from '../services/meetings.service.js';
import { actorFrom } from '../plugins/auth.plugin.js';

export async function meetingsRoutes(fastify: FastifyInstance) {
  fastify.addHook('onRequest', fastify.authenticate);

  /**
   * GET /api/meetings?teamId=...&from=...&to=...
   */
  fastify.get('/api/meetings', async (request, reply) => {
    const query = MeetingListQuerySchema.parse(request.query);
    const data = await meetingsService.listMeetings(actorFrom(request), query);
    return reply.send({ data });
  });

  fastify.get('/api/meetings/my', async (request, reply) => {
    const data = await meetingsService.listMyMeetings(actorFrom(request));
    return reply.send({ data });
  });

  fastify.get('/api/meetings/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const meeting = await meetingsService.getMeeting(actorFrom(request), id);
    return reply.send(meeting);
  });

  /**
   * POST /api/meetings
   * Responds with the meeting and any overlapping meetings of its participants
   */
  fastify.post('/api/meetings', async (request, reply) => {
    const input = CreateMeetingSchema.parse(request.body);
    const result = await meetingsService.createMeeting(actorFrom(request), input);
    if (result.conflicts.length > 0) {
      request.log.info(
        { meetingId: result.meeting.id, conflicts: result.conflicts.length },
        'meeting created with participant conflicts',
      );
    }
    return reply.status(201).send(result);
  });

  fastify.put('/api/meetings/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const input = UpdateMeetingSchema.parse(request.body);
    const result = await meetingsService.updateMeeting(actorFrom(request), id, input);
    return reply.send(result);
  });

  fastify.delete('/api/meetings/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    await meetingsService.deleteMeeting(actorFrom(request), id);
    return reply.status(204).send();
  });
}
