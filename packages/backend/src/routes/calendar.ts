import { FastifyInstance } from 'fastify';
import { DayViewParamsSchema, MonthViewParamsSchema } from '../schemas/calendar.schema.js';
import * as calendarService from '../services/calendar.service.js';

export async function calendarRoutes(fastify: FastifyInstance) {
  fastify.addHook('onRequest', fastify.authenticate);

  /**
   * GET /api/calendar/day/:date
   * Tasks and meetings of the caller's teams on one UTC day
   */
  fastify.get('/api/calendar/day/:date', async (request, reply) => {
    const { date } = DayViewParamsSchema.parse(request.params);
    const view = await calendarService.dayView(request.user.sub, date);
    return reply.send(view);
  });

  /**
   * GET /api/calendar/month/:year/:month
   * Per-day counts; days without activity are left out
   */
  fastify.get('/api/calendar/month/:year/:month', async (request, reply) => {
    const { year, month } = MonthViewParamsSchema.parse(request.params);
    const view = await calendarService.monthView(request.user.sub, year, month);
    return reply.send(view);
  });
}
