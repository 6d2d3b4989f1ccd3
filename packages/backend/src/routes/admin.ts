import { FastifyInstance } from 'fastify';
import { AuditQuerySchema } from '../schemas/audit.schema.js';
import { queryAuditEvents } from '../services/audit.service.js';

export async function adminRoutes(fastify: FastifyInstance) {
  fastify.addHook('onRequest', fastify.authenticate);
  fastify.addHook('onRequest', fastify.requireAdmin);

  /**
   * GET /api/admin/audit-events
   * Membership, ownership and evaluation history, newest first
   */
  fastify.get('/api/admin/audit-events', async (request, reply) => {
    const query = AuditQuerySchema.parse(request.query);
    const result = await queryAuditEvents(query);
    return reply.send(result);
  });
}
