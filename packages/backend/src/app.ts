import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import { getConfig } from './lib/config/app.js';
import { registerErrorHandler } from './lib/error-handler.js';
import authPlugin from './plugins/auth.plugin.js';
import { authRoutes } from './routes/auth.js';
import { userRoutes } from './routes/users.js';
import { teamsRoutes } from './routes/teams.js';
import { tasksRoutes } from './routes/tasks.js';
import { commentsRoutes } from './routes/comments.js';
import { meetingsRoutes } from './routes/meetings.js';
import { evaluationsRoutes } from './routes/evaluations.js';
import { calendarRoutes } from './routes/calendar.js';
import { adminRoutes } from './routes/admin.js';

export interface BuildAppOptions {
  logger?: boolean;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = getConfig();

  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  });

  // CORS with credentials support
  await fastify.register(cors, {
    origin: config.frontendUrl,
    credentials: true,
  });

  await fastify.register(cookie);

  // Bearer/cookie authentication and the requireAdmin guard
  await fastify.register(authPlugin);

  registerErrorHandler(fastify);

  fastify.get('/health', async () => {
    return { status: 'ok' };
  });

  await fastify.register(authRoutes);
  await fastify.register(userRoutes);
  await fastify.register(teamsRoutes);
  await fastify.register(tasksRoutes);
  await fastify.register(commentsRoutes);
  await fastify.register(meetingsRoutes);
  await fastify.register(evaluationsRoutes);
  await fastify.register(calendarRoutes);
  await fastify.register(adminRoutes);

  return fastify;
}
