import { FastifyInstance } from 'fastify';
import {
  LoginSchema,
  RegisterSchema,
  ChangePasswordSchema,
} from '../schemas/auth.schema.js';
import * as authService from '../services/auth.service.js';
import { getTokenExpiry, signAccessToken } from '../lib/auth.js';
import { getConfig } from '../lib/config/app.js';
import { ACCESS_TOKEN_COOKIE } from '../plugins/auth.plugin.js';

function cookieOptions() {
  return {
    httpOnly: true,
    secure: getConfig().env === 'production',
    sameSite: 'lax' as const,
    path: '/',
  };
}

export async function authRoutes(fastify: FastifyInstance): Promise<void> {
  /**
   * POST /api/auth/register
   * Self-registration
   */
  fastify.post('/api/auth/register', async (request, reply) => {
    const input = RegisterSchema.parse(request.body);
    const user = await authService.register(input);
    request.log.info({ userId: user.id }, 'user registered');
    return reply.status(201).send({ user });
  });

  /**
   * POST /api/auth/login
   * Login with email and password
   */
  fastify.post('/api/auth/login', async (request, reply) => {
    const input = LoginSchema.parse(request.body);
    const user = await authService.login(input);

    const accessToken = await signAccessToken({ sub: user.id, email: user.email });
    const { accessTokenTtl } = getConfig();
    const expiresAt = getTokenExpiry(accessTokenTtl);

    reply.setCookie(ACCESS_TOKEN_COOKIE, accessToken, {
      ...cookieOptions(),
      expires: expiresAt,
    });

    return reply.send({ user, accessToken, expiresAt });
  });

  /**
   * POST /api/auth/logout
   * Clear the session cookie
   */
  fastify.post(
    '/api/auth/logout',
    { onRequest: [fastify.authenticate] },
    async (_request, reply) => {
      reply.clearCookie(ACCESS_TOKEN_COOKIE, cookieOptions());
      return reply.send({ message: 'Logged out successfully' });
    }
  );

  /**
   * GET /api/auth/me
   * Get current authenticated user
   */
  fastify.get(
    '/api/auth/me',
    { onRequest: [fastify.authenticate] },
    async (request, reply) => {
      const user = await authService.getUserById(request.user.sub);
      return reply.send({ user });
    }
  );

  /**
   * PUT /api/auth/password
   * Change password for current user
   */
  fastify.put(
    '/api/auth/password',
    { onRequest: [fastify.authenticate] },
    async (request, reply) => {
      const input = ChangePasswordSchema.parse(request.body);
      await authService.changePassword(request.user.sub, input);

      // Force re-login
      reply.clearCookie(ACCESS_TOKEN_COOKIE, cookieOptions());

      return reply.send({ message: 'Password changed successfully' });
    }
  );
}
