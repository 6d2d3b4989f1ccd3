import fp from 'fastify-plugin';
import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { eq } from 'drizzle-orm';
import { db } from '../lib/db.js';
import { users } from '../db/schema.js';
import { verifyAccessToken } from '../lib/auth.js';
import { UnauthorizedError, ForbiddenError } from '../lib/errors.js';
import type { Actor } from '../lib/permissions.js';

export const ACCESS_TOKEN_COOKIE = 'access_token';

export interface JwtPayload {
  sub: string; // local user id
  email: string;
  isAdmin: boolean;
}

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (
      request: FastifyRequest,
      reply: FastifyReply
    ) => Promise<void>;
    requireAdmin: (
      request: FastifyRequest,
      reply: FastifyReply
    ) => Promise<void>;
  }
  interface FastifyRequest {
    user: JwtPayload;
  }
}

/**
 * The access-control actor for an authenticated request.
 */
export function actorFrom(request: FastifyRequest): Actor {
  return { id: request.user.sub, isAdmin: request.user.isAdmin };
}

function extractToken(request: FastifyRequest): string | undefined {
  const authHeader = request.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.slice(7);
  }
  return request.cookies[ACCESS_TOKEN_COOKIE];
}

async function authPlugin(fastify: FastifyInstance): Promise<void> {
  fastify.decorateRequest('user', null, []);

  /**
   * Decorator to authenticate requests.
   * Accepts an HS256 token from `Authorization: Bearer` or the access_token cookie,
   * then reloads the user so disabled accounts are rejected immediately.
   */
  fastify.decorate(
    'authenticate',
    async function (request: FastifyRequest, _reply: FastifyReply) {
      const token = extractToken(request);
      if (!token) {
        throw new UnauthorizedError('Access token required');
      }

      let userId: string;
      try {
        const claims = await verifyAccessToken(token);
        userId = claims.sub;
      } catch (err) {
        request.log.debug({ err }, 'access token rejected');
        throw new UnauthorizedError('Invalid or expired access token');
      }

      const user = db.select().from(users).where(eq(users.id, userId)).get();
      if (!user || !user.isActive) {
        throw new UnauthorizedError('Account not found or disabled');
      }

      request.user = {
        sub: user.id,
        email: user.email,
        isAdmin: user.isAdmin,
      };
    }
  );

  /**
   * Must run after authenticate.
   */
  fastify.decorate(
    'requireAdmin',
    async function (request: FastifyRequest, _reply: FastifyReply) {
      if (!request.user) {
        throw new UnauthorizedError('Authentication required');
      }
      if (!request.user.isAdmin) {
        throw new ForbiddenError('Administrator access required');
      }
    }
  );
}

export default fp(authPlugin, {
  name: 'auth',
  dependencies: ['@fastify/cookie'],
});
