import { and, asc, count, eq, like, or, type SQL } from 'drizzle-orm';
import { db } from '../lib/db.js';
import { users } from '../db/schema.js';
import { InvalidOperationError, NotFoundError } from '../lib/errors.js';
import type { Actor } from '../lib/permissions.js';
import type { UserResponse } from '../schemas/auth.schema.js';
import type { UpdateProfileInput, UserListQuery } from '../schemas/user.schema.js';
import { logAuditEvent } from './audit.service.js';
import { toUserResponse } from './auth.service.js';

// ============================================================================
// User Directory
// ============================================================================

/**
 * List users with pagination and search. Inactive users are only listed for
 * admins that ask for them.
 */
export async function listUsers(actor: Actor, query: UserListQuery) {
  const conditions: SQL[] = [];
  if (!actor.isAdmin || !query.includeInactive) {
    conditions.push(eq(users.isActive, true));
  }
  if (query.search) {
    const pattern = `%${query.search}%`;
    const match = or(
      like(users.email, pattern),
      like(users.firstName, pattern),
      like(users.lastName, pattern),
    );
    if (match) conditions.push(match);
  }
  const where = and(...conditions);

  const { page, limit } = query;
  const rows = db
    .select()
    .from(users)
    .where(where)
    .orderBy(asc(users.lastName), asc(users.firstName), asc(users.email))
    .limit(limit)
    .offset((page - 1) * limit)
    .all();
  const [{ total }] = db.select({ total: count() }).from(users).where(where).all();

  return {
    data: rows.map(toUserResponse),
    pagination: { page, limit, total, totalPages: Math.ceil(total / limit) },
  };
}

export async function updateProfile(
  userId: string,
  input: UpdateProfileInput,
): Promise<UserResponse> {
  const user = db
    .update(users)
    .set({
      ...(input.firstName !== undefined ? { firstName: input.firstName } : {}),
      ...(input.lastName !== undefined ? { lastName: input.lastName } : {}),
      updatedAt: new Date(),
    })
    .where(eq(users.id, userId))
    .returning()
    .get();

  if (!user) {
    throw new NotFoundError('User', userId);
  }
  return toUserResponse(user);
}

/**
 * Enable or disable an account. Disabled users keep their data but cannot sign in.
 */
export async function setUserActive(
  actor: Actor,
  userId: string,
  isActive: boolean,
): Promise<UserResponse> {
  if (!isActive && actor.id === userId) {
    throw new InvalidOperationError('You cannot deactivate your own account');
  }

  const user = db.transaction((tx) => {
    const updated = tx
      .update(users)
      .set({ isActive, updatedAt: new Date() })
      .where(eq(users.id, userId))
      .returning()
      .get();

    if (!updated) {
      throw new NotFoundError('User', userId);
    }

    logAuditEvent(
      {
        actorId: actor.id,
        entityType: 'User',
        entityId: userId,
        action: isActive ? 'ACTIVATE' : 'DEACTIVATE',
        payload: { isActive },
      },
      tx,
    );

    return updated;
  });

  return toUserResponse(user);
}
