import { and, asc, eq, inArray } from 'drizzle-orm';
import { db, type DbExecutor } from '../lib/db.js';
import {
  meetingParticipants,
  meetings,
  memberships,
  tasks,
  teams,
  users,
  type Membership,
  type TeamRole,
} from '../db/schema.js';
import {
  ConflictError,
  InvalidOperationError,
  NotFoundError,
  ValidationError,
} from '../lib/errors.js';
import type { AccessContext } from '../lib/permissions.js';
import { logAuditEvent } from './audit.service.js';

// ============================================================================
// Types
// ============================================================================

export interface TeamMember {
  userId: string;
  email: string;
  firstName: string;
  lastName: string;
  role: TeamRole;
  joinedAt: Date;
}

function findMembership(executor: DbExecutor, teamId: string, userId: string) {
  return executor
    .select()
    .from(memberships)
    .where(and(eq(memberships.teamId, teamId), eq(memberships.userId, userId)))
    .get();
}

function requireTeam(executor: DbExecutor, teamId: string) {
  const team = executor.select().from(teams).where(eq(teams.id, teamId)).get();
  if (!team) throw new NotFoundError('Team', teamId);
  return team;
}

// ============================================================================
// Membership Queries
// ============================================================================

export async function isMember(userId: string, teamId: string): Promise<boolean> {
  return findMembership(db, teamId, userId) !== undefined;
}

export async function roleOf(userId: string, teamId: string): Promise<TeamRole | null> {
  return findMembership(db, teamId, userId)?.role ?? null;
}

export async function listTeamIdsForUser(userId: string): Promise<string[]> {
  return db
    .select({ teamId: memberships.teamId })
    .from(memberships)
    .where(eq(memberships.userId, userId))
    .all()
    .map((row) => row.teamId);
}

/**
 * Load everything the access-control evaluator needs about an actor.
 * `subjectId` adds the subject's teams, used when creating evaluations.
 */
export async function loadAccessContext(
  actorId: string,
  options: { subjectId?: string } = {},
): Promise<AccessContext> {
  const rows = db
    .select({ teamId: memberships.teamId, role: memberships.role })
    .from(memberships)
    .where(eq(memberships.userId, actorId))
    .all();

  const context: AccessContext = {
    roles: new Map(rows.map((row) => [row.teamId, row.role])),
  };

  if (options.subjectId) {
    context.subjectTeamIds = new Set(await listTeamIdsForUser(options.subjectId));
  }

  return context;
}

export async function listMembers(teamId: string): Promise<TeamMember[]> {
  requireTeam(db, teamId);

  return db
    .select({
      userId: users.id,
      email: users.email,
      firstName: users.firstName,
      lastName: users.lastName,
      role: memberships.role,
      joinedAt: memberships.joinedAt,
    })
    .from(memberships)
    .innerJoin(users, eq(users.id, memberships.userId))
    .where(eq(memberships.teamId, teamId))
    .orderBy(asc(memberships.joinedAt), asc(users.email))
    .all();
}

// ============================================================================
// Membership Mutations
// ============================================================================

/**
 * Add a user to a team. Ownership is never granted here; a team's single
 * owner only changes through transferOwnership().
 */
export async function addMember(
  teamId: string,
  userId: string,
  role: TeamRole = 'MEMBER',
  actorId?: string,
): Promise<Membership> {
  if (role === 'OWNER') {
    throw new InvalidOperationError(
      'A team has exactly one owner; use an ownership transfer instead',
    );
  }

  return db.transaction((tx) => {
    requireTeam(tx, teamId);

    const user = tx.select().from(users).where(eq(users.id, userId)).get();
    if (!user) throw new NotFoundError('User', userId);
    if (!user.isActive) throw new ValidationError('Cannot add an inactive user to a team');

    if (findMembership(tx, teamId, userId)) {
      throw new ConflictError(`User '${userId}' is already a member of team '${teamId}'`);
    }

    const membership = tx
      .insert(memberships)
      .values({ teamId, userId, role, joinedAt: new Date() })
      .returning()
      .get();

    logAuditEvent(
      {
        actorId: actorId ?? userId,
        entityType: 'TeamMembership',
        entityId: teamId,
        action: 'ADD_MEMBER',
        payload: { userId, role },
      },
      tx,
    );

    return membership;
  });
}

/**
 * Remove a member from a team. The owner cannot be removed.
 * The user is also dropped from the team's meetings and unassigned from its tasks.
 */
export async function removeMember(
  teamId: string,
  userId: string,
  actorId?: string,
): Promise<void> {
  db.transaction((tx) => {
    requireTeam(tx, teamId);

    const membership = findMembership(tx, teamId, userId);
    if (!membership) throw new NotFoundError('Team member', userId);

    if (membership.role === 'OWNER') {
      throw new InvalidOperationError(
        'The team owner cannot be removed; transfer ownership or delete the team first',
      );
    }

    tx.delete(memberships)
      .where(and(eq(memberships.teamId, teamId), eq(memberships.userId, userId)))
      .run();

    const teamMeetingIds = tx
      .select({ id: meetings.id })
      .from(meetings)
      .where(eq(meetings.teamId, teamId));
    tx.delete(meetingParticipants)
      .where(
        and(
          eq(meetingParticipants.userId, userId),
          inArray(meetingParticipants.meetingId, teamMeetingIds),
        ),
      )
      .run();

    tx.update(tasks)
      .set({ assigneeId: null, updatedAt: new Date() })
      .where(and(eq(tasks.teamId, teamId), eq(tasks.assigneeId, userId)))
      .run();

    logAuditEvent(
      {
        actorId: actorId ?? userId,
        entityType: 'TeamMembership',
        entityId: teamId,
        action: 'REMOVE_MEMBER',
        payload: { userId },
      },
      tx,
    );
  });
}

/**
 * Hand ownership to another member. The previous owner stays on as a member.
 */
export async function transferOwnership(
  teamId: string,
  newOwnerId: string,
  actorId?: string,
) {
  return db.transaction((tx) => {
    const team = requireTeam(tx, teamId);

    const target = findMembership(tx, teamId, newOwnerId);
    if (!target) {
      throw new InvalidOperationError('The new owner must already be a member of the team');
    }
    if (target.role === 'OWNER') {
      return team;
    }

    // Demote first: the schema allows a single OWNER row per team
    tx.update(memberships)
      .set({ role: 'MEMBER' })
      .where(and(eq(memberships.teamId, teamId), eq(memberships.role, 'OWNER')))
      .run();
    tx.update(memberships)
      .set({ role: 'OWNER' })
      .where(and(eq(memberships.teamId, teamId), eq(memberships.userId, newOwnerId)))
      .run();

    const updated = tx
      .update(teams)
      .set({ ownerId: newOwnerId, updatedAt: new Date() })
      .where(eq(teams.id, teamId))
      .returning()
      .get();

    logAuditEvent(
      {
        actorId: actorId ?? team.ownerId,
        entityType: 'Team',
        entityId: teamId,
        action: 'TRANSFER_OWNERSHIP',
        payload: { from: team.ownerId, to: newOwnerId },
      },
      tx,
    );

    return updated;
  });
}

export async function joinWithInviteCode(
  teamId: string,
  inviteCode: string,
  userId: string,
): Promise<Membership> {
  const team = requireTeam(db, teamId);
  if (team.inviteCode !== inviteCode.trim().toUpperCase()) {
    throw new ValidationError('Invalid invite code');
  }
  return addMember(teamId, userId, 'MEMBER', userId);
}

export async function leaveTeam(teamId: string, userId: string): Promise<void> {
  return removeMember(teamId, userId, userId);
}
