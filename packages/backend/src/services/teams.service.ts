import { randomInt, randomUUID } from 'node:crypto';
import { asc, eq } from 'drizzle-orm';
import { db, type DbExecutor } from '../lib/db.js';
import { memberships, teams, type Membership, type Team, type TeamRole } from '../db/schema.js';
import { NotFoundError } from '../lib/errors.js';
import { enforce, type Action, type Actor } from '../lib/permissions.js';
import type { CreateTeamInput, UpdateTeamInput } from '../schemas/teams.schema.js';
import { logAuditEvent } from './audit.service.js';
import {
  addMember,
  listMembers,
  loadAccessContext,
  removeMember,
  transferOwnership,
  type TeamMember,
} from './membership.service.js';

const INVITE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const INVITE_CODE_LENGTH = 8;

export function generateInviteCode(length = INVITE_CODE_LENGTH): string {
  let code = '';
  for (let i = 0; i < length; i++) {
    code += INVITE_ALPHABET[randomInt(INVITE_ALPHABET.length)];
  }
  return code;
}

function uniqueInviteCode(executor: DbExecutor): string {
  let code = generateInviteCode();
  while (executor.select({ id: teams.id }).from(teams).where(eq(teams.inviteCode, code)).get()) {
    code = generateInviteCode();
  }
  return code;
}

/**
 * Load a team and check that the actor may perform `action` on it.
 */
export async function authorizeTeam(actor: Actor, teamId: string, action: Action): Promise<Team> {
  const team = db.select().from(teams).where(eq(teams.id, teamId)).get();
  if (!team) throw new NotFoundError('Team', teamId);

  const context = await loadAccessContext(actor.id);
  enforce(actor, { kind: 'team', teamId }, action, context);
  return team;
}

export async function createTeam(actor: Actor, input: CreateTeamInput): Promise<Team> {
  enforce(actor, { kind: 'team', teamId: null }, 'create', { roles: new Map() });

  return db.transaction((tx) => {
    const now = new Date();
    const team = tx
      .insert(teams)
      .values({
        id: randomUUID(),
        name: input.name,
        description: input.description ?? null,
        inviteCode: uniqueInviteCode(tx),
        ownerId: actor.id,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .get();

    tx.insert(memberships)
      .values({ teamId: team.id, userId: actor.id, role: 'OWNER', joinedAt: now })
      .run();

    logAuditEvent(
      {
        actorId: actor.id,
        entityType: 'Team',
        entityId: team.id,
        action: 'CREATE',
        payload: { name: team.name },
      },
      tx,
    );

    return team;
  });
}

/**
 * Admins see every team; everyone else sees the teams they belong to.
 */
export async function listTeams(actor: Actor): Promise<Team[]> {
  if (actor.isAdmin) {
    return db.select().from(teams).orderBy(asc(teams.name)).all();
  }

  return db
    .select({ team: teams })
    .from(teams)
    .innerJoin(memberships, eq(memberships.teamId, teams.id))
    .where(eq(memberships.userId, actor.id))
    .orderBy(asc(teams.name))
    .all()
    .map((row) => row.team);
}

export async function getTeam(
  actor: Actor,
  teamId: string,
): Promise<Team & { members: TeamMember[] }> {
  const team = await authorizeTeam(actor, teamId, 'read');
  return { ...team, members: await listMembers(teamId) };
}

export async function updateTeam(
  actor: Actor,
  teamId: string,
  input: UpdateTeamInput,
): Promise<Team> {
  await authorizeTeam(actor, teamId, 'update');

  return db
    .update(teams)
    .set({
      ...(input.name !== undefined ? { name: input.name } : {}),
      ...(input.description !== undefined ? { description: input.description } : {}),
      updatedAt: new Date(),
    })
    .where(eq(teams.id, teamId))
    .returning()
    .get();
}

export async function regenerateInviteCode(actor: Actor, teamId: string): Promise<Team> {
  await authorizeTeam(actor, teamId, 'update');

  return db.transaction((tx) =>
    tx
      .update(teams)
      .set({ inviteCode: uniqueInviteCode(tx), updatedAt: new Date() })
      .where(eq(teams.id, teamId))
      .returning()
      .get(),
  );
}

/**
 * Delete a team together with its memberships, tasks, comments, meetings and
 * evaluations (cascaded by foreign keys).
 */
export async function deleteTeam(actor: Actor, teamId: string): Promise<void> {
  const team = await authorizeTeam(actor, teamId, 'delete');

  db.transaction((tx) => {
    tx.delete(teams).where(eq(teams.id, teamId)).run();
    logAuditEvent(
      {
        actorId: actor.id,
        entityType: 'Team',
        entityId: teamId,
        action: 'DELETE',
        payload: { name: team.name },
      },
      tx,
    );
  });
}

// ============================================================================
// Membership management
// ============================================================================

export async function listTeamMembers(actor: Actor, teamId: string): Promise<TeamMember[]> {
  await authorizeTeam(actor, teamId, 'read');
  return listMembers(teamId);
}

export async function addTeamMember(
  actor: Actor,
  teamId: string,
  userId: string,
  role: TeamRole = 'MEMBER',
): Promise<Membership> {
  await authorizeTeam(actor, teamId, 'update');
  return addMember(teamId, userId, role, actor.id);
}

/**
 * Owners and admins may remove anyone but the owner; members may remove themselves.
 */
export async function removeTeamMember(actor: Actor, teamId: string, userId: string): Promise<void> {
  if (userId !== actor.id) {
    await authorizeTeam(actor, teamId, 'update');
  }
  return removeMember(teamId, userId, actor.id);
}

export async function transferTeamOwnership(
  actor: Actor,
  teamId: string,
  newOwnerId: string,
): Promise<Team> {
  await authorizeTeam(actor, teamId, 'update');
  return transferOwnership(teamId, newOwnerId, actor.id);
}
