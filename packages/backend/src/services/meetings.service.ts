import { randomUUID } from 'node:crypto';
import { and, asc, eq, gt, inArray, lt, ne, or, type SQL } from 'drizzle-orm';
import { db, type DbExecutor } from '../lib/db.js';
import {
  meetingParticipants,
  meetings,
  memberships,
  teams,
  type Meeting,
} from '../db/schema.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import { enforce, type Action, type Actor, type Resource } from '../lib/permissions.js';
import type {
  CreateMeetingInput,
  MeetingListQuery,
  UpdateMeetingInput,
} from '../schemas/meetings.schema.js';
import { listTeamIdsForUser, loadAccessContext } from './membership.service.js';
import { authorizeTeam } from './teams.service.js';

export type MeetingWithParticipants = Meeting & { participantIds: string[] };

export interface MeetingConflict {
  userId: string;
  meetingId: string;
  title: string;
  startTime: Date;
  endTime: Date;
}

export function toMeetingResource(meeting: Meeting): Resource {
  return { kind: 'meeting', teamId: meeting.teamId, creatorId: meeting.creatorId };
}

/**
 * Attach participant ids to a batch of meetings with a single query.
 */
export function withParticipants(
  executor: DbExecutor,
  rows: Meeting[],
): MeetingWithParticipants[] {
  if (rows.length === 0) return [];

  const links = executor
    .select()
    .from(meetingParticipants)
    .where(
      inArray(
        meetingParticipants.meetingId,
        rows.map((m) => m.id),
      ),
    )
    .orderBy(asc(meetingParticipants.userId))
    .all();

  const byMeeting = new Map<string, string[]>();
  for (const link of links) {
    const ids = byMeeting.get(link.meetingId) ?? [];
    ids.push(link.userId);
    byMeeting.set(link.meetingId, ids);
  }

  return rows.map((meeting) => ({ ...meeting, participantIds: byMeeting.get(meeting.id) ?? [] }));
}

function findMeeting(meetingId: string): Meeting {
  const meeting = db.select().from(meetings).where(eq(meetings.id, meetingId)).get();
  if (!meeting) throw new NotFoundError('Meeting', meetingId);
  return meeting;
}

async function authorizeMeeting(actor: Actor, meetingId: string, action: Action): Promise<Meeting> {
  const meeting = findMeeting(meetingId);
  const context = await loadAccessContext(actor.id);
  enforce(actor, toMeetingResource(meeting), action, context);
  return meeting;
}

/**
 * Participants must all belong to the meeting's team. Duplicates are dropped.
 */
function validateParticipants(executor: DbExecutor, teamId: string, participantIds: string[]): string[] {
  const unique = [...new Set(participantIds)];
  if (unique.length === 0) return unique;

  const memberIds = new Set(
    executor
      .select({ userId: memberships.userId })
      .from(memberships)
      .where(and(eq(memberships.teamId, teamId), inArray(memberships.userId, unique)))
      .all()
      .map((row) => row.userId),
  );

  const outsiders = unique.filter((id) => !memberIds.has(id));
  if (outsiders.length > 0) {
    throw new ValidationError('Participants must be members of the meeting team', { outsiders });
  }
  return unique;
}

/**
 * Meetings (other than `excludeMeetingId`) that overlap [start, end) for any of the given users.
 */
export async function findConflicts(
  participantIds: string[],
  startTime: Date,
  endTime: Date,
  excludeMeetingId?: string,
): Promise<MeetingConflict[]> {
  if (participantIds.length === 0) return [];

  const conditions: SQL[] = [
    inArray(meetingParticipants.userId, participantIds),
    lt(meetings.startTime, endTime),
    gt(meetings.endTime, startTime),
  ];
  if (excludeMeetingId) conditions.push(ne(meetings.id, excludeMeetingId));

  return db
    .select({
      userId: meetingParticipants.userId,
      meetingId: meetings.id,
      title: meetings.title,
      startTime: meetings.startTime,
      endTime: meetings.endTime,
    })
    .from(meetingParticipants)
    .innerJoin(meetings, eq(meetings.id, meetingParticipants.meetingId))
    .where(and(...conditions))
    .orderBy(asc(meetings.startTime), asc(meetingParticipants.userId))
    .all();
}

// ============================================================================
// Meeting CRUD
// ============================================================================

/**
 * Create a meeting. Overlapping meetings of the participants are reported
 * back as `conflicts`; they do not block the write.
 */
export async function createMeeting(actor: Actor, input: CreateMeetingInput) {
  const team = db.select({ id: teams.id }).from(teams).where(eq(teams.id, input.teamId)).get();
  if (!team) throw new NotFoundError('Team', input.teamId);

  const context = await loadAccessContext(actor.id);
  enforce(actor, { kind: 'meeting', teamId: input.teamId, creatorId: actor.id }, 'create', context);

  const conflicts = await findConflicts(
    [...new Set(input.participantIds)],
    input.startTime,
    input.endTime,
  );

  const meeting = db.transaction((tx) => {
    const participantIds = validateParticipants(tx, input.teamId, input.participantIds);
    const now = new Date();
    const created = tx
      .insert(meetings)
      .values({
        id: randomUUID(),
        teamId: input.teamId,
        creatorId: actor.id,
        title: input.title,
        description: input.description ?? null,
        location: input.location ?? null,
        startTime: input.startTime,
        endTime: input.endTime,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .get();

    if (participantIds.length > 0) {
      tx.insert(meetingParticipants)
        .values(participantIds.map((userId) => ({ meetingId: created.id, userId })))
        .run();
    }

    return withParticipants(tx, [created])[0];
  });

  return { meeting, conflicts };
}

export async function listMeetings(
  actor: Actor,
  query: MeetingListQuery,
): Promise<MeetingWithParticipants[]> {
  await authorizeTeam(actor, query.teamId, 'read');

  const conditions: SQL[] = [eq(meetings.teamId, query.teamId)];
  if (query.to) conditions.push(lt(meetings.startTime, query.to));
  if (query.from) conditions.push(gt(meetings.endTime, query.from));

  const rows = db
    .select()
    .from(meetings)
    .where(and(...conditions))
    .orderBy(asc(meetings.startTime), asc(meetings.id))
    .all();
  return withParticipants(db, rows);
}

/**
 * Meetings the actor created or takes part in, in the teams they still belong to.
 */
export async function listMyMeetings(actor: Actor): Promise<MeetingWithParticipants[]> {
  const teamIds = await listTeamIdsForUser(actor.id);
  if (teamIds.length === 0) return [];

  const participating = db
    .select({ id: meetingParticipants.meetingId })
    .from(meetingParticipants)
    .where(eq(meetingParticipants.userId, actor.id));

  const rows = db
    .select()
    .from(meetings)
    .where(
      and(
        inArray(meetings.teamId, teamIds),
        or(eq(meetings.creatorId, actor.id), inArray(meetings.id, participating)),
      ),
    )
    .orderBy(asc(meetings.startTime), asc(meetings.id))
    .all();
  return withParticipants(db, rows);
}

export async function getMeeting(actor: Actor, meetingId: string): Promise<MeetingWithParticipants> {
  const meeting = await authorizeMeeting(actor, meetingId, 'read');
  return withParticipants(db, [meeting])[0];
}

export async function updateMeeting(actor: Actor, meetingId: string, input: UpdateMeetingInput) {
  const existing = await authorizeMeeting(actor, meetingId, 'update');

  const startTime = input.startTime ?? existing.startTime;
  const endTime = input.endTime ?? existing.endTime;
  if (endTime.getTime() <= startTime.getTime()) {
    throw new ValidationError('endTime must be after startTime');
  }

  const meeting = db.transaction((tx) => {
    if (input.participantIds !== undefined) {
      const participantIds = validateParticipants(tx, existing.teamId, input.participantIds);
      tx.delete(meetingParticipants).where(eq(meetingParticipants.meetingId, meetingId)).run();
      if (participantIds.length > 0) {
        tx.insert(meetingParticipants)
          .values(participantIds.map((userId) => ({ meetingId, userId })))
          .run();
      }
    }

    const updated = tx
      .update(meetings)
      .set({
        ...(input.title !== undefined ? { title: input.title } : {}),
        ...(input.description !== undefined ? { description: input.description } : {}),
        ...(input.location !== undefined ? { location: input.location } : {}),
        startTime,
        endTime,
        updatedAt: new Date(),
      })
      .where(eq(meetings.id, meetingId))
      .returning()
      .get();

    return withParticipants(tx, [updated])[0];
  });

  const conflicts = await findConflicts(meeting.participantIds, startTime, endTime, meetingId);
  return { meeting, conflicts };
}

export async function deleteMeeting(actor: Actor, meetingId: string): Promise<void> {
  await authorizeMeeting(actor, meetingId, 'delete');
  db.delete(meetings).where(eq(meetings.id, meetingId)).run();
}
