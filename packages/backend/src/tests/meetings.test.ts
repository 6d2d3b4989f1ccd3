import { describe, it, expect, beforeEach } from 'vitest';
import { ForbiddenError, ValidationError } from '../lib/errors.js';
import { CreateMeetingSchema } from '../schemas/meetings.schema.js';
import { leaveTeam } from '../services/membership.service.js';
import * as meetingsService from '../services/meetings.service.js';
import { actorOf, fixtures, resetDatabase, testUuid } from './setup.js';

const OWNER = testUuid('1');
const MEMBER = testUuid('2');
const COLLEAGUE = testUuid('3');
const OUTSIDER = testUuid('4');
const TEAM = testUuid('100');

const owner = actorOf({ id: OWNER, isAdmin: false });
const member = actorOf({ id: MEMBER, isAdmin: false });
const colleague = actorOf({ id: COLLEAGUE, isAdmin: false });

const at = (iso: string) => new Date(iso);

describe('Meetings', () => {
  beforeEach(() => {
    resetDatabase();
    fixtures.user({ id: OWNER });
    fixtures.user({ id: MEMBER });
    fixtures.user({ id: COLLEAGUE });
    fixtures.user({ id: OUTSIDER });
    fixtures.team(TEAM, OWNER, [MEMBER, COLLEAGUE]);
  });

  it('rejects an end time that is not after the start', () => {
    const result = CreateMeetingSchema.safeParse({
      teamId: TEAM,
      title: 'Standup',
      startTime: '2024-03-01T10:00:00.000Z',
      endTime: '2024-03-01T10:00:00.000Z',
    });
    expect(result.success).toBe(false);
  });

  it('creates a meeting with deduplicated participants', async () => {
    const { meeting, conflicts } = await meetingsService.createMeeting(member, {
      teamId: TEAM,
      title: 'Planning',
      startTime: at('2024-03-01T10:00:00.000Z'),
      endTime: at('2024-03-01T11:00:00.000Z'),
      participantIds: [COLLEAGUE, MEMBER, COLLEAGUE],
    });

    expect(meeting.creatorId).toBe(MEMBER);
    expect(meeting.participantIds).toEqual([MEMBER, COLLEAGUE].sort());
    expect(conflicts).toEqual([]);
  });

  it('requires every participant to be a team member', async () => {
    await expect(
      meetingsService.createMeeting(member, {
        teamId: TEAM,
        title: 'Planning',
        startTime: at('2024-03-01T10:00:00.000Z'),
        endTime: at('2024-03-01T11:00:00.000Z'),
        participantIds: [OUTSIDER],
      }),
    ).rejects.toThrow(ValidationError);
  });

  it('reports overlapping meetings without blocking the write', async () => {
    fixtures.meeting(
      {
        id: testUuid('600'),
        teamId: TEAM,
        creatorId: OWNER,
        title: 'Retro',
        startTime: at('2024-03-01T10:30:00.000Z'),
        endTime: at('2024-03-01T11:30:00.000Z'),
      },
      [COLLEAGUE],
    );
    // Touches the new meeting's end only; half-open ranges do not overlap
    fixtures.meeting(
      {
        id: testUuid('601'),
        teamId: TEAM,
        creatorId: OWNER,
        startTime: at('2024-03-01T11:00:00.000Z'),
        endTime: at('2024-03-01T12:00:00.000Z'),
      },
      [MEMBER],
    );

    const { meeting, conflicts } = await meetingsService.createMeeting(member, {
      teamId: TEAM,
      title: 'Planning',
      startTime: at('2024-03-01T10:00:00.000Z'),
      endTime: at('2024-03-01T11:00:00.000Z'),
      participantIds: [MEMBER, COLLEAGUE],
    });

    expect(meeting.id).toBeDefined();
    expect(conflicts).toEqual([
      {
        userId: COLLEAGUE,
        meetingId: testUuid('600'),
        title: 'Retro',
        startTime: at('2024-03-01T10:30:00.000Z'),
        endTime: at('2024-03-01T11:30:00.000Z'),
      },
    ]);
  });

  it('excludes the meeting itself when checking conflicts on update', async () => {
    fixtures.meeting(
      {
        id: testUuid('602'),
        teamId: TEAM,
        creatorId: MEMBER,
        startTime: at('2024-03-02T09:00:00.000Z'),
        endTime: at('2024-03-02T10:00:00.000Z'),
      },
      [MEMBER],
    );

    const { meeting, conflicts } = await meetingsService.updateMeeting(member, testUuid('602'), {
      endTime: at('2024-03-02T10:30:00.000Z'),
    });

    expect(meeting.endTime).toEqual(at('2024-03-02T10:30:00.000Z'));
    expect(conflicts).toEqual([]);
  });

  it('validates the resulting time range on update', async () => {
    fixtures.meeting({
      id: testUuid('603'),
      teamId: TEAM,
      creatorId: MEMBER,
      startTime: at('2024-03-02T09:00:00.000Z'),
      endTime: at('2024-03-02T10:00:00.000Z'),
    });

    await expect(
      meetingsService.updateMeeting(member, testUuid('603'), {
        startTime: at('2024-03-02T11:00:00.000Z'),
      }),
    ).rejects.toThrow('endTime must be after startTime');
  });

  it('lets only the creator or owner modify a meeting', async () => {
    fixtures.meeting({
      id: testUuid('604'),
      teamId: TEAM,
      creatorId: MEMBER,
      startTime: at('2024-03-03T09:00:00.000Z'),
      endTime: at('2024-03-03T10:00:00.000Z'),
    });

    await expect(
      meetingsService.updateMeeting(colleague, testUuid('604'), { title: 'Mine now' }),
    ).rejects.toThrow(ForbiddenError);
    await meetingsService.deleteMeeting(owner, testUuid('604'));
    await expect(meetingsService.getMeeting(member, testUuid('604'))).rejects.toThrow(
      "Meeting with id '00000000-0000-4000-8000-000000000604' not found",
    );
  });

  it('filters the team list by range and lists my meetings', async () => {
    fixtures.meeting(
      {
        id: testUuid('610'),
        teamId: TEAM,
        creatorId: OWNER,
        startTime: at('2024-03-04T09:00:00.000Z'),
        endTime: at('2024-03-04T10:00:00.000Z'),
      },
      [MEMBER],
    );
    fixtures.meeting({
      id: testUuid('611'),
      teamId: TEAM,
      creatorId: OWNER,
      startTime: at('2024-03-05T09:00:00.000Z'),
      endTime: at('2024-03-05T10:00:00.000Z'),
    });

    const inRange = await meetingsService.listMeetings(member, {
      teamId: TEAM,
      from: at('2024-03-05T00:00:00.000Z'),
      to: at('2024-03-06T00:00:00.000Z'),
    });
    expect(inRange.map((m) => m.id)).toEqual([testUuid('611')]);

    const mine = await meetingsService.listMyMeetings(member);
    expect(mine.map((m) => m.id)).toEqual([testUuid('610')]);
  });

  it('drops meetings of a team the caller has left', async () => {
    fixtures.meeting({
      id: testUuid('620'),
      teamId: TEAM,
      creatorId: MEMBER,
      startTime: at('2024-03-05T09:00:00.000Z'),
      endTime: at('2024-03-05T10:00:00.000Z'),
    });

    await leaveTeam(TEAM, MEMBER);

    expect(await meetingsService.listMyMeetings(member)).toEqual([]);
    await expect(meetingsService.getMeeting(member, testUuid('620'))).rejects.toThrow(ForbiddenError);
  });
});
