import { describe, it, expect, beforeEach } from 'vitest';
import { compareEntries, dayView, monthView } from '../services/calendar.service.js';
import { addDays, daysInMonth, dueInstant, monthBounds } from '../lib/dates.js';
import { fixtures, resetDatabase, testUuid } from './setup.js';

const OWNER = testUuid('1');
const MEMBER = testUuid('2');
const STRANGER = testUuid('3');
const ADMIN = testUuid('9');
const TEAM = testUuid('100');
const OTHER_TEAM = testUuid('101');

const at = (iso: string) => new Date(iso);

describe('Calendar', () => {
  describe('date helpers', () => {
    it('handles month lengths and leap years', () => {
      expect(daysInMonth(2024, 2)).toBe(29);
      expect(daysInMonth(2023, 2)).toBe(28);
      expect(monthBounds(2024, 3)).toEqual({ first: '2024-03-01', last: '2024-03-31' });
      expect(addDays('2024-02-28', 2)).toBe('2024-03-01');
    });

    it('treats an untimed due date as due at the end of the day', () => {
      expect(dueInstant('2024-03-05', null)).toEqual(at('2024-03-06T00:00:00.000Z'));
      expect(dueInstant('2024-03-05', '09:15')).toEqual(at('2024-03-05T09:15:00.000Z'));
    });
  });

  describe('views', () => {
    beforeEach(() => {
      resetDatabase();
      fixtures.user({ id: OWNER });
      fixtures.user({ id: MEMBER });
      fixtures.user({ id: STRANGER });
      fixtures.user({ id: ADMIN, isAdmin: true });
      fixtures.team(TEAM, OWNER, [MEMBER]);
      fixtures.team(OTHER_TEAM, STRANGER);

      // Tasks
      fixtures.task({ id: testUuid('501'), teamId: TEAM, creatorId: OWNER, dueDate: '2024-03-05', dueTime: '09:00' });
      fixtures.task({ id: testUuid('502'), teamId: TEAM, creatorId: OWNER, dueDate: '2024-03-05', priority: 'LOW' });
      fixtures.task({ id: testUuid('503'), teamId: TEAM, creatorId: OWNER, dueDate: '2024-03-05', priority: 'URGENT' });
      fixtures.task({ id: testUuid('504'), teamId: TEAM, creatorId: OWNER, dueDate: '2024-03-20' });
      fixtures.task({ id: testUuid('505'), teamId: OTHER_TEAM, creatorId: STRANGER, dueDate: '2024-03-07' });
      fixtures.task({ id: testUuid('506'), teamId: TEAM, creatorId: OWNER, dueDate: '2024-04-01' });
      fixtures.task({ id: testUuid('507'), teamId: TEAM, creatorId: OWNER, dueDate: '2024-02-29' });
      fixtures.task({ id: testUuid('508'), teamId: TEAM, creatorId: OWNER });

      // Meetings
      fixtures.meeting({ id: testUuid('601'), teamId: TEAM, creatorId: OWNER, startTime: at('2024-03-05T09:00:00.000Z'), endTime: at('2024-03-05T10:00:00.000Z') });
      fixtures.meeting({ id: testUuid('602'), teamId: TEAM, creatorId: OWNER, startTime: at('2024-03-05T08:00:00.000Z'), endTime: at('2024-03-05T08:30:00.000Z') });
      fixtures.meeting({ id: testUuid('603'), teamId: TEAM, creatorId: OWNER, startTime: at('2024-03-30T22:00:00.000Z'), endTime: at('2024-04-01T02:00:00.000Z') });
      fixtures.meeting({ id: testUuid('604'), teamId: TEAM, creatorId: OWNER, startTime: at('2024-02-29T23:00:00.000Z'), endTime: at('2024-03-01T01:00:00.000Z') });
      fixtures.meeting({ id: testUuid('605'), teamId: TEAM, creatorId: OWNER, startTime: at('2024-03-10T10:00:00.000Z'), endTime: at('2024-03-11T00:00:00.000Z') });
      fixtures.meeting({ id: testUuid('606'), teamId: OTHER_TEAM, creatorId: STRANGER, startTime: at('2024-03-12T10:00:00.000Z'), endTime: at('2024-03-12T11:00:00.000Z') });
    });

    describe('monthView', () => {
      it('is keyed exactly by the active days of the month', async () => {
        const view = await monthView(MEMBER, 2024, 3);

        expect(view.year).toBe(2024);
        expect(view.month).toBe(3);
        expect(Object.keys(view.days)).toEqual([
          '2024-03-01',
          '2024-03-05',
          '2024-03-10',
          '2024-03-20',
          '2024-03-30',
          '2024-03-31',
        ]);
        expect(view.days).toEqual({
          '2024-03-01': { taskCount: 0, meetingCount: 1 },
          '2024-03-05': { taskCount: 3, meetingCount: 2 },
          '2024-03-10': { taskCount: 0, meetingCount: 1 },
          '2024-03-20': { taskCount: 1, meetingCount: 0 },
          '2024-03-30': { taskCount: 0, meetingCount: 1 },
          '2024-03-31': { taskCount: 0, meetingCount: 1 },
        });
      });

      it('only covers the caller\'s own teams, even for admins', async () => {
        expect((await monthView(STRANGER, 2024, 3)).days).toEqual({
          '2024-03-07': { taskCount: 1, meetingCount: 0 },
          '2024-03-12': { taskCount: 0, meetingCount: 1 },
        });
        expect((await monthView(ADMIN, 2024, 3)).days).toEqual({});
      });
    });

    describe('dayView', () => {
      it('sorts timed entries first, meetings before tasks at the same instant', async () => {
        const view = await dayView(MEMBER, '2024-03-05');

        expect(view.date).toBe('2024-03-05');
        expect(view.tasks.map((t) => t.id)).toEqual([testUuid('501'), testUuid('502'), testUuid('503')]);
        expect(view.meetings.map((m) => m.id)).toEqual([testUuid('602'), testUuid('601')]);
        expect(view.entries.map((e) => [e.type, e.id])).toEqual([
          ['meeting', testUuid('602')],
          ['meeting', testUuid('601')],
          ['task', testUuid('501')],
          ['task', testUuid('503')],
          ['task', testUuid('502')],
        ]);
      });

      it('includes meetings that started the previous day', async () => {
        const view = await dayView(MEMBER, '2024-03-01');
        expect(view.entries.map((e) => e.id)).toEqual([testUuid('604')]);
      });

      it('returns an empty day for users without teams', async () => {
        const view = await dayView(ADMIN, '2024-03-05');
        expect(view).toEqual({ date: '2024-03-05', tasks: [], meetings: [], entries: [] });
      });
    });
  });

  describe('compareEntries', () => {
    it('orders untimed tasks by priority, then id', () => {
      const untimed = (id: string, priority: 'LOW' | 'URGENT') => ({
        type: 'task' as const,
        id,
        teamId: TEAM,
        title: id,
        priority,
        due: null,
      });

      expect(compareEntries(untimed('b', 'URGENT'), untimed('a', 'LOW'))).toBeLessThan(0);
      expect(compareEntries(untimed('a', 'LOW'), untimed('b', 'LOW'))).toBeLessThan(0);
    });
  });
});
