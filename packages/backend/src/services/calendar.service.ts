import { and, asc, eq, gt, gte, inArray, lt, lte } from 'drizzle-orm';
import { db } from '../lib/db.js';
import { meetings, tasks, type Task, type TaskPriority } from '../db/schema.js';
import { addDays, dueInstant, monthBounds, startOfDay, toIsoDate } from '../lib/dates.js';
import { listTeamIdsForUser } from './membership.service.js';
import { withParticipants, type MeetingWithParticipants } from './meetings.service.js';

// ============================================================================
// Types
// ============================================================================

export type CalendarEntry =
  | {
      type: 'meeting';
      id: string;
      teamId: string;
      title: string;
      start: Date;
      end: Date;
    }
  | {
      type: 'task';
      id: string;
      teamId: string;
      title: string;
      priority: TaskPriority;
      /** Null for tasks due on the day without a time. */
      due: Date | null;
    };

export interface DayView {
  date: string;
  tasks: Task[];
  meetings: MeetingWithParticipants[];
  entries: CalendarEntry[];
}

export interface DayCounts {
  taskCount: number;
  meetingCount: number;
}

export interface MonthView {
  year: number;
  month: number;
  /** Only days with at least one task or meeting are present. */
  days: Record<string, DayCounts>;
}

const PRIORITY_RANK: Record<TaskPriority, number> = {
  URGENT: 0,
  HIGH: 1,
  MEDIUM: 2,
  LOW: 3,
};

// ============================================================================
// Queries
// ============================================================================

function tasksDueBetween(teamIds: string[], first: string, last: string): Task[] {
  if (teamIds.length === 0) return [];
  return db
    .select()
    .from(tasks)
    .where(and(inArray(tasks.teamId, teamIds), gte(tasks.dueDate, first), lte(tasks.dueDate, last)))
    .orderBy(asc(tasks.dueDate), asc(tasks.id))
    .all();
}

/**
 * Meetings whose [start, end) intersects [from, to).
 */
function meetingsBetween(teamIds: string[], from: Date, to: Date) {
  if (teamIds.length === 0) return [];
  return db
    .select()
    .from(meetings)
    .where(and(inArray(meetings.teamId, teamIds), lt(meetings.startTime, to), gt(meetings.endTime, from)))
    .orderBy(asc(meetings.startTime), asc(meetings.id))
    .all();
}

// ============================================================================
// Ordering
// ============================================================================

function entryInstant(entry: CalendarEntry): number | null {
  if (entry.type === 'meeting') return entry.start.getTime();
  return entry.due ? entry.due.getTime() : null;
}

/**
 * Timed entries ascending (meetings before tasks at the same instant, then id);
 * untimed tasks last, by priority then id.
 */
export function compareEntries(a: CalendarEntry, b: CalendarEntry): number {
  const at = entryInstant(a);
  const bt = entryInstant(b);

  if (at !== null && bt !== null) {
    if (at !== bt) return at - bt;
    if (a.type !== b.type) return a.type === 'meeting' ? -1 : 1;
    return a.id.localeCompare(b.id);
  }
  if (at !== null) return -1;
  if (bt !== null) return 1;

  if (a.type === 'task' && b.type === 'task' && a.priority !== b.priority) {
    return PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  }
  return a.id.localeCompare(b.id);
}

function toEntries(dayTasks: Task[], dayMeetings: MeetingWithParticipants[]): CalendarEntry[] {
  const entries: CalendarEntry[] = [
    ...dayMeetings.map((m) => ({
      type: 'meeting' as const,
      id: m.id,
      teamId: m.teamId,
      title: m.title,
      start: m.startTime,
      end: m.endTime,
    })),
    ...dayTasks.map((t) => ({
      type: 'task' as const,
      id: t.id,
      teamId: t.teamId,
      title: t.title,
      priority: t.priority,
      due: t.dueDate && t.dueTime ? dueInstant(t.dueDate, t.dueTime) : null,
    })),
  ];
  return entries.sort(compareEntries);
}

// ============================================================================
// Views
// ============================================================================

/**
 * Everything on a user's calendar for one UTC day, across the teams they belong to.
 */
export async function dayView(userId: string, date: string): Promise<DayView> {
  const teamIds = await listTeamIdsForUser(userId);

  const dayTasks = tasksDueBetween(teamIds, date, date);
  const dayMeetings = withParticipants(
    db,
    meetingsBetween(teamIds, startOfDay(date), startOfDay(addDays(date, 1))),
  );

  return {
    date,
    tasks: dayTasks,
    meetings: dayMeetings,
    entries: toEntries(dayTasks, dayMeetings),
  };
}

/**
 * Per-day task and meeting counts for a month. A meeting counts on every day it touches.
 */
export async function monthView(userId: string, year: number, month: number): Promise<MonthView> {
  const teamIds = await listTeamIdsForUser(userId);
  const { first, last } = monthBounds(year, month);

  const counts = new Map<string, DayCounts>();
  const bump = (date: string, key: keyof DayCounts) => {
    const day = counts.get(date) ?? { taskCount: 0, meetingCount: 0 };
    day[key] += 1;
    counts.set(date, day);
  };

  for (const task of tasksDueBetween(teamIds, first, last)) {
    if (task.dueDate) bump(task.dueDate, 'taskCount');
  }

  for (const meeting of meetingsBetween(teamIds, startOfDay(first), startOfDay(addDays(last, 1)))) {
    const startDay = toIsoDate(meeting.startTime);
    let day = startDay < first ? first : startDay;
    while (day <= last && startOfDay(day).getTime() < meeting.endTime.getTime()) {
      bump(day, 'meetingCount');
      day = addDays(day, 1);
    }
  }

  const days: Record<string, DayCounts> = {};
  for (const date of [...counts.keys()].sort()) {
    const day = counts.get(date);
    if (day) days[date] = day;
  }

  return { year, month, days };
}
