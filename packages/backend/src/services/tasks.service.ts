import { randomUUID } from 'node:crypto';
import { and, asc, count, desc, eq, inArray, isNotNull, ne, or, type SQL } from 'drizzle-orm';
import { db } from '../lib/db.js';
import {
  tasks,
  teams,
  type Task,
  type TaskPriority,
  type TaskStatus,
} from '../db/schema.js';
import { InvalidOperationError, NotFoundError, ValidationError } from '../lib/errors.js';
import { enforce, type Action, type Actor, type Resource } from '../lib/permissions.js';
import { dueInstant } from '../lib/dates.js';
import {
  isValidStatusTransition,
  type CreateTaskInput,
  type TaskFilters,
  type UpdateTaskInput,
} from '../schemas/tasks.schema.js';
import { isMember, listTeamIdsForUser, loadAccessContext } from './membership.service.js';
import { authorizeTeam } from './teams.service.js';

export interface TaskStatistics {
  total: number;
  byStatus: Record<TaskStatus, number>;
  byPriority: Record<TaskPriority, number>;
  overdue: number;
  withoutAssignee: number;
}

export function toTaskResource(task: Task): Resource {
  return {
    kind: 'task',
    teamId: task.teamId,
    creatorId: task.creatorId,
    assigneeId: task.assigneeId,
  };
}

function findTask(taskId: string): Task {
  const task = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  if (!task) throw new NotFoundError('Task', taskId);
  return task;
}

/**
 * Load a task and check that the actor may perform `action` on it.
 */
export async function authorizeTask(actor: Actor, taskId: string, action: Action): Promise<Task> {
  const task = findTask(taskId);
  const context = await loadAccessContext(actor.id);
  enforce(actor, toTaskResource(task), action, context);
  return task;
}

async function assertAssignable(teamId: string, assigneeId: string | null | undefined) {
  if (assigneeId && !(await isMember(assigneeId, teamId))) {
    throw new ValidationError('Assignee is not a member of this team', { assigneeId });
  }
}

export function isOverdue(task: Task, now: Date): boolean {
  if (!task.dueDate || task.status === 'DONE') return false;
  return dueInstant(task.dueDate, task.dueTime).getTime() < now.getTime();
}

// ============================================================================
// Task CRUD
// ============================================================================

export async function createTask(actor: Actor, input: CreateTaskInput): Promise<Task> {
  const team = db.select({ id: teams.id }).from(teams).where(eq(teams.id, input.teamId)).get();
  if (!team) throw new NotFoundError('Team', input.teamId);

  const context = await loadAccessContext(actor.id);
  enforce(
    actor,
    { kind: 'task', teamId: input.teamId, creatorId: actor.id, assigneeId: input.assigneeId ?? null },
    'create',
    context,
  );
  await assertAssignable(input.teamId, input.assigneeId);

  const now = new Date();
  return db
    .insert(tasks)
    .values({
      id: randomUUID(),
      teamId: input.teamId,
      creatorId: actor.id,
      assigneeId: input.assigneeId ?? null,
      title: input.title,
      description: input.description ?? null,
      priority: input.priority,
      dueDate: input.dueDate ?? null,
      dueTime: input.dueTime ?? null,
      createdAt: now,
      updatedAt: now,
    })
    .returning()
    .get();
}

export async function listTasks(actor: Actor, filters: TaskFilters) {
  await authorizeTeam(actor, filters.teamId, 'read');

  const conditions: SQL[] = [eq(tasks.teamId, filters.teamId)];
  if (filters.status) conditions.push(eq(tasks.status, filters.status));
  if (filters.priority) conditions.push(eq(tasks.priority, filters.priority));
  if (filters.assigneeId) conditions.push(eq(tasks.assigneeId, filters.assigneeId));
  const where = and(...conditions);

  const { page, limit } = filters;
  const data = db
    .select()
    .from(tasks)
    .where(where)
    .orderBy(desc(tasks.createdAt), asc(tasks.id))
    .limit(limit)
    .offset((page - 1) * limit)
    .all();
  const [{ total }] = db.select({ total: count() }).from(tasks).where(where).all();

  return {
    data,
    pagination: { page, limit, total, totalPages: Math.ceil(total / limit) },
  };
}

/**
 * Tasks the actor created or is assigned to, in the teams they still belong to.
 */
export async function listMyTasks(actor: Actor): Promise<Task[]> {
  const teamIds = await listTeamIdsForUser(actor.id);
  if (teamIds.length === 0) return [];

  return db
    .select()
    .from(tasks)
    .where(
      and(
        inArray(tasks.teamId, teamIds),
        or(eq(tasks.creatorId, actor.id), eq(tasks.assigneeId, actor.id)),
      ),
    )
    .orderBy(desc(tasks.createdAt), asc(tasks.id))
    .all();
}

export async function getTask(actor: Actor, taskId: string): Promise<Task> {
  return authorizeTask(actor, taskId, 'read');
}

export async function updateTask(
  actor: Actor,
  taskId: string,
  input: UpdateTaskInput,
): Promise<Task> {
  const task = await authorizeTask(actor, taskId, 'update');

  if (input.status && !isValidStatusTransition(task.status, input.status)) {
    throw new InvalidOperationError(
      `Cannot change task status from ${task.status} to ${input.status}`,
    );
  }
  if (input.assigneeId !== undefined) {
    await assertAssignable(task.teamId, input.assigneeId);
  }

  const dueDate = input.dueDate !== undefined ? input.dueDate : task.dueDate;
  // Clearing the date clears the time with it
  const dueTime = dueDate === null ? null : input.dueTime !== undefined ? input.dueTime : task.dueTime;
  if (dueTime && !dueDate) {
    throw new ValidationError('dueTime requires dueDate');
  }

  const status = input.status ?? task.status;
  let completedAt = task.completedAt;
  if (status === 'DONE' && task.status !== 'DONE') completedAt = new Date();
  if (status !== 'DONE') completedAt = null;

  return db
    .update(tasks)
    .set({
      ...(input.title !== undefined ? { title: input.title } : {}),
      ...(input.description !== undefined ? { description: input.description } : {}),
      ...(input.priority !== undefined ? { priority: input.priority } : {}),
      ...(input.assigneeId !== undefined ? { assigneeId: input.assigneeId } : {}),
      status,
      dueDate,
      dueTime,
      completedAt,
      updatedAt: new Date(),
    })
    .where(eq(tasks.id, taskId))
    .returning()
    .get();
}

export async function assignTask(
  actor: Actor,
  taskId: string,
  assigneeId: string | null,
): Promise<Task> {
  return updateTask(actor, taskId, { assigneeId });
}

export async function completeTask(actor: Actor, taskId: string): Promise<Task> {
  const task = await authorizeTask(actor, taskId, 'update');
  if (task.status === 'DONE') {
    throw new InvalidOperationError('Task is already completed');
  }
  return updateTask(actor, taskId, { status: 'DONE' });
}

export async function deleteTask(actor: Actor, taskId: string): Promise<void> {
  await authorizeTask(actor, taskId, 'delete');
  db.delete(tasks).where(eq(tasks.id, taskId)).run();
}

// ============================================================================
// Team reports
// ============================================================================

export async function listOverdueTasks(
  actor: Actor,
  teamId: string,
  now = new Date(),
): Promise<Task[]> {
  await authorizeTeam(actor, teamId, 'read');

  return db
    .select()
    .from(tasks)
    .where(and(eq(tasks.teamId, teamId), ne(tasks.status, 'DONE'), isNotNull(tasks.dueDate)))
    .orderBy(asc(tasks.dueDate), asc(tasks.dueTime), asc(tasks.id))
    .all()
    .filter((task) => isOverdue(task, now));
}

export async function getTeamStatistics(
  actor: Actor,
  teamId: string,
  now = new Date(),
): Promise<TaskStatistics> {
  await authorizeTeam(actor, teamId, 'read');

  const teamTasks = db.select().from(tasks).where(eq(tasks.teamId, teamId)).all();

  const stats: TaskStatistics = {
    total: teamTasks.length,
    byStatus: { TODO: 0, IN_PROGRESS: 0, DONE: 0 },
    byPriority: { LOW: 0, MEDIUM: 0, HIGH: 0, URGENT: 0 },
    overdue: 0,
    withoutAssignee: 0,
  };

  for (const task of teamTasks) {
    stats.byStatus[task.status] += 1;
    stats.byPriority[task.priority] += 1;
    if (isOverdue(task, now)) stats.overdue += 1;
    if (!task.assigneeId) stats.withoutAssignee += 1;
  }

  return stats;
}
