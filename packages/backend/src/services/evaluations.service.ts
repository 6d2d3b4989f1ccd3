import { randomUUID } from 'node:crypto';
import { and, asc, desc, eq } from 'drizzle-orm';
import { db, type DbExecutor } from '../lib/db.js';
import {
  evaluations,
  memberships,
  tasks,
  teams,
  users,
  type Evaluation,
} from '../db/schema.js';
import {
  ConflictError,
  ForbiddenError,
  InvalidOperationError,
  NotFoundError,
  ValidationError,
} from '../lib/errors.js';
import {
  check,
  enforce,
  type AccessContext,
  type Action,
  type Actor,
  type Resource,
} from '../lib/permissions.js';
import type {
  CreateEvaluationInput,
  UpdateEvaluationInput,
} from '../schemas/evaluations.schema.js';
import { logAuditEvent } from './audit.service.js';
import { loadAccessContext } from './membership.service.js';
import { authorizeTeam } from './teams.service.js';

export interface EvaluationStatistics {
  userId: string;
  count: number;
  average: number | null;
  distribution: Record<1 | 2 | 3 | 4 | 5, number>;
}

type Score = keyof EvaluationStatistics['distribution'];

function isScore(value: number): value is Score {
  return Number.isInteger(value) && value >= 1 && value <= 5;
}

export function toEvaluationResource(evaluation: Evaluation): Resource {
  return {
    kind: 'evaluation',
    teamId: evaluation.teamId,
    evaluatorId: evaluation.evaluatorId,
    subjectId: evaluation.subjectId,
  };
}

async function authorizeEvaluation(
  actor: Actor,
  evaluationId: string,
  action: Action,
): Promise<Evaluation> {
  const evaluation = db.select().from(evaluations).where(eq(evaluations.id, evaluationId)).get();
  if (!evaluation) throw new NotFoundError('Evaluation', evaluationId);

  const context = await loadAccessContext(actor.id);
  enforce(actor, toEvaluationResource(evaluation), action, context);
  return evaluation;
}

function isTeamMember(executor: DbExecutor, teamId: string, userId: string): boolean {
  const row = executor
    .select({ userId: memberships.userId })
    .from(memberships)
    .where(and(eq(memberships.teamId, teamId), eq(memberships.userId, userId)))
    .get();
  return row !== undefined;
}

function readable(actor: Actor, rows: Evaluation[], context: AccessContext): Evaluation[] {
  return rows.filter((row) => check(actor, toEvaluationResource(row), 'read', context).allowed);
}

// ============================================================================
// Evaluation CRUD
// ============================================================================

/**
 * Record an evaluation of `subjectId` by the actor. A linked task must be a
 * completed task of the same team, evaluated at most once per subject.
 */
export async function createEvaluation(
  actor: Actor,
  input: CreateEvaluationInput,
): Promise<Evaluation> {
  const team = db.select({ id: teams.id }).from(teams).where(eq(teams.id, input.teamId)).get();
  if (!team) throw new NotFoundError('Team', input.teamId);

  const subject = db.select({ id: users.id }).from(users).where(eq(users.id, input.subjectId)).get();
  if (!subject) throw new NotFoundError('User', input.subjectId);

  const context = await loadAccessContext(actor.id, { subjectId: input.subjectId });
  enforce(
    actor,
    {
      kind: 'evaluation',
      teamId: input.teamId,
      evaluatorId: actor.id,
      subjectId: input.subjectId,
    },
    'create',
    context,
  );

  // Applies to admins too: evaluator and subject are distinct members of the team.
  if (input.subjectId === actor.id) {
    throw new InvalidOperationError('You cannot evaluate yourself');
  }

  const taskId = input.taskId ?? null;

  return db.transaction((tx) => {
    if (!isTeamMember(tx, input.teamId, actor.id)) {
      throw new ForbiddenError('You are not a member of this team');
    }
    if (!isTeamMember(tx, input.teamId, input.subjectId)) {
      throw new ForbiddenError('Evaluator and subject do not share this team');
    }

    if (taskId) {
      const task = tx.select().from(tasks).where(eq(tasks.id, taskId)).get();
      if (!task) throw new NotFoundError('Task', taskId);
      if (task.teamId !== input.teamId) {
        throw new ValidationError('Task does not belong to this team', { taskId });
      }
      if (task.status !== 'DONE') {
        throw new ValidationError('Only completed tasks can be evaluated', { taskId });
      }

      const duplicate = tx
        .select({ id: evaluations.id })
        .from(evaluations)
        .where(and(eq(evaluations.taskId, taskId), eq(evaluations.subjectId, input.subjectId)))
        .get();
      if (duplicate) {
        throw new ConflictError(`User '${input.subjectId}' has already been evaluated for task '${taskId}'`);
      }
    }

    const now = new Date();
    const evaluation = tx
      .insert(evaluations)
      .values({
        id: randomUUID(),
        teamId: input.teamId,
        subjectId: input.subjectId,
        evaluatorId: actor.id,
        taskId,
        score: input.score,
        notes: input.notes ?? null,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .get();

    logAuditEvent(
      {
        actorId: actor.id,
        entityType: 'Evaluation',
        entityId: evaluation.id,
        action: 'CREATE',
        payload: { teamId: input.teamId, subjectId: input.subjectId, score: input.score },
      },
      tx,
    );

    return evaluation;
  });
}

export async function getEvaluation(actor: Actor, evaluationId: string): Promise<Evaluation> {
  return authorizeEvaluation(actor, evaluationId, 'read');
}

/**
 * Evaluations about a user, limited to those the actor may read.
 */
export async function listEvaluationsForSubject(
  actor: Actor,
  subjectId: string,
): Promise<Evaluation[]> {
  const rows = db
    .select()
    .from(evaluations)
    .where(eq(evaluations.subjectId, subjectId))
    .orderBy(desc(evaluations.createdAt), asc(evaluations.id))
    .all();
  return readable(actor, rows, await loadAccessContext(actor.id));
}

export async function listEvaluationsByEvaluator(
  actor: Actor,
  evaluatorId: string,
): Promise<Evaluation[]> {
  const rows = db
    .select()
    .from(evaluations)
    .where(eq(evaluations.evaluatorId, evaluatorId))
    .orderBy(desc(evaluations.createdAt), asc(evaluations.id))
    .all();
  return readable(actor, rows, await loadAccessContext(actor.id));
}

export async function listTeamEvaluations(actor: Actor, teamId: string): Promise<Evaluation[]> {
  await authorizeTeam(actor, teamId, 'read');

  const rows = db
    .select()
    .from(evaluations)
    .where(eq(evaluations.teamId, teamId))
    .orderBy(desc(evaluations.createdAt), asc(evaluations.id))
    .all();
  return readable(actor, rows, await loadAccessContext(actor.id));
}

export async function updateEvaluation(
  actor: Actor,
  evaluationId: string,
  input: UpdateEvaluationInput,
): Promise<Evaluation> {
  await authorizeEvaluation(actor, evaluationId, 'update');

  return db
    .update(evaluations)
    .set({
      ...(input.score !== undefined ? { score: input.score } : {}),
      ...(input.notes !== undefined ? { notes: input.notes } : {}),
      updatedAt: new Date(),
    })
    .where(eq(evaluations.id, evaluationId))
    .returning()
    .get();
}

export async function deleteEvaluation(actor: Actor, evaluationId: string): Promise<void> {
  await authorizeEvaluation(actor, evaluationId, 'delete');
  db.delete(evaluations).where(eq(evaluations.id, evaluationId)).run();
}

// ============================================================================
// Statistics
// ============================================================================

/**
 * Score summary for a user over the evaluations the actor can see.
 */
export async function getEvaluationStatistics(
  actor: Actor,
  userId: string,
): Promise<EvaluationStatistics> {
  const visible = await listEvaluationsForSubject(actor, userId);

  const distribution = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
  let sum = 0;
  for (const evaluation of visible) {
    sum += evaluation.score;
    if (isScore(evaluation.score)) distribution[evaluation.score] += 1;
  }

  return {
    userId,
    count: visible.length,
    average: visible.length === 0 ? null : Math.round((sum / visible.length) * 100) / 100,
    distribution,
  };
}
