import { randomUUID } from 'node:crypto';
import { asc, eq } from 'drizzle-orm';
import { db } from '../lib/db.js';
import { comments, tasks, type Comment, type Task } from '../db/schema.js';
import { NotFoundError } from '../lib/errors.js';
import { enforce, type Action, type Actor } from '../lib/permissions.js';
import type { CreateCommentInput, UpdateCommentInput } from '../schemas/comments.schema.js';
import { loadAccessContext } from './membership.service.js';
import { authorizeTask } from './tasks.service.js';

/**
 * Resolve comment -> task -> team, then check the action.
 */
async function authorizeComment(
  actor: Actor,
  commentId: string,
  action: Action,
): Promise<{ comment: Comment; task: Task }> {
  const row = db
    .select({ comment: comments, task: tasks })
    .from(comments)
    .innerJoin(tasks, eq(tasks.id, comments.taskId))
    .where(eq(comments.id, commentId))
    .get();
  if (!row) throw new NotFoundError('Comment', commentId);

  const context = await loadAccessContext(actor.id);
  enforce(
    actor,
    { kind: 'comment', teamId: row.task.teamId, authorId: row.comment.authorId },
    action,
    context,
  );
  return row;
}

export async function listComments(actor: Actor, taskId: string): Promise<Comment[]> {
  await authorizeTask(actor, taskId, 'read');

  return db
    .select()
    .from(comments)
    .where(eq(comments.taskId, taskId))
    .orderBy(asc(comments.createdAt), asc(comments.id))
    .all();
}

export async function createComment(
  actor: Actor,
  taskId: string,
  input: CreateCommentInput,
): Promise<Comment> {
  const task = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  if (!task) throw new NotFoundError('Task', taskId);

  const context = await loadAccessContext(actor.id);
  enforce(actor, { kind: 'comment', teamId: task.teamId, authorId: actor.id }, 'create', context);

  const now = new Date();
  return db
    .insert(comments)
    .values({
      id: randomUUID(),
      taskId,
      authorId: actor.id,
      content: input.content,
      createdAt: now,
      updatedAt: now,
    })
    .returning()
    .get();
}

export async function getComment(actor: Actor, commentId: string): Promise<Comment> {
  const { comment } = await authorizeComment(actor, commentId, 'read');
  return comment;
}

export async function updateComment(
  actor: Actor,
  commentId: string,
  input: UpdateCommentInput,
): Promise<Comment> {
  await authorizeComment(actor, commentId, 'update');

  return db
    .update(comments)
    .set({ content: input.content, updatedAt: new Date() })
    .where(eq(comments.id, commentId))
    .returning()
    .get();
}

export async function deleteComment(actor: Actor, commentId: string): Promise<void> {
  await authorizeComment(actor, commentId, 'delete');
  db.delete(comments).where(eq(comments.id, commentId)).run();
}
