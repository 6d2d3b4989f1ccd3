import { randomUUID } from 'node:crypto';
import { and, count, desc, eq, type SQL } from 'drizzle-orm';
import { db, type DbExecutor } from '../lib/db.js';
import { auditEvents } from '../db/schema.js';

// ============================================================================
// Audit Service
// ============================================================================

export interface AuditLogInput {
  actorId?: string | null;
  entityType: string;
  entityId: string;
  action: string;
  payload: Record<string, unknown>;
}

/**
 * Record an audit event. Pass the open transaction so the event commits
 * (or rolls back) together with the change it describes.
 */
export function logAuditEvent(input: AuditLogInput, executor: DbExecutor = db) {
  return executor
    .insert(auditEvents)
    .values({
      id: randomUUID(),
      actorId: input.actorId ?? null,
      entityType: input.entityType,
      entityId: input.entityId,
      action: input.action,
      payload: input.payload,
      createdAt: new Date(),
    })
    .returning()
    .get();
}

export async function queryAuditEvents(filters: {
  entityType?: string;
  entityId?: string;
  actorId?: string;
  page?: number;
  limit?: number;
}) {
  const { entityType, entityId, actorId, page = 1, limit = 50 } = filters;

  const conditions: SQL[] = [];
  if (entityType) conditions.push(eq(auditEvents.entityType, entityType));
  if (entityId) conditions.push(eq(auditEvents.entityId, entityId));
  if (actorId) conditions.push(eq(auditEvents.actorId, actorId));
  const where = conditions.length > 0 ? and(...conditions) : undefined;

  const events = db
    .select()
    .from(auditEvents)
    .where(where)
    .orderBy(desc(auditEvents.createdAt))
    .limit(limit)
    .offset((page - 1) * limit)
    .all();
  const [{ total }] = db.select({ total: count() }).from(auditEvents).where(where).all();

  return {
    data: events,
    pagination: {
      page,
      limit,
      total,
      totalPages: Math.ceil(total / limit),
    },
  };
}
