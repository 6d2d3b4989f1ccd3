import { z } from 'zod';
import { PaginationSchema, uuidSchema } from './common.schema.js';

export const AuditQuerySchema = PaginationSchema.extend({
  entityType: z.string().min(1).optional(),
  entityId: z.string().min(1).optional(),
  actorId: uuidSchema.optional(),
});

export type AuditQuery = z.infer<typeof AuditQuerySchema>;
