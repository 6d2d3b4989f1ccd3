import { z } from 'zod';
import { uuidSchema } from './common.schema.js';

const scoreSchema = z.number().int().min(1, 'Score must be between 1 and 5').max(5, 'Score must be between 1 and 5');

export const CreateEvaluationSchema = z.object({
  teamId: uuidSchema,
  subjectId: uuidSchema,
  taskId: uuidSchema.optional().nullable(),
  score: scoreSchema,
  notes: z.string().max(4000).optional().nullable(),
});

export type CreateEvaluationInput = z.infer<typeof CreateEvaluationSchema>;

export const UpdateEvaluationSchema = z.object({
  score: scoreSchema.optional(),
  notes: z.string().max(4000).optional().nullable(),
});

export type UpdateEvaluationInput = z.infer<typeof UpdateEvaluationSchema>;
