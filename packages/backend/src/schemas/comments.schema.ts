import { z } from 'zod';

export const CreateCommentSchema = z.object({
  content: z.string().trim().min(1, 'Content is required').max(4000),
});

export type CreateCommentInput = z.infer<typeof CreateCommentSchema>;

export const UpdateCommentSchema = CreateCommentSchema;

export type UpdateCommentInput = z.infer<typeof UpdateCommentSchema>;
