import { z } from 'zod';

export const UpdateProfileSchema = z.object({
  firstName: z.string().trim().min(1).max(100).optional(),
  lastName: z.string().trim().min(1).max(100).optional(),
});

export type UpdateProfileInput = z.infer<typeof UpdateProfileSchema>;

export const UpdateUserStatusSchema = z.object({
  isActive: z.boolean(),
});

export const UserListQuerySchema = z.object({
  search: z.string().optional(),
  includeInactive: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  page: z.coerce.number().int().positive().default(1),
  limit: z.coerce.number().int().positive().max(100).default(50),
});

export type UserListQuery = z.infer<typeof UserListQuerySchema>;
