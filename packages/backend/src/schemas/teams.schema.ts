import { z } from 'zod';
import { uuidSchema } from './common.schema.js';

export const CreateTeamSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
  description: z.string().max(4000).optional().nullable(),
});

export type CreateTeamInput = z.infer<typeof CreateTeamSchema>;

export const UpdateTeamSchema = z.object({
  name: z.string().trim().min(1).max(200).optional(),
  description: z.string().max(4000).optional().nullable(),
});

export type UpdateTeamInput = z.infer<typeof UpdateTeamSchema>;

export const AddMemberSchema = z.object({
  userId: uuidSchema,
  role: z.enum(['OWNER', 'MEMBER']).default('MEMBER'),
});

export type AddMemberInput = z.infer<typeof AddMemberSchema>;

export const MemberParamsSchema = z.object({
  id: uuidSchema,
  userId: uuidSchema,
});

export const TransferOwnershipSchema = z.object({
  userId: uuidSchema,
});

export const JoinTeamSchema = z.object({
  inviteCode: z.string().trim().min(1, 'Invite code is required').max(50),
});
