import { z } from 'zod';
import { uuidSchema } from './common.schema.js';

const instantSchema = z.coerce.date();

export const CreateMeetingSchema = z
  .object({
    teamId: uuidSchema,
    title: z.string().trim().min(1, 'Title is required').max(200),
    description: z.string().max(4000).optional().nullable(),
    location: z.string().max(255).optional().nullable(),
    startTime: instantSchema,
    endTime: instantSchema,
    participantIds: z.array(uuidSchema).default([]),
  })
  .refine((data) => data.endTime.getTime() > data.startTime.getTime(), {
    message: 'endTime must be after startTime',
    path: ['endTime'],
  });

export type CreateMeetingInput = z.infer<typeof CreateMeetingSchema>;

export const UpdateMeetingSchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  description: z.string().max(4000).optional().nullable(),
  location: z.string().max(255).optional().nullable(),
  startTime: instantSchema.optional(),
  endTime: instantSchema.optional(),
  participantIds: z.array(uuidSchema).optional(),
});

export type UpdateMeetingInput = z.infer<typeof UpdateMeetingSchema>;

export const MeetingListQuerySchema = z.object({
  teamId: uuidSchema,
  from: instantSchema.optional(),
  to: instantSchema.optional(),
});

export type MeetingListQuery = z.infer<typeof MeetingListQuerySchema>;
