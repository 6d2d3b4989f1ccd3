import { z } from 'zod';
import { TASK_PRIORITIES, TASK_STATUSES, type TaskStatus } from '../db/schema.js';
import { isoDateSchema, timeOfDaySchema, uuidSchema } from './common.schema.js';

// Valid status transitions
export const STATUS_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  TODO: ['IN_PROGRESS', 'DONE'],
  IN_PROGRESS: ['TODO', 'DONE'],
  DONE: ['IN_PROGRESS'],
};

export function isValidStatusTransition(from: TaskStatus, to: TaskStatus): boolean {
  return from === to || STATUS_TRANSITIONS[from].includes(to);
}

const TaskStatusEnum = z.enum(TASK_STATUSES);
const TaskPriorityEnum = z.enum(TASK_PRIORITIES);

/**
 * Schema for creating a new task
 */
export const CreateTaskSchema = z
  .object({
    teamId: uuidSchema,
    title: z.string().trim().min(1, 'Title is required').max(200),
    description: z.string().max(4000).optional().nullable(),
    priority: TaskPriorityEnum.default('MEDIUM'),
    assigneeId: uuidSchema.optional().nullable(),
    dueDate: isoDateSchema.optional().nullable(),
    dueTime: timeOfDaySchema.optional().nullable(),
  })
  .refine((data) => !data.dueTime || data.dueDate, {
    message: 'dueTime requires dueDate',
    path: ['dueTime'],
  });

export type CreateTaskInput = z.infer<typeof CreateTaskSchema>;

export const UpdateTaskSchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  description: z.string().max(4000).optional().nullable(),
  status: TaskStatusEnum.optional(),
  priority: TaskPriorityEnum.optional(),
  assigneeId: uuidSchema.optional().nullable(),
  dueDate: isoDateSchema.optional().nullable(),
  dueTime: timeOfDaySchema.optional().nullable(),
});

export type UpdateTaskInput = z.infer<typeof UpdateTaskSchema>;

export const AssignTaskSchema = z.object({
  assigneeId: uuidSchema.nullable(),
});

export const TaskFiltersSchema = z.object({
  teamId: uuidSchema,
  status: TaskStatusEnum.optional(),
  priority: TaskPriorityEnum.optional(),
  assigneeId: uuidSchema.optional(),
  page: z.coerce.number().int().positive().default(1),
  limit: z.coerce.number().int().positive().max(100).default(50),
});

export type TaskFilters = z.infer<typeof TaskFiltersSchema>;

export const TeamQuerySchema = z.object({
  teamId: uuidSchema,
});
