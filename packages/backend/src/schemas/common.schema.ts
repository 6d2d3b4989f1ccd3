import { z } from 'zod';

export const uuidSchema = z.uuid('Must be a valid UUID');

export const IdParamsSchema = z.object({
  id: uuidSchema,
});

export type IdParams = z.infer<typeof IdParamsSchema>;

/**
 * Calendar date in YYYY-MM-DD form that names a real day.
 */
export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be a date in format YYYY-MM-DD')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00.000Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
  }, 'Must be a valid calendar date');

export const timeOfDaySchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Must be a time in format HH:MM');

export const PaginationSchema = z.object({
  page: z.coerce.number().int().positive().default(1),
  limit: z.coerce.number().int().positive().max(100).default(50),
});
