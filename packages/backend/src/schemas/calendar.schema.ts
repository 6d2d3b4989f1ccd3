import { z } from 'zod';
import { isoDateSchema } from './common.schema.js';

export const DayViewParamsSchema = z.object({
  date: isoDateSchema,
});

export const MonthViewParamsSchema = z.object({
  year: z.coerce.number().int().min(1970).max(9999),
  month: z.coerce.number().int().min(1).max(12),
});
