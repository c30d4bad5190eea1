import { z } from 'zod';

export const stockReportQuerySchema = z.object({
  below_min_only: z.enum(['true', 'false']).optional()
});

export const movementReportQuerySchema = z.object({
  item_id: z.string().uuid().optional(),
  from: z.string().datetime({ offset: true }).optional(),
  to: z.string().datetime({ offset: true }).optional(),
  limit: z.coerce.number().int().positive().max(5000).optional()
});
