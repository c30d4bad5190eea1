import { z } from 'zod';
import { QUANTITY_MAX } from '../lib/numbers';
import { documentNumberSchema } from './documents.schema';

export const countLineSchema = z.object({
  itemId: z.string().uuid(),
  locationId: z.string().uuid().nullable().optional(),
  actualQuantity: z.number().finite().max(QUANTITY_MAX).min(0)
});

export const inventoryCountSchema = z.object({
  number: documentNumberSchema,
  notes: z.string().max(2000).nullable().optional(),
  createdBy: z.string().max(255).nullable().optional(),
  lines: z.array(countLineSchema).min(1)
});
