import { z } from 'zod';
import { QUANTITY_MAX } from '../lib/numbers';
import { documentNumberSchema } from './documents.schema';

export const issueLineSchema = z.object({
  itemId: z.string().uuid(),
  locationId: z.string().uuid().nullable().optional(),
  quantity: z.number().finite().max(QUANTITY_MAX).positive()
});

export const issueSchema = z.object({
  number: documentNumberSchema,
  department: z.string().max(255).nullable().optional(),
  requester: z.string().max(255).nullable().optional(),
  purpose: z.string().max(2000).nullable().optional(),
  notes: z.string().max(2000).nullable().optional(),
  createdBy: z.string().max(255).nullable().optional(),
  lines: z.array(issueLineSchema).min(1)
});
