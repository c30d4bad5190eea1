import { z } from 'zod';
import { QUANTITY_MAX } from '../lib/numbers';
import { documentNumberSchema } from './documents.schema';

export const receiptLineSchema = z.object({
  itemId: z.string().uuid(),
  locationId: z.string().uuid().nullable().optional(),
  quantity: z.number().finite().max(QUANTITY_MAX).positive(),
  unitPrice: z.number().finite().max(QUANTITY_MAX).min(0).nullable().optional()
});

export const receiptSchema = z.object({
  number: documentNumberSchema,
  supplier: z.string().max(255).nullable().optional(),
  invoiceNumber: z.string().max(255).nullable().optional(),
  notes: z.string().max(2000).nullable().optional(),
  createdBy: z.string().max(255).nullable().optional(),
  lines: z.array(receiptLineSchema).min(1)
});
