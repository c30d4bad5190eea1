import { z } from 'zod';
import { DOCUMENT_STATUSES } from '../domains/inventory/types';

export const documentNumberSchema = z.string().trim().min(1).max(64);

export const documentListQuerySchema = z.object({
  status: z.enum(DOCUMENT_STATUSES).optional(),
  limit: z.coerce.number().int().positive().max(200).optional(),
  offset: z.coerce.number().int().nonnegative().optional()
});

export const documentActionSchema = z.object({
  actor: z.string().trim().min(1).max(255).optional()
});
