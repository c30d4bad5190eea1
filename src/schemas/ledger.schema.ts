import { z } from 'zod';
import { LEDGER_ACTIONS } from '../domains/inventory/types';

export const ledgerListQuerySchema = z.object({
  item_id: z.string().uuid().optional(),
  location_id: z.string().uuid().optional(),
  document_id: z.string().uuid().optional(),
  action: z.enum(LEDGER_ACTIONS).optional(),
  from: z.string().datetime({ offset: true }).optional(),
  to: z.string().datetime({ offset: true }).optional(),
  limit: z.coerce.number().int().positive().max(1000).optional(),
  offset: z.coerce.number().int().nonnegative().optional()
});

export const balanceListQuerySchema = z.object({
  item_id: z.string().uuid().optional(),
  location_id: z.string().uuid().optional()
});
