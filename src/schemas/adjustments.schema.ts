import { z } from 'zod';
import { QUANTITY_MAX } from '../lib/numbers';

export const adjustBalanceSchema = z.object({
  itemId: z.string().uuid(),
  locationId: z.string().uuid(),
  targetQuantity: z.number().finite().max(QUANTITY_MAX).min(0),
  reason: z.string().trim().min(1).max(2000),
  actor: z.string().trim().min(1).max(255).optional()
});
