import type { z } from 'zod';
import { validationError } from '../lib/errors';
import { logEvent } from '../lib/logger';
import { isWithinQuantityRange, QUANTITY_MAX, roundQuantity } from '../lib/numbers';
import { applyStockMutation, assertBalanceTarget, type StockMutationResult } from '../domains/inventory/mutationEngine';
import { runUnitOfWork, type LedgerContext } from '../domains/inventory/unitOfWork';
import type { adjustBalanceSchema } from '../schemas/adjustments.schema';

export type AdjustBalanceInput = z.infer<typeof adjustBalanceSchema>;

/**
 * Sets the balance to `targetQuantity`. The delta is taken against the locked balance, so a
 * concurrent writer cannot slip in between the read and the write.
 */
export async function adjustBalance(ctx: LedgerContext, data: AdjustBalanceInput): Promise<StockMutationResult> {
  if (!isWithinQuantityRange(data.targetQuantity) || data.targetQuantity < 0) {
    throw validationError('TARGET_QUANTITY_INVALID', `Target quantity must be between 0 and ${QUANTITY_MAX}.`, {
      targetQuantity: data.targetQuantity
    });
  }
  const reason = data.reason.trim();
  if (!reason) {
    throw validationError('REASON_REQUIRED', 'A reason is required for a manual adjustment.');
  }
  const key = { itemId: data.itemId, locationId: data.locationId };
  const target = roundQuantity(data.targetQuantity);

  const result = await runUnitOfWork(ctx, 'adjust_balance', async (session) => {
    await assertBalanceTarget(session, key);
    const current = await session.lockBalance(key);
    return applyStockMutation(session, {
      ...key,
      delta: roundQuantity(target - current.onHand),
      action: 'adjust',
      description: reason,
      performedBy: data.actor ?? null
    });
  });
  logEvent('info', 'balance_adjusted', {
    itemId: key.itemId,
    locationId: key.locationId,
    quantityBefore: result.entry.quantityBefore,
    quantityAfter: result.entry.quantityAfter
  });
  return result;
}
