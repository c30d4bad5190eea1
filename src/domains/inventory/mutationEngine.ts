import { InsufficientStockError, notFound, validationError } from '../../lib/errors';
import { QUANTITY_MAX, roundQuantity } from '../../lib/numbers';
import type { LedgerReader, LedgerSession } from './store';
import type { Balance, BalanceKey, LedgerEntry, QuantityAction } from './types';
import { runUnitOfWork, type LedgerContext } from './unitOfWork';

export type StockMutationInput = BalanceKey & {
  delta: number;
  action: QuantityAction;
  description?: string | null;
  performedBy?: string | null;
  documentId?: string | null;
};

export type StockMutationResult = {
  balance: Balance;
  entry: LedgerEntry;
};

export async function assertBalanceTarget(reader: LedgerReader, key: BalanceKey) {
  const [item, location] = await Promise.all([reader.findItem(key.itemId), reader.findLocation(key.locationId)]);
  if (!item) {
    throw notFound('item', key.itemId);
  }
  if (!location) {
    throw notFound('location', key.locationId);
  }
}

/**
 * The only path that changes an on-hand quantity. Must run inside the caller's session so the
 * balance write and its ledger entry commit (or roll back) together.
 */
export async function applyStockMutation(
  session: LedgerSession,
  input: StockMutationInput
): Promise<StockMutationResult> {
  if (!Number.isFinite(input.delta)) {
    throw validationError('DELTA_NOT_FINITE', 'Quantity delta must be a finite number.', { delta: input.delta });
  }
  const key: BalanceKey = { itemId: input.itemId, locationId: input.locationId };
  await assertBalanceTarget(session, key);

  const current = await session.lockBalance(key);
  const before = current.onHand;
  const after = roundQuantity(before + input.delta);
  if (after < 0) {
    throw new InsufficientStockError({
      itemId: key.itemId,
      locationId: key.locationId,
      available: before,
      requested: roundQuantity(-input.delta)
    });
  }
  if (after > QUANTITY_MAX) {
    throw validationError('QUANTITY_OUT_OF_RANGE', `Balance would exceed ${QUANTITY_MAX}.`, {
      itemId: key.itemId,
      locationId: key.locationId,
      quantityBefore: before,
      delta: input.delta
    });
  }

  const now = new Date();
  const balance = await session.writeBalance(key, after, now);
  const entry = await session.appendLedgerEntry({
    action: input.action,
    entityType: 'balance',
    entityId: null,
    itemId: key.itemId,
    locationId: key.locationId,
    documentId: input.documentId ?? null,
    quantityBefore: before,
    quantityAfter: after,
    description: input.description ?? null,
    payload: null,
    performedBy: input.performedBy ?? null,
    createdAt: now
  });
  return { balance, entry };
}

/**
 * Standalone mutation in its own unit of work.
 */
export function applyMutation(ctx: LedgerContext, input: StockMutationInput): Promise<StockMutationResult> {
  return runUnitOfWork(ctx, 'apply_mutation', (session) => applyStockMutation(session, input));
}

export async function getBalance(ctx: LedgerContext, key: BalanceKey): Promise<Balance> {
  const balance = await ctx.store.reader.findBalance(key);
  if (balance) return balance;
  await assertBalanceTarget(ctx.store.reader, key);
  return { ...key, onHand: 0, reserved: 0, updatedAt: null };
}
