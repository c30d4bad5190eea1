import { getBalance } from '../domains/inventory/mutationEngine';
import type { Balance, BalanceKey, LedgerAction, LedgerEntry } from '../domains/inventory/types';
import type { LedgerContext } from '../domains/inventory/unitOfWork';

export const LEDGER_DEFAULT_LIMIT = 100;
export const LEDGER_MAX_LIMIT = 1000;

export type LedgerListFilters = {
  itemId?: string;
  locationId?: string;
  action?: LedgerAction;
  documentId?: string;
  from?: Date;
  to?: Date;
  limit?: number;
  offset?: number;
};

/**
 * Newest first; entries written in the same instant keep their append order via `sequence`.
 */
export function listLedger(ctx: LedgerContext, filters: LedgerListFilters = {}): Promise<LedgerEntry[]> {
  const limit = Math.min(Math.max(filters.limit ?? LEDGER_DEFAULT_LIMIT, 1), LEDGER_MAX_LIMIT);
  return ctx.store.reader.listLedgerEntries({
    itemId: filters.itemId,
    locationId: filters.locationId,
    documentId: filters.documentId,
    actions: filters.action ? [filters.action] : undefined,
    from: filters.from,
    to: filters.to,
    limit,
    offset: Math.max(filters.offset ?? 0, 0)
  });
}

export function listBalances(ctx: LedgerContext, filters: { itemId?: string; locationId?: string } = {}): Promise<Balance[]> {
  return ctx.store.reader.listBalances(filters);
}

export function readBalance(ctx: LedgerContext, key: BalanceKey): Promise<Balance> {
  return getBalance(ctx, key);
}
