import { roundQuantity } from '../lib/numbers';
import { QUANTITY_ACTIONS, type QuantityAction } from '../domains/inventory/types';
import type { LedgerContext } from '../domains/inventory/unitOfWork';

export type StockReportRow = {
  itemId: string;
  code: string;
  name: string;
  unit: string;
  category: string | null;
  totalQuantity: number;
  reserved: number;
  available: number;
  minStock: number;
  isBelowMin: boolean;
  unitPrice: number | null;
  totalValue: number | null;
};

export type MovementReportRow = {
  id: string;
  date: string;
  action: QuantityAction;
  itemId: string | null;
  locationId: string | null;
  documentId: string | null;
  quantityBefore: number | null;
  quantityAfter: number | null;
  delta: number | null;
  description: string | null;
  performedBy: string | null;
};

function isQuantityAction(action: string): action is QuantityAction {
  return QUANTITY_ACTIONS.some((candidate) => candidate === action);
}

/**
 * One row per active item, totals summed across locations. Items never stocked report zero.
 */
export async function stockReport(
  ctx: LedgerContext,
  options: { belowMinOnly?: boolean } = {}
): Promise<StockReportRow[]> {
  const [items, totals] = await Promise.all([
    ctx.store.reader.listItems({ activeOnly: true }),
    ctx.store.reader.summarizeBalancesByItem()
  ]);
  const totalsByItem = new Map(totals.map((row) => [row.itemId, row]));

  const rows: StockReportRow[] = [];
  for (const item of items) {
    const total = totalsByItem.get(item.id);
    const totalQuantity = total?.onHand ?? 0;
    const reserved = total?.reserved ?? 0;
    const isBelowMin = totalQuantity < item.minStock;
    if (options.belowMinOnly && !isBelowMin) continue;
    rows.push({
      itemId: item.id,
      code: item.code,
      name: item.name,
      unit: item.unit,
      category: item.category,
      totalQuantity,
      reserved,
      available: roundQuantity(totalQuantity - reserved),
      minStock: item.minStock,
      isBelowMin,
      unitPrice: item.unitPrice,
      totalValue: item.unitPrice === null ? null : roundQuantity(totalQuantity * item.unitPrice)
    });
  }
  return rows;
}

export async function movementReport(
  ctx: LedgerContext,
  filters: { itemId?: string; from?: Date; to?: Date; limit?: number } = {}
): Promise<MovementReportRow[]> {
  const entries = await ctx.store.reader.listLedgerEntries({
    itemId: filters.itemId,
    actions: QUANTITY_ACTIONS,
    from: filters.from,
    to: filters.to,
    limit: Math.max(1, Math.min(filters.limit ?? ctx.policy.movementReportLimit, ctx.policy.movementReportLimit)),
    offset: 0
  });
  const rows: MovementReportRow[] = [];
  for (const entry of entries) {
    if (!isQuantityAction(entry.action)) continue;
    rows.push({
      id: entry.id,
      date: entry.createdAt,
      action: entry.action,
      itemId: entry.itemId,
      locationId: entry.locationId,
      documentId: entry.documentId,
      quantityBefore: entry.quantityBefore,
      quantityAfter: entry.quantityAfter,
      delta:
        entry.quantityBefore !== null && entry.quantityAfter !== null
          ? roundQuantity(entry.quantityAfter - entry.quantityBefore)
          : null,
      description: entry.description,
      performedBy: entry.performedBy
    });
  }
  return rows;
}
