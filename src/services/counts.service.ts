import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import { logEvent } from '../lib/logger';
import { formatSignedQuantity, roundQuantity } from '../lib/numbers';
import { applyStockMutation } from '../domains/inventory/mutationEngine';
import type { InventoryCount } from '../domains/inventory/types';
import { runUnitOfWork, type LedgerContext } from '../domains/inventory/unitOfWork';
import type { inventoryCountSchema } from '../schemas/counts.schema';
import { assertDistinctLineKeys, assertDraftLines, lockConfirmationTargets } from './documents/documentLines';
import {
  cancelDocumentOfKind,
  findDocumentOfKind,
  listDocumentsOfKind,
  lockDocumentForTransition,
  markDocumentStatus,
  type DocumentListOptions
} from './documents/documents.service';
import { assertDocumentNumber, assertLinesPresent, assertNonNegativeQuantity } from './documents/lineValidation';

export type InventoryCountInput = z.infer<typeof inventoryCountSchema>;

export async function createInventoryCount(ctx: LedgerContext, data: InventoryCountInput): Promise<InventoryCount> {
  assertDocumentNumber(data.number);
  assertLinesPresent(data.lines);
  const quantities = data.lines.map((line, index) => assertNonNegativeQuantity(line.actualQuantity, index + 1));
  assertDistinctLineKeys(ctx.policy, data.lines);

  return runUnitOfWork(ctx, 'create_inventory_count', async (session) => {
    await assertDraftLines(session, ctx.policy, data.lines);
    const now = new Date().toISOString();
    const count: InventoryCount = {
      id: uuidv4(),
      kind: 'inventory_count',
      number: data.number.trim(),
      status: 'draft',
      notes: data.notes ?? null,
      createdBy: data.createdBy ?? null,
      processedBy: null,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
      lines: data.lines.map((line, index) => ({
        id: uuidv4(),
        lineNumber: index + 1,
        itemId: line.itemId,
        locationId: line.locationId ?? null,
        actualQuantity: quantities[index],
        expectedQuantity: null,
        discrepancy: null
      }))
    };
    await session.insertDocument(count);
    return count;
  });
}

export function getInventoryCount(ctx: LedgerContext, id: string): Promise<InventoryCount> {
  return findDocumentOfKind(ctx.store.reader, id, 'inventory_count');
}

export function listInventoryCounts(ctx: LedgerContext, options: DocumentListOptions = {}): Promise<InventoryCount[]> {
  return listDocumentsOfKind(ctx.store.reader, 'inventory_count', options);
}

/**
 * Reconciles each counted line against the locked balance. Expected quantity and discrepancy
 * are frozen on the line; only lines with a non-zero discrepancy touch stock.
 */
export async function confirmInventoryCount(
  ctx: LedgerContext,
  id: string,
  actor: string | null = null
): Promise<InventoryCount> {
  const confirmed = await runUnitOfWork(ctx, 'confirm_inventory_count', async (session) => {
    const { document, next } = await lockDocumentForTransition(session, id, 'inventory_count', 'confirm');
    assertDistinctLineKeys(ctx.policy, document.lines);
    const targets = await lockConfirmationTargets(session, ctx.policy, document.lines);
    for (const { line, key } of targets) {
      const balance = await session.lockBalance(key);
      const expected = balance.onHand;
      const discrepancy = roundQuantity(line.actualQuantity - expected);
      if (discrepancy !== 0) {
        await applyStockMutation(session, {
          ...key,
          delta: discrepancy,
          action: 'inventory_count',
          description: `Inventory count ${document.number}: discrepancy ${formatSignedQuantity(discrepancy)}`,
          performedBy: actor,
          documentId: document.id
        });
      }
      await session.updateDocumentLine(document.id, line.id, {
        locationId: key.locationId,
        expectedQuantity: expected,
        discrepancy
      });
    }
    return markDocumentStatus(session, id, 'inventory_count', next, actor);
  });
  logEvent('info', 'inventory_count_confirmed', {
    documentId: id,
    number: confirmed.number,
    adjustedLines: confirmed.lines.filter((line) => line.discrepancy !== null && line.discrepancy !== 0).length
  });
  return confirmed;
}

export function cancelInventoryCount(
  ctx: LedgerContext,
  id: string,
  actor: string | null = null
): Promise<InventoryCount> {
  return cancelDocumentOfKind(ctx, id, 'inventory_count', actor);
}
