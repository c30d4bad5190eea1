import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import { logEvent } from '../lib/logger';
import { applyStockMutation } from '../domains/inventory/mutationEngine';
import type { Receipt } from '../domains/inventory/types';
import { runUnitOfWork, type LedgerContext } from '../domains/inventory/unitOfWork';
import type { receiptSchema } from '../schemas/receipts.schema';
import { assertDraftLines, lockConfirmationTargets } from './documents/documentLines';
import {
  cancelDocumentOfKind,
  findDocumentOfKind,
  listDocumentsOfKind,
  lockDocumentForTransition,
  markDocumentStatus,
  type DocumentListOptions
} from './documents/documents.service';
import {
  assertDocumentNumber,
  assertLinesPresent,
  assertPositiveQuantity,
  assertUnitPrice
} from './documents/lineValidation';

export type ReceiptInput = z.infer<typeof receiptSchema>;

export async function createReceipt(ctx: LedgerContext, data: ReceiptInput): Promise<Receipt> {
  assertDocumentNumber(data.number);
  assertLinesPresent(data.lines);
  const quantities = data.lines.map((line, index) => assertPositiveQuantity(line.quantity, index + 1));
  const unitPrices = data.lines.map((line, index) => assertUnitPrice(line.unitPrice ?? null, index + 1));

  return runUnitOfWork(ctx, 'create_receipt', async (session) => {
    await assertDraftLines(session, ctx.policy, data.lines);
    const now = new Date().toISOString();
    const receipt: Receipt = {
      id: uuidv4(),
      kind: 'receipt',
      number: data.number.trim(),
      status: 'draft',
      notes: data.notes ?? null,
      supplier: data.supplier ?? null,
      invoiceNumber: data.invoiceNumber ?? null,
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
        quantity: quantities[index],
        unitPrice: unitPrices[index]
      }))
    };
    await session.insertDocument(receipt);
    return receipt;
  });
}

export function getReceipt(ctx: LedgerContext, id: string): Promise<Receipt> {
  return findDocumentOfKind(ctx.store.reader, id, 'receipt');
}

export function listReceipts(ctx: LedgerContext, options: DocumentListOptions = {}): Promise<Receipt[]> {
  return listDocumentsOfKind(ctx.store.reader, 'receipt', options);
}

/**
 * Books every line in (+quantity) and confirms the receipt, all in one unit of work.
 */
export async function confirmReceipt(ctx: LedgerContext, id: string, actor: string | null = null): Promise<Receipt> {
  const confirmed = await runUnitOfWork(ctx, 'confirm_receipt', async (session) => {
    const { document, next } = await lockDocumentForTransition(session, id, 'receipt', 'confirm');
    const targets = await lockConfirmationTargets(session, ctx.policy, document.lines);
    for (const { line, key } of targets) {
      await applyStockMutation(session, {
        ...key,
        delta: line.quantity,
        action: 'receipt',
        description: `Receipt ${document.number}`,
        performedBy: actor,
        documentId: document.id
      });
      await session.updateDocumentLine(document.id, line.id, { locationId: key.locationId });
    }
    return markDocumentStatus(session, id, 'receipt', next, actor);
  });
  logEvent('info', 'receipt_confirmed', { documentId: id, number: confirmed.number, lines: confirmed.lines.length });
  return confirmed;
}

export function cancelReceipt(ctx: LedgerContext, id: string, actor: string | null = null): Promise<Receipt> {
  return cancelDocumentOfKind(ctx, id, 'receipt', actor);
}
