import { describe, expect, it } from 'vitest';
import { getBalance } from '../../domains/inventory/mutationEngine';
import { createTestContext, seedItem, seedLocation } from '../../test/ledgerTestContext';
import { confirmReceipt, createReceipt, getReceipt } from '../receipts.service';
import { createIssue } from '../issues.service';
import { cancelDocument, findDocumentOfKind, listDocumentsOfKind } from './documents.service';

async function setup() {
  const ctx = createTestContext();
  const item = await seedItem(ctx);
  const location = await seedLocation(ctx);
  return { ctx, item, location };
}

describe('stock documents', () => {
  it('cancels a draft of any kind without touching stock', async () => {
    const { ctx, item, location } = await setup();
    const issue = await createIssue(ctx, {
      number: 'OUT-1',
      lines: [{ itemId: item.id, locationId: location.id, quantity: 1 }]
    });

    const cancelled = await cancelDocument(ctx, issue.id, 'clerk');

    expect(cancelled).toMatchObject({ kind: 'issue', status: 'cancelled', processedBy: 'clerk', completedAt: null });
    const entries = await ctx.store.reader.listLedgerEntries({ documentId: issue.id, limit: 10, offset: 0 });
    expect(entries).toEqual([]);
  });

  it('refuses to cancel a confirmed document', async () => {
    const { ctx, item, location } = await setup();
    const receipt = await createReceipt(ctx, {
      number: 'IN-1',
      lines: [{ itemId: item.id, locationId: location.id, quantity: 3 }]
    });
    await confirmReceipt(ctx, receipt.id);

    await expect(cancelDocument(ctx, receipt.id)).rejects.toMatchObject({ code: 'DOCUMENT_ALREADY_PROCESSED' });
    expect((await getReceipt(ctx, receipt.id)).status).toBe('confirmed');
    expect((await getBalance(ctx, { itemId: item.id, locationId: location.id })).onHand).toBe(3);
  });

  it('reports a missing document as not found', async () => {
    const { ctx } = await setup();

    await expect(cancelDocument(ctx, '00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({
      code: 'NOT_FOUND'
    });
  });

  it('treats a document of another kind as missing', async () => {
    const { ctx, item, location } = await setup();
    const receipt = await createReceipt(ctx, {
      number: 'IN-2',
      lines: [{ itemId: item.id, locationId: location.id, quantity: 1 }]
    });

    await expect(findDocumentOfKind(ctx.store.reader, receipt.id, 'issue')).rejects.toMatchObject({
      code: 'NOT_FOUND',
      details: { entityType: 'issue', id: receipt.id }
    });
  });

  it('lists documents of one kind filtered by status', async () => {
    const { ctx, item, location } = await setup();
    const first = await createReceipt(ctx, {
      number: 'IN-3',
      lines: [{ itemId: item.id, locationId: location.id, quantity: 1 }]
    });
    await createReceipt(ctx, {
      number: 'IN-4',
      lines: [{ itemId: item.id, locationId: location.id, quantity: 1 }]
    });
    await createIssue(ctx, {
      number: 'OUT-2',
      lines: [{ itemId: item.id, locationId: location.id, quantity: 1 }]
    });
    await cancelDocument(ctx, first.id);

    const drafts = await listDocumentsOfKind(ctx.store.reader, 'receipt', { status: 'draft' });

    expect(drafts.map((document) => document.number)).toEqual(['IN-4']);
  });
});
