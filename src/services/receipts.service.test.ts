import { describe, expect, it } from 'vitest';
import { getBalance } from '../domains/inventory/mutationEngine';
import { createTestContext, seedItem, seedLocation } from '../test/ledgerTestContext';
import { cancelReceipt, confirmReceipt, createReceipt, getReceipt, listReceipts } from './receipts.service';

async function setup(policy: Parameters<typeof createTestContext>[0] = {}) {
  const ctx = createTestContext(policy);
  const resistor = await seedItem(ctx, { code: 'R-10K', name: '10k resistor' });
  const capacitor = await seedItem(ctx, { code: 'C-100N', name: '100nF capacitor' });
  const shelf = await seedLocation(ctx, 'SHELF-A');
  return { ctx, resistor, capacitor, shelf };
}

describe('receipts', () => {
  it('creates a draft without touching stock', async () => {
    const { ctx, resistor, shelf } = await setup();

    const receipt = await createReceipt(ctx, {
      number: 'R-1',
      supplier: 'Acme Components',
      lines: [{ itemId: resistor.id, locationId: shelf.id, quantity: 100, unitPrice: 0.02 }]
    });

    expect(receipt).toMatchObject({ kind: 'receipt', status: 'draft', number: 'R-1', supplier: 'Acme Components' });
    expect(receipt.lines).toEqual([
      expect.objectContaining({ lineNumber: 1, itemId: resistor.id, locationId: shelf.id, quantity: 100, unitPrice: 0.02 })
    ]);
    expect((await getBalance(ctx, { itemId: resistor.id, locationId: shelf.id })).onHand).toBe(0);
  });

  it('confirms every line and stamps the document', async () => {
    const { ctx, resistor, capacitor, shelf } = await setup();
    const draft = await createReceipt(ctx, {
      number: 'R-2',
      lines: [
        { itemId: resistor.id, locationId: shelf.id, quantity: 100 },
        { itemId: capacitor.id, locationId: shelf.id, quantity: 40 }
      ]
    });

    const confirmed = await confirmReceipt(ctx, draft.id, 'storekeeper');

    expect(confirmed.status).toBe('confirmed');
    expect(confirmed.processedBy).toBe('storekeeper');
    expect(confirmed.completedAt).not.toBeNull();
    expect((await getBalance(ctx, { itemId: resistor.id, locationId: shelf.id })).onHand).toBe(100);
    expect((await getBalance(ctx, { itemId: capacitor.id, locationId: shelf.id })).onHand).toBe(40);

    const entries = await ctx.store.reader.listLedgerEntries({ documentId: draft.id, limit: 10, offset: 0 });
    expect(entries).toHaveLength(2);
    expect(entries.every((entry) => entry.action === 'receipt' && entry.description === 'Receipt R-2')).toBe(true);
    expect(entries.every((entry) => entry.performedBy === 'storekeeper')).toBe(true);
  });

  it('adds repeated lines for the same balance one after another', async () => {
    const { ctx, resistor, shelf } = await setup();
    const draft = await createReceipt(ctx, {
      number: 'R-3',
      lines: [
        { itemId: resistor.id, locationId: shelf.id, quantity: 10 },
        { itemId: resistor.id, locationId: shelf.id, quantity: 5 }
      ]
    });

    await confirmReceipt(ctx, draft.id);

    expect((await getBalance(ctx, { itemId: resistor.id, locationId: shelf.id })).onHand).toBe(15);
  });

  it('refuses a second confirmation without changing stock', async () => {
    const { ctx, resistor, shelf } = await setup();
    const draft = await createReceipt(ctx, {
      number: 'R-4',
      lines: [{ itemId: resistor.id, locationId: shelf.id, quantity: 7 }]
    });
    await confirmReceipt(ctx, draft.id);

    await expect(confirmReceipt(ctx, draft.id)).rejects.toMatchObject({
      code: 'DOCUMENT_ALREADY_PROCESSED',
      details: { status: 'confirmed', attempted: 'confirm' }
    });
    expect((await getBalance(ctx, { itemId: resistor.id, locationId: shelf.id })).onHand).toBe(7);
  });

  it('cancels a draft and then refuses to confirm it', async () => {
    const { ctx, resistor, shelf } = await setup();
    const draft = await createReceipt(ctx, {
      number: 'R-5',
      lines: [{ itemId: resistor.id, locationId: shelf.id, quantity: 7 }]
    });

    const cancelled = await cancelReceipt(ctx, draft.id);

    expect(cancelled.status).toBe('cancelled');
    expect(cancelled.completedAt).toBeNull();
    await expect(confirmReceipt(ctx, draft.id)).rejects.toMatchObject({ code: 'DOCUMENT_ALREADY_PROCESSED' });
    await expect(cancelReceipt(ctx, draft.id)).rejects.toMatchObject({ code: 'DOCUMENT_ALREADY_PROCESSED' });
    expect((await getBalance(ctx, { itemId: resistor.id, locationId: shelf.id })).onHand).toBe(0);
  });

  it('refuses to cancel a confirmed receipt', async () => {
    const { ctx, resistor, shelf } = await setup();
    const draft = await createReceipt(ctx, {
      number: 'R-6',
      lines: [{ itemId: resistor.id, locationId: shelf.id, quantity: 3 }]
    });
    await confirmReceipt(ctx, draft.id);

    await expect(cancelReceipt(ctx, draft.id)).rejects.toMatchObject({ code: 'DOCUMENT_ALREADY_PROCESSED' });
    expect((await getReceipt(ctx, draft.id)).status).toBe('confirmed');
  });

  it('requires a location when no default is configured', async () => {
    const { ctx, resistor } = await setup();

    await expect(
      createReceipt(ctx, { number: 'R-7', lines: [{ itemId: resistor.id, quantity: 1 }] })
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', details: { reason: 'LOCATION_REQUIRED' } });
  });

  it('books lines without a location to the configured default and stores it on the line', async () => {
    const base = await setup();
    const ctx = { ...base.ctx, policy: { ...base.ctx.policy, defaultLocationId: base.shelf.id } };
    const draft = await createReceipt(ctx, { number: 'R-8', lines: [{ itemId: base.resistor.id, quantity: 12 }] });
    expect(draft.lines[0].locationId).toBeNull();

    const confirmed = await confirmReceipt(ctx, draft.id);

    expect(confirmed.lines[0].locationId).toBe(base.shelf.id);
    expect((await getBalance(ctx, { itemId: base.resistor.id, locationId: base.shelf.id })).onHand).toBe(12);
  });

  it('rejects a default location that does not exist', async () => {
    const base = await setup();
    const ctx = {
      ...base.ctx,
      policy: { ...base.ctx.policy, defaultLocationId: '00000000-0000-4000-8000-000000000000' }
    };

    await expect(
      createReceipt(ctx, { number: 'R-9', lines: [{ itemId: base.resistor.id, quantity: 1 }] })
    ).rejects.toMatchObject({ code: 'NOT_FOUND', details: { entityType: 'location' } });
  });

  it('validates quantities and references at draft time', async () => {
    const { ctx, resistor, shelf } = await setup();

    await expect(
      createReceipt(ctx, { number: 'R-10', lines: [{ itemId: resistor.id, locationId: shelf.id, quantity: 0 }] })
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', details: { reason: 'QUANTITY_NOT_POSITIVE' } });
    await expect(
      createReceipt(ctx, {
        number: 'R-10',
        lines: [{ itemId: '00000000-0000-4000-8000-000000000000', locationId: shelf.id, quantity: 1 }]
      })
    ).rejects.toMatchObject({ code: 'NOT_FOUND', details: { entityType: 'item' } });
    await expect(createReceipt(ctx, { number: 'R-10', lines: [] })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      details: { reason: 'DOCUMENT_HAS_NO_LINES' }
    });
  });

  it('rejects a duplicate receipt number', async () => {
    const { ctx, resistor, shelf } = await setup();
    const lines = [{ itemId: resistor.id, locationId: shelf.id, quantity: 1 }];
    await createReceipt(ctx, { number: 'R-11', lines });

    await expect(createReceipt(ctx, { number: 'R-11', lines })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      details: { reason: 'DUPLICATE_KEY' }
    });
  });

  it('reports an unknown receipt as not found', async () => {
    const { ctx } = await setup();

    await expect(confirmReceipt(ctx, '00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({
      code: 'NOT_FOUND'
    });
  });

  it('lists receipts filtered by status', async () => {
    const { ctx, resistor, shelf } = await setup();
    const lines = [{ itemId: resistor.id, locationId: shelf.id, quantity: 1 }];
    const first = await createReceipt(ctx, { number: 'R-12', lines });
    await createReceipt(ctx, { number: 'R-13', lines });
    await confirmReceipt(ctx, first.id);

    const drafts = await listReceipts(ctx, { status: 'draft' });

    expect(drafts.map((receipt) => receipt.number)).toEqual(['R-13']);
  });

  it('rejects a quantity that rounds to zero before anything is written', async () => {
    const { ctx, resistor, shelf } = await setup();

    await expect(
      createReceipt(ctx, { number: 'R-20', lines: [{ itemId: resistor.id, locationId: shelf.id, quantity: 1e-7 }] })
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', details: { reason: 'QUANTITY_NOT_POSITIVE', lineNumber: 1 } });
    expect(await listReceipts(ctx)).toEqual([]);
  });

  it('rejects a quantity or price beyond the storable range', async () => {
    const { ctx, resistor, shelf } = await setup();

    await expect(
      createReceipt(ctx, { number: 'R-21', lines: [{ itemId: resistor.id, locationId: shelf.id, quantity: 1e12 }] })
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', details: { reason: 'QUANTITY_OUT_OF_RANGE' } });
    await expect(
      createReceipt(ctx, {
        number: 'R-22',
        lines: [{ itemId: resistor.id, locationId: shelf.id, quantity: 1, unitPrice: 1e12 }]
      })
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', details: { reason: 'UNIT_PRICE_INVALID' } });
  });

  it('stores line quantities at ledger precision', async () => {
    const { ctx, resistor, shelf } = await setup();

    const draft = await createReceipt(ctx, {
      number: 'R-23',
      lines: [{ itemId: resistor.id, locationId: shelf.id, quantity: 2.0000004 }]
    });

    expect(draft.lines[0].quantity).toBe(2);
  });
});
