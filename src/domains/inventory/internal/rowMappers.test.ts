import { describe, expect, it } from 'vitest';
import { mapDocumentRow, type StockDocumentLineRow, type StockDocumentRow } from './documentRows';
import { mapLedgerEntryRow, type LedgerEntryRow } from './ledgerWriter';

const CREATED = new Date('2026-03-02T08:15:00.000Z');

function documentRow(overrides: Partial<StockDocumentRow> = {}): StockDocumentRow {
  return {
    id: 'doc-1',
    kind: 'receipt',
    number: 'RC-1',
    status: 'draft',
    notes: null,
    supplier: 'Parts Depot',
    invoice_number: 'INV-77',
    department: null,
    requester: null,
    purpose: null,
    created_by: 'clerk',
    processed_by: null,
    created_at: CREATED,
    updated_at: CREATED,
    completed_at: null,
    ...overrides
  };
}

function lineRow(overrides: Partial<StockDocumentLineRow> = {}): StockDocumentLineRow {
  return {
    id: 'line-1',
    document_id: 'doc-1',
    line_number: 1,
    item_id: 'item-1',
    location_id: 'loc-1',
    quantity: '5.000000',
    unit_price: null,
    expected_quantity: null,
    discrepancy: null,
    ...overrides
  };
}

describe('mapDocumentRow', () => {
  it('maps a receipt with numeric strings and orders its lines', () => {
    const document = mapDocumentRow(documentRow(), [
      lineRow({ id: 'line-2', line_number: 2, quantity: '1.250000', unit_price: '0.100000' }),
      lineRow()
    ]);

    expect(document).toEqual({
      id: 'doc-1',
      kind: 'receipt',
      number: 'RC-1',
      status: 'draft',
      notes: null,
      supplier: 'Parts Depot',
      invoiceNumber: 'INV-77',
      createdBy: 'clerk',
      processedBy: null,
      createdAt: '2026-03-02T08:15:00.000Z',
      updatedAt: '2026-03-02T08:15:00.000Z',
      completedAt: null,
      lines: [
        { id: 'line-1', lineNumber: 1, itemId: 'item-1', locationId: 'loc-1', quantity: 5, unitPrice: null },
        { id: 'line-2', lineNumber: 2, itemId: 'item-1', locationId: 'loc-1', quantity: 1.25, unitPrice: 0.1 }
      ]
    });
  });

  it('reads count lines from the quantity column as the counted quantity', () => {
    const document = mapDocumentRow(
      documentRow({ kind: 'inventory_count', status: 'confirmed', completed_at: '2026-03-03T10:00:00Z' }),
      [lineRow({ quantity: '7', expected_quantity: '9.5', discrepancy: '-2.5' })]
    );

    expect(document.kind).toBe('inventory_count');
    expect(document.completedAt).toBe('2026-03-03T10:00:00.000Z');
    expect(document.lines[0]).toEqual({
      id: 'line-1',
      lineNumber: 1,
      itemId: 'item-1',
      locationId: 'loc-1',
      actualQuantity: 7,
      expectedQuantity: 9.5,
      discrepancy: -2.5
    });
  });

  it('rejects an unknown kind or status', () => {
    expect(() => mapDocumentRow(documentRow({ kind: 'transfer' }), [])).toThrow('DOCUMENT_KIND_UNKNOWN:transfer');
    expect(() => mapDocumentRow(documentRow({ status: 'posted' }), [])).toThrow('DOCUMENT_STATUS_UNKNOWN:posted');
  });
});

describe('mapLedgerEntryRow', () => {
  const base: LedgerEntryRow = {
    id: 'entry-1',
    sequence: '42',
    action: 'issue',
    entity_type: 'balance',
    entity_id: null,
    item_id: 'item-1',
    location_id: 'loc-1',
    document_id: 'doc-1',
    quantity_before: '10.000000',
    quantity_after: '7.500000',
    description: 'Issue IS-9',
    payload: null,
    performed_by: 'picker',
    created_at: CREATED
  };

  it('maps a quantity entry', () => {
    expect(mapLedgerEntryRow(base)).toEqual({
      id: 'entry-1',
      sequence: 42,
      action: 'issue',
      entityType: 'balance',
      entityId: null,
      itemId: 'item-1',
      locationId: 'loc-1',
      documentId: 'doc-1',
      quantityBefore: 10,
      quantityAfter: 7.5,
      description: 'Issue IS-9',
      payload: null,
      performedBy: 'picker',
      createdAt: '2026-03-02T08:15:00.000Z'
    });
  });

  it('keeps the change payload of a catalog entry', () => {
    const entry = mapLedgerEntryRow({
      ...base,
      action: 'update',
      entity_type: 'item',
      entity_id: 'item-1',
      quantity_before: null,
      quantity_after: null,
      payload: { changes: { name: 'Relay 5V', minStock: 3 } }
    });

    expect(entry).toMatchObject({
      entityType: 'item',
      quantityBefore: null,
      payload: { changes: { name: 'Relay 5V', minStock: 3 } }
    });
  });

  it('rejects an action it does not know', () => {
    expect(() => mapLedgerEntryRow({ ...base, action: 'transfer' })).toThrow('LEDGER_ACTION_UNKNOWN:transfer');
  });
});
