import type { PoolClient } from 'pg';
import { toIsoString, toNullableIsoString } from '../../../lib/dates';
import { roundQuantity, toNullableNumber, toNumber } from '../../../lib/numbers';
import {
  DOCUMENT_KINDS,
  DOCUMENT_STATUSES,
  type DocumentFilter,
  type DocumentKind,
  type DocumentLinePatch,
  type DocumentStatus,
  type DocumentStatusPatch,
  type StockDocument
} from '../types';

export type StockDocumentRow = {
  id: string;
  kind: string;
  number: string;
  status: string;
  notes: string | null;
  supplier: string | null;
  invoice_number: string | null;
  department: string | null;
  requester: string | null;
  purpose: string | null;
  created_by: string | null;
  processed_by: string | null;
  created_at: Date | string;
  updated_at: Date | string;
  completed_at: Date | string | null;
};

export type StockDocumentLineRow = {
  id: string;
  document_id: string;
  line_number: number;
  item_id: string;
  location_id: string | null;
  quantity: string | number;
  unit_price: string | number | null;
  expected_quantity: string | number | null;
  discrepancy: string | number | null;
};

function parseKind(value: string): DocumentKind {
  const kind = DOCUMENT_KINDS.find((candidate) => candidate === value);
  if (!kind) throw new Error(`DOCUMENT_KIND_UNKNOWN:${value}`);
  return kind;
}

function parseStatus(value: string): DocumentStatus {
  const status = DOCUMENT_STATUSES.find((candidate) => candidate === value);
  if (!status) throw new Error(`DOCUMENT_STATUS_UNKNOWN:${value}`);
  return status;
}

export function mapDocumentRow(row: StockDocumentRow, lineRows: StockDocumentLineRow[]): StockDocument {
  const header = {
    id: row.id,
    number: row.number,
    status: parseStatus(row.status),
    notes: row.notes,
    createdBy: row.created_by,
    processedBy: row.processed_by,
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at),
    completedAt: toNullableIsoString(row.completed_at)
  };
  const lines = [...lineRows].sort((a, b) => a.line_number - b.line_number);
  const kind = parseKind(row.kind);
  switch (kind) {
    case 'receipt':
      return {
        ...header,
        kind,
        supplier: row.supplier,
        invoiceNumber: row.invoice_number,
        lines: lines.map((line) => ({
          id: line.id,
          lineNumber: line.line_number,
          itemId: line.item_id,
          locationId: line.location_id,
          quantity: roundQuantity(toNumber(line.quantity)),
          unitPrice: toNullableNumber(line.unit_price)
        }))
      };
    case 'issue':
      return {
        ...header,
        kind,
        department: row.department,
        requester: row.requester,
        purpose: row.purpose,
        lines: lines.map((line) => ({
          id: line.id,
          lineNumber: line.line_number,
          itemId: line.item_id,
          locationId: line.location_id,
          quantity: roundQuantity(toNumber(line.quantity))
        }))
      };
    case 'inventory_count':
      return {
        ...header,
        kind,
        lines: lines.map((line) => ({
          id: line.id,
          lineNumber: line.line_number,
          itemId: line.item_id,
          locationId: line.location_id,
          actualQuantity: roundQuantity(toNumber(line.quantity)),
          expectedQuantity: toNullableNumber(line.expected_quantity),
          discrepancy: toNullableNumber(line.discrepancy)
        }))
      };
  }
}

async function loadLines(client: PoolClient, documentIds: string[]): Promise<Map<string, StockDocumentLineRow[]>> {
  const byDocument = new Map<string, StockDocumentLineRow[]>();
  if (documentIds.length === 0) return byDocument;
  const res = await client.query<StockDocumentLineRow>(
    `SELECT * FROM stock_document_lines
      WHERE document_id = ANY($1::uuid[])
      ORDER BY document_id, line_number`,
    [documentIds]
  );
  for (const row of res.rows) {
    const bucket = byDocument.get(row.document_id) ?? [];
    bucket.push(row);
    byDocument.set(row.document_id, bucket);
  }
  return byDocument;
}

export async function findDocumentRow(
  client: PoolClient,
  id: string,
  options: { forUpdate?: boolean } = {}
): Promise<StockDocument | null> {
  const res = await client.query<StockDocumentRow>(
    `SELECT * FROM stock_documents WHERE id = $1${options.forUpdate ? ' FOR UPDATE' : ''}`,
    [id]
  );
  if (res.rowCount === 0) return null;
  const lines = await loadLines(client, [id]);
  return mapDocumentRow(res.rows[0], lines.get(id) ?? []);
}

export async function listDocumentRows(client: PoolClient, filter: DocumentFilter): Promise<StockDocument[]> {
  const clauses: string[] = [];
  const params: unknown[] = [];
  if (filter.kind) {
    params.push(filter.kind);
    clauses.push(`kind = $${params.length}`);
  }
  if (filter.status) {
    params.push(filter.status);
    clauses.push(`status = $${params.length}`);
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
  params.push(filter.limit, filter.offset);
  const res = await client.query<StockDocumentRow>(
    `SELECT * FROM stock_documents
      ${where}
      ORDER BY created_at DESC, number DESC
      LIMIT $${params.length - 1} OFFSET $${params.length}`,
    params
  );
  const lines = await loadLines(
    client,
    res.rows.map((row) => row.id)
  );
  return res.rows.map((row) => mapDocumentRow(row, lines.get(row.id) ?? []));
}

export async function insertDocumentRows(client: PoolClient, document: StockDocument) {
  await client.query(
    `INSERT INTO stock_documents (
        id, kind, number, status, notes, supplier, invoice_number, department, requester, purpose,
        created_by, processed_by, created_at, updated_at, completed_at
     ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15)`,
    [
      document.id,
      document.kind,
      document.number,
      document.status,
      document.notes,
      document.kind === 'receipt' ? document.supplier : null,
      document.kind === 'receipt' ? document.invoiceNumber : null,
      document.kind === 'issue' ? document.department : null,
      document.kind === 'issue' ? document.requester : null,
      document.kind === 'issue' ? document.purpose : null,
      document.createdBy,
      document.processedBy,
      document.createdAt,
      document.updatedAt,
      document.completedAt
    ]
  );
  for (const line of document.lines) {
    const quantity = 'actualQuantity' in line ? line.actualQuantity : line.quantity;
    await client.query(
      `INSERT INTO stock_document_lines (
          id, document_id, line_number, item_id, location_id, quantity, unit_price, expected_quantity, discrepancy
       ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)`,
      [
        line.id,
        document.id,
        line.lineNumber,
        line.itemId,
        line.locationId,
        quantity,
        'unitPrice' in line ? line.unitPrice : null,
        'expectedQuantity' in line ? line.expectedQuantity : null,
        'discrepancy' in line ? line.discrepancy : null
      ]
    );
  }
}

export async function updateDocumentStatusRow(client: PoolClient, id: string, patch: DocumentStatusPatch) {
  await client.query(
    `UPDATE stock_documents
        SET status = $2,
            processed_by = $3,
            completed_at = $4,
            updated_at = $5
      WHERE id = $1`,
    [id, patch.status, patch.processedBy, patch.completedAt, patch.updatedAt]
  );
}

export async function updateDocumentLineRow(
  client: PoolClient,
  documentId: string,
  lineId: string,
  patch: DocumentLinePatch
) {
  await client.query(
    `UPDATE stock_document_lines
        SET location_id = $3,
            expected_quantity = COALESCE($4, expected_quantity),
            discrepancy = COALESCE($5, discrepancy)
      WHERE document_id = $1 AND id = $2`,
    [documentId, lineId, patch.locationId, patch.expectedQuantity ?? null, patch.discrepancy ?? null]
  );
}
