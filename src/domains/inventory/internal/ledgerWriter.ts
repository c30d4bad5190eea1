import type { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { toIsoString } from '../../../lib/dates';
import { toNullableNumber, toNumber } from '../../../lib/numbers';
import {
  catalogChangePayloadSchema,
  LEDGER_ACTIONS,
  type CatalogChangePayload,
  type LedgerAction,
  type LedgerEntityType,
  type LedgerEntry,
  type LedgerEntryInput,
  type LedgerFilter
} from '../types';

export type LedgerEntryRow = {
  id: string;
  sequence: string | number;
  action: string;
  entity_type: string;
  entity_id: string | null;
  item_id: string | null;
  location_id: string | null;
  document_id: string | null;
  quantity_before: string | number | null;
  quantity_after: string | number | null;
  description: string | null;
  payload: unknown;
  performed_by: string | null;
  created_at: Date | string;
};

function parseAction(value: string): LedgerAction {
  const action = LEDGER_ACTIONS.find((candidate) => candidate === value);
  if (!action) {
    throw new Error(`LEDGER_ACTION_UNKNOWN:${value}`);
  }
  return action;
}

function parseEntityType(value: string): LedgerEntityType {
  if (value === 'balance' || value === 'item' || value === 'location') {
    return value;
  }
  throw new Error(`LEDGER_ENTITY_TYPE_UNKNOWN:${value}`);
}

function parsePayload(value: unknown): CatalogChangePayload | null {
  if (value === null || value === undefined) return null;
  return catalogChangePayloadSchema.parse(value);
}

export function mapLedgerEntryRow(row: LedgerEntryRow): LedgerEntry {
  return {
    id: row.id,
    sequence: toNumber(row.sequence),
    action: parseAction(row.action),
    entityType: parseEntityType(row.entity_type),
    entityId: row.entity_id,
    itemId: row.item_id,
    locationId: row.location_id,
    documentId: row.document_id,
    quantityBefore: toNullableNumber(row.quantity_before),
    quantityAfter: toNullableNumber(row.quantity_after),
    description: row.description,
    payload: parsePayload(row.payload),
    performedBy: row.performed_by,
    createdAt: toIsoString(row.created_at)
  };
}

export async function insertLedgerEntry(client: PoolClient, input: LedgerEntryInput): Promise<LedgerEntry> {
  const payload = input.payload === null ? null : catalogChangePayloadSchema.parse(input.payload);
  const res = await client.query<LedgerEntryRow>(
    `INSERT INTO stock_ledger (
        id, action, entity_type, entity_id, item_id, location_id, document_id,
        quantity_before, quantity_after, description, payload, performed_by, created_at
     ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13)
     RETURNING *`,
    [
      uuidv4(),
      input.action,
      input.entityType,
      input.entityId,
      input.itemId,
      input.locationId,
      input.documentId,
      input.quantityBefore,
      input.quantityAfter,
      input.description,
      payload === null ? null : JSON.stringify(payload),
      input.performedBy,
      input.createdAt ?? new Date()
    ]
  );
  return mapLedgerEntryRow(res.rows[0]);
}

export async function listLedgerEntries(client: PoolClient, filter: LedgerFilter): Promise<LedgerEntry[]> {
  const clauses: string[] = [];
  const params: unknown[] = [];
  if (filter.itemId) {
    params.push(filter.itemId);
    clauses.push(`item_id = $${params.length}`);
  }
  if (filter.locationId) {
    params.push(filter.locationId);
    clauses.push(`location_id = $${params.length}`);
  }
  if (filter.documentId) {
    params.push(filter.documentId);
    clauses.push(`document_id = $${params.length}`);
  }
  if (filter.actions && filter.actions.length > 0) {
    params.push([...filter.actions]);
    clauses.push(`action = ANY($${params.length}::text[])`);
  }
  if (filter.from) {
    params.push(filter.from);
    clauses.push(`created_at >= $${params.length}`);
  }
  if (filter.to) {
    params.push(filter.to);
    clauses.push(`created_at <= $${params.length}`);
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
  params.push(filter.limit, filter.offset);
  const res = await client.query<LedgerEntryRow>(
    `SELECT * FROM stock_ledger
      ${where}
      ORDER BY created_at DESC, sequence DESC
      LIMIT $${params.length - 1} OFFSET $${params.length}`,
    params
  );
  return res.rows.map(mapLedgerEntryRow);
}
