import type { PoolClient } from 'pg';
import { toNullableIsoString } from '../../../lib/dates';
import { roundQuantity, toNumber } from '../../../lib/numbers';
import type { Balance, BalanceFilter, BalanceKey, ItemBalanceTotals } from '../types';

export type InventoryBalanceRow = {
  item_id: string;
  location_id: string;
  on_hand: string | number;
  reserved: string | number;
  created_at: Date | string;
  updated_at: Date | string | null;
};

function normalizeQuantity(value: unknown): number {
  return roundQuantity(toNumber(value));
}

export function mapBalanceRow(row: InventoryBalanceRow): Balance {
  return {
    itemId: row.item_id,
    locationId: row.location_id,
    onHand: normalizeQuantity(row.on_hand),
    reserved: normalizeQuantity(row.reserved),
    updatedAt: toNullableIsoString(row.updated_at)
  };
}

export async function ensureInventoryBalanceRow(client: PoolClient, key: BalanceKey) {
  await client.query(
    `INSERT INTO inventory_balance (item_id, location_id, on_hand, reserved, created_at, updated_at)
     VALUES ($1, $2, 0, 0, now(), NULL)
     ON CONFLICT (item_id, location_id) DO NOTHING`,
    [key.itemId, key.locationId]
  );
}

export async function ensureInventoryBalanceRowAndLock(client: PoolClient, key: BalanceKey): Promise<Balance> {
  await ensureInventoryBalanceRow(client, key);
  const res = await client.query<InventoryBalanceRow>(
    `SELECT * FROM inventory_balance
      WHERE item_id = $1 AND location_id = $2
      FOR UPDATE`,
    [key.itemId, key.locationId]
  );
  if (res.rowCount === 0) {
    throw new Error('INVENTORY_BALANCE_ROW_MISSING');
  }
  return mapBalanceRow(res.rows[0]);
}

export async function writeInventoryBalance(
  client: PoolClient,
  key: BalanceKey,
  onHand: number,
  at: Date
): Promise<Balance> {
  const res = await client.query<InventoryBalanceRow>(
    `UPDATE inventory_balance
        SET on_hand = $1,
            updated_at = $2
      WHERE item_id = $3 AND location_id = $4
      RETURNING *`,
    [onHand, at, key.itemId, key.locationId]
  );
  if (res.rowCount === 0) {
    throw new Error('INVENTORY_BALANCE_ROW_MISSING');
  }
  return mapBalanceRow(res.rows[0]);
}

export async function getInventoryBalance(client: PoolClient, key: BalanceKey): Promise<Balance | null> {
  const res = await client.query<InventoryBalanceRow>(
    `SELECT * FROM inventory_balance
      WHERE item_id = $1 AND location_id = $2`,
    [key.itemId, key.locationId]
  );
  if (res.rowCount === 0) return null;
  return mapBalanceRow(res.rows[0]);
}

export async function listInventoryBalances(client: PoolClient, filter: BalanceFilter): Promise<Balance[]> {
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
  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
  const res = await client.query<InventoryBalanceRow>(
    `SELECT * FROM inventory_balance ${where} ORDER BY item_id, location_id`,
    params
  );
  return res.rows.map(mapBalanceRow);
}

export async function summarizeInventoryBalances(client: PoolClient): Promise<ItemBalanceTotals[]> {
  const res = await client.query<{ item_id: string; on_hand: string | number; reserved: string | number }>(
    `SELECT item_id,
            COALESCE(SUM(on_hand), 0) AS on_hand,
            COALESCE(SUM(reserved), 0) AS reserved
       FROM inventory_balance
      GROUP BY item_id`
  );
  return res.rows.map((row) => ({
    itemId: row.item_id,
    onHand: normalizeQuantity(row.on_hand),
    reserved: normalizeQuantity(row.reserved)
  }));
}
