import type { PoolClient } from 'pg';
import { toIsoString } from '../../../lib/dates';
import { toNullableNumber, toNumber } from '../../../lib/numbers';
import type { Item, ItemFilter, Location, LocationFilter } from '../types';

export type ItemRow = {
  id: string;
  code: string;
  name: string;
  unit: string;
  category: string | null;
  description: string | null;
  min_stock: string | number;
  unit_price: string | number | null;
  active: boolean;
  created_at: Date | string;
  updated_at: Date | string;
};

export type LocationRow = {
  id: string;
  code: string;
  description: string | null;
  active: boolean;
  created_at: Date | string;
  updated_at: Date | string;
};

export function mapItemRow(row: ItemRow): Item {
  return {
    id: row.id,
    code: row.code,
    name: row.name,
    unit: row.unit,
    category: row.category,
    description: row.description,
    minStock: toNumber(row.min_stock),
    unitPrice: toNullableNumber(row.unit_price),
    active: row.active,
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at)
  };
}

export function mapLocationRow(row: LocationRow): Location {
  return {
    id: row.id,
    code: row.code,
    description: row.description,
    active: row.active,
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at)
  };
}

export async function findItemRow(client: PoolClient, id: string): Promise<Item | null> {
  const res = await client.query<ItemRow>('SELECT * FROM items WHERE id = $1', [id]);
  return res.rowCount === 0 ? null : mapItemRow(res.rows[0]);
}

export async function listItemRows(client: PoolClient, filter: ItemFilter): Promise<Item[]> {
  const clauses: string[] = [];
  const params: unknown[] = [];
  if (filter.activeOnly) {
    clauses.push('active = true');
  }
  if (filter.search) {
    params.push(`%${filter.search}%`);
    clauses.push(`(code ILIKE $${params.length} OR name ILIKE $${params.length})`);
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
  let paging = '';
  if (filter.limit !== undefined) {
    params.push(filter.limit, filter.offset ?? 0);
    paging = `LIMIT $${params.length - 1} OFFSET $${params.length}`;
  }
  const res = await client.query<ItemRow>(`SELECT * FROM items ${where} ORDER BY code ${paging}`, params);
  return res.rows.map(mapItemRow);
}

export async function insertItemRow(client: PoolClient, item: Item) {
  await client.query(
    `INSERT INTO items (
        id, code, name, unit, category, description, min_stock, unit_price, active, created_at, updated_at
     ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11)`,
    [
      item.id,
      item.code,
      item.name,
      item.unit,
      item.category,
      item.description,
      item.minStock,
      item.unitPrice,
      item.active,
      item.createdAt,
      item.updatedAt
    ]
  );
}

export async function updateItemRow(client: PoolClient, item: Item) {
  await client.query(
    `UPDATE items
        SET code = $2,
            name = $3,
            unit = $4,
            category = $5,
            description = $6,
            min_stock = $7,
            unit_price = $8,
            active = $9,
            updated_at = $10
      WHERE id = $1`,
    [
      item.id,
      item.code,
      item.name,
      item.unit,
      item.category,
      item.description,
      item.minStock,
      item.unitPrice,
      item.active,
      item.updatedAt
    ]
  );
}

export async function findLocationRow(client: PoolClient, id: string): Promise<Location | null> {
  const res = await client.query<LocationRow>('SELECT * FROM locations WHERE id = $1', [id]);
  return res.rowCount === 0 ? null : mapLocationRow(res.rows[0]);
}

export async function listLocationRows(client: PoolClient, filter: LocationFilter): Promise<Location[]> {
  const where = filter.activeOnly ? 'WHERE active = true' : '';
  const res = await client.query<LocationRow>(`SELECT * FROM locations ${where} ORDER BY code`);
  return res.rows.map(mapLocationRow);
}

export async function insertLocationRow(client: PoolClient, location: Location) {
  await client.query(
    `INSERT INTO locations (id, code, description, active, created_at, updated_at)
     VALUES ($1,$2,$3,$4,$5,$6)`,
    [location.id, location.code, location.description, location.active, location.createdAt, location.updatedAt]
  );
}

export async function updateLocationRow(client: PoolClient, location: Location) {
  await client.query(
    `UPDATE locations
        SET code = $2,
            description = $3,
            active = $4,
            updated_at = $5
      WHERE id = $1`,
    [location.id, location.code, location.description, location.active, location.updatedAt]
  );
}
