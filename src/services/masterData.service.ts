import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import { notFound, validationError } from '../lib/errors';
import { logEvent } from '../lib/logger';
import { isWithinQuantityRange, QUANTITY_MAX } from '../lib/numbers';
import type { LedgerSession } from '../domains/inventory/store';
import type {
  CatalogAction,
  CatalogFieldValue,
  Item,
  LedgerEntityType,
  Location
} from '../domains/inventory/types';
import { runUnitOfWork, type LedgerContext } from '../domains/inventory/unitOfWork';
import type {
  itemSchema,
  itemUpdateSchema,
  locationSchema,
  locationUpdateSchema
} from '../schemas/masterData.schema';

export type ItemInput = z.input<typeof itemSchema>;
export type ItemUpdateInput = z.infer<typeof itemUpdateSchema>;
export type LocationInput = z.input<typeof locationSchema>;
export type LocationUpdateInput = z.infer<typeof locationUpdateSchema>;

type ChangeSet = Record<string, CatalogFieldValue>;

const ITEM_FIELDS = ['code', 'name', 'unit', 'category', 'description', 'minStock', 'unitPrice', 'active'] as const;
const LOCATION_FIELDS = ['code', 'description', 'active'] as const;

function requireText(value: string, field: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw validationError('FIELD_REQUIRED', `${field} is required.`, { field });
  }
  return trimmed;
}

function requireNonNegative(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw validationError('FIELD_NEGATIVE', `${field} must be zero or more.`, { field, value });
  }
  if (!isWithinQuantityRange(value)) {
    throw validationError('FIELD_OUT_OF_RANGE', `${field} must not exceed ${QUANTITY_MAX}.`, { field, value });
  }
  return value;
}

function diff<T, K extends keyof T & string>(before: T, after: T, fields: readonly K[]): ChangeSet {
  const changes: ChangeSet = {};
  for (const field of fields) {
    const next = after[field];
    if (before[field] !== next && isFieldValue(next)) {
      changes[field] = next;
    }
  }
  return changes;
}

function snapshot<T, K extends keyof T & string>(entity: T, fields: readonly K[]): ChangeSet {
  const values: ChangeSet = {};
  for (const field of fields) {
    const value = entity[field];
    if (isFieldValue(value)) {
      values[field] = value;
    }
  }
  return values;
}

function isFieldValue(value: unknown): value is CatalogFieldValue {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

async function recordCatalogChange(
  session: LedgerSession,
  params: {
    action: CatalogAction;
    entityType: Exclude<LedgerEntityType, 'balance'>;
    entityId: string;
    description: string;
    changes: ChangeSet;
    actor: string | null;
    at: Date;
  }
) {
  await session.appendLedgerEntry({
    action: params.action,
    entityType: params.entityType,
    entityId: params.entityId,
    itemId: params.entityType === 'item' ? params.entityId : null,
    locationId: params.entityType === 'location' ? params.entityId : null,
    documentId: null,
    quantityBefore: null,
    quantityAfter: null,
    description: params.description,
    payload: { changes: params.changes },
    performedBy: params.actor,
    createdAt: params.at
  });
}

function normalizeItem(item: Item): Item {
  return {
    ...item,
    code: requireText(item.code, 'code'),
    name: requireText(item.name, 'name'),
    unit: requireText(item.unit, 'unit'),
    minStock: requireNonNegative(item.minStock, 'minStock'),
    unitPrice: item.unitPrice === null ? null : requireNonNegative(item.unitPrice, 'unitPrice')
  };
}

export async function createItem(ctx: LedgerContext, data: ItemInput, actor: string | null = null): Promise<Item> {
  const now = new Date();
  const item = normalizeItem({
    id: uuidv4(),
    code: data.code,
    name: data.name,
    unit: data.unit ?? 'pcs',
    category: data.category ?? null,
    description: data.description ?? null,
    minStock: data.minStock ?? 0,
    unitPrice: data.unitPrice ?? null,
    active: data.active ?? true,
    createdAt: now.toISOString(),
    updatedAt: now.toISOString()
  });
  await runUnitOfWork(ctx, 'create_item', async (session) => {
    await session.insertItem(item);
    await recordCatalogChange(session, {
      action: 'create',
      entityType: 'item',
      entityId: item.id,
      description: `Item ${item.code} created`,
      changes: snapshot(item, ITEM_FIELDS),
      actor,
      at: now
    });
  });
  logEvent('info', 'item_created', { itemId: item.id, code: item.code });
  return item;
}

export async function getItem(ctx: LedgerContext, id: string): Promise<Item> {
  const item = await ctx.store.reader.findItem(id);
  if (!item) throw notFound('item', id);
  return item;
}

export function listItems(
  ctx: LedgerContext,
  filters: { activeOnly?: boolean; search?: string; limit?: number; offset?: number } = {}
): Promise<Item[]> {
  return ctx.store.reader.listItems({
    activeOnly: filters.activeOnly ?? true,
    search: filters.search,
    limit: filters.limit ?? 100,
    offset: filters.offset ?? 0
  });
}

/**
 * Partial update. Only fields whose value actually changes are written to the ledger payload;
 * a no-op update writes nothing.
 */
export function updateItem(
  ctx: LedgerContext,
  id: string,
  data: ItemUpdateInput,
  actor: string | null = null
): Promise<Item> {
  return runUnitOfWork(ctx, 'update_item', async (session) => {
    const existing = await session.findItem(id);
    if (!existing) throw notFound('item', id);
    const now = new Date();
    const next = normalizeItem({ ...existing, ...data, updatedAt: now.toISOString() });
    const changes = diff(existing, next, ITEM_FIELDS);
    if (Object.keys(changes).length === 0) return existing;
    await session.updateItem(next);
    await recordCatalogChange(session, {
      action: 'update',
      entityType: 'item',
      entityId: id,
      description: `Item ${next.code} updated`,
      changes,
      actor,
      at: now
    });
    return next;
  });
}

export function deactivateItem(ctx: LedgerContext, id: string, actor: string | null = null): Promise<Item> {
  return runUnitOfWork(ctx, 'deactivate_item', async (session) => {
    const existing = await session.findItem(id);
    if (!existing) throw notFound('item', id);
    if (!existing.active) return existing;
    const now = new Date();
    const next: Item = { ...existing, active: false, updatedAt: now.toISOString() };
    await session.updateItem(next);
    await recordCatalogChange(session, {
      action: 'delete',
      entityType: 'item',
      entityId: id,
      description: `Item ${existing.code} deactivated`,
      changes: { active: false },
      actor,
      at: now
    });
    return next;
  });
}

function normalizeLocation(location: Location): Location {
  return { ...location, code: requireText(location.code, 'code') };
}

export async function createLocation(
  ctx: LedgerContext,
  data: LocationInput,
  actor: string | null = null
): Promise<Location> {
  const now = new Date();
  const location = normalizeLocation({
    id: uuidv4(),
    code: data.code,
    description: data.description ?? null,
    active: data.active ?? true,
    createdAt: now.toISOString(),
    updatedAt: now.toISOString()
  });
  await runUnitOfWork(ctx, 'create_location', async (session) => {
    await session.insertLocation(location);
    await recordCatalogChange(session, {
      action: 'create',
      entityType: 'location',
      entityId: location.id,
      description: `Location ${location.code} created`,
      changes: snapshot(location, LOCATION_FIELDS),
      actor,
      at: now
    });
  });
  logEvent('info', 'location_created', { locationId: location.id, code: location.code });
  return location;
}

export async function getLocation(ctx: LedgerContext, id: string): Promise<Location> {
  const location = await ctx.store.reader.findLocation(id);
  if (!location) throw notFound('location', id);
  return location;
}

export function listLocations(ctx: LedgerContext, filters: { activeOnly?: boolean } = {}): Promise<Location[]> {
  return ctx.store.reader.listLocations({ activeOnly: filters.activeOnly ?? true });
}

export function updateLocation(
  ctx: LedgerContext,
  id: string,
  data: LocationUpdateInput,
  actor: string | null = null
): Promise<Location> {
  return runUnitOfWork(ctx, 'update_location', async (session) => {
    const existing = await session.findLocation(id);
    if (!existing) throw notFound('location', id);
    const now = new Date();
    const next = normalizeLocation({ ...existing, ...data, updatedAt: now.toISOString() });
    const changes = diff(existing, next, LOCATION_FIELDS);
    if (Object.keys(changes).length === 0) return existing;
    await session.updateLocation(next);
    await recordCatalogChange(session, {
      action: 'update',
      entityType: 'location',
      entityId: id,
      description: `Location ${next.code} updated`,
      changes,
      actor,
      at: now
    });
    return next;
  });
}

export function deactivateLocation(ctx: LedgerContext, id: string, actor: string | null = null): Promise<Location> {
  return runUnitOfWork(ctx, 'deactivate_location', async (session) => {
    const existing = await session.findLocation(id);
    if (!existing) throw notFound('location', id);
    if (!existing.active) return existing;
    const now = new Date();
    const next: Location = { ...existing, active: false, updatedAt: now.toISOString() };
    await session.updateLocation(next);
    await recordCatalogChange(session, {
      action: 'delete',
      entityType: 'location',
      entityId: id,
      description: `Location ${existing.code} deactivated`,
      changes: { active: false },
      actor,
      at: now
    });
    return next;
  });
}
