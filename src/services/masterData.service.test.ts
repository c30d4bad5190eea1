import { describe, expect, it } from 'vitest';
import { createTestContext } from '../test/ledgerTestContext';
import {
  createItem,
  createLocation,
  deactivateItem,
  deactivateLocation,
  getItem,
  listItems,
  listLocations,
  updateItem,
  updateLocation
} from './masterData.service';

describe('items', () => {
  it('creates an item with defaults and records a create entry', async () => {
    const ctx = createTestContext();

    const item = await createItem(ctx, { code: ' SW-01 ', name: 'Toggle switch' }, 'admin');

    expect(item).toMatchObject({
      code: 'SW-01',
      unit: 'pcs',
      category: null,
      minStock: 0,
      unitPrice: null,
      active: true
    });
    const [entry] = await ctx.store.reader.listLedgerEntries({ itemId: item.id, limit: 10, offset: 0 });
    expect(entry).toMatchObject({
      action: 'create',
      entityType: 'item',
      entityId: item.id,
      locationId: null,
      description: 'Item SW-01 created',
      performedBy: 'admin',
      quantityBefore: null,
      quantityAfter: null
    });
    expect(entry.payload).toEqual({
      changes: {
        code: 'SW-01',
        name: 'Toggle switch',
        unit: 'pcs',
        category: null,
        description: null,
        minStock: 0,
        unitPrice: null,
        active: true
      }
    });
  });

  it('rejects a duplicate code and writes nothing', async () => {
    const ctx = createTestContext();
    await createItem(ctx, { code: 'SW-02', name: 'Push button' });

    await expect(createItem(ctx, { code: 'SW-02', name: 'Another' })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      details: { reason: 'DUPLICATE_KEY', message: 'Item code SW-02 already exists.' }
    });
    expect(await listItems(ctx)).toHaveLength(1);
    expect(await ctx.store.reader.listLedgerEntries({ limit: 10, offset: 0 })).toHaveLength(1);
  });

  it('logs only the fields that changed', async () => {
    const ctx = createTestContext();
    const item = await createItem(ctx, { code: 'SW-03', name: 'Rocker', minStock: 2 });

    const updated = await updateItem(ctx, item.id, { name: 'Rocker switch', minStock: 2 });

    expect(updated.name).toBe('Rocker switch');
    const [entry] = await ctx.store.reader.listLedgerEntries({ itemId: item.id, actions: ['update'], limit: 10, offset: 0 });
    expect(entry).toMatchObject({ description: 'Item SW-03 updated', payload: { changes: { name: 'Rocker switch' } } });
    expect(entry.payload?.changes).not.toHaveProperty('minStock');
  });

  it('writes nothing for an update that changes nothing', async () => {
    const ctx = createTestContext();
    const item = await createItem(ctx, { code: 'SW-04', name: 'Slide' });

    const same = await updateItem(ctx, item.id, { name: 'Slide' });

    expect(same).toEqual(item);
    expect(await ctx.store.reader.listLedgerEntries({ itemId: item.id, limit: 10, offset: 0 })).toHaveLength(1);
  });

  it('deactivates an item and hides it from the default listing', async () => {
    const ctx = createTestContext();
    const item = await createItem(ctx, { code: 'SW-05', name: 'Reed' });

    await deactivateItem(ctx, item.id);

    expect(await listItems(ctx)).toEqual([]);
    expect(await listItems(ctx, { activeOnly: false })).toHaveLength(1);
    expect((await getItem(ctx, item.id)).active).toBe(false);
    const [entry] = await ctx.store.reader.listLedgerEntries({ itemId: item.id, actions: ['delete'], limit: 10, offset: 0 });
    expect(entry).toMatchObject({ description: 'Item SW-05 deactivated', payload: { changes: { active: false } } });
  });

  it('searches by code or name', async () => {
    const ctx = createTestContext();
    await createItem(ctx, { code: 'CAB-1', name: 'USB cable' });
    await createItem(ctx, { code: 'USB-HUB', name: 'Hub' });
    await createItem(ctx, { code: 'PSU-1', name: 'Power supply' });

    const found = await listItems(ctx, { search: 'usb' });

    expect(found.map((item) => item.code)).toEqual(['CAB-1', 'USB-HUB']);
  });

  it('rejects a negative minimum stock', async () => {
    const ctx = createTestContext();

    await expect(createItem(ctx, { code: 'SW-06', name: 'Dip', minStock: -1 })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      details: { reason: 'FIELD_NEGATIVE', field: 'minStock' }
    });
  });

  it('rejects a minimum stock beyond the storable range', async () => {
    const ctx = createTestContext();

    await expect(createItem(ctx, { code: 'SW-07', name: 'Limit', minStock: 1e12 })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      details: { reason: 'FIELD_OUT_OF_RANGE', field: 'minStock' }
    });
  });

  it('reports an unknown item as not found', async () => {
    const ctx = createTestContext();

    await expect(getItem(ctx, '00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });
});

describe('locations', () => {
  it('creates, renames and deactivates a location', async () => {
    const ctx = createTestContext();
    const location = await createLocation(ctx, { code: 'RACK-1', description: 'North wall' });

    await updateLocation(ctx, location.id, { code: 'RACK-01' });
    await deactivateLocation(ctx, location.id);

    const entries = await ctx.store.reader.listLedgerEntries({ locationId: location.id, limit: 10, offset: 0 });
    expect(entries.map((entry) => entry.description)).toEqual([
      'Location RACK-01 deactivated',
      'Location RACK-01 updated',
      'Location RACK-1 created'
    ]);
    expect(await listLocations(ctx)).toEqual([]);
  });

  it('rejects a code already in use by another location', async () => {
    const ctx = createTestContext();
    await createLocation(ctx, { code: 'RACK-2' });
    const other = await createLocation(ctx, { code: 'RACK-3' });

    await expect(updateLocation(ctx, other.id, { code: 'RACK-2' })).rejects.toMatchObject({
      details: { reason: 'DUPLICATE_KEY' }
    });
  });
});
