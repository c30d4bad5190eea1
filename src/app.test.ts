import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { createApp } from './app';
import { createTestContext } from './test/ledgerTestContext';

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

async function setup() {
  const ctx = createTestContext();
  const app = createApp(ctx);
  const item = await request(app).post('/items').send({ code: 'IC-555', name: '555 timer', minStock: 10 });
  const location = await request(app).post('/locations').send({ code: 'TRAY-1' });
  return { app, itemId: String(item.body.id), locationId: String(location.body.id) };
}

describe('http api', () => {
  it('reports liveness and readiness', async () => {
    const { app } = await setup();

    const live = await request(app).get('/health/live');
    const ready = await request(app).get('/health/ready');

    expect(live.status).toBe(200);
    expect(live.body.status).toBe('ok');
    expect(ready.status).toBe(200);
    expect(ready.body).toMatchObject({ status: 'ok', ready: true, details: { store: { ok: true } } });
  });

  it('runs a receipt from draft to confirmed', async () => {
    const { app, itemId, locationId } = await setup();

    const created = await request(app)
      .post('/receipts')
      .set('x-actor', 'storekeeper')
      .send({ number: 'RC-100', lines: [{ itemId, locationId, quantity: 25 }] });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ status: 'draft', createdBy: 'storekeeper' });

    const confirmed = await request(app).post(`/receipts/${created.body.id}/confirm`).send({ actor: 'lead' });
    expect(confirmed.status).toBe(200);
    expect(confirmed.body).toMatchObject({ status: 'confirmed', processedBy: 'lead' });

    const balance = await request(app).get(`/balances/${itemId}/${locationId}`);
    expect(balance.body).toMatchObject({ itemId, locationId, onHand: 25 });
  });

  it('answers 409 with the error envelope when stock is short', async () => {
    const { app, itemId, locationId } = await setup();
    const issue = await request(app)
      .post('/issues')
      .send({ number: 'IS-1', lines: [{ itemId, locationId, quantity: 3 }] });

    const response = await request(app).post(`/issues/${issue.body.id}/confirm`).send({});

    expect(response.status).toBe(409);
    expect(response.body).toEqual({
      error: {
        code: 'INSUFFICIENT_STOCK',
        message: 'Insufficient stock: available 0, requested 3.',
        details: { itemId, locationId, available: 0, requested: 3 }
      }
    });
  });

  it('answers 409 when a document is confirmed twice', async () => {
    const { app, itemId, locationId } = await setup();
    const receipt = await request(app)
      .post('/receipts')
      .send({ number: 'RC-2', lines: [{ itemId, locationId, quantity: 1 }] });
    await request(app).post(`/receipts/${receipt.body.id}/confirm`).send({});

    const again = await request(app).post(`/receipts/${receipt.body.id}/confirm`).send({});

    expect(again.status).toBe(409);
    expect(again.body.error.code).toBe('DOCUMENT_ALREADY_PROCESSED');
  });

  it('answers 400 for a body that fails validation', async () => {
    const { app, itemId } = await setup();

    const response = await request(app)
      .post('/issues')
      .send({ number: 'IS-2', lines: [{ itemId, quantity: -2 }] });

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('VALIDATION_ERROR');
    expect(response.body.error.details.fieldErrors).toHaveProperty('lines');
  });

  it('answers 400 for malformed json and for a bad id', async () => {
    const { app } = await setup();

    const malformed = await request(app).post('/items').set('content-type', 'application/json').send('{"code":');
    const badId = await request(app).get('/items/not-a-uuid');

    expect(malformed.status).toBe(400);
    expect(malformed.body).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body.' } });
    expect(badId.status).toBe(400);
  });

  it('answers 404 for unknown records and routes', async () => {
    const { app } = await setup();

    const item = await request(app).get(`/items/${MISSING_ID}`);
    const route = await request(app).get('/nowhere');

    expect(item.status).toBe(404);
    expect(item.body.error).toMatchObject({ code: 'NOT_FOUND', details: { entityType: 'item', id: MISSING_ID } });
    expect(route.status).toBe(404);
  });

  it('adjusts a balance and exposes the movement in the ledger and reports', async () => {
    const { app, itemId, locationId } = await setup();

    const adjusted = await request(app)
      .post('/balances/adjust')
      .send({ itemId, locationId, targetQuantity: 4, reason: 'found in returns', actor: 'auditor' });
    expect(adjusted.status).toBe(200);
    expect(adjusted.body.balance.onHand).toBe(4);

    const ledger = await request(app).get('/ledger').query({ item_id: itemId, action: 'adjust' });
    expect(ledger.body.paging).toEqual({ limit: 100, offset: 0 });
    expect(ledger.body.data).toHaveLength(1);
    expect(ledger.body.data[0]).toMatchObject({ description: 'found in returns', performedBy: 'auditor' });

    const stock = await request(app).get('/reports/stock').query({ below_min_only: 'true' });
    expect(stock.body.data).toEqual([expect.objectContaining({ itemId, totalQuantity: 4, isBelowMin: true })]);
  });

  it('rejects a duplicate item code with 400', async () => {
    const { app } = await setup();

    const response = await request(app).post('/items').send({ code: 'IC-555', name: 'Second timer' });

    expect(response.status).toBe(400);
    expect(response.body.error).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Item code IC-555 already exists.',
      details: { reason: 'DUPLICATE_KEY' }
    });
  });

  it('answers 400 for an adjustment target beyond the storable range', async () => {
    const { app, itemId, locationId } = await setup();

    const response = await request(app)
      .post('/balances/adjust')
      .send({ itemId, locationId, targetQuantity: 1e12, reason: 'typo' });

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('VALIDATION_ERROR');
    expect(response.body.error.details.fieldErrors).toHaveProperty('targetQuantity');
  });
});
