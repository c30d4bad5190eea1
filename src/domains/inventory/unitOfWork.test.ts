import { describe, expect, it } from 'vitest';
import { concurrencyConflict, validationError } from '../../lib/errors';
import { createTestContext } from '../../test/ledgerTestContext';
import { runUnitOfWork } from './unitOfWork';

describe('runUnitOfWork', () => {
  it('retries a concurrency conflict from scratch and returns the later result', async () => {
    const ctx = createTestContext();
    let attempts = 0;

    const result = await runUnitOfWork(ctx, 'test', async () => {
      attempts += 1;
      if (attempts < 3) throw concurrencyConflict('lock_timeout');
      return 'done';
    });

    expect(result).toBe('done');
    expect(attempts).toBe(3);
  });

  it('surfaces the conflict once retries run out', async () => {
    const ctx = createTestContext({ retry: { retries: 2, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 } });
    let attempts = 0;

    await expect(
      runUnitOfWork(ctx, 'test', async () => {
        attempts += 1;
        throw concurrencyConflict('lock_timeout');
      })
    ).rejects.toMatchObject({ code: 'CONCURRENCY_CONFLICT' });
    expect(attempts).toBe(3);
  });

  it('does not retry other errors', async () => {
    const ctx = createTestContext();
    let attempts = 0;

    await expect(
      runUnitOfWork(ctx, 'test', async () => {
        attempts += 1;
        throw validationError('NOPE', 'nope');
      })
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
    expect(attempts).toBe(1);
  });
});
