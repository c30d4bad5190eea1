import { describe, expect, it } from 'vitest';
import { getLedgerPolicy } from './ledgerPolicy';

describe('getLedgerPolicy', () => {
  it('falls back to defaults', () => {
    expect(getLedgerPolicy({})).toEqual({
      defaultLocationId: null,
      lockTimeoutMs: 5000,
      retry: { retries: 3, baseDelayMs: 25, maxDelayMs: 500, jitterMs: 25 },
      movementReportLimit: 500
    });
  });

  it('reads overrides and ignores malformed numbers', () => {
    const policy = getLedgerPolicy({
      DEFAULT_LOCATION_ID: '6f1c2b9e-3f4a-4c1d-9e8b-2a7d5c4b3a21',
      LEDGER_LOCK_TIMEOUT_MS: '250',
      LEDGER_RETRY_ATTEMPTS: 'lots',
      MOVEMENT_REPORT_LIMIT: '50'
    });

    expect(policy.defaultLocationId).toBe('6f1c2b9e-3f4a-4c1d-9e8b-2a7d5c4b3a21');
    expect(policy.lockTimeoutMs).toBe(250);
    expect(policy.retry.retries).toBe(3);
    expect(policy.movementReportLimit).toBe(50);
  });

  it('treats blank and negative values as unset and keeps a zero lock timeout', () => {
    const policy = getLedgerPolicy({
      DEFAULT_LOCATION_ID: '  ',
      LEDGER_LOCK_TIMEOUT_MS: '0',
      LEDGER_RETRY_ATTEMPTS: '',
      LEDGER_RETRY_JITTER_MS: '-5',
      LEDGER_RETRY_MAX_DELAY_MS: '2.5',
      MOVEMENT_REPORT_LIMIT: '0'
    });

    expect(policy).toEqual({
      defaultLocationId: null,
      lockTimeoutMs: 0,
      retry: { retries: 3, baseDelayMs: 25, maxDelayMs: 500, jitterMs: 25 },
      movementReportLimit: 1
    });
  });

  it('rejects a default location that is not a uuid', () => {
    expect(() => getLedgerPolicy({ DEFAULT_LOCATION_ID: 'main-store' })).toThrow(
      'DEFAULT_LOCATION_ID must be a uuid, got "main-store"'
    );
  });
});
