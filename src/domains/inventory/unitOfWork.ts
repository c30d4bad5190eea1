import type { LedgerPolicy } from '../../config/ledgerPolicy';
import { isLedgerError } from '../../lib/errors';
import { logEvent } from '../../lib/logger';
import { withRetry } from '../../lib/retry';
import type { LedgerSession, LedgerStore } from './store';

export type LedgerContext = {
  store: LedgerStore;
  policy: LedgerPolicy;
};

/**
 * Runs `handler` in one store transaction. ConcurrencyConflict aborts the whole transaction
 * and the handler runs again from scratch; every other error propagates after rollback.
 */
export function runUnitOfWork<T>(
  ctx: LedgerContext,
  label: string,
  handler: (session: LedgerSession) => Promise<T>
): Promise<T> {
  return withRetry(() => ctx.store.withTransaction(handler), ctx.policy.retry, {
    shouldRetry: (error) => isLedgerError(error, 'CONCURRENCY_CONFLICT'),
    onRetry: (error, attempt, delayMs) => {
      logEvent('warn', 'ledger_unit_of_work_retry', {
        operation: label,
        attempt,
        delayMs: Math.round(delayMs),
        reason: isLedgerError(error) ? error.details.reason : undefined
      });
    }
  });
}
