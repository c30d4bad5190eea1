import { concurrencyConflict, validationError } from './errors';

type PgError = {
  code?: string;
  constraint?: string;
  detail?: string;
};

export type PgErrorKind = 'unique' | 'foreignKey' | 'check' | 'notNull' | 'numericRange' | 'concurrency';

const CONCURRENCY_CODES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '55P03' // lock_not_available (lock_timeout)
]);

function asPgError(err: unknown): PgError | null {
  if (!err || typeof err !== 'object' || !('code' in err) || typeof err.code !== 'string') {
    return null;
  }
  return {
    code: err.code,
    constraint: 'constraint' in err && typeof err.constraint === 'string' ? err.constraint : undefined,
    detail: 'detail' in err && typeof err.detail === 'string' ? err.detail : undefined
  };
}

export function classifyPgError(err: unknown): PgErrorKind | null {
  const pgErr = asPgError(err);
  if (!pgErr?.code) return null;
  if (CONCURRENCY_CODES.has(pgErr.code)) return 'concurrency';
  switch (pgErr.code) {
    case '23505':
      return 'unique';
    case '23503':
      return 'foreignKey';
    case '23514':
      return 'check';
    case '23502':
      return 'notNull';
    case '22003':
      return 'numericRange';
    default:
      return null;
  }
}

/**
 * Translates Postgres errors raised inside a ledger transaction into ledger errors.
 *
 * Callers supply the unique-violation message since only they know which key collided;
 * anything unrecognised is rethrown untouched.
 */
export function translatePgError(err: unknown, mapping: { unique?: string; foreignKey?: string } = {}): unknown {
  const kind = classifyPgError(err);
  const constraint = asPgError(err)?.constraint ?? null;
  switch (kind) {
    case 'concurrency':
      return concurrencyConflict(`pg_${asPgError(err)?.code}`, err);
    case 'unique':
      return mapping.unique ? validationError('DUPLICATE_KEY', mapping.unique, { constraint }) : err;
    case 'foreignKey':
      return mapping.foreignKey ? validationError('INVALID_REFERENCE', mapping.foreignKey, { constraint }) : err;
    case 'numericRange':
      return validationError('NUMERIC_OUT_OF_RANGE', 'A quantity or price is outside the storable range.', {
        detail: asPgError(err)?.detail ?? null
      });
    default:
      return err;
  }
}
