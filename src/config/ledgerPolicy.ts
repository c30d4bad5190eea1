import { z } from 'zod';

export type RetryPolicy = {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
};

export type LedgerPolicy = {
  /** Location used for document lines that name none; null means lines must name one. */
  defaultLocationId: string | null;
  /** 0 disables the lock wait limit in both stores. */
  lockTimeoutMs: number;
  retry: RetryPolicy;
  movementReportLimit: number;
};

type Env = Record<string, string | undefined>;

const blankAsMissing = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

function envInt(fallback: number) {
  return z.preprocess(blankAsMissing, z.coerce.number().int().nonnegative()).catch(fallback);
}

const policyEnvSchema = z.object({
  DEFAULT_LOCATION_ID: z.preprocess(blankAsMissing, z.string().trim().optional()),
  LEDGER_LOCK_TIMEOUT_MS: envInt(5000),
  LEDGER_RETRY_ATTEMPTS: envInt(3),
  LEDGER_RETRY_BASE_DELAY_MS: envInt(25),
  LEDGER_RETRY_MAX_DELAY_MS: envInt(500),
  LEDGER_RETRY_JITTER_MS: envInt(25),
  MOVEMENT_REPORT_LIMIT: envInt(500)
});

function parseDefaultLocation(value: string | undefined): string | null {
  if (!value) return null;
  const parsed = z.string().uuid().safeParse(value);
  if (!parsed.success) {
    throw new Error(`DEFAULT_LOCATION_ID must be a uuid, got "${value}"`);
  }
  return parsed.data;
}

export function getLedgerPolicy(env: Env = process.env): LedgerPolicy {
  const parsed = policyEnvSchema.parse(env);
  return {
    defaultLocationId: parseDefaultLocation(parsed.DEFAULT_LOCATION_ID),
    lockTimeoutMs: parsed.LEDGER_LOCK_TIMEOUT_MS,
    retry: {
      retries: parsed.LEDGER_RETRY_ATTEMPTS,
      baseDelayMs: parsed.LEDGER_RETRY_BASE_DELAY_MS,
      maxDelayMs: parsed.LEDGER_RETRY_MAX_DELAY_MS,
      jitterMs: parsed.LEDGER_RETRY_JITTER_MS
    },
    movementReportLimit: Math.max(1, parsed.MOVEMENT_REPORT_LIMIT)
  };
}
