import 'dotenv/config';
import { createPool } from './db';
import { getLedgerPolicy } from './config/ledgerPolicy';
import { createApp } from './app';
import { MemoryLedgerStore, PgLedgerStore, type LedgerContext, type LedgerStore } from './domains/inventory';
import { logEvent, serializeError } from './lib/logger';

const PORT = Number(process.env.PORT) || 3000;

function createStore(lockTimeoutMs: number): LedgerStore {
  const kind = (process.env.LEDGER_STORE ?? 'postgres').toLowerCase();
  if (kind === 'memory') {
    return new MemoryLedgerStore({ lockTimeoutMs });
  }
  if (kind !== 'postgres') {
    throw new Error(`LEDGER_STORE must be "postgres" or "memory", got "${kind}"`);
  }
  const pool = createPool();
  pool.on('error', (err) => {
    logEvent('error', 'db_pool_error', { error: serializeError(err) });
  });
  return new PgLedgerStore(pool, { lockTimeoutMs });
}

async function main() {
  const policy = getLedgerPolicy();
  const ctx: LedgerContext = { store: createStore(policy.lockTimeoutMs), policy };

  if (policy.defaultLocationId && !(await ctx.store.reader.findLocation(policy.defaultLocationId))) {
    logEvent('warn', 'default_location_missing', { locationId: policy.defaultLocationId });
  }

  const server = createApp(ctx).listen(PORT, () => {
    logEvent('info', 'server_started', { port: PORT, store: process.env.LEDGER_STORE ?? 'postgres' });
  });

  const shutdown = (signal: string) => {
    logEvent('info', 'server_stopping', { signal });
    server.close(() => {
      ctx.store
        .close()
        .catch((err: unknown) => logEvent('error', 'store_close_failed', { error: serializeError(err) }))
        .finally(() => process.exit(0));
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  logEvent('error', 'server_start_failed', { error: serializeError(err) });
  process.exit(1);
});
