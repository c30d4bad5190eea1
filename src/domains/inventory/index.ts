export * from './types';
export type { LedgerReader, LedgerSession, LedgerStore } from './store';
export { runUnitOfWork, type LedgerContext } from './unitOfWork';
export {
  applyMutation,
  applyStockMutation,
  assertBalanceTarget,
  getBalance,
  type StockMutationInput,
  type StockMutationResult
} from './mutationEngine';
export { MemoryLedgerStore, type MemoryLedgerStoreOptions } from './memory/memoryLedgerStore';
export { PgLedgerStore, type PgLedgerStoreOptions } from './pgLedgerStore';
