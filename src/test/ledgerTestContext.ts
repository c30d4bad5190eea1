import type { LedgerPolicy } from '../config/ledgerPolicy';
import { MemoryLedgerStore } from '../domains/inventory/memory/memoryLedgerStore';
import type { Item, Location } from '../domains/inventory/types';
import type { LedgerContext } from '../domains/inventory/unitOfWork';
import { createItem, createLocation, type ItemInput } from '../services/masterData.service';

export function testPolicy(overrides: Partial<LedgerPolicy> = {}): LedgerPolicy {
  return {
    defaultLocationId: null,
    lockTimeoutMs: 200,
    retry: { retries: 3, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 },
    movementReportLimit: 500,
    ...overrides
  };
}

export function createTestContext(overrides: Partial<LedgerPolicy> = {}): LedgerContext & { store: MemoryLedgerStore } {
  const policy = testPolicy(overrides);
  return { store: new MemoryLedgerStore({ lockTimeoutMs: policy.lockTimeoutMs }), policy };
}

let sequence = 0;

export function seedItem(ctx: LedgerContext, overrides: Partial<ItemInput> = {}): Promise<Item> {
  sequence += 1;
  return createItem(ctx, {
    code: `PN-${sequence}`,
    name: `Resistor ${sequence}`,
    ...overrides
  });
}

export function seedLocation(ctx: LedgerContext, code?: string): Promise<Location> {
  sequence += 1;
  return createLocation(ctx, { code: code ?? `BIN-${sequence}` });
}
