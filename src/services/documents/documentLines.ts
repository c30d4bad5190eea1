import type { LedgerPolicy } from '../../config/ledgerPolicy';
import { notFound, validationError } from '../../lib/errors';
import { assertBalanceTarget } from '../../domains/inventory/mutationEngine';
import type { LedgerReader, LedgerSession } from '../../domains/inventory/store';
import { balanceKeyOf, type BalanceKey } from '../../domains/inventory/types';

export type DocumentLineRef = {
  id: string;
  lineNumber: number;
  itemId: string;
  locationId: string | null;
};

export type DraftLineRef = {
  itemId: string;
  locationId?: string | null;
};

export type ResolvedLine<L> = {
  line: L;
  key: BalanceKey;
};

/**
 * A line without a location falls back to the configured default; with no default the line
 * is rejected rather than guessed.
 */
export function resolveLineLocation(policy: LedgerPolicy, line: DraftLineRef, lineNumber: number): string {
  const locationId = line.locationId ?? policy.defaultLocationId;
  if (!locationId) {
    throw validationError('LOCATION_REQUIRED', `Line ${lineNumber} has no location and no default location is configured.`, {
      lineNumber
    });
  }
  return locationId;
}

/**
 * Draft-time checks: every item and every explicit or default location must exist.
 */
export async function assertDraftLines(reader: LedgerReader, policy: LedgerPolicy, lines: DraftLineRef[]) {
  const itemIds = new Set(lines.map((line) => line.itemId));
  const locationIds = new Set(lines.map((line, index) => resolveLineLocation(policy, line, index + 1)));
  for (const itemId of itemIds) {
    if (!(await reader.findItem(itemId))) {
      throw notFound('item', itemId);
    }
  }
  for (const locationId of locationIds) {
    if (!(await reader.findLocation(locationId))) {
      throw notFound('location', locationId);
    }
  }
}

export function assertDistinctLineKeys(policy: LedgerPolicy, lines: DraftLineRef[]) {
  const seen = new Map<string, number>();
  lines.forEach((line, index) => {
    const key = balanceKeyOf({ itemId: line.itemId, locationId: resolveLineLocation(policy, line, index + 1) });
    const previous = seen.get(key);
    if (previous !== undefined) {
      throw validationError('DUPLICATE_COUNT_LINE', `Lines ${previous} and ${index + 1} count the same item at the same location.`, {
        lineNumbers: [previous, index + 1]
      });
    }
    seen.set(key, index + 1);
  });
}

/**
 * Resolves every line's balance key and locks the distinct keys in sorted order, so two
 * confirmations touching overlapping balances always queue instead of deadlocking.
 */
export async function lockConfirmationTargets<L extends DocumentLineRef>(
  session: LedgerSession,
  policy: LedgerPolicy,
  lines: L[]
): Promise<ResolvedLine<L>[]> {
  if (lines.length === 0) {
    throw validationError('DOCUMENT_HAS_NO_LINES', 'Document has no lines to confirm.');
  }
  const resolved = lines.map((line) => ({
    line,
    key: { itemId: line.itemId, locationId: resolveLineLocation(policy, line, line.lineNumber) }
  }));

  const distinct = new Map<string, BalanceKey>();
  for (const { key } of resolved) {
    distinct.set(balanceKeyOf(key), key);
  }
  const ordered = [...distinct.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [, key] of ordered) {
    await assertBalanceTarget(session, key);
    await session.lockBalance(key);
  }
  return resolved;
}
