import { v4 as uuidv4 } from 'uuid';
import { notFound, validationError } from '../../../lib/errors';
import { roundQuantity } from '../../../lib/numbers';
import type { LedgerReader, LedgerSession, LedgerStore } from '../store';
import {
  balanceKeyOf,
  type Balance,
  type BalanceFilter,
  type BalanceKey,
  type DocumentFilter,
  type DocumentLinePatch,
  type DocumentStatusPatch,
  type Item,
  type ItemBalanceTotals,
  type ItemFilter,
  type LedgerEntry,
  type LedgerEntryInput,
  type LedgerFilter,
  type Location,
  type LocationFilter,
  type StockDocument
} from '../types';
import { KeyedLock } from './keyedLock';

type Tables = {
  items: Map<string, Item>;
  locations: Map<string, Location>;
  balances: Map<string, Balance>;
  documents: Map<string, StockDocument>;
  ledger: LedgerEntry[];
};

function emptyTables(): Tables {
  return {
    items: new Map(),
    locations: new Map(),
    balances: new Map(),
    documents: new Map(),
    ledger: []
  };
}

function merged<T>(base: Map<string, T>, overlay: Map<string, T> | null): Map<string, T> {
  if (!overlay || overlay.size === 0) return base;
  const view = new Map(base);
  for (const [key, value] of overlay) view.set(key, value);
  return view;
}

function page<T>(rows: T[], limit: number | undefined, offset: number | undefined): T[] {
  const start = offset ?? 0;
  return limit === undefined ? rows.slice(start) : rows.slice(start, start + limit);
}

function byNewest(a: { createdAt: string; sequence: number }, b: { createdAt: string; sequence: number }) {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
  return b.sequence - a.sequence;
}

function patchDocumentLine(document: StockDocument, lineId: string, patch: DocumentLinePatch): StockDocument {
  switch (document.kind) {
    case 'receipt':
      return {
        ...document,
        lines: document.lines.map((line) => (line.id === lineId ? { ...line, locationId: patch.locationId } : line))
      };
    case 'issue':
      return {
        ...document,
        lines: document.lines.map((line) => (line.id === lineId ? { ...line, locationId: patch.locationId } : line))
      };
    case 'inventory_count':
      return {
        ...document,
        lines: document.lines.map((line) =>
          line.id === lineId
            ? {
                ...line,
                locationId: patch.locationId,
                expectedQuantity: patch.expectedQuantity ?? line.expectedQuantity,
                discrepancy: patch.discrepancy ?? line.discrepancy
              }
            : line
        )
      };
  }
}

/**
 * Query side shared by the committed reader and open sessions; subclasses decide which
 * version of each table is visible.
 */
abstract class MemoryLedgerQueries implements LedgerReader {
  protected abstract view(): Tables;

  async findItem(id: string): Promise<Item | null> {
    const item = this.view().items.get(id);
    return item ? structuredClone(item) : null;
  }

  async listItems(filter: ItemFilter): Promise<Item[]> {
    const search = filter.search?.toLowerCase();
    const rows = [...this.view().items.values()]
      .filter((item) => !filter.activeOnly || item.active)
      .filter(
        (item) => !search || item.code.toLowerCase().includes(search) || item.name.toLowerCase().includes(search)
      )
      .sort((a, b) => a.code.localeCompare(b.code));
    return structuredClone(page(rows, filter.limit, filter.offset));
  }

  async findLocation(id: string): Promise<Location | null> {
    const location = this.view().locations.get(id);
    return location ? structuredClone(location) : null;
  }

  async listLocations(filter: LocationFilter): Promise<Location[]> {
    const rows = [...this.view().locations.values()]
      .filter((location) => !filter.activeOnly || location.active)
      .sort((a, b) => a.code.localeCompare(b.code));
    return structuredClone(rows);
  }

  async findBalance(key: BalanceKey): Promise<Balance | null> {
    const balance = this.view().balances.get(balanceKeyOf(key));
    return balance ? structuredClone(balance) : null;
  }

  async listBalances(filter: BalanceFilter): Promise<Balance[]> {
    const rows = [...this.view().balances.values()]
      .filter((balance) => !filter.itemId || balance.itemId === filter.itemId)
      .filter((balance) => !filter.locationId || balance.locationId === filter.locationId)
      .sort((a, b) => balanceKeyOf(a).localeCompare(balanceKeyOf(b)));
    return structuredClone(rows);
  }

  async summarizeBalancesByItem(): Promise<ItemBalanceTotals[]> {
    const totals = new Map<string, ItemBalanceTotals>();
    for (const balance of this.view().balances.values()) {
      const current = totals.get(balance.itemId) ?? { itemId: balance.itemId, onHand: 0, reserved: 0 };
      current.onHand = roundQuantity(current.onHand + balance.onHand);
      current.reserved = roundQuantity(current.reserved + balance.reserved);
      totals.set(balance.itemId, current);
    }
    return [...totals.values()];
  }

  async listLedgerEntries(filter: LedgerFilter): Promise<LedgerEntry[]> {
    const fromIso = filter.from?.toISOString();
    const toIso = filter.to?.toISOString();
    const rows = this.view()
      .ledger.filter((entry) => !filter.itemId || entry.itemId === filter.itemId)
      .filter((entry) => !filter.locationId || entry.locationId === filter.locationId)
      .filter((entry) => !filter.documentId || entry.documentId === filter.documentId)
      .filter((entry) => !filter.actions || filter.actions.length === 0 || filter.actions.includes(entry.action))
      .filter((entry) => !fromIso || entry.createdAt >= fromIso)
      .filter((entry) => !toIso || entry.createdAt <= toIso)
      .sort(byNewest);
    return structuredClone(page(rows, filter.limit, filter.offset));
  }

  async findDocument(id: string): Promise<StockDocument | null> {
    const document = this.view().documents.get(id);
    return document ? structuredClone(document) : null;
  }

  async listDocuments(filter: DocumentFilter): Promise<StockDocument[]> {
    const rows = [...this.view().documents.values()]
      .filter((document) => !filter.kind || document.kind === filter.kind)
      .filter((document) => !filter.status || document.status === filter.status)
      .sort((a, b) => {
        if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
        return b.number.localeCompare(a.number);
      });
    return structuredClone(page(rows, filter.limit, filter.offset));
  }
}

class MemoryLedgerReader extends MemoryLedgerQueries {
  constructor(private readonly committed: Tables) {
    super();
  }

  protected view(): Tables {
    return this.committed;
  }
}

type SessionOptions = {
  lockTimeoutMs: number;
  nextSequence: () => number;
};

class MemoryLedgerSession extends MemoryLedgerQueries implements LedgerSession {
  private readonly owner = Symbol('memory-ledger-transaction');
  private readonly heldKeys = new Set<string>();
  private readonly pending: Tables = emptyTables();

  constructor(
    private readonly committed: Tables,
    private readonly locks: KeyedLock,
    private readonly options: SessionOptions
  ) {
    super();
  }

  protected view(): Tables {
    return {
      items: merged(this.committed.items, this.pending.items),
      locations: merged(this.committed.locations, this.pending.locations),
      balances: merged(this.committed.balances, this.pending.balances),
      documents: merged(this.committed.documents, this.pending.documents),
      ledger: this.pending.ledger.length > 0 ? [...this.committed.ledger, ...this.pending.ledger] : this.committed.ledger
    };
  }

  private async lock(key: string) {
    await this.locks.acquire(key, this.owner, this.options.lockTimeoutMs);
    this.heldKeys.add(key);
  }

  async lockBalance(key: BalanceKey): Promise<Balance> {
    const id = balanceKeyOf(key);
    await this.lock(`balance:${id}`);
    const existing = this.view().balances.get(id);
    if (existing) return structuredClone(existing);
    const created: Balance = { ...key, onHand: 0, reserved: 0, updatedAt: null };
    this.pending.balances.set(id, created);
    return structuredClone(created);
  }

  async writeBalance(key: BalanceKey, onHand: number, at: Date): Promise<Balance> {
    const id = balanceKeyOf(key);
    if (!this.heldKeys.has(`balance:${id}`)) {
      throw new Error('INVENTORY_BALANCE_NOT_LOCKED');
    }
    const current = this.view().balances.get(id);
    const next: Balance = {
      ...key,
      onHand,
      reserved: current?.reserved ?? 0,
      updatedAt: at.toISOString()
    };
    this.pending.balances.set(id, next);
    return structuredClone(next);
  }

  async appendLedgerEntry(input: LedgerEntryInput): Promise<LedgerEntry> {
    const { createdAt, ...rest } = input;
    const entry: LedgerEntry = {
      ...structuredClone(rest),
      id: uuidv4(),
      sequence: this.options.nextSequence(),
      createdAt: (createdAt ?? new Date()).toISOString()
    };
    this.pending.ledger.push(entry);
    return structuredClone(entry);
  }

  async lockDocument(id: string): Promise<StockDocument | null> {
    await this.lock(`document:${id}`);
    return this.findDocument(id);
  }

  async insertDocument(document: StockDocument): Promise<void> {
    await this.lock(`document-number:${document.kind}:${document.number}`);
    const clash = [...this.view().documents.values()].some(
      (existing) => existing.kind === document.kind && existing.number === document.number
    );
    if (clash) {
      throw validationError('DUPLICATE_KEY', `Document number ${document.number} already exists.`);
    }
    this.pending.documents.set(document.id, structuredClone(document));
  }

  async updateDocumentStatus(id: string, patch: DocumentStatusPatch): Promise<void> {
    const document = this.view().documents.get(id);
    if (!document) throw notFound('document', id);
    this.pending.documents.set(id, {
      ...structuredClone(document),
      status: patch.status,
      processedBy: patch.processedBy,
      completedAt: patch.completedAt ? patch.completedAt.toISOString() : null,
      updatedAt: patch.updatedAt.toISOString()
    });
  }

  async updateDocumentLine(documentId: string, lineId: string, patch: DocumentLinePatch): Promise<void> {
    const document = this.view().documents.get(documentId);
    if (!document) throw notFound('document', documentId);
    this.pending.documents.set(documentId, patchDocumentLine(structuredClone(document), lineId, patch));
  }

  private async assertUniqueCode<T extends { id: string; code: string }>(
    table: Map<string, T>,
    scope: string,
    row: T,
    message: string
  ) {
    await this.lock(`${scope}-code:${row.code}`);
    const clash = [...table.values()].some((existing) => existing.code === row.code && existing.id !== row.id);
    if (clash) {
      throw validationError('DUPLICATE_KEY', message);
    }
  }

  async insertItem(item: Item): Promise<void> {
    await this.assertUniqueCode(this.view().items, 'item', item, `Item code ${item.code} already exists.`);
    this.pending.items.set(item.id, structuredClone(item));
  }

  async updateItem(item: Item): Promise<void> {
    await this.assertUniqueCode(this.view().items, 'item', item, `Item code ${item.code} already exists.`);
    this.pending.items.set(item.id, structuredClone(item));
  }

  async insertLocation(location: Location): Promise<void> {
    await this.assertUniqueCode(
      this.view().locations,
      'location',
      location,
      `Location code ${location.code} already exists.`
    );
    this.pending.locations.set(location.id, structuredClone(location));
  }

  async updateLocation(location: Location): Promise<void> {
    await this.assertUniqueCode(
      this.view().locations,
      'location',
      location,
      `Location code ${location.code} already exists.`
    );
    this.pending.locations.set(location.id, structuredClone(location));
  }

  commit() {
    for (const [id, item] of this.pending.items) this.committed.items.set(id, item);
    for (const [id, location] of this.pending.locations) this.committed.locations.set(id, location);
    for (const [id, balance] of this.pending.balances) this.committed.balances.set(id, balance);
    for (const [id, document] of this.pending.documents) this.committed.documents.set(id, document);
    this.committed.ledger.push(...this.pending.ledger);
  }

  releaseLocks() {
    for (const key of this.heldKeys) {
      this.locks.release(key, this.owner);
    }
    this.heldKeys.clear();
  }
}

export type MemoryLedgerStoreOptions = {
  lockTimeoutMs: number;
};

/**
 * In-process store with the same transactional contract as the Postgres one: writes stay in a
 * per-transaction overlay until commit, and balance or document locks are held until the
 * transaction ends.
 */
export class MemoryLedgerStore implements LedgerStore {
  readonly reader: LedgerReader;
  private readonly tables: Tables = emptyTables();
  private readonly locks = new KeyedLock();
  private sequence = 0;

  constructor(private readonly options: MemoryLedgerStoreOptions) {
    this.reader = new MemoryLedgerReader(this.tables);
  }

  async withTransaction<T>(handler: (session: LedgerSession) => Promise<T>): Promise<T> {
    const session = new MemoryLedgerSession(this.tables, this.locks, {
      lockTimeoutMs: this.options.lockTimeoutMs,
      nextSequence: () => {
        this.sequence += 1;
        return this.sequence;
      }
    });
    try {
      const result = await handler(session);
      session.commit();
      return result;
    } finally {
      session.releaseLocks();
    }
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}
}
