import type {
  Balance,
  BalanceFilter,
  BalanceKey,
  DocumentFilter,
  DocumentLinePatch,
  DocumentStatusPatch,
  Item,
  ItemBalanceTotals,
  ItemFilter,
  LedgerEntry,
  LedgerEntryInput,
  LedgerFilter,
  Location,
  LocationFilter,
  StockDocument
} from './types';

/**
 * Read access to committed state (or, inside a transaction, to the transaction's own view).
 */
export interface LedgerReader {
  findItem(id: string): Promise<Item | null>;
  listItems(filter: ItemFilter): Promise<Item[]>;
  findLocation(id: string): Promise<Location | null>;
  listLocations(filter: LocationFilter): Promise<Location[]>;
  findBalance(key: BalanceKey): Promise<Balance | null>;
  listBalances(filter: BalanceFilter): Promise<Balance[]>;
  summarizeBalancesByItem(): Promise<ItemBalanceTotals[]>;
  listLedgerEntries(filter: LedgerFilter): Promise<LedgerEntry[]>;
  findDocument(id: string): Promise<StockDocument | null>;
  listDocuments(filter: DocumentFilter): Promise<StockDocument[]>;
}

/**
 * One failure-atomic unit of work. Locks taken here are held until the transaction ends.
 *
 * `writeBalance` and `appendLedgerEntry` are reserved for the mutation engine and the
 * catalog service; nothing else may call them.
 */
export interface LedgerSession extends LedgerReader {
  /** Returns the balance (quantity 0 when no row exists yet) under an exclusive lock. */
  lockBalance(key: BalanceKey): Promise<Balance>;
  writeBalance(key: BalanceKey, onHand: number, at: Date): Promise<Balance>;
  appendLedgerEntry(input: LedgerEntryInput): Promise<LedgerEntry>;

  lockDocument(id: string): Promise<StockDocument | null>;
  insertDocument(document: StockDocument): Promise<void>;
  updateDocumentStatus(id: string, patch: DocumentStatusPatch): Promise<void>;
  updateDocumentLine(documentId: string, lineId: string, patch: DocumentLinePatch): Promise<void>;

  insertItem(item: Item): Promise<void>;
  updateItem(item: Item): Promise<void>;
  insertLocation(location: Location): Promise<void>;
  updateLocation(location: Location): Promise<void>;
}

export interface LedgerStore {
  readonly reader: LedgerReader;
  withTransaction<T>(handler: (session: LedgerSession) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
