import type { Pool, PoolClient } from 'pg';
import { withTransaction } from '../../db';
import { translatePgError } from '../../lib/pgErrors';
import {
  findItemRow,
  findLocationRow,
  insertItemRow,
  insertLocationRow,
  listItemRows,
  listLocationRows,
  updateItemRow,
  updateLocationRow
} from './internal/catalogRows';
import {
  findDocumentRow,
  insertDocumentRows,
  listDocumentRows,
  updateDocumentLineRow,
  updateDocumentStatusRow
} from './internal/documentRows';
import {
  ensureInventoryBalanceRowAndLock,
  getInventoryBalance,
  listInventoryBalances,
  summarizeInventoryBalances,
  writeInventoryBalance
} from './internal/inventoryBalance';
import { insertLedgerEntry, listLedgerEntries } from './internal/ledgerWriter';
import type { LedgerReader, LedgerSession, LedgerStore } from './store';
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

abstract class PgLedgerQueries implements LedgerReader {
  protected abstract run<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;

  findItem(id: string): Promise<Item | null> {
    return this.run((client) => findItemRow(client, id));
  }

  listItems(filter: ItemFilter): Promise<Item[]> {
    return this.run((client) => listItemRows(client, filter));
  }

  findLocation(id: string): Promise<Location | null> {
    return this.run((client) => findLocationRow(client, id));
  }

  listLocations(filter: LocationFilter): Promise<Location[]> {
    return this.run((client) => listLocationRows(client, filter));
  }

  findBalance(key: BalanceKey): Promise<Balance | null> {
    return this.run((client) => getInventoryBalance(client, key));
  }

  listBalances(filter: BalanceFilter): Promise<Balance[]> {
    return this.run((client) => listInventoryBalances(client, filter));
  }

  summarizeBalancesByItem(): Promise<ItemBalanceTotals[]> {
    return this.run((client) => summarizeInventoryBalances(client));
  }

  listLedgerEntries(filter: LedgerFilter): Promise<LedgerEntry[]> {
    return this.run((client) => listLedgerEntries(client, filter));
  }

  findDocument(id: string): Promise<StockDocument | null> {
    return this.run((client) => findDocumentRow(client, id));
  }

  listDocuments(filter: DocumentFilter): Promise<StockDocument[]> {
    return this.run((client) => listDocumentRows(client, filter));
  }
}

class PgLedgerReader extends PgLedgerQueries {
  constructor(private readonly pool: Pool) {
    super();
  }

  protected async run<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }
}

class PgLedgerSession extends PgLedgerQueries implements LedgerSession {
  constructor(private readonly client: PoolClient) {
    super();
  }

  protected run<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    return fn(this.client);
  }

  lockBalance(key: BalanceKey): Promise<Balance> {
    return ensureInventoryBalanceRowAndLock(this.client, key);
  }

  writeBalance(key: BalanceKey, onHand: number, at: Date): Promise<Balance> {
    return writeInventoryBalance(this.client, key, onHand, at);
  }

  appendLedgerEntry(input: LedgerEntryInput): Promise<LedgerEntry> {
    return insertLedgerEntry(this.client, input);
  }

  lockDocument(id: string): Promise<StockDocument | null> {
    return findDocumentRow(this.client, id, { forUpdate: true });
  }

  async insertDocument(document: StockDocument): Promise<void> {
    try {
      await insertDocumentRows(this.client, document);
    } catch (err) {
      throw translatePgError(err, {
        unique: `Document number ${document.number} already exists.`,
        foreignKey: 'Document line references an unknown item or location.'
      });
    }
  }

  updateDocumentStatus(id: string, patch: DocumentStatusPatch): Promise<void> {
    return updateDocumentStatusRow(this.client, id, patch);
  }

  updateDocumentLine(documentId: string, lineId: string, patch: DocumentLinePatch): Promise<void> {
    return updateDocumentLineRow(this.client, documentId, lineId, patch);
  }

  async insertItem(item: Item): Promise<void> {
    try {
      await insertItemRow(this.client, item);
    } catch (err) {
      throw translatePgError(err, { unique: `Item code ${item.code} already exists.` });
    }
  }

  async updateItem(item: Item): Promise<void> {
    try {
      await updateItemRow(this.client, item);
    } catch (err) {
      throw translatePgError(err, { unique: `Item code ${item.code} already exists.` });
    }
  }

  async insertLocation(location: Location): Promise<void> {
    try {
      await insertLocationRow(this.client, location);
    } catch (err) {
      throw translatePgError(err, { unique: `Location code ${location.code} already exists.` });
    }
  }

  async updateLocation(location: Location): Promise<void> {
    try {
      await updateLocationRow(this.client, location);
    } catch (err) {
      throw translatePgError(err, { unique: `Location code ${location.code} already exists.` });
    }
  }
}

export type PgLedgerStoreOptions = {
  lockTimeoutMs: number;
};

export class PgLedgerStore implements LedgerStore {
  readonly reader: LedgerReader;

  constructor(
    private readonly pool: Pool,
    private readonly options: PgLedgerStoreOptions
  ) {
    this.reader = new PgLedgerReader(pool);
  }

  async withTransaction<T>(handler: (session: LedgerSession) => Promise<T>): Promise<T> {
    try {
      return await withTransaction(this.pool, async (client) => {
        // Bounded waits turn into 55P03, which the unit of work retries.
        await client.query(`SELECT set_config('lock_timeout', $1, true)`, [`${this.options.lockTimeoutMs}ms`]);
        return handler(new PgLedgerSession(client));
      });
    } catch (err) {
      throw translatePgError(err);
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
