import { z } from 'zod';

export type BalanceKey = {
  itemId: string;
  locationId: string;
};

export type Balance = BalanceKey & {
  onHand: number;
  reserved: number;
  /** null until the first mutation materializes the row */
  updatedAt: string | null;
};

export const LEDGER_ACTIONS = [
  'create',
  'update',
  'delete',
  'receipt',
  'issue',
  'adjust',
  'inventory_count'
] as const;

export type LedgerAction = (typeof LEDGER_ACTIONS)[number];

export const QUANTITY_ACTIONS = ['receipt', 'issue', 'adjust', 'inventory_count'] as const;

export type QuantityAction = (typeof QUANTITY_ACTIONS)[number];
export type CatalogAction = Exclude<LedgerAction, QuantityAction>;

export type LedgerEntityType = 'balance' | 'item' | 'location';

export const catalogFieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const catalogChangePayloadSchema = z.object({
  changes: z.record(catalogFieldValueSchema)
});

export type CatalogFieldValue = z.infer<typeof catalogFieldValueSchema>;
export type CatalogChangePayload = z.infer<typeof catalogChangePayloadSchema>;

export type LedgerEntry = {
  id: string;
  sequence: number;
  action: LedgerAction;
  entityType: LedgerEntityType;
  entityId: string | null;
  itemId: string | null;
  locationId: string | null;
  documentId: string | null;
  quantityBefore: number | null;
  quantityAfter: number | null;
  description: string | null;
  payload: CatalogChangePayload | null;
  performedBy: string | null;
  createdAt: string;
};

export type LedgerEntryInput = Omit<LedgerEntry, 'id' | 'sequence' | 'createdAt'> & {
  createdAt?: Date;
};

export type LedgerFilter = {
  itemId?: string;
  locationId?: string;
  actions?: readonly LedgerAction[];
  documentId?: string;
  from?: Date;
  to?: Date;
  limit: number;
  offset: number;
};

export type Item = {
  id: string;
  code: string;
  name: string;
  unit: string;
  category: string | null;
  description: string | null;
  minStock: number;
  unitPrice: number | null;
  active: boolean;
  createdAt: string;
  updatedAt: string;
};

export type Location = {
  id: string;
  code: string;
  description: string | null;
  active: boolean;
  createdAt: string;
  updatedAt: string;
};

export type ItemFilter = {
  activeOnly?: boolean;
  search?: string;
  limit?: number;
  offset?: number;
};

export type LocationFilter = {
  activeOnly?: boolean;
};

export type BalanceFilter = {
  itemId?: string;
  locationId?: string;
};

export type ItemBalanceTotals = {
  itemId: string;
  onHand: number;
  reserved: number;
};

export const DOCUMENT_KINDS = ['receipt', 'issue', 'inventory_count'] as const;
export type DocumentKind = (typeof DOCUMENT_KINDS)[number];

export const DOCUMENT_STATUSES = ['draft', 'confirmed', 'cancelled'] as const;
export type DocumentStatus = (typeof DOCUMENT_STATUSES)[number];

type DocumentHeader = {
  id: string;
  number: string;
  status: DocumentStatus;
  notes: string | null;
  createdBy: string | null;
  processedBy: string | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
};

export type ReceiptLine = {
  id: string;
  lineNumber: number;
  itemId: string;
  locationId: string | null;
  quantity: number;
  unitPrice: number | null;
};

export type IssueLine = {
  id: string;
  lineNumber: number;
  itemId: string;
  locationId: string | null;
  quantity: number;
};

export type InventoryCountLine = {
  id: string;
  lineNumber: number;
  itemId: string;
  locationId: string | null;
  actualQuantity: number;
  expectedQuantity: number | null;
  discrepancy: number | null;
};

export type Receipt = DocumentHeader & {
  kind: 'receipt';
  supplier: string | null;
  invoiceNumber: string | null;
  lines: ReceiptLine[];
};

export type Issue = DocumentHeader & {
  kind: 'issue';
  department: string | null;
  requester: string | null;
  purpose: string | null;
  lines: IssueLine[];
};

export type InventoryCount = DocumentHeader & {
  kind: 'inventory_count';
  lines: InventoryCountLine[];
};

export type StockDocument = Receipt | Issue | InventoryCount;

export type DocumentFilter = {
  kind?: DocumentKind;
  status?: DocumentStatus;
  limit: number;
  offset: number;
};

export type DocumentStatusPatch = {
  status: DocumentStatus;
  processedBy: string | null;
  completedAt: Date | null;
  updatedAt: Date;
};

export type DocumentLinePatch = {
  locationId: string;
  expectedQuantity?: number;
  discrepancy?: number;
};

export function balanceKeyOf(key: BalanceKey): string {
  return `${key.itemId}:${key.locationId}`;
}
