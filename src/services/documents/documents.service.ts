import { notFound } from '../../lib/errors';
import { logEvent } from '../../lib/logger';
import type { LedgerReader, LedgerSession } from '../../domains/inventory/store';
import type { DocumentKind, DocumentStatus, StockDocument } from '../../domains/inventory/types';
import { runUnitOfWork, type LedgerContext } from '../../domains/inventory/unitOfWork';
import { nextDocumentStatus, type DocumentTransition } from './stateMachine';

export type DocumentOfKind<K extends DocumentKind> = Extract<StockDocument, { kind: K }>;

const KIND_LABELS: Record<DocumentKind, string> = {
  receipt: 'receipt',
  issue: 'issue',
  inventory_count: 'inventory count'
};

export function isDocumentOfKind<K extends DocumentKind>(
  document: StockDocument,
  kind: K
): document is DocumentOfKind<K> {
  return document.kind === kind;
}

export type DocumentListOptions = {
  status?: DocumentStatus;
  limit?: number;
  offset?: number;
};

export async function findDocumentOfKind<K extends DocumentKind>(
  reader: LedgerReader,
  id: string,
  kind: K
): Promise<DocumentOfKind<K>> {
  const document = await reader.findDocument(id);
  if (!document || !isDocumentOfKind(document, kind)) {
    throw notFound(KIND_LABELS[kind], id);
  }
  return document;
}

export async function listDocumentsOfKind<K extends DocumentKind>(
  reader: LedgerReader,
  kind: K,
  options: DocumentListOptions = {}
): Promise<DocumentOfKind<K>[]> {
  const documents = await reader.listDocuments({
    kind,
    status: options.status,
    limit: options.limit ?? 50,
    offset: options.offset ?? 0
  });
  return documents.filter((document): document is DocumentOfKind<K> => isDocumentOfKind(document, kind));
}

/**
 * Locks the document row and checks that `transition` is allowed from its current status.
 * `kind` narrows the lookup; a document of another kind reads as missing.
 */
export async function lockDocumentForTransition<K extends DocumentKind>(
  session: LedgerSession,
  id: string,
  kind: K,
  transition: DocumentTransition
): Promise<{ document: DocumentOfKind<K>; next: DocumentStatus }> {
  const document = await session.lockDocument(id);
  if (!document || !isDocumentOfKind(document, kind)) {
    throw notFound(KIND_LABELS[kind], id);
  }
  return { document, next: nextDocumentStatus(id, document.status, transition) };
}

export async function markDocumentStatus<K extends DocumentKind>(
  session: LedgerSession,
  id: string,
  kind: K,
  status: DocumentStatus,
  actor: string | null
): Promise<DocumentOfKind<K>> {
  const now = new Date();
  await session.updateDocumentStatus(id, {
    status,
    processedBy: actor,
    completedAt: status === 'confirmed' ? now : null,
    updatedAt: now
  });
  return findDocumentOfKind(session, id, kind);
}

export function cancelDocumentOfKind<K extends DocumentKind>(
  ctx: LedgerContext,
  id: string,
  kind: K,
  actor: string | null = null
): Promise<DocumentOfKind<K>> {
  return runUnitOfWork(ctx, `cancel_${kind}`, async (session) => {
    const { document, next } = await lockDocumentForTransition(session, id, kind, 'cancel');
    const cancelled = await markDocumentStatus(session, id, kind, next, actor);
    logEvent('info', 'stock_document_cancelled', { documentId: id, kind, number: document.number });
    return cancelled;
  });
}

/**
 * Cancels a draft of any kind. Cancellation never touches stock.
 */
export function cancelDocument(ctx: LedgerContext, id: string, actor: string | null = null): Promise<StockDocument> {
  return runUnitOfWork(ctx, 'cancel_document', async (session) => {
    const document = await session.lockDocument(id);
    if (!document) {
      throw notFound('document', id);
    }
    const next = nextDocumentStatus(id, document.status, 'cancel');
    const now = new Date();
    await session.updateDocumentStatus(id, { status: next, processedBy: actor, completedAt: null, updatedAt: now });
    const cancelled = await session.findDocument(id);
    if (!cancelled) {
      throw notFound('document', id);
    }
    logEvent('info', 'stock_document_cancelled', { documentId: id, kind: document.kind, number: document.number });
    return cancelled;
  });
}
