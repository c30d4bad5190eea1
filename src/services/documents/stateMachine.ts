import { documentAlreadyProcessed } from '../../lib/errors';
import type { DocumentStatus } from '../../domains/inventory/types';

export type DocumentTransition = 'confirm' | 'cancel';

const TRANSITIONS: Record<DocumentStatus, Partial<Record<DocumentTransition, DocumentStatus>>> = {
  draft: { confirm: 'confirmed', cancel: 'cancelled' },
  confirmed: {},
  cancelled: {}
};

/**
 * Confirmed and cancelled are terminal; both transitions only leave draft.
 */
export function nextDocumentStatus(
  documentId: string,
  current: DocumentStatus,
  transition: DocumentTransition
): DocumentStatus {
  const next = TRANSITIONS[current][transition];
  if (!next) {
    throw documentAlreadyProcessed(documentId, current, transition);
  }
  return next;
}
