import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import { logEvent } from '../lib/logger';
import { applyStockMutation } from '../domains/inventory/mutationEngine';
import type { Issue } from '../domains/inventory/types';
import { runUnitOfWork, type LedgerContext } from '../domains/inventory/unitOfWork';
import type { issueSchema } from '../schemas/issues.schema';
import { assertDraftLines, lockConfirmationTargets } from './documents/documentLines';
import {
  cancelDocumentOfKind,
  findDocumentOfKind,
  listDocumentsOfKind,
  lockDocumentForTransition,
  markDocumentStatus,
  type DocumentListOptions
} from './documents/documents.service';
import { assertDocumentNumber, assertLinesPresent, assertPositiveQuantity } from './documents/lineValidation';

export type IssueInput = z.infer<typeof issueSchema>;

export async function createIssue(ctx: LedgerContext, data: IssueInput): Promise<Issue> {
  assertDocumentNumber(data.number);
  assertLinesPresent(data.lines);
  const quantities = data.lines.map((line, index) => assertPositiveQuantity(line.quantity, index + 1));

  return runUnitOfWork(ctx, 'create_issue', async (session) => {
    await assertDraftLines(session, ctx.policy, data.lines);
    const now = new Date().toISOString();
    const issue: Issue = {
      id: uuidv4(),
      kind: 'issue',
      number: data.number.trim(),
      status: 'draft',
      notes: data.notes ?? null,
      department: data.department ?? null,
      requester: data.requester ?? null,
      purpose: data.purpose ?? null,
      createdBy: data.createdBy ?? null,
      processedBy: null,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
      lines: data.lines.map((line, index) => ({
        id: uuidv4(),
        lineNumber: index + 1,
        itemId: line.itemId,
        locationId: line.locationId ?? null,
        quantity: quantities[index]
      }))
    };
    await session.insertDocument(issue);
    return issue;
  });
}

export function getIssue(ctx: LedgerContext, id: string): Promise<Issue> {
  return findDocumentOfKind(ctx.store.reader, id, 'issue');
}

export function listIssues(ctx: LedgerContext, options: DocumentListOptions = {}): Promise<Issue[]> {
  return listDocumentsOfKind(ctx.store.reader, 'issue', options);
}

/**
 * Books every line out (-quantity). A single short line rejects the whole issue with
 * InsufficientStock and nothing is written.
 */
export async function confirmIssue(ctx: LedgerContext, id: string, actor: string | null = null): Promise<Issue> {
  const confirmed = await runUnitOfWork(ctx, 'confirm_issue', async (session) => {
    const { document, next } = await lockDocumentForTransition(session, id, 'issue', 'confirm');
    const targets = await lockConfirmationTargets(session, ctx.policy, document.lines);
    for (const { line, key } of targets) {
      await applyStockMutation(session, {
        ...key,
        delta: -line.quantity,
        action: 'issue',
        description: `Issue ${document.number}`,
        performedBy: actor,
        documentId: document.id
      });
      await session.updateDocumentLine(document.id, line.id, { locationId: key.locationId });
    }
    return markDocumentStatus(session, id, 'issue', next, actor);
  });
  logEvent('info', 'issue_confirmed', { documentId: id, number: confirmed.number, lines: confirmed.lines.length });
  return confirmed;
}

export function cancelIssue(ctx: LedgerContext, id: string, actor: string | null = null): Promise<Issue> {
  return cancelDocumentOfKind(ctx, id, 'issue', actor);
}
