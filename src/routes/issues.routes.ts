import { Router, type Request, type Response } from 'express';
import type { LedgerContext } from '../domains/inventory/unitOfWork';
import { resolveActor } from '../middleware/actor';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { sendInvalidRequest, validateUuidParam } from '../middleware/validation/schema';
import { issueSchema } from '../schemas/issues.schema';
import { documentActionSchema, documentListQuerySchema } from '../schemas/documents.schema';
import {
  cancelIssue,
  confirmIssue,
  createIssue,
  getIssue,
  listIssues
} from '../services/issues.service';

export function createIssuesRouter(ctx: LedgerContext) {
  const router = Router();

  router.post(
    '/issues',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = issueSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid issue.', parsed.error);
      }
      const document = await createIssue(ctx, {
        ...parsed.data,
        createdBy: parsed.data.createdBy ?? resolveActor(req)
      });
      return res.status(201).json(document);
    })
  );

  router.get(
    '/issues',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = documentListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid query parameters.', parsed.error);
      }
      const limit = parsed.data.limit ?? 50;
      const offset = parsed.data.offset ?? 0;
      const documents = await listIssues(ctx, { status: parsed.data.status, limit, offset });
      return res.json({ data: documents, paging: { limit, offset } });
    })
  );

  router.get(
    '/issues/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await getIssue(ctx, req.params.id));
    })
  );

  router.post(
    '/issues/:id/confirm',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = documentActionSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid request body.', parsed.error);
      }
      return res.json(await confirmIssue(ctx, req.params.id, resolveActor(req, parsed.data.actor)));
    })
  );

  router.post(
    '/issues/:id/cancel',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = documentActionSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid request body.', parsed.error);
      }
      return res.json(await cancelIssue(ctx, req.params.id, resolveActor(req, parsed.data.actor)));
    })
  );

  return router;
}
