import { Router, type Request, type Response } from 'express';
import type { LedgerContext } from '../domains/inventory/unitOfWork';
import { resolveActor } from '../middleware/actor';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { sendInvalidRequest, validateUuidParam } from '../middleware/validation/schema';
import { receiptSchema } from '../schemas/receipts.schema';
import { documentActionSchema, documentListQuerySchema } from '../schemas/documents.schema';
import {
  cancelReceipt,
  confirmReceipt,
  createReceipt,
  getReceipt,
  listReceipts
} from '../services/receipts.service';

export function createReceiptsRouter(ctx: LedgerContext) {
  const router = Router();

  router.post(
    '/receipts',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = receiptSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid receipt.', parsed.error);
      }
      const document = await createReceipt(ctx, {
        ...parsed.data,
        createdBy: parsed.data.createdBy ?? resolveActor(req)
      });
      return res.status(201).json(document);
    })
  );

  router.get(
    '/receipts',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = documentListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid query parameters.', parsed.error);
      }
      const limit = parsed.data.limit ?? 50;
      const offset = parsed.data.offset ?? 0;
      const documents = await listReceipts(ctx, { status: parsed.data.status, limit, offset });
      return res.json({ data: documents, paging: { limit, offset } });
    })
  );

  router.get(
    '/receipts/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await getReceipt(ctx, req.params.id));
    })
  );

  router.post(
    '/receipts/:id/confirm',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = documentActionSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid request body.', parsed.error);
      }
      return res.json(await confirmReceipt(ctx, req.params.id, resolveActor(req, parsed.data.actor)));
    })
  );

  router.post(
    '/receipts/:id/cancel',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = documentActionSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid request body.', parsed.error);
      }
      return res.json(await cancelReceipt(ctx, req.params.id, resolveActor(req, parsed.data.actor)));
    })
  );

  return router;
}
