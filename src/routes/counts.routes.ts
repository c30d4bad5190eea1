import { Router, type Request, type Response } from 'express';
import type { LedgerContext } from '../domains/inventory/unitOfWork';
import { resolveActor } from '../middleware/actor';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { sendInvalidRequest, validateUuidParam } from '../middleware/validation/schema';
import { inventoryCountSchema } from '../schemas/counts.schema';
import { documentActionSchema, documentListQuerySchema } from '../schemas/documents.schema';
import {
  cancelInventoryCount,
  confirmInventoryCount,
  createInventoryCount,
  getInventoryCount,
  listInventoryCounts
} from '../services/counts.service';

export function createInventoryCountsRouter(ctx: LedgerContext) {
  const router = Router();

  router.post(
    '/inventory-counts',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = inventoryCountSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid inventory count.', parsed.error);
      }
      const document = await createInventoryCount(ctx, {
        ...parsed.data,
        createdBy: parsed.data.createdBy ?? resolveActor(req)
      });
      return res.status(201).json(document);
    })
  );

  router.get(
    '/inventory-counts',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = documentListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid query parameters.', parsed.error);
      }
      const limit = parsed.data.limit ?? 50;
      const offset = parsed.data.offset ?? 0;
      const documents = await listInventoryCounts(ctx, { status: parsed.data.status, limit, offset });
      return res.json({ data: documents, paging: { limit, offset } });
    })
  );

  router.get(
    '/inventory-counts/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await getInventoryCount(ctx, req.params.id));
    })
  );

  router.post(
    '/inventory-counts/:id/confirm',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = documentActionSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid request body.', parsed.error);
      }
      return res.json(await confirmInventoryCount(ctx, req.params.id, resolveActor(req, parsed.data.actor)));
    })
  );

  router.post(
    '/inventory-counts/:id/cancel',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = documentActionSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid request body.', parsed.error);
      }
      return res.json(await cancelInventoryCount(ctx, req.params.id, resolveActor(req, parsed.data.actor)));
    })
  );

  return router;
}
