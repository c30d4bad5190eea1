import { Router, type Request, type Response } from 'express';
import type { LedgerContext } from '../domains/inventory/unitOfWork';
import { resolveActor } from '../middleware/actor';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { sendInvalidRequest, validateUuidParam } from '../middleware/validation/schema';
import { documentActionSchema } from '../schemas/documents.schema';
import { cancelDocument } from '../services/documents/documents.service';

export function createDocumentsRouter(ctx: LedgerContext) {
  const router = Router();

  router.post(
    '/documents/:id/cancel',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = documentActionSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid request body.', parsed.error);
      }
      return res.json(await cancelDocument(ctx, req.params.id, resolveActor(req, parsed.data.actor)));
    })
  );

  return router;
}
