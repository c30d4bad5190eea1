import { Router, type Request, type Response } from 'express';
import type { LedgerContext } from '../domains/inventory/unitOfWork';
import { resolveActor } from '../middleware/actor';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { sendInvalidRequest } from '../middleware/validation/schema';
import { adjustBalanceSchema } from '../schemas/adjustments.schema';
import { adjustBalance } from '../services/adjustments.service';

export function createAdjustmentsRouter(ctx: LedgerContext) {
  const router = Router();

  router.post(
    '/balances/adjust',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = adjustBalanceSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid adjustment.', parsed.error);
      }
      const result = await adjustBalance(ctx, {
        ...parsed.data,
        actor: resolveActor(req, parsed.data.actor) ?? undefined
      });
      return res.json(result);
    })
  );

  return router;
}
