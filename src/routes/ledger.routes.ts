import { Router, type Request, type Response } from 'express';
import type { LedgerContext } from '../domains/inventory/unitOfWork';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { sendInvalidRequest, validateUuidParam } from '../middleware/validation/schema';
import { balanceListQuerySchema, ledgerListQuerySchema } from '../schemas/ledger.schema';
import { LEDGER_DEFAULT_LIMIT, listBalances, listLedger, readBalance } from '../services/ledger.service';

export function createLedgerRouter(ctx: LedgerContext) {
  const router = Router();

  router.get(
    '/ledger',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = ledgerListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid query parameters.', parsed.error);
      }
      const limit = parsed.data.limit ?? LEDGER_DEFAULT_LIMIT;
      const offset = parsed.data.offset ?? 0;
      const entries = await listLedger(ctx, {
        itemId: parsed.data.item_id,
        locationId: parsed.data.location_id,
        documentId: parsed.data.document_id,
        action: parsed.data.action,
        from: parsed.data.from ? new Date(parsed.data.from) : undefined,
        to: parsed.data.to ? new Date(parsed.data.to) : undefined,
        limit,
        offset
      });
      return res.json({ data: entries, paging: { limit, offset } });
    })
  );

  router.get(
    '/balances',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = balanceListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid query parameters.', parsed.error);
      }
      const balances = await listBalances(ctx, {
        itemId: parsed.data.item_id,
        locationId: parsed.data.location_id
      });
      return res.json({ data: balances });
    })
  );

  router.get(
    '/balances/:itemId/:locationId',
    validateUuidParam('itemId'),
    validateUuidParam('locationId'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const balance = await readBalance(ctx, { itemId: req.params.itemId, locationId: req.params.locationId });
      return res.json(balance);
    })
  );

  return router;
}
