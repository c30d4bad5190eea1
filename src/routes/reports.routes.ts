import { Router, type Request, type Response } from 'express';
import type { LedgerContext } from '../domains/inventory/unitOfWork';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { sendInvalidRequest } from '../middleware/validation/schema';
import { movementReportQuerySchema, stockReportQuerySchema } from '../schemas/reports.schema';
import { movementReport, stockReport } from '../services/reports.service';

export function createReportsRouter(ctx: LedgerContext) {
  const router = Router();

  router.get(
    '/reports/stock',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = stockReportQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid query parameters.', parsed.error);
      }
      const rows = await stockReport(ctx, { belowMinOnly: parsed.data.below_min_only === 'true' });
      return res.json({ data: rows });
    })
  );

  router.get(
    '/reports/movements',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = movementReportQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid query parameters.', parsed.error);
      }
      const rows = await movementReport(ctx, {
        itemId: parsed.data.item_id,
        from: parsed.data.from ? new Date(parsed.data.from) : undefined,
        to: parsed.data.to ? new Date(parsed.data.to) : undefined,
        limit: parsed.data.limit
      });
      return res.json({ data: rows });
    })
  );

  return router;
}
