import express, { type NextFunction, type Request, type Response } from 'express';
import type { LedgerContext } from './domains/inventory/unitOfWork';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import { sendError } from './middleware/validation/errors';
import { createAdjustmentsRouter } from './routes/adjustments.routes';
import { createInventoryCountsRouter } from './routes/counts.routes';
import { createDocumentsRouter } from './routes/documents.routes';
import { createHealthRouter } from './routes/health.routes';
import { createIssuesRouter } from './routes/issues.routes';
import { createLedgerRouter } from './routes/ledger.routes';
import { createMasterDataRouter } from './routes/masterData.routes';
import { createReceiptsRouter } from './routes/receipts.routes';
import { createReportsRouter } from './routes/reports.routes';

export function createApp(ctx: LedgerContext) {
  const app = express();
  app.use(requestContextMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(express.json());

  app.use(createHealthRouter(ctx));
  app.use(createMasterDataRouter(ctx));
  // /balances/adjust before /balances/:itemId/:locationId
  app.use(createAdjustmentsRouter(ctx));
  app.use(createLedgerRouter(ctx));
  app.use(createReceiptsRouter(ctx));
  app.use(createIssuesRouter(ctx));
  app.use(createInventoryCountsRouter(ctx));
  app.use(createDocumentsRouter(ctx));
  app.use(createReportsRouter(ctx));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Not found' } });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body.' } });
      return;
    }
    sendError(req, res, err);
  });

  return app;
}
