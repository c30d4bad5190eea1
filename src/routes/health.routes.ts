import { Router, type Request, type Response } from 'express';
import type { LedgerContext } from '../domains/inventory/unitOfWork';

const STORE_TIMEOUT_MS = Number(process.env.HEALTH_STORE_TIMEOUT_MS || 1500);

function pingWithin(ctx: LedgerContext, ms: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`store ping timed out after ${ms}ms`)), ms);
  });
  return Promise.race([ctx.store.ping(), timeout]).finally(() => clearTimeout(timer));
}

export function createHealthRouter(ctx: LedgerContext) {
  const router = Router();

  router.get('/health/live', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  router.get('/health/ready', async (_req: Request, res: Response) => {
    const start = Date.now();
    const details: Record<string, unknown> = {};
    let ready = true;

    try {
      await pingWithin(ctx, STORE_TIMEOUT_MS);
      details.store = { ok: true };
    } catch (error) {
      details.store = { ok: false, error: error instanceof Error ? error.message : String(error) };
      ready = false;
    }

    details.durationMs = Date.now() - start;
    res.status(ready ? 200 : 503).json({
      status: ready ? 'ok' : 'not_ready',
      ready,
      timestamp: new Date().toISOString(),
      details
    });
  });

  return router;
}
