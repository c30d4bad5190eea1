import type { Request, Response, NextFunction } from 'express';
import { isLedgerError } from '../../lib/errors';
import { logEvent, serializeError } from '../../lib/logger';

/**
 * Renders any thrown error as JSON. Ledger errors carry their own status and details;
 * anything else is a 500 whose message is only exposed in development.
 */
export function sendError(req: Request, res: Response, error: unknown) {
  if (isLedgerError(error)) {
    const { message, ...details } = error.details;
    if (error.code === 'CONCURRENCY_CONFLICT') {
      logEvent('warn', 'ledger_conflict_unresolved', { path: req.path, reason: details.reason });
    }
    return res.status(error.status).json({ error: { code: error.code, message, details } });
  }

  logEvent('error', 'http_unhandled_error', { method: req.method, path: req.path, error: serializeError(error) });
  return res.status(500).json({
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An internal server error occurred.',
      ...(process.env.NODE_ENV === 'development' && error instanceof Error && { details: { message: error.message } })
    }
  });
}

/**
 * Higher-order function to create async error handling middleware
 * Catches errors from async route handlers and maps them to HTTP responses
 */
export function asyncErrorHandler(handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      sendError(req, res, error);
    }
  };
}
