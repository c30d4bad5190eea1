import type { Request, Response, NextFunction } from 'express';
import { logEvent } from '../lib/logger';

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const bytesIn = Number(req.headers['content-length'] ?? 0);

  res.on('finish', () => {
    const status = res.statusCode;
    logEvent(status >= 500 ? 'error' : 'info', 'http_request', {
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      status,
      durationMs: Date.now() - start,
      bytesIn,
      bytesOut: Number(res.getHeader('content-length') ?? 0),
      actor: req.header('x-actor') ?? undefined,
      userAgent: req.header('user-agent') ?? undefined,
      ip: req.ip
    });
  });

  next();
}
