import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { runWithRequestContext } from '../lib/requestContext';
import { resolveActor } from './actor';

const MAX_REQUEST_ID_LENGTH = 128;

function extractRequestId(req: Request): string {
  const header = req.header('x-request-id') || req.header('x-correlation-id');
  const trimmed = header?.trim();
  if (trimmed && trimmed.length <= MAX_REQUEST_ID_LENGTH) {
    return trimmed;
  }
  return uuidv4();
}

/**
 * Tags every log line written while handling the request with its id and, when the caller
 * sent `x-actor`, who is acting.
 */
export function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
  const requestId = extractRequestId(req);
  req.requestId = requestId;
  res.setHeader('x-request-id', requestId);

  runWithRequestContext({ requestId, actor: resolveActor(req) ?? undefined }, () => next());
}
