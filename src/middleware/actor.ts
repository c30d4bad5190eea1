import type { Request } from 'express';

/**
 * Caller identity for `performedBy`. An explicit body field wins over the `x-actor` header.
 */
export function resolveActor(req: Request, bodyActor?: string | null): string | null {
  if (bodyActor) return bodyActor;
  const header = req.header('x-actor');
  return header && header.trim() ? header.trim() : null;
}
