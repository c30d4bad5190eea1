import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';

export function sendInvalidRequest(res: Response, message: string, error: z.ZodError) {
  return res.status(400).json({
    error: {
      code: 'VALIDATION_ERROR',
      message,
      details: error.flatten()
    }
  });
}

/**
 * Middleware factory to validate UUID path parameters
 */
export function validateUuidParam(paramName: string = 'id') {
  const uuidSchema = z.string().uuid();

  return (req: Request, res: Response, next: NextFunction) => {
    const result = uuidSchema.safeParse(req.params[paramName]);
    if (!result.success) {
      return sendInvalidRequest(res, `Invalid ${paramName}.`, result.error);
    }
    next();
  };
}
