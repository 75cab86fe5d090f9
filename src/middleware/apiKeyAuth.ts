import { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';

/**
 * Require the shared secret in `x-api-key`. An unset secret rejects every
 * request; there is no open fallback.
 */
export function createApiKeyAuth(expectedKey: string | undefined): RequestHandler {
  const expectedTrimmed = (expectedKey || '').trim();

  return (req: Request, res: Response, next: NextFunction): void => {
    const headerTrimmed = (req.header('x-api-key') || '').trim();
    if (!expectedTrimmed || !headerTrimmed || headerTrimmed !== expectedTrimmed) {
      res.status(401).json({
        success: false,
        error: { type: 'UNAUTHORIZED', message: 'Unauthorized', details: {} },
      });
      return;
    }
    next();
  };
}

const userIdSchema = z.string().uuid();

/**
 * Resolve the owning user from `x-user-id` into `res.locals.userId`.
 */
export function requireUser(req: Request, res: Response, next: NextFunction): void {
  const parsed = userIdSchema.safeParse(req.header('x-user-id'));
  if (!parsed.success) {
    res.status(400).json({
      success: false,
      error: {
        type: 'VALIDATION_ERROR',
        message: 'x-user-id header must be a UUID',
        details: {},
      },
    });
    return;
  }
  res.locals.userId = parsed.data;
  next();
}

/** Owner id set by `requireUser`. */
export function currentUserId(res: Response): string {
  const userId: unknown = res.locals.userId;
  if (typeof userId !== 'string') {
    throw new Error('requireUser middleware did not run for this route');
  }
  return userId;
}
