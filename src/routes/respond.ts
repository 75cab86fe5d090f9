import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { ServiceError, ServiceErrorType } from '@/shared/errors.js';
import type { Result } from '@/shared/result.js';

export const STATUS_BY_ERROR_TYPE: Record<ServiceErrorType, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  STORE_ERROR: 503,
  NO_MODEL_AVAILABLE: 503,
  GENERATION_FAILED: 502,
};

export function sendError(res: Response, error: ServiceError): void {
  res.status(STATUS_BY_ERROR_TYPE[error.type]).json({
    success: false,
    error: { type: error.type, message: error.message, details: error.details },
  });
}

export function sendResult<T>(res: Response, result: Result<T>, successStatus = 200): void {
  if (!result.success) {
    sendError(res, result.error);
    return;
  }
  res.status(successStatus).json({ success: true, data: result.data });
}

/** Forward a rejected handler promise to the Express error middleware. */
export function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}
