import type { Request, Response, NextFunction } from 'express';
import { isExchangeError, isGatewayError } from '@orderdesk/errors';
import { createServiceLogger } from '@orderdesk/logger';
import { ZodError } from 'zod';

const logger = createServiceLogger('error-handler');

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (isGatewayError(err)) {
    logger.warn(
      { path: req.path, code: err.gatewayCode, venueCode: err.venueCode },
      `Exchange request failed: ${err.message}`
    );
    res.status(err.statusCode).json(err.toJSON());
    return;
  }

  if (isExchangeError(err)) {
    res.status(err.statusCode).json(err.toJSON());
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: err.errors,
      },
    });
    return;
  }

  logger.error({ error: err, stack: err.stack }, 'Unhandled error');

  res.status(500).json({
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  });
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
