import { randomUUID } from 'crypto';

import type { Request, Response, NextFunction } from 'express';

import { BaseError } from '../core/errors/base-error.js';
import { logger } from '../utils/logger.js';

interface ErrorPayload {
  message: string;
  code: string;
  traceId: string;
  details?: unknown;
}

export const errorMiddleware = (err: Error, _req: Request, res: Response, _next: NextFunction) => {
  const traceId = randomUUID();
  const known = err instanceof BaseError;
  const status = known ? err.status : 500;

  const payload: ErrorPayload = {
    message: known ? err.message : 'Internal server error',
    code: known ? err.code : 'INTERNAL_ERROR',
    traceId,
  };

  if (known && err.details !== undefined) {
    try {
      payload.details = JSON.parse(JSON.stringify(err.details));
    } catch {
      payload.details = String(err.details);
    }
  }

  if (status >= 500) {
    logger.error({ err, traceId }, '[http] request failed');
  } else {
    logger.warn({ code: payload.code, traceId }, '[http] request rejected');
  }

  res.status(status).json(payload);
};
