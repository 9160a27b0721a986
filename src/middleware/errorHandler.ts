import type { Request, Response, NextFunction } from 'express';
import {
  CaptchaBanError,
  IncompleteSearchError,
  NotFoundError,
  SkyscannerError,
  TransportError,
  ValidationError
} from '../types/errors.js';
import { logger } from '../utils/logger.js';

function statusFor(err: Error): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof NotFoundError) return 404;
  if (err instanceof CaptchaBanError) return 503;
  if (err instanceof IncompleteSearchError) return 504;
  if (err instanceof TransportError) return 502;
  return 500;
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  const status = statusFor(err);
  const details = {
    error: err.message,
    code: err instanceof SkyscannerError ? err.code : undefined,
    url: req.originalUrl,
    method: req.method
  };
  if (status >= 500) {
    logger.error('Request failed', { ...details, stack: err.stack });
  } else {
    logger.warn('Request rejected', details);
  }

  res.status(status).json({
    success: false,
    error: err instanceof SkyscannerError ? err.message : 'Internal server error',
    code: err instanceof SkyscannerError ? err.code : 'INTERNAL_ERROR',
    ...(err instanceof CaptchaBanError ? { captchaUrl: err.url } : {}),
    ...(err instanceof IncompleteSearchError ? { attempts: err.attempts } : {}),
    ...(err instanceof TransportError ? { upstreamStatus: err.statusCode } : {}),
    timestamp: new Date().toISOString()
  });
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    success: false,
    error: 'Not Found',
    message: 'The requested endpoint does not exist',
    timestamp: new Date().toISOString(),
    path: req.url
  });
}
