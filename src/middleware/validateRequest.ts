import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ZodTypeAny, z } from 'zod';
import { logger } from '../utils/logger.js';

type RequestPart = 'body' | 'query' | 'params';

type ValidatedHandler<S extends ZodTypeAny> = (
  input: z.infer<S>,
  req: Request,
  res: Response
) => Promise<unknown>;

/**
 * Validates `req[part]` against a zod schema, then runs the handler with the
 * parsed value. Rejections go to the error middleware.
 */
export function validateRequest<S extends ZodTypeAny>(
  schema: S,
  handler: ValidatedHandler<S>,
  part: RequestPart = 'body'
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const parsed = schema.safeParse(req[part]);
    if (!parsed.success) {
      logger.warn('Request validation failed', {
        path: req.originalUrl,
        issues: parsed.error.issues
      });
      res.status(400).json({
        success: false,
        error: 'Invalid request',
        details: parsed.error.flatten()
      });
      return;
    }
    handler(parsed.data, req, res).catch(next);
  };
}
