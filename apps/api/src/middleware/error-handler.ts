import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { VisitError } from '@field-visit/domain';
import { createLogger } from '../lib/logger.js';

const log = createLogger('api');

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof VisitError) {
    res.status(err.status).json(err.toJSON());
    return;
  }
  if (err instanceof Error) {
    // body-parser and http-errors carry their own status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) log.error('unhandled error', err);
    res.status(status).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
