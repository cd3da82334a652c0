import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { InvalidWindowError } from '@fleet-ledger/domain';

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
  if (err instanceof InvalidWindowError) {
    res.status(400).json({ error: err.code, message: err.message });
    return;
  }
  if (err instanceof Error) {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) console.error('[error-handler] unhandled error', err);
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : err.message });
    return;
  }
  console.error('[error-handler] non-error thrown', err);
  res.status(500).json({ error: 'Internal server error' });
}
