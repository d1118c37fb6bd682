import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { RelayError, SchemaError } from '@trackside/domain';

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

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
  if (err instanceof SchemaError) {
    res.status(err.status).json({
      error: err.code,
      kind: err.kind,
      sensorId: err.sensorId,
      detail: err.detail,
    });
    return;
  }
  if (err instanceof RelayError) {
    res.status(err.status).json({ error: err.code, message: err.message });
    return;
  }
  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  console.error('[server] unhandled route error', err);
  res.status(500).json({ error: 'Internal server error' });
}
