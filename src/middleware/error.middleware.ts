import type { Request, Response, NextFunction } from 'express';
import { env } from '../config/env.js';
import { isRecord } from '../core/row-values.js';

function statusOf(err: unknown): number {
  if (isRecord(err)) {
    const status = err.statusCode ?? err.status;
    if (typeof status === 'number' && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}

export const errorMiddleware = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const message = err instanceof Error ? err.message : 'An unexpected error occurred';
  console.error(`[${new Date().toISOString()}] [HTTP] ${req.method} ${req.path}: ${message}`);

  const statusCode = statusOf(err);

  res.status(statusCode).json({
    success: false,
    // Body parser errors carry a 4xx status; their message is safe to echo
    error: statusCode < 500 ? message : 'Internal server error',
    details: statusCode < 500 ? undefined : 'An unexpected error occurred',
    // In development, send the stack trace to help debug
    ...(env.NODE_ENV === 'development' && err instanceof Error && { stack: err.stack }),
  });
};
