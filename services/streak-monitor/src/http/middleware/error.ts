import type { ErrorRequestHandler } from 'express';
import { logger } from '../../utils/logger.js';

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

function codeOf(err: unknown, status: number): string {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return status < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR';
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const status = statusOf(err);
  const code = codeOf(err, status);
  const message = err instanceof Error ? err.message : 'internal error';
  if (status >= 500) logger.error({ err, url: req.originalUrl }, 'request error');
  else logger.warn({ code, url: req.originalUrl }, 'request rejected');
  res.status(status).json({ error: { code, message: status >= 500 ? 'internal error' : message } });
};
