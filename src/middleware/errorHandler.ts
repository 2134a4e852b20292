import type { NextFunction, Request, Response } from 'express';
import { AppError, ArtifactUnavailableError, fromBodyParserError } from '../errors/AppError.js';
import { buildRequestLogContext, logStructuredError } from '../utils/logger.js';

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction) {
  const err = fromBodyParserError(error) ?? error;
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logStructuredError({
        ...buildRequestLogContext(req),
        status: err.statusCode,
        error: err.message,
        code: err.code,
        details: err.details
      });
    }

    if (err instanceof ArtifactUnavailableError) {
      res.setHeader('Retry-After', String(err.retryAfterSeconds));
    }

    return res.status(err.statusCode).json({
      error: {
        code: err.code ?? 'APP_ERROR',
        message: err.message,
        details: err.details
      }
    });
  }

  logStructuredError({
    ...buildRequestLogContext(req),
    status: 500,
    error: err instanceof Error ? err.message : 'Unknown error'
  });
  return res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    error: { code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` }
  });
}
