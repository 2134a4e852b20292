import crypto from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const headerRequestId = req.header('x-request-id');
  const requestId = headerRequestId && headerRequestId.trim().length > 0
    ? headerRequestId.trim()
    : crypto.randomUUID();

  req.requestId = requestId;
  res.setHeader('x-request-id', requestId);
  return next();
}
