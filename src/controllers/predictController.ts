import crypto from 'node:crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { InferenceService } from '../services/inferenceService.js';

/**
 * The body parser runs inside the handler so that a payload which never
 * parses is still a terminal request for the inference metrics.
 */
export function createPredictController(service: InferenceService, parseBody: RequestHandler) {
  return function predict(req: Request, res: Response, next: NextFunction) {
    // requestContext always assigns one; the fallback only matters if it is not mounted
    const requestId = req.requestId ?? crypto.randomUUID();
    const endTimer = service.begin();

    parseBody(req, res, (parseError?: unknown) => {
      if (parseError) {
        return next(service.rejectUnparsed(parseError, requestId, endTimer));
      }
      try {
        const prediction = service.predict(req.body, requestId, endTimer);
        res.setHeader('x-request-id', prediction.requestId);
        res.setHeader('x-model-version', prediction.modelVersion);
        return res.json({ label: prediction.label, probability: prediction.probability });
      } catch (error) {
        return next(error);
      }
    });
  };
}
