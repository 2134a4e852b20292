import type { NextFunction, Request, Response } from 'express';
import type { TelemetrySink } from '../observability/metrics.js';

export function createMetricsController(metrics: TelemetrySink) {
  return async function renderMetrics(req: Request, res: Response, next: NextFunction) {
    const format = req.accepts(['text/plain', 'application/json']) === 'application/json' ? 'json' : 'prometheus';
    try {
      const rendered = await metrics.render(format);
      res.setHeader('Content-Type', rendered.contentType);
      res.setHeader('Cache-Control', 'no-store');
      return res.send(rendered.body);
    } catch (error) {
      return next(error);
    }
  };
}
