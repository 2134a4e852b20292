import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { ValidationError } from '../errors/AppError.js';
import { METRIC, type TelemetrySink } from '../observability/metrics.js';
import type { OutcomeAppendStatus, OutcomeLedger } from '../services/outcomeLedger.js';
import { logger } from '../utils/logger.js';

const MAX_BATCH = 1000;

const outcomeSchema = z.object({
  request_id: z.string().min(1),
  label: z.union([z.literal(0), z.literal(1)]),
  observed_at: z.string().datetime().optional()
});

const outcomesBodySchema = z.union([outcomeSchema, z.array(outcomeSchema).min(1).max(MAX_BATCH)]);

export function createOutcomesController(ledger: OutcomeLedger, metrics: TelemetrySink) {
  return async function ingestOutcomes(req: Request, res: Response, next: NextFunction) {
    const parsed = outcomesBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return next(new ValidationError('Invalid outcome payload', parsed.error.flatten()));
    }

    const updates = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
    const counts: Record<OutcomeAppendStatus, number> = { recorded: 0, duplicate: 0, corrected: 0, stale: 0 };

    try {
      for (const update of updates) {
        const status = await ledger.appendOutcome({
          requestId: update.request_id,
          label: update.label,
          timestamp: update.observed_at ?? new Date().toISOString()
        });
        counts[status] += 1;
      }
    } catch (error) {
      metrics.increment(METRIC.ledgerWriteFailures);
      logger.error('ledger.outcome.write_failed', { request_id: req.requestId ?? null, accepted: counts });
      return next(error);
    }

    return res.status(202).json({ accepted: updates.length, ...counts });
  };
}
