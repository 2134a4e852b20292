import crypto from 'node:crypto';
import { AppError, errorMessage, fromBodyParserError } from '../errors/AppError.js';
import { METRIC, type TelemetrySink } from '../observability/metrics.js';
import { logger } from '../utils/logger.js';
import { align, decodeFeatureRecord, type FeatureRecord } from './featureAligner.js';
import type { OutcomeLedger, PredictionRecord } from './outcomeLedger.js';
import type { Label, ScoringArtifactAdapter } from './scoringArtifact.js';

export type RequestState = 'received' | 'validated' | 'aligned' | 'scored' | 'responded' | 'rejected';

export type Prediction = {
  requestId: string;
  label: Label;
  probability: number;
  modelVersion: string;
};

/** Ends the latency measurement of one request; records at most once. */
export type RequestTimer = () => number;

export type InferenceServiceDeps = {
  adapter: ScoringArtifactAdapter;
  ledger: OutcomeLedger;
  metrics: TelemetrySink;
  clock?: () => Date;
};

export function hashFeatureRecord(record: FeatureRecord): string {
  const canonical = Object.keys(record)
    .sort()
    .map((key) => [key, record[key]]);
  return crypto.createHash('sha256').update(JSON.stringify(canonical)).digest('hex');
}

/**
 * Received -> Validated -> Aligned -> Scored -> Responded, or Rejected when
 * a step throws. Whatever the exit path, the request counter and the latency
 * histogram are updated exactly once. A request starts at `begin()`, before
 * its body is parsed; a body that never parses ends in `rejectUnparsed`.
 */
export class InferenceService {
  private readonly clock: () => Date;

  constructor(private readonly deps: InferenceServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  begin(): RequestTimer {
    return this.deps.metrics.startTimer(METRIC.requestDuration);
  }

  predict(body: unknown, requestId: string, endTimer: RequestTimer = this.begin()): Prediction {
    const { adapter, ledger } = this.deps;
    let state: RequestState = 'received';

    try {
      const record = decodeFeatureRecord(body);
      state = 'validated';

      // capture once so a concurrent reload cannot swap the artifact mid-request
      const artifact = adapter.require();
      const vector = align(record, artifact.schema);
      state = 'aligned';

      const score = artifact.score(vector);
      state = 'scored';

      // ledger rows are keyed by request id; a reused id gets a server-generated one
      const ledgerId = ledger.hasPrediction(requestId) ? crypto.randomUUID() : requestId;
      if (ledgerId !== requestId) {
        logger.warn('inference.request_id.reused', { request_id: requestId, assigned_id: ledgerId });
      }

      this.recordPrediction({
        requestId: ledgerId,
        timestamp: this.clock().toISOString(),
        inputHash: hashFeatureRecord(record),
        label: score.label,
        probability: score.probability,
        modelVersion: artifact.version
      });

      state = 'responded';
      return {
        requestId: ledgerId,
        label: score.label,
        probability: score.probability,
        modelVersion: artifact.version
      };
    } catch (error) {
      const reachedState = state;
      state = 'rejected';
      this.recordRejection(requestId, reachedState, error);
      throw error;
    } finally {
      this.complete(endTimer);
    }
  }

  /** Terminates a request whose body could not be read; returns the error to send. */
  rejectUnparsed(error: unknown, requestId: string, endTimer: RequestTimer): unknown {
    const rejection = fromBodyParserError(error) ?? error;
    try {
      this.recordRejection(requestId, 'received', rejection);
    } finally {
      this.complete(endTimer);
    }
    return rejection;
  }

  private recordRejection(requestId: string, reachedState: RequestState, error: unknown) {
    this.deps.metrics.increment(METRIC.rejections);
    logger.info('inference.rejected', {
      request_id: requestId,
      reached_state: reachedState,
      code: error instanceof AppError ? error.code : 'INTERNAL_ERROR',
      error: errorMessage(error)
    });
  }

  private complete(endTimer: RequestTimer) {
    this.deps.metrics.increment(METRIC.requests);
    endTimer();
  }

  // Not awaited by the caller: the response never waits on ledger durability.
  private recordPrediction(record: PredictionRecord) {
    this.deps.ledger.appendPrediction(record).catch((error: unknown) => {
      this.deps.metrics.increment(METRIC.ledgerWriteFailures);
      logger.error('ledger.prediction.write_failed', {
        request_id: record.requestId,
        error: errorMessage(error)
      });
    });
  }
}
