import { LedgerWriteFailure, errorMessage } from '../errors/AppError.js';
import {
  InMemoryLedgerRepository,
  type LedgerEntry,
  type LedgerRepository,
  type OutcomeUpdate,
  type PredictionRecord
} from '../repositories/ledgerRepository.js';
import { logger } from '../utils/logger.js';

export type { OutcomeUpdate, PredictionRecord } from '../repositories/ledgerRepository.js';

export type LedgerWindow = {
  /** Inclusive, epoch ms. */
  start: number;
  /** Exclusive, epoch ms. */
  end: number;
};

export type JoinedPair = {
  prediction: PredictionRecord;
  outcome: OutcomeUpdate | null;
};

export type LedgerQueryResult = {
  pairs: JoinedPair[];
  joined: number;
  pending: number;
};

export type OutcomeAppendStatus = 'recorded' | 'duplicate' | 'corrected' | 'stale';

export type CompactionResult = {
  removedPredictions: number;
  removedOutcomes: number;
};

type Stored<T> = { value: T; at: number };

/**
 * Append log of served predictions and their late-arriving outcomes, joined
 * by request id. The in-memory index is the read model; the repository is the
 * durable copy and is replayed on open.
 */
export class OutcomeLedger {
  private readonly predictions = new Map<string, Stored<PredictionRecord>>();

  private readonly outcomes = new Map<string, Stored<OutcomeUpdate>>();

  constructor(private readonly repository: LedgerRepository = new InMemoryLedgerRepository()) {}

  static async open(repository: LedgerRepository): Promise<OutcomeLedger> {
    const ledger = new OutcomeLedger(repository);
    const entries = await repository.readAll();
    for (const entry of entries) {
      if (entry.type === 'prediction') {
        ledger.indexPrediction(entry.record);
      } else {
        ledger.indexOutcome(entry.update);
      }
    }
    logger.info('ledger.opened', { entries: entries.length, predictions: ledger.predictions.size, outcomes: ledger.outcomes.size });
    return ledger;
  }

  /**
   * Records a served prediction. A second record for an already known request
   * id is ignored.
   */
  async appendPrediction(record: PredictionRecord): Promise<void> {
    if (!this.indexPrediction(record)) {
      logger.warn('ledger.prediction.duplicate', { request_id: record.requestId });
      return;
    }
    await this.persist({ type: 'prediction', record });
  }

  /**
   * Idempotent upsert keyed by request id. Redelivery of the same label is a
   * no-op; a different label with a newer timestamp replaces the old one.
   */
  async appendOutcome(update: OutcomeUpdate): Promise<OutcomeAppendStatus> {
    const status = this.indexOutcome(update);
    if (status === 'recorded' || status === 'corrected') {
      await this.persist({ type: 'outcome', update });
    }
    return status;
  }

  hasPrediction(requestId: string): boolean {
    return this.predictions.has(requestId);
  }

  query(window: LedgerWindow): LedgerQueryResult {
    const pairs: JoinedPair[] = [];
    let pending = 0;
    for (const [requestId, prediction] of this.predictions) {
      if (prediction.at < window.start || prediction.at >= window.end) continue;
      const outcome = this.outcomes.get(requestId)?.value ?? null;
      if (!outcome) pending += 1;
      pairs.push({ prediction: prediction.value, outcome });
    }
    pairs.sort((a, b) => Date.parse(a.prediction.timestamp) - Date.parse(b.prediction.timestamp));
    return { pairs, joined: pairs.length - pending, pending };
  }

  stats() {
    let pending = 0;
    for (const requestId of this.predictions.keys()) {
      if (!this.outcomes.has(requestId)) pending += 1;
    }
    return { predictions: this.predictions.size, outcomes: this.outcomes.size, pending };
  }

  /**
   * Drops predictions older than `horizonMs` together with their outcomes,
   * and outcomes older than the horizon that never matched a prediction.
   */
  async compact(horizonMs: number, now = Date.now()): Promise<CompactionResult> {
    const cutoff = now - horizonMs;
    let removedPredictions = 0;
    let removedOutcomes = 0;

    for (const [requestId, prediction] of this.predictions) {
      if (prediction.at >= cutoff) continue;
      this.predictions.delete(requestId);
      removedPredictions += 1;
      if (this.outcomes.delete(requestId)) removedOutcomes += 1;
    }
    for (const [requestId, outcome] of this.outcomes) {
      if (outcome.at < cutoff && !this.predictions.has(requestId)) {
        this.outcomes.delete(requestId);
        removedOutcomes += 1;
      }
    }

    if (removedPredictions + removedOutcomes > 0) {
      try {
        await this.repository.rewrite(this.entries());
      } catch (error) {
        throw new LedgerWriteFailure('Ledger compaction rewrite failed', errorMessage(error));
      }
      logger.info('ledger.compacted', { removed_predictions: removedPredictions, removed_outcomes: removedOutcomes });
    }
    return { removedPredictions, removedOutcomes };
  }

  private entries(): LedgerEntry[] {
    const entries: LedgerEntry[] = [];
    for (const { value } of this.predictions.values()) {
      entries.push({ type: 'prediction', record: value });
    }
    for (const { value } of this.outcomes.values()) {
      entries.push({ type: 'outcome', update: value });
    }
    return entries;
  }

  private indexPrediction(record: PredictionRecord): boolean {
    if (this.predictions.has(record.requestId)) {
      return false;
    }
    this.predictions.set(record.requestId, { value: record, at: Date.parse(record.timestamp) });
    return true;
  }

  private indexOutcome(update: OutcomeUpdate): OutcomeAppendStatus {
    const at = Date.parse(update.timestamp);
    const existing = this.outcomes.get(update.requestId);
    if (!existing) {
      this.outcomes.set(update.requestId, { value: update, at });
      return 'recorded';
    }
    if (existing.value.label === update.label) {
      return 'duplicate';
    }
    if (at < existing.at) {
      return 'stale';
    }
    this.outcomes.set(update.requestId, { value: update, at });
    return 'corrected';
  }

  private async persist(entry: LedgerEntry) {
    try {
      await this.repository.append(entry);
    } catch (error) {
      throw new LedgerWriteFailure(`Ledger ${entry.type} append failed`, errorMessage(error));
    }
  }
}
