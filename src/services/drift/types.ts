import type { OutcomeUpdate, PredictionRecord } from '../outcomeLedger.js';

export type DriftState = 'normal' | 'drifting' | 'signaled';

export type VerdictStatus = 'normal' | 'triggered' | 'inconclusive';

export type ResolvedPair = {
  prediction: PredictionRecord;
  outcome: OutcomeUpdate;
};

export type DriftVerdict = {
  windowStart: string;
  windowEnd: string;
  statisticName: string;
  /** null when the window held too few joined pairs to compute it. */
  statistic: number | null;
  threshold: number;
  sampleSize: number;
  pending: number;
  status: VerdictStatus;
  triggered: boolean;
  /** Whether this cycle delivered a retraining signal. */
  signaled: boolean;
  state: DriftState;
  evaluatedAt: string;
};

export interface DriftStatistic {
  readonly name: string;
  compute(pairs: readonly ResolvedPair[]): number;
}

export interface RetrainingTrigger {
  readonly name: string;
  signal(verdict: DriftVerdict): Promise<void>;
}
