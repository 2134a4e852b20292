import { createApp } from '../src/app.js';
import { TelemetrySink } from '../src/observability/metrics.js';
import { InMemoryLedgerRepository, type LedgerRepository } from '../src/repositories/ledgerRepository.js';
import { DriftMonitor } from '../src/services/driftMonitor.js';
import { positiveRateGap } from '../src/services/drift/statistics.js';
import type { DriftVerdict, RetrainingTrigger } from '../src/services/drift/types.js';
import { OutcomeLedger, type PredictionRecord } from '../src/services/outcomeLedger.js';
import { ScoringArtifactAdapter, inlineSource, type ArtifactFile } from '../src/services/scoringArtifact.js';

export const COEFFICIENTS = [-0.05, -0.01, -0.005, 0.02, -1.1, -2.0];
export const INTERCEPT = -0.5;

export function churnArtifactFile(overrides: Partial<ArtifactFile> = {}): ArtifactFile {
  return {
    format_version: 1,
    version: 'churn-test-1',
    schema: {
      fields: [
        { name: 'tenure', kind: 'numeric' },
        { name: 'usage', kind: 'numeric' },
        { name: 'age', kind: 'numeric' },
        { name: 'monthly_charges', kind: 'numeric' },
        {
          name: 'contract_type',
          kind: 'categorical',
          levels: ['Month-to-month', 'One year', 'Two year'],
          reference: 'Month-to-month'
        }
      ]
    },
    model: {
      type: 'logistic',
      intercept: INTERCEPT,
      coefficients: [...COEFFICIENTS],
      threshold: 0.5
    },
    ...overrides
  };
}

/** Same summation order as the logistic scorer. */
export function expectedProbability(vector: readonly number[]) {
  let z = INTERCEPT;
  for (let i = 0; i < COEFFICIENTS.length; i += 1) {
    z += (COEFFICIENTS[i] ?? 0) * (vector[i] ?? 0);
  }
  return 1 / (1 + Math.exp(-z));
}

export const MONTHLY_CUSTOMER = {
  tenure: 12,
  usage: 50,
  age: 30,
  monthly_charges: 70,
  contract_type: 'Month-to-month'
};

export const AT_RISK_CUSTOMER = {
  tenure: 1,
  usage: 5,
  age: 25,
  monthly_charges: 110,
  contract_type: 'Month-to-month'
};

export async function loadedAdapter(metrics?: TelemetrySink, file: ArtifactFile = churnArtifactFile()) {
  const adapter = new ScoringArtifactAdapter(inlineSource(file), metrics);
  await adapter.load();
  return adapter;
}

export class RecordingTrigger implements RetrainingTrigger {
  readonly name = 'recording';

  readonly signals: DriftVerdict[] = [];

  failNext = false;

  async signal(verdict: DriftVerdict) {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('trigger offline');
    }
    this.signals.push(verdict);
  }
}

export class FailingLedgerRepository extends InMemoryLedgerRepository {
  override async append(): Promise<void> {
    throw new Error('disk full');
  }
}

export function prediction(requestId: string, at: number, label: 0 | 1, probability = label === 1 ? 0.8 : 0.2): PredictionRecord {
  return {
    requestId,
    timestamp: new Date(at).toISOString(),
    inputHash: `hash-${requestId}`,
    label,
    probability,
    modelVersion: 'churn-test-1'
  };
}

export async function buildTestApp(options: { repository?: LedgerRepository; loadArtifact?: boolean; clock?: () => number } = {}) {
  const metrics = new TelemetrySink({ strict: true });
  const adapter = options.loadArtifact === false
    ? new ScoringArtifactAdapter(inlineSource('not json'), metrics)
    : await loadedAdapter(metrics);
  const ledger = new OutcomeLedger(options.repository ?? new InMemoryLedgerRepository());
  const trigger = new RecordingTrigger();
  const monitor = new DriftMonitor({
    ledger,
    metrics,
    trigger,
    statistic: positiveRateGap,
    intervalMs: 60_000,
    windowMs: 24 * 60 * 60 * 1000,
    minSamples: 10,
    threshold: 0.2,
    cooldownMs: 60 * 60 * 1000,
    clock: options.clock
  });
  const app = createApp({ adapter, ledger, metrics, monitor });
  return { app, adapter, ledger, metrics, monitor, trigger };
}

export function flushMicrotasks() {
  return new Promise<void>((resolve) => setImmediate(resolve));
}
