import { MonitorEvaluationError, errorMessage } from '../errors/AppError.js';
import { METRIC, type TelemetrySink } from '../observability/metrics.js';
import { runInSpan } from '../observability/telemetry.js';
import { logger } from '../utils/logger.js';
import type { OutcomeLedger } from './outcomeLedger.js';
import type {
  DriftState,
  DriftStatistic,
  DriftVerdict,
  ResolvedPair,
  RetrainingTrigger,
  VerdictStatus
} from './drift/types.js';

export type DriftMonitorOptions = {
  ledger: OutcomeLedger;
  statistic: DriftStatistic;
  trigger: RetrainingTrigger;
  intervalMs: number;
  windowMs: number;
  minSamples: number;
  threshold: number;
  cooldownMs: number;
  /** Ledger retention horizon; compaction runs at the start of each cycle. */
  retentionMs?: number;
  metrics?: TelemetrySink;
  clock?: () => number;
  historySize?: number;
};

const DEFAULT_HISTORY_SIZE = 50;

/**
 * Periodically compares predictions with realized outcomes and raises a
 * retraining signal when the statistic crosses the threshold.
 *
 * normal -> drifting (first breach) -> signaled (cooldown active)
 * signaled -> normal once the cooldown has expired and the metric recovered.
 * A signal is raised at most once per cooldown period.
 */
export class DriftMonitor {
  private state: DriftState = 'normal';

  private lastSignalAt: number | null = null;

  private running = false;

  private timer: NodeJS.Timeout | null = null;

  private readonly verdicts: DriftVerdict[] = [];

  private readonly clock: () => number;

  constructor(private readonly options: DriftMonitorOptions) {
    this.clock = options.clock ?? Date.now;
  }

  get currentState(): DriftState {
    return this.state;
  }

  get isRunning() {
    return this.running;
  }

  history(): readonly DriftVerdict[] {
    return [...this.verdicts];
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.runCycle();
    }, this.options.intervalMs);
    this.timer.unref();
    logger.info('drift.monitor.started', {
      interval_ms: this.options.intervalMs,
      window_ms: this.options.windowMs,
      statistic: this.options.statistic.name,
      threshold: this.options.threshold,
      trigger: this.options.trigger.name
    });
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('drift.monitor.stopped');
    }
  }

  /**
   * Runs one evaluation. Returns null when the cycle was skipped because the
   * previous one is still in flight, or when evaluation failed.
   */
  async runCycle(): Promise<DriftVerdict | null> {
    const { metrics } = this.options;
    if (this.running) {
      metrics?.increment(METRIC.driftCyclesSkipped);
      logger.warn('drift.cycle.skipped', { reason: 'previous_cycle_running' });
      return null;
    }

    this.running = true;
    const endTimer = metrics?.startTimer(METRIC.driftEvaluationDuration);
    try {
      const verdict = await runInSpan(() => this.evaluate());
      metrics?.increment(METRIC.driftCycles);
      logger.info('drift.cycle.completed', { ...verdict });
      return verdict;
    } catch (error) {
      const failure = error instanceof MonitorEvaluationError
        ? error
        : new MonitorEvaluationError('Drift evaluation failed', errorMessage(error));
      metrics?.increment(METRIC.driftCycleFailures);
      logger.error('drift.cycle.failed', { error: failure.message, details: failure.details });
      return null;
    } finally {
      endTimer?.();
      this.running = false;
    }
  }

  private async evaluate(): Promise<DriftVerdict> {
    const { ledger, statistic, threshold, minSamples, metrics } = this.options;
    const now = this.clock();

    if (this.options.retentionMs) {
      try {
        await ledger.compact(this.options.retentionMs, now);
      } catch (error) {
        metrics?.increment(METRIC.ledgerWriteFailures);
        logger.error('ledger.compaction.failed', { error: errorMessage(error) });
      }
    }

    const windowStart = now - this.options.windowMs;
    const result = ledger.query({ start: windowStart, end: now });
    metrics?.set(METRIC.ledgerPending, result.pending);

    const resolved: ResolvedPair[] = [];
    for (const pair of result.pairs) {
      if (pair.outcome) {
        resolved.push({ prediction: pair.prediction, outcome: pair.outcome });
      }
    }

    const base = {
      windowStart: new Date(windowStart).toISOString(),
      windowEnd: new Date(now).toISOString(),
      statisticName: statistic.name,
      threshold,
      sampleSize: resolved.length,
      pending: result.pending,
      evaluatedAt: new Date(now).toISOString()
    };

    if (resolved.length < minSamples) {
      return this.record({ ...base, statistic: null, status: 'inconclusive', triggered: false, signaled: false, state: this.state });
    }

    const value = statistic.compute(resolved);
    if (!Number.isFinite(value)) {
      throw new MonitorEvaluationError(`Statistic ${statistic.name} produced a non-finite value`, { value });
    }
    metrics?.set(METRIC.driftStatistic, value);

    const breached = value > threshold;
    const status: VerdictStatus = breached ? 'triggered' : 'normal';
    const signaled = breached ? await this.onBreach(now, { ...base, statistic: value, status }) : this.onRecovery(now);

    return this.record({ ...base, statistic: value, status, triggered: breached, signaled, state: this.state });
  }

  private coolingDown(now: number) {
    return this.lastSignalAt !== null && now < this.lastSignalAt + this.options.cooldownMs;
  }

  private onRecovery(now: number): false {
    if (this.state === 'drifting' || (this.state === 'signaled' && !this.coolingDown(now))) {
      this.transition('normal');
    }
    return false;
  }

  private async onBreach(
    now: number,
    draft: Omit<DriftVerdict, 'triggered' | 'signaled' | 'state'>
  ): Promise<boolean> {
    if (this.state === 'normal') {
      this.transition('drifting');
    }
    if (this.coolingDown(now)) {
      logger.info('drift.signal.suppressed', { cooldown_until: new Date((this.lastSignalAt ?? now) + this.options.cooldownMs).toISOString() });
      return false;
    }

    const verdict: DriftVerdict = { ...draft, triggered: true, signaled: true, state: 'signaled' };
    try {
      await this.options.trigger.signal(verdict);
    } catch (error) {
      this.transition('drifting');
      this.options.metrics?.increment(METRIC.driftSignalFailures);
      logger.error('drift.signal.failed', { trigger: this.options.trigger.name, error: errorMessage(error) });
      return false;
    }

    this.lastSignalAt = now;
    this.transition('signaled');
    this.options.metrics?.increment(METRIC.driftSignals);
    return true;
  }

  private transition(next: DriftState) {
    if (next !== this.state) {
      logger.info('drift.state.changed', { from: this.state, to: next });
      this.state = next;
    }
  }

  private record(verdict: DriftVerdict): DriftVerdict {
    const frozen = Object.freeze(verdict);
    this.verdicts.unshift(frozen);
    const limit = this.options.historySize ?? DEFAULT_HISTORY_SIZE;
    if (this.verdicts.length > limit) {
      this.verdicts.splice(limit);
    }
    return frozen;
  }
}
