import { performance } from 'node:perf_hooks';
import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import { logger } from '../utils/logger.js';

export type MetricDefinition = {
  help: string;
  buckets?: number[];
};

export type MetricCatalog = {
  counters: Record<string, MetricDefinition>;
  histograms: Record<string, MetricDefinition>;
  gauges: Record<string, MetricDefinition>;
};

export type RenderFormat = 'prometheus' | 'json';

export type RenderedMetrics = {
  contentType: string;
  body: string;
};

export type TelemetrySinkOptions = {
  /** Throw on undeclared metric names instead of logging and ignoring them. */
  strict?: boolean;
  catalog?: MetricCatalog;
};

export const DEFAULT_LATENCY_BUCKETS = [0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5];

export const METRIC = {
  requests: 'inference_requests_total',
  rejections: 'inference_rejections_total',
  requestDuration: 'inference_request_duration_seconds',
  ledgerWriteFailures: 'ledger_write_failures_total',
  ledgerPending: 'ledger_pending_predictions',
  artifactReloads: 'artifact_reloads_total',
  artifactReloadFailures: 'artifact_reload_failures_total',
  artifactLoaded: 'artifact_loaded',
  driftCycles: 'drift_cycles_total',
  driftCyclesSkipped: 'drift_cycles_skipped_total',
  driftCycleFailures: 'drift_cycle_failures_total',
  driftSignals: 'drift_signals_total',
  driftSignalFailures: 'drift_signal_failures_total',
  driftEvaluationDuration: 'drift_evaluation_duration_seconds',
  driftStatistic: 'drift_last_statistic'
} as const;

export const SERVICE_METRICS: MetricCatalog = {
  counters: {
    [METRIC.requests]: { help: 'Inference requests that reached a terminal state' },
    [METRIC.rejections]: { help: 'Inference requests rejected before scoring completed' },
    [METRIC.ledgerWriteFailures]: { help: 'Prediction or outcome ledger writes that failed' },
    [METRIC.artifactReloads]: { help: 'Successful scoring artifact hot swaps' },
    [METRIC.artifactReloadFailures]: { help: 'Scoring artifact reloads that failed and kept the stale artifact' },
    [METRIC.driftCycles]: { help: 'Completed drift evaluation cycles' },
    [METRIC.driftCyclesSkipped]: { help: 'Drift cycles skipped because the previous one was still running' },
    [METRIC.driftCycleFailures]: { help: 'Drift cycles that failed during evaluation' },
    [METRIC.driftSignals]: { help: 'Retraining signals raised' },
    [METRIC.driftSignalFailures]: { help: 'Retraining signals the trigger failed to accept' }
  },
  histograms: {
    [METRIC.requestDuration]: { help: 'Inference latency from receipt to terminal state', buckets: DEFAULT_LATENCY_BUCKETS },
    [METRIC.driftEvaluationDuration]: { help: 'Drift cycle duration', buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 10] }
  },
  gauges: {
    [METRIC.ledgerPending]: { help: 'Predictions in the drift window still waiting for an outcome' },
    [METRIC.artifactLoaded]: { help: '1 when a scoring artifact is loaded' },
    [METRIC.driftStatistic]: { help: 'Statistic computed by the most recent conclusive drift cycle' }
  }
};

export function nowMs() {
  return performance.now();
}

/**
 * Process-wide metric registry. Constructed once at startup and handed to the
 * components that report into it; nothing registers on prom-client's default
 * registry.
 */
export class TelemetrySink {
  private readonly registry = new Registry();

  private readonly counters = new Map<string, Counter>();

  private readonly histograms = new Map<string, Histogram>();

  private readonly gauges = new Map<string, Gauge>();

  private readonly strict: boolean;

  constructor(options: TelemetrySinkOptions = {}) {
    this.strict = options.strict ?? process.env.NODE_ENV !== 'production';
    const catalog = options.catalog ?? SERVICE_METRICS;

    for (const [name, def] of Object.entries(catalog.counters)) {
      this.counters.set(name, new Counter({ name, help: def.help, registers: [this.registry] }));
    }
    for (const [name, def] of Object.entries(catalog.histograms)) {
      this.histograms.set(name, new Histogram({
        name,
        help: def.help,
        buckets: def.buckets ?? DEFAULT_LATENCY_BUCKETS,
        registers: [this.registry]
      }));
    }
    for (const [name, def] of Object.entries(catalog.gauges)) {
      this.gauges.set(name, new Gauge({ name, help: def.help, registers: [this.registry] }));
    }
  }

  increment(name: string, by = 1) {
    const counter = this.counters.get(name);
    if (!counter) {
      this.undeclared('counter', name);
      return;
    }
    counter.inc(by);
  }

  observe(name: string, seconds: number) {
    const histogram = this.histograms.get(name);
    if (!histogram) {
      this.undeclared('histogram', name);
      return;
    }
    histogram.observe(seconds);
  }

  set(name: string, value: number) {
    const gauge = this.gauges.get(name);
    if (!gauge) {
      this.undeclared('gauge', name);
      return;
    }
    gauge.set(value);
  }

  /** Starts a latency measurement; the returned function records it once. */
  startTimer(name: string): () => number {
    const start = nowMs();
    let recorded = false;
    return () => {
      const seconds = (nowMs() - start) / 1000;
      if (!recorded) {
        recorded = true;
        this.observe(name, seconds);
      }
      return seconds;
    };
  }

  async render(format: RenderFormat = 'prometheus'): Promise<RenderedMetrics> {
    if (format === 'json') {
      const metrics = await this.registry.getMetricsAsJSON();
      return { contentType: 'application/json; charset=utf-8', body: JSON.stringify(metrics) };
    }
    return { contentType: this.registry.contentType, body: await this.registry.metrics() };
  }

  async counterValue(name: string): Promise<number> {
    const counter = this.counters.get(name);
    if (!counter) {
      this.undeclared('counter', name);
      return 0;
    }
    const metric = await counter.get();
    return metric.values[0]?.value ?? 0;
  }

  async histogramCount(name: string): Promise<number> {
    const histogram = this.histograms.get(name);
    if (!histogram) {
      this.undeclared('histogram', name);
      return 0;
    }
    const metric = await histogram.get();
    return metric.values.find((value) => value.metricName === `${name}_count`)?.value ?? 0;
  }

  async gaugeValue(name: string): Promise<number> {
    const gauge = this.gauges.get(name);
    if (!gauge) {
      this.undeclared('gauge', name);
      return 0;
    }
    const metric = await gauge.get();
    return metric.values[0]?.value ?? 0;
  }

  private undeclared(kind: string, name: string) {
    if (this.strict) {
      throw new Error(`Undeclared ${kind} metric "${name}"`);
    }
    logger.error('metrics.undeclared', { kind, metric: name });
  }
}
