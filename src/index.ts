import { loadConfig } from './config/env.js';
import { logger } from './utils/logger.js';
import { createApp } from './app.js';
import { errorMessage } from './errors/AppError.js';
import { TelemetrySink } from './observability/metrics.js';
import { InMemoryLedgerRepository, JsonlLedgerRepository } from './repositories/ledgerRepository.js';
import { DriftMonitor } from './services/driftMonitor.js';
import { resolveStatistic } from './services/drift/statistics.js';
import { LogRetrainingTrigger, WebhookRetrainingTrigger } from './services/drift/retrainingTrigger.js';
import { OutcomeLedger } from './services/outcomeLedger.js';
import { ScoringArtifactAdapter, fileSource } from './services/scoringArtifact.js';

const config = loadConfig();
const metrics = new TelemetrySink({ strict: config.nodeEnv !== 'production' });
const adapter = new ScoringArtifactAdapter(fileSource(config.artifactPath), metrics);

try {
  await adapter.load();
} catch (error) {
  logger.error('artifact.load.fatal', { path: config.artifactPath, error: errorMessage(error) });
  process.exit(1);
}

const ledger = await OutcomeLedger.open(
  config.ledgerPath ? new JsonlLedgerRepository(config.ledgerPath) : new InMemoryLedgerRepository()
);

const monitor = new DriftMonitor({
  ledger,
  metrics,
  statistic: resolveStatistic(config.drift.statistic),
  trigger: config.retrainWebhook
    ? new WebhookRetrainingTrigger(config.retrainWebhook)
    : new LogRetrainingTrigger(),
  intervalMs: config.drift.intervalMs,
  windowMs: config.drift.windowMs,
  minSamples: config.drift.minSamples,
  threshold: config.drift.threshold,
  cooldownMs: config.drift.cooldownMs,
  retentionMs: config.ledgerRetentionMs
});

const app = createApp({ adapter, ledger, metrics, monitor, corsOrigin: config.corsOrigin });

const server = app.listen(config.port, () => {
  logger.info('Server started', { port: config.port, model_version: adapter.version, ledger: config.ledgerPath ?? 'memory' });
  monitor.start();
});

process.on('SIGHUP', () => {
  void adapter.reload();
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    logger.info('Shutting down', { signal });
    monitor.stop();
    server.close(() => process.exit(0));
  });
}
