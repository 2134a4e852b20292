import express from 'express';
import cors from 'cors';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestContext } from './middleware/requestContext.js';
import { createTraceMiddleware } from './observability/telemetry.js';
import type { TelemetrySink } from './observability/metrics.js';
import { createRoutes } from './routes/index.js';
import { InferenceService } from './services/inferenceService.js';
import type { DriftMonitor } from './services/driftMonitor.js';
import type { OutcomeLedger } from './services/outcomeLedger.js';
import type { ScoringArtifactAdapter } from './services/scoringArtifact.js';

export type AppDependencies = {
  adapter: ScoringArtifactAdapter;
  ledger: OutcomeLedger;
  metrics: TelemetrySink;
  monitor?: DriftMonitor;
  corsOrigin?: string;
  clock?: () => Date;
};

export type ServiceContext = AppDependencies & {
  inference: InferenceService;
};

export function createApp(deps: AppDependencies) {
  const app = express();
  const context: ServiceContext = {
    ...deps,
    inference: new InferenceService({
      adapter: deps.adapter,
      ledger: deps.ledger,
      metrics: deps.metrics,
      clock: deps.clock
    })
  };

  app.disable('x-powered-by');
  app.use(requestContext);
  app.use(createTraceMiddleware());

  if (deps.corsOrigin) {
    app.use(cors({ origin: deps.corsOrigin }));
  }

  app.use(createRoutes(context));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
