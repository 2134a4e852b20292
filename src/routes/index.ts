import express, { Router } from 'express';
import { createDriftController } from '../controllers/driftController.js';
import { createMetricsController } from '../controllers/metricsController.js';
import { createHealthController, createReloadController } from '../controllers/modelController.js';
import { createOutcomesController } from '../controllers/outcomesController.js';
import { createPredictController } from '../controllers/predictController.js';
import type { ServiceContext } from '../app.js';

const JSON_BODY_LIMIT = '100kb';

export function createRoutes(context: ServiceContext) {
  const routes = Router();
  const parseJson = express.json({ limit: JSON_BODY_LIMIT });

  routes.get('/health', createHealthController(context));
  routes.get('/metrics', createMetricsController(context.metrics));
  routes.post('/predict', createPredictController(context.inference, parseJson));
  routes.post('/outcomes', parseJson, createOutcomesController(context.ledger, context.metrics));
  routes.post('/model/reload', createReloadController(context.adapter));

  if (context.monitor) {
    const drift = createDriftController(context.monitor);
    routes.get('/drift/verdicts', drift.listVerdicts);
    routes.post('/drift/evaluate', drift.evaluate);
  }

  return routes;
}
