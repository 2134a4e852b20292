import type { NextFunction, Request, Response } from 'express';
import type { DriftMonitor } from '../services/driftMonitor.js';
import type { OutcomeLedger } from '../services/outcomeLedger.js';
import type { ScoringArtifactAdapter } from '../services/scoringArtifact.js';

type HealthDeps = {
  adapter: ScoringArtifactAdapter;
  ledger: OutcomeLedger;
  monitor?: DriftMonitor;
};

export function createHealthController({ adapter, ledger, monitor }: HealthDeps) {
  return function health(_req: Request, res: Response) {
    const artifact = adapter.artifact;
    return res.status(artifact ? 200 : 503).json({
      status: artifact ? 'ok' : 'degraded',
      model_version: artifact?.version ?? null,
      ledger: ledger.stats(),
      drift_state: monitor?.currentState ?? null
    });
  };
}

export function createReloadController(adapter: ScoringArtifactAdapter) {
  return async function reloadModel(_req: Request, res: Response, next: NextFunction) {
    const result = await adapter.reload();
    if (!result.ok) {
      return next(result.error);
    }
    return res.json({ model_version: result.version, previous_version: result.previousVersion });
  };
}
