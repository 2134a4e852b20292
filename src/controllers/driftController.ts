import type { NextFunction, Request, Response } from 'express';
import { AppError, MonitorEvaluationError } from '../errors/AppError.js';
import type { DriftMonitor } from '../services/driftMonitor.js';

export function createDriftController(monitor: DriftMonitor) {
  return {
    listVerdicts(_req: Request, res: Response) {
      return res.json({ state: monitor.currentState, verdicts: monitor.history() });
    },

    async evaluate(_req: Request, res: Response, next: NextFunction) {
      if (monitor.isRunning) {
        return next(new AppError('A drift cycle is already running', 409, { code: 'DRIFT_CYCLE_RUNNING' }));
      }
      const verdict = await monitor.runCycle();
      if (!verdict) {
        return next(new MonitorEvaluationError('Drift evaluation failed; see service logs'));
      }
      return res.json({ verdict });
    }
  };
}
