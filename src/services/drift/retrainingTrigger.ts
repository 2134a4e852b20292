import { AppError } from '../../errors/AppError.js';
import { logger } from '../../utils/logger.js';
import type { DriftVerdict, RetrainingTrigger } from './types.js';

export class RetrainingTriggerError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 502, { code: 'RETRAINING_TRIGGER_FAILED', details });
    this.name = 'RetrainingTriggerError';
  }
}

/** Used when no retraining endpoint is configured: the signal is only logged. */
export class LogRetrainingTrigger implements RetrainingTrigger {
  readonly name = 'log';

  async signal(verdict: DriftVerdict) {
    logger.warn('drift.retraining.signal', { ...verdict });
  }
}

export type WebhookTriggerOptions = {
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

export class WebhookRetrainingTrigger implements RetrainingTrigger {
  readonly name = 'webhook';

  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: WebhookTriggerOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async signal(verdict: DriftVerdict) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const response = await this.fetchImpl(this.options.url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ event: 'drift.retraining_requested', verdict }),
        signal: controller.signal
      });
      if (!response.ok) {
        throw new RetrainingTriggerError(`Retraining endpoint responded ${response.status}`);
      }
      logger.info('drift.retraining.signal.delivered', { url: this.options.url, status: response.status });
    } catch (error) {
      if (error instanceof RetrainingTriggerError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        throw new RetrainingTriggerError('Retraining endpoint timed out');
      }
      throw new RetrainingTriggerError('Retraining endpoint unavailable', error instanceof Error ? error.message : undefined);
    } finally {
      clearTimeout(timeout);
    }
  }
}
