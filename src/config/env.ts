import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const positiveNumber = (fallback: string) => z.string().default(fallback).pipe(z.coerce.number().positive());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.string().default('3000'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  CORS_ORIGIN: z.string().url().optional(),
  MODEL_ARTIFACT_PATH: z.string().min(1).default('models/churn-model.json'),
  LEDGER_PATH: z.string().min(1).optional(),
  LEDGER_RETENTION_HOURS: positiveNumber('720'),
  DRIFT_INTERVAL_SECONDS: positiveNumber('300'),
  DRIFT_WINDOW_HOURS: positiveNumber('168'),
  DRIFT_MIN_SAMPLES: z.string().default('50').pipe(z.coerce.number().int().min(1)),
  DRIFT_THRESHOLD: z.string().default('0.1').pipe(z.coerce.number().min(0).max(1)),
  DRIFT_COOLDOWN_HOURS: positiveNumber('24'),
  DRIFT_STATISTIC: z.enum(['positive_rate_gap', 'calibration_gap']).default('positive_rate_gap'),
  RETRAIN_WEBHOOK_URL: z.string().url().optional(),
  RETRAIN_WEBHOOK_TIMEOUT_MS: positiveNumber('5000')
});

export type Env = z.infer<typeof envSchema>;

export type ServiceConfig = {
  nodeEnv: Env['NODE_ENV'];
  port: number;
  corsOrigin?: string;
  artifactPath: string;
  ledgerPath?: string;
  ledgerRetentionMs: number;
  drift: {
    intervalMs: number;
    windowMs: number;
    minSamples: number;
    threshold: number;
    cooldownMs: number;
    statistic: Env['DRIFT_STATISTIC'];
  };
  retrainWebhook?: {
    url: string;
    timeoutMs: number;
  };
};

const HOUR_MS = 60 * 60 * 1000;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const env = envSchema.parse(source);
  return {
    nodeEnv: env.NODE_ENV,
    port: Number(env.PORT),
    corsOrigin: env.CORS_ORIGIN,
    artifactPath: env.MODEL_ARTIFACT_PATH,
    ledgerPath: env.LEDGER_PATH,
    ledgerRetentionMs: env.LEDGER_RETENTION_HOURS * HOUR_MS,
    drift: {
      intervalMs: env.DRIFT_INTERVAL_SECONDS * 1000,
      windowMs: env.DRIFT_WINDOW_HOURS * HOUR_MS,
      minSamples: env.DRIFT_MIN_SAMPLES,
      threshold: env.DRIFT_THRESHOLD,
      cooldownMs: env.DRIFT_COOLDOWN_HOURS * HOUR_MS,
      statistic: env.DRIFT_STATISTIC
    },
    retrainWebhook: env.RETRAIN_WEBHOOK_URL
      ? { url: env.RETRAIN_WEBHOOK_URL, timeoutMs: env.RETRAIN_WEBHOOK_TIMEOUT_MS }
      : undefined
  };
}
