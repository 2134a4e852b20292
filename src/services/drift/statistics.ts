import type { DriftStatistic, ResolvedPair } from './types.js';

function mean(values: readonly number[]) {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function realizedPositiveRate(pairs: readonly ResolvedPair[]) {
  return mean(pairs.map((pair) => pair.outcome.label));
}

export function predictedPositiveRate(pairs: readonly ResolvedPair[]) {
  return mean(pairs.map((pair) => pair.prediction.label));
}

/** |realized positive rate - predicted positive rate| */
export const positiveRateGap: DriftStatistic = {
  name: 'positive_rate_gap',
  compute: (pairs) => Math.abs(realizedPositiveRate(pairs) - predictedPositiveRate(pairs))
};

/** |mean predicted probability - realized positive rate| */
export const calibrationGap: DriftStatistic = {
  name: 'calibration_gap',
  compute: (pairs) => Math.abs(mean(pairs.map((pair) => pair.prediction.probability)) - realizedPositiveRate(pairs))
};

const STATISTICS: Record<string, DriftStatistic> = {
  [positiveRateGap.name]: positiveRateGap,
  [calibrationGap.name]: calibrationGap
};

export function resolveStatistic(name: string): DriftStatistic {
  const statistic = STATISTICS[name];
  if (!statistic) {
    throw new Error(`Unknown drift statistic "${name}"`);
  }
  return statistic;
}
