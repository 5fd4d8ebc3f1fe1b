/**
 * Calculation Engine Implementation
 * Derives short-window volume metrics and z-scores from the rolling trade buffer
 */

import { MetricsSnapshot, TradeSample } from '../types';
import { ReadonlyRollingBuffer } from './rolling-buffer';

/** Samples summed into the recent volume burst */
export const RECENT_WINDOW = 3;

/** Samples forming the baseline mean and standard deviation */
export const BASELINE_WINDOW = 60;

/**
 * Statistics helpers. Standard deviation is the sample estimator (n - 1 denominator).
 */
export class ZScoreCalculator {
  static sum(values: readonly number[]): number {
    let total = 0;
    for (const value of values) {
      total += value;
    }
    return total;
  }

  static mean(values: readonly number[]): number {
    if (values.length === 0) {
      return 0;
    }
    return this.sum(values) / values.length;
  }

  /**
   * Sample standard deviation, computed two-pass around the mean.
   * Returns 0 for fewer than two values and for a window of identical values.
   */
  static sampleStandardDeviation(values: readonly number[]): number {
    if (values.length < 2) {
      return 0;
    }

    let min = Number.POSITIVE_INFINITY;
    let max = Number.NEGATIVE_INFINITY;
    for (const value of values) {
      if (value < min) min = value;
      if (value > max) max = value;
    }
    if (min === max) {
      return 0;
    }

    const mean = this.mean(values);
    let squaredDeviations = 0;
    for (const value of values) {
      const deviation = value - mean;
      squaredDeviations += deviation * deviation;
    }

    return Math.sqrt(squaredDeviations / (values.length - 1));
  }

  /**
   * Z-score = (value - mean) / standard_deviation, 0 when the deviation is 0
   */
  static calculateZScore(value: number, historicalValues: readonly number[]): number {
    if (historicalValues.length === 0) {
      return 0;
    }

    const stdDev = this.sampleStandardDeviation(historicalValues);
    if (stdDev === 0) {
      return 0;
    }

    return (value - this.mean(historicalValues)) / stdDev;
  }
}

/**
 * Compute the metrics snapshot for the current buffer contents.
 * Returns null until the buffer holds a full baseline window.
 */
export function computeMetrics(
  buffer: ReadonlyRollingBuffer<TradeSample>,
  whaleThreshold: number
): MetricsSnapshot | null {
  if (buffer.len() < BASELINE_WINDOW) {
    return null;
  }

  const latest = buffer.latest();
  if (!latest) {
    return null;
  }

  const recentVolume = ZScoreCalculator.sum(buffer.lastN(RECENT_WINDOW).map((sample) => sample.notional));
  const baseline = buffer.lastN(BASELINE_WINDOW).map((sample) => sample.notional);
  const baselineAverage = ZScoreCalculator.sum(baseline) / BASELINE_WINDOW;

  return {
    timestamp: latest.timestamp,
    price: latest.price,
    recentVolume,
    baselineAverage,
    zScore: ZScoreCalculator.calculateZScore(recentVolume, baseline),
    isWhale: recentVolume > whaleThreshold,
  };
}
