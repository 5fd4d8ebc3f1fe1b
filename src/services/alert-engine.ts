/**
 * Alert Engine
 * Threshold and cooldown decision unit for high-volume and whale alerts
 */

import { AlertEvent, AlertKind, AlertState, MetricsSnapshot, SettingsSnapshot } from '../types';
import { AlertStateReader } from './interfaces';

/**
 * Secondary z-score gate for whale alerts. Fixed, unlike the operator-tunable thresholds.
 */
export const WHALE_MIN_Z_SCORE = 2.0;

/**
 * recentVolume / baselineAverage, 0 on a zero baseline
 */
export function volumeRatio(metrics: MetricsSnapshot): number {
  return metrics.baselineAverage > 0 ? metrics.recentVolume / metrics.baselineAverage : 0;
}

/**
 * Decides alerts from metric snapshots. One cooldown clock is shared by both alert kinds.
 */
export class AlertEngine implements AlertStateReader {
  private state: AlertState = {
    lastAlertTimestamp: 0,
    alertCount: 0,
    whaleCount: 0,
  };

  /**
   * Evaluate a snapshot at decision time `now` (epoch seconds).
   * Returns the fired alert, or null when paused, cooling down or no rule matches.
   */
  evaluate(metrics: MetricsSnapshot, settings: SettingsSnapshot, now: number): AlertEvent | null {
    if (settings.paused || this.isCoolingDown(now, settings.cooldownSeconds)) {
      return null;
    }

    const ratio = volumeRatio(metrics);
    const kind = this.matchRule(metrics, settings, ratio);
    if (!kind) {
      return null;
    }

    const next: AlertState = { ...this.state, lastAlertTimestamp: now };
    if (kind === 'HighVolume') {
      next.alertCount += 1;
    } else {
      next.whaleCount += 1;
    }
    this.state = next;

    return Object.freeze({
      kind,
      timestamp: now,
      sequence: kind === 'HighVolume' ? next.alertCount : next.whaleCount,
      volumeRatio: ratio,
      metrics,
      settings,
    });
  }

  /**
   * Cooling while an alert has fired and fewer than `cooldownSeconds` have elapsed since.
   * A clock that moved backwards keeps the engine cooling.
   */
  isCoolingDown(now: number, cooldownSeconds: number): boolean {
    if (this.state.alertCount + this.state.whaleCount === 0) {
      return false;
    }
    return now - this.state.lastAlertTimestamp < cooldownSeconds;
  }

  getState(): AlertState {
    return { ...this.state };
  }

  private matchRule(
    metrics: MetricsSnapshot,
    settings: SettingsSnapshot,
    ratio: number
  ): AlertKind | null {
    if (metrics.zScore >= settings.zThreshold && ratio >= settings.volumeRatioThreshold) {
      return 'HighVolume';
    }

    if (metrics.isWhale && metrics.zScore >= WHALE_MIN_Z_SCORE) {
      return 'Whale';
    }

    return null;
  }
}
