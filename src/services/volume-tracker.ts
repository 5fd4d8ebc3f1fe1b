/**
 * Volume Tracker
 * Ingestion path: trade sample -> rolling buffer -> metrics -> alert decision -> alert delivery
 */

import { EventEmitter } from 'events';
import { AlertEvent, MetricsSnapshot, TradeSample } from '../types';
import { RollingBuffer } from './rolling-buffer';
import { computeMetrics } from './calculation-engine';
import { AlertEngine } from './alert-engine';
import { AlertManager } from './alert-manager';
import { TunableSettings } from './tunable-settings';
import { TrackerStatistics } from './tracker-statistics';
import { formatPrice, formatUsd } from './message-formatter';
import { logger } from '../utils/logger';

export interface VolumeTrackerOptions {
  bufferCapacity?: number;
  statusLogIntervalSeconds?: number;
}

export interface VolumeTrackerDependencies {
  settings: TunableSettings;
  alertEngine: AlertEngine;
  alertManager: AlertManager;
  statistics: TrackerStatistics;
}

export declare interface VolumeTracker {
  on(event: 'metrics', listener: (metrics: MetricsSnapshot) => void): this;
}

const log = logger.child('VolumeTracker');

/**
 * Owns the rolling buffer. `processTrade` is synchronous, so each trade is evaluated
 * against one settings snapshot without interleaving with command handling.
 */
export class VolumeTracker extends EventEmitter {
  private readonly buffer: RollingBuffer<TradeSample>;
  private readonly settings: TunableSettings;
  private readonly alertEngine: AlertEngine;
  private readonly alertManager: AlertManager;
  private readonly statistics: TrackerStatistics;
  private readonly statusLogIntervalSeconds: number;
  private lastStatusLogAt: number | null = null;
  private processedCount = 0;

  constructor(dependencies: VolumeTrackerDependencies, options: VolumeTrackerOptions = {}) {
    super();
    this.settings = dependencies.settings;
    this.alertEngine = dependencies.alertEngine;
    this.alertManager = dependencies.alertManager;
    this.statistics = dependencies.statistics;
    this.buffer = new RollingBuffer<TradeSample>(options.bufferCapacity ?? 3600);
    this.statusLogIntervalSeconds = options.statusLogIntervalSeconds ?? 30;
  }

  /**
   * Ingest one trade. Returns the alert decided for it, if any; delivery runs in the background.
   */
  processTrade(sample: TradeSample): AlertEvent | null {
    this.buffer.append(sample);
    this.processedCount++;
    this.statistics.recordPrice(sample.price);

    const settings = this.settings.snapshot();
    const metrics = computeMetrics(this.buffer, settings.whaleThreshold);
    let alert: AlertEvent | null = null;

    if (metrics) {
      this.statistics.recordMetrics(metrics.recentVolume, metrics.zScore);
      this.emit('metrics', metrics);

      alert = this.alertEngine.evaluate(metrics, settings, sample.timestamp);
      if (alert) {
        log.info(`${alert.kind} alert #${alert.sequence} decided`, {
          zScore: Number(metrics.zScore.toFixed(2)),
          volumeRatio: Number(alert.volumeRatio.toFixed(2)),
        });
        this.alertManager.dispatch(alert);
      }
    }

    this.logStatus(sample);
    return alert;
  }

  getBufferLength(): number {
    return this.buffer.len();
  }

  getProcessedCount(): number {
    return this.processedCount;
  }

  private logStatus(sample: TradeSample): void {
    if (
      this.lastStatusLogAt !== null &&
      sample.timestamp - this.lastStatusLogAt < this.statusLogIntervalSeconds &&
      sample.timestamp >= this.lastStatusLogAt
    ) {
      return;
    }

    this.lastStatusLogAt = sample.timestamp;
    const { recentVolume, zScore } = this.statistics.getLastObservation();
    log.info(
      `Price: ${formatPrice(sample.price)} | Vol: ${formatUsd(sample.notional)} | ` +
        `Recent: ${formatUsd(recentVolume)} | Z: ${zScore.toFixed(2)} | Buffered: ${this.buffer.len()}`
    );
  }
}
