/**
 * Alert Manager
 * Renders decided alerts, hands them to the notification sink and records alert history
 */

import { EventEmitter } from 'events';
import { AlertEvent } from '../types';
import { IAlertHistoryStore, INotificationSink } from './interfaces';
import { buildAlertMessage } from './message-formatter';
import { logger } from '../utils/logger';

export interface AlertManagerOptions {
  symbol: string;
  historyStore?: IAlertHistoryStore;
}

export declare interface AlertManager {
  on(event: 'alertSent', listener: (alert: AlertEvent) => void): this;
  on(event: 'alertFailed', listener: (alert: AlertEvent) => void): this;
}

const log = logger.child('AlertManager');

/**
 * Delivery is fire-and-forget: a decided alert stays counted and keeps its cooldown
 * whether or not the sink accepts it. In-flight deliveries are tracked for shutdown.
 */
export class AlertManager extends EventEmitter {
  private readonly notifier: INotificationSink;
  private readonly symbol: string;
  private readonly historyStore: IAlertHistoryStore | null;
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(notifier: INotificationSink, options: AlertManagerOptions) {
    super();
    this.notifier = notifier;
    this.symbol = options.symbol;
    this.historyStore = options.historyStore ?? null;
  }

  /**
   * Start delivering an alert without waiting for it
   */
  dispatch(alert: AlertEvent): void {
    const delivery = this.deliver(alert).catch((error: unknown) => {
      log.error('Unexpected failure while delivering alert', error);
    });

    this.inFlight.add(delivery);
    void delivery.finally(() => {
      this.inFlight.delete(delivery);
    });
  }

  /**
   * Send one alert and record it. Resolves with the sink's delivery result.
   */
  async deliver(alert: AlertEvent): Promise<boolean> {
    const message = buildAlertMessage(alert, this.symbol);
    const delivered = await this.notifier.send(message);

    if (delivered) {
      log.info(`${alert.kind} alert #${alert.sequence} sent`, {
        zScore: Number(alert.metrics.zScore.toFixed(2)),
        recentVolume: Math.round(alert.metrics.recentVolume),
      });
      this.emit('alertSent', alert);
    } else {
      log.warn(`${alert.kind} alert #${alert.sequence} could not be delivered`);
      this.emit('alertFailed', alert);
    }

    await this.recordHistory(alert, message, delivered);
    return delivered;
  }

  /**
   * Wait for every delivery started so far
   */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  pendingCount(): number {
    return this.inFlight.size;
  }

  private async recordHistory(alert: AlertEvent, message: string, delivered: boolean): Promise<void> {
    if (!this.historyStore) {
      return;
    }

    try {
      const highVolume = alert.kind === 'HighVolume';
      // whale rows compare notional against the dollar threshold
      await this.historyStore.saveAlertHistory({
        alertType: highVolume ? 'HIGH_VOLUME' : 'WHALE',
        timestamp: alert.timestamp,
        value: highVolume ? alert.metrics.zScore : alert.metrics.recentVolume,
        threshold: highVolume ? alert.settings.zThreshold : alert.settings.whaleThreshold,
        message,
        delivered,
      });
    } catch (error) {
      log.error('Failed to record alert history', error);
    }
  }
}
