import { EventEmitter } from 'events';

export interface DataHealthMonitorOptions {
  tradeStaleThresholdMs?: number;
  checkIntervalMs?: number;
  sleepThresholdMs?: number;
}

export interface TradeDataStalePayload {
  staleMs: number;
  lastTradeReceivedAt: number;
  detectedAt: string;
}

export interface SystemResumePayload {
  gapMs: number;
  detectedAt: string;
  checkIntervalMs: number;
}

export declare interface DataHealthMonitor {
  on(event: 'tradeDataStale', listener: (payload: TradeDataStalePayload) => void): this;
  on(event: 'systemResumeDetected', listener: (payload: SystemResumePayload) => void): this;
}

/**
 * Watches the trade stream for silence and the host for sleep/resume gaps.
 * Times are wall-clock receipt times, not exchange trade times.
 */
export class DataHealthMonitor extends EventEmitter {
  private readonly tradeStaleThresholdMs: number;
  private readonly checkIntervalMs: number;
  private readonly sleepThresholdMs: number;

  private timer: NodeJS.Timeout | null = null;
  private lastCheckAt = Date.now();
  private lastTradeReceivedAt: number | null = null;
  private tradeStaleReported = false;

  constructor(options: DataHealthMonitorOptions = {}) {
    super();

    this.tradeStaleThresholdMs = options.tradeStaleThresholdMs ?? 2 * 60 * 1000;
    this.checkIntervalMs = options.checkIntervalMs ?? 30 * 1000;
    this.sleepThresholdMs = options.sleepThresholdMs ?? 2 * this.checkIntervalMs;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.lastCheckAt = Date.now();
    if (this.lastTradeReceivedAt === null) {
      this.lastTradeReceivedAt = this.lastCheckAt;
    }
    this.timer = setInterval(() => this.evaluate(), this.checkIntervalMs);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;
  }

  trackTrade(receivedAt: number = Date.now()): void {
    this.lastTradeReceivedAt = receivedAt;
    this.tradeStaleReported = false;
  }

  markWebsocketConnected(): void {
    // a fresh connection restarts the silence clock
    this.lastTradeReceivedAt = Date.now();
    this.tradeStaleReported = false;
  }

  markWebsocketDisconnected(): void {
    this.tradeStaleReported = false;
  }

  evaluate(): void {
    const now = Date.now();
    const gapMs = now - this.lastCheckAt;

    if (gapMs > this.sleepThresholdMs) {
      const payload: SystemResumePayload = {
        gapMs,
        detectedAt: new Date(now).toISOString(),
        checkIntervalMs: this.checkIntervalMs,
      };

      this.emit('systemResumeDetected', payload);
    }

    this.lastCheckAt = now;

    if (this.lastTradeReceivedAt === null) {
      return;
    }

    const staleMs = now - this.lastTradeReceivedAt;

    if (staleMs > this.tradeStaleThresholdMs) {
      if (!this.tradeStaleReported) {
        const payload: TradeDataStalePayload = {
          staleMs,
          lastTradeReceivedAt: this.lastTradeReceivedAt,
          detectedAt: new Date(now).toISOString(),
        };

        this.tradeStaleReported = true;
        this.emit('tradeDataStale', payload);
      }
    } else {
      this.tradeStaleReported = false;
    }
  }
}
