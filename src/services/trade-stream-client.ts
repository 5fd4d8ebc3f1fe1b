/**
 * WebSocket client for the exchange aggregated-trade stream
 * Handles real-time trade ingestion with auto-reconnection and heartbeat
 */

import WebSocket from 'ws';
import { EventEmitter } from 'events';
import { TradeSample } from '../types';
import { createTradeSample } from './trade-sample';
import { logger } from '../utils/logger';

export interface TradeStreamClientOptions {
  url: string;
  /** Frames for any other symbol are rejected as malformed */
  symbol?: string;
  reconnectInterval?: number;
  maxReconnectInterval?: number;
  maxReconnectAttempts?: number;
  heartbeatInterval?: number;
  heartbeatTimeout?: number;
  connectTimeout?: number;
}

export declare interface TradeStreamClient {
  on(event: 'connected', listener: () => void): this;
  on(event: 'disconnected', listener: (info: { code: number; reason: string }) => void): this;
  on(event: 'trade', listener: (sample: TradeSample) => void): this;
  on(event: 'malformedMessage', listener: (error: Error, raw: string) => void): this;
  on(event: 'maxReconnectAttemptsReached', listener: () => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

const log = logger.child('TradeStream');

/**
 * Parse one stream frame into a trade sample. Accepts raw `aggTrade` payloads and
 * combined-stream envelopes (`{ stream, data }`). Returns null for non-trade frames
 * and throws for trade frames with invalid fields or, when `expectedSymbol` is given,
 * for trades of another symbol.
 */
export function parseAggTradeFrame(raw: string, expectedSymbol?: string): TradeSample | null {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error('Trade frame is not an object');
  }

  const payload: unknown = 'data' in parsed && 'stream' in parsed ? parsed.data : parsed;
  if (typeof payload !== 'object' || payload === null) {
    throw new Error('Trade frame payload is not an object');
  }

  if (!('e' in payload) || payload.e !== 'aggTrade') {
    return null;
  }

  if (expectedSymbol !== undefined) {
    const symbol = 's' in payload && typeof payload.s === 'string' ? payload.s.toUpperCase() : '';
    if (symbol !== expectedSymbol.toUpperCase()) {
      throw new Error(`Unexpected symbol ${symbol || '(missing)'}, expected ${expectedSymbol.toUpperCase()}`);
    }
  }

  const price = 'p' in payload ? Number(payload.p) : Number.NaN;
  const quantity = 'q' in payload ? Number(payload.q) : Number.NaN;
  const tradeTime = 'T' in payload && typeof payload.T === 'number' ? payload.T : Number.NaN;

  return createTradeSample(tradeTime / 1000, price, quantity);
}

/**
 * WebSocket client for the aggregated-trade stream with auto-reconnection
 */
export class TradeStreamClient extends EventEmitter {
  private ws: WebSocket | null = null;
  private readonly options: Required<Omit<TradeStreamClientOptions, 'symbol'>>;
  private readonly symbol: string | undefined;
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private isConnecting = false;
  private shouldReconnect = true;
  private lastActivity = Date.now();

  constructor(options: TradeStreamClientOptions) {
    super();

    const heartbeatInterval = options.heartbeatInterval ?? 30000;

    this.options = {
      url: options.url,
      reconnectInterval: options.reconnectInterval ?? 5000,
      maxReconnectInterval: options.maxReconnectInterval ?? 30000,
      maxReconnectAttempts: options.maxReconnectAttempts ?? Number.POSITIVE_INFINITY,
      heartbeatInterval,
      heartbeatTimeout: options.heartbeatTimeout ?? heartbeatInterval * 3,
      connectTimeout: options.connectTimeout ?? 10000,
    };
    this.symbol = options.symbol;
  }

  /**
   * Connect to the trade stream
   */
  async connect(): Promise<void> {
    if (this.isConnecting || (this.ws && this.ws.readyState === WebSocket.OPEN)) {
      return;
    }

    this.isConnecting = true;
    this.shouldReconnect = true;

    try {
      log.info(`Connecting to trade stream: ${this.options.url}`);

      const socket = new WebSocket(this.options.url);
      this.ws = socket;
      this.lastActivity = Date.now();

      socket.on('open', () => this.onOpen());
      socket.on('message', (data: WebSocket.RawData) => this.onMessage(data));
      socket.on('close', (code: number, reason: Buffer) => this.onClose(code, reason));
      socket.on('error', (error: Error) => this.onError(error));
      socket.on('pong', () => this.onPong());

      await new Promise<void>((resolve, reject) => {
        let timeout: NodeJS.Timeout | null = null;

        const cleanup = (): void => {
          if (timeout) {
            clearTimeout(timeout);
            timeout = null;
          }
          this.off('connected', handleConnected);
          this.off('error', handleError);
        };

        const handleConnected = (): void => {
          cleanup();
          resolve();
        };

        const handleError = (error: Error): void => {
          cleanup();
          reject(error);
        };

        timeout = setTimeout(() => {
          cleanup();
          // onClose schedules the next attempt
          socket.terminate();
          reject(new Error('Connection timeout'));
        }, this.options.connectTimeout);

        this.once('connected', handleConnected);
        this.once('error', handleError);
      });
    } catch (error) {
      this.isConnecting = false;
      throw error;
    }
  }

  /**
   * Disconnect and stop reconnecting
   */
  disconnect(): void {
    this.shouldReconnect = false;

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    this.stopHeartbeat();

    if (this.ws) {
      this.ws.removeAllListeners();
      // keep a no-op error listener so a late socket error is not thrown
      this.ws.on('error', () => undefined);
      this.ws.close();
      this.ws = null;
    }

    this.isConnecting = false;
    this.reconnectAttempts = 0;
  }

  /**
   * Drop the current socket and connect again
   */
  async reconnect(reason: string): Promise<void> {
    log.warn(`Reconnecting trade stream: ${reason}`);
    this.disconnect();
    await this.connect();
  }

  isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  getLastActivity(): number {
    return this.lastActivity;
  }

  private onOpen(): void {
    log.info('Trade stream connected');
    this.isConnecting = false;
    this.reconnectAttempts = 0;
    this.lastActivity = Date.now();

    this.startHeartbeat();
    this.emit('connected');
  }

  private onMessage(data: WebSocket.RawData): void {
    this.lastActivity = Date.now();
    const raw = data.toString();

    let sample: TradeSample | null;
    try {
      sample = parseAggTradeFrame(raw, this.symbol);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      log.warn('Skipping malformed trade frame', { reason: err.message });
      this.emit('malformedMessage', err, raw);
      return;
    }

    if (sample) {
      this.emit('trade', sample);
    }
  }

  private onClose(code: number, reason: Buffer): void {
    log.info(`Trade stream closed: ${code} - ${reason.toString()}`);

    this.ws = null;
    this.isConnecting = false;
    this.lastActivity = Date.now();
    this.stopHeartbeat();

    this.emit('disconnected', { code, reason: reason.toString() });

    if (this.shouldReconnect) {
      this.scheduleReconnect();
    }
  }

  private onError(error: Error): void {
    log.error('Trade stream error', error.message);
    this.isConnecting = false;
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  private onPong(): void {
    this.lastActivity = Date.now();
  }

  /**
   * Schedule reconnection attempt with exponential backoff
   */
  private scheduleReconnect(): void {
    if (this.reconnectTimer) {
      return;
    }

    const maxAttempts = this.options.maxReconnectAttempts;
    this.reconnectAttempts++;

    if (Number.isFinite(maxAttempts) && this.reconnectAttempts > maxAttempts) {
      log.error('Max reconnection attempts reached');
      this.shouldReconnect = false;
      this.emit('maxReconnectAttemptsReached');
      return;
    }

    const delay = Math.min(
      this.options.reconnectInterval * Math.pow(2, this.reconnectAttempts - 1),
      this.options.maxReconnectInterval
    );

    log.info(`Scheduling reconnection attempt ${this.reconnectAttempts} in ${delay}ms`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((error) => {
        // onClose schedules the next attempt
        log.error('Reconnection failed', error instanceof Error ? error.message : error);
      });
    }, delay);
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();

    this.heartbeatTimer = setInterval(() => {
      const socket = this.ws;
      if (!socket || socket.readyState !== WebSocket.OPEN) {
        return;
      }

      try {
        socket.ping();
      } catch (error) {
        log.warn('Failed to send ping frame', error instanceof Error ? error.message : error);
      }

      const idleTime = Date.now() - this.lastActivity;
      if (idleTime > this.options.heartbeatTimeout) {
        log.warn(`Heartbeat timeout exceeded (${idleTime}ms), terminating WebSocket`);
        socket.terminate();
      }
    }, this.options.heartbeatInterval);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}
