/**
 * Level-filtered logger with optional component scopes
 */

import { LogLevel } from '../types/config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

interface LoggerState {
  level: LogLevel;
}

export class Logger {
  private readonly state: LoggerState;
  private readonly prefix: string;

  constructor(scope?: string, state: LoggerState = { level: 'info' }) {
    this.state = state;
    this.prefix = scope ? `[${scope}] ` : '';
  }

  /**
   * Create a logger sharing this logger's level that tags every line with a scope
   */
  child(scope: string): Logger {
    return new Logger(scope, this.state);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
    this.debug(`Log level set to ${level}`);
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  error(message: string, error?: unknown): void {
    if (!this.shouldLog('error')) return;
    if (error !== undefined) {
      console.error(`[ERROR] ${this.prefix}${message}`, error);
    } else {
      console.error(`[ERROR] ${this.prefix}${message}`);
    }
  }

  warn(message: string, details?: unknown): void {
    if (!this.shouldLog('warn')) return;
    if (details !== undefined) {
      console.warn(`[WARN] ${this.prefix}${message}`, details);
    } else {
      console.warn(`[WARN] ${this.prefix}${message}`);
    }
  }

  info(message: string, details?: unknown): void {
    if (!this.shouldLog('info')) return;
    if (details !== undefined) {
      console.log(`[INFO] ${this.prefix}${message}`, details);
    } else {
      console.log(`[INFO] ${this.prefix}${message}`);
    }
  }

  debug(message: string, details?: unknown): void {
    if (!this.shouldLog('debug')) return;
    if (details !== undefined) {
      console.debug(`[DEBUG] ${this.prefix}${message}`, details);
    } else {
      console.debug(`[DEBUG] ${this.prefix}${message}`);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.state.level];
  }
}

export const logger = new Logger();
