/**
 * Configuration management module
 * Handles loading and validation of environment variables
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import * as os from 'os';
import { AppConfig, IConfigManager } from '../services/interfaces';
import { DEFAULT_SETTINGS, validateSettings } from '../services/tunable-settings';
import { BASELINE_WINDOW } from '../services/calculation-engine';
import { LogLevel } from '../types/config';

// Load environment variables from .env file
dotenv.config();

/**
 * Configuration manager implementation
 */
export class ConfigManager implements IConfigManager {
  private config: AppConfig | null = null;

  /**
   * Load and validate configuration from environment variables
   */
  async loadConfig(): Promise<void> {
    const config: AppConfig = {
      telegramBotToken: this.getRequiredEnvVar('TELEGRAM_BOT_TOKEN'),
      telegramChatId: this.getRequiredEnvVar('TELEGRAM_CHAT_ID'),
      telegramApiUrl: this.getEnvVar('TELEGRAM_API_URL', 'https://api.telegram.org'),
      telegramRequestTimeoutMs: this.getNumberEnvVar('TELEGRAM_REQUEST_TIMEOUT_MS', 10000),
      tradeStreamUrl: this.getEnvVar(
        'TRADE_STREAM_URL',
        'wss://fstream.binance.com/ws/btcusdt@aggTrade'
      ),
      trackerSymbol: this.getEnvVar('TRACKER_SYMBOL', 'BTCUSDT').trim().toUpperCase(),
      databasePath: this.expandPath(this.getEnvVar('DATABASE_PATH', '~/.volume-tracker/tracker.db')),
      bufferCapacity: this.getNumberEnvVar('BUFFER_CAPACITY', 3600),
      commandPollIntervalMs: this.getNumberEnvVar('COMMAND_POLL_INTERVAL_MS', 2000),
      statusLogIntervalSeconds: this.getNumberEnvVar('STATUS_LOG_INTERVAL_SECONDS', 30),
      tradeStaleThresholdMs: this.getNumberEnvVar('TRADE_STALE_THRESHOLD_MS', 2 * 60 * 1000),
      sendStartupMessage: this.getBooleanEnvVar('SEND_STARTUP_MESSAGE', true),
      defaultSettings: {
        zThreshold: this.getNumberEnvVar('DEFAULT_Z_THRESHOLD', DEFAULT_SETTINGS.zThreshold),
        volumeRatioThreshold: this.getNumberEnvVar(
          'DEFAULT_VOLUME_RATIO_THRESHOLD',
          DEFAULT_SETTINGS.volumeRatioThreshold
        ),
        cooldownSeconds: this.getNumberEnvVar('DEFAULT_COOLDOWN_SECONDS', DEFAULT_SETTINGS.cooldownSeconds),
        whaleThreshold: this.getNumberEnvVar('DEFAULT_WHALE_THRESHOLD', DEFAULT_SETTINGS.whaleThreshold),
        paused: false,
      },
      logLevel: this.getLogLevel(this.getEnvVar('LOG_LEVEL', 'info')),
    };

    if (!this.validateConfig(config)) {
      throw new Error('Configuration validation failed');
    }

    this.config = config;
  }

  /**
   * Get current configuration
   */
  getConfig(): AppConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  /**
   * Validate configuration values
   */
  validateConfig(config: Partial<AppConfig>): boolean {
    const errors: string[] = [];

    if (!config.telegramBotToken) {
      errors.push('TELEGRAM_BOT_TOKEN is required');
    }

    if (!config.telegramChatId) {
      errors.push('TELEGRAM_CHAT_ID is required');
    }

    if (config.telegramApiUrl !== undefined && !this.isValidHttpUrl(config.telegramApiUrl)) {
      errors.push('TELEGRAM_API_URL must be a valid HTTP(S) URL');
    }

    if (config.telegramRequestTimeoutMs !== undefined && config.telegramRequestTimeoutMs < 1000) {
      errors.push('TELEGRAM_REQUEST_TIMEOUT_MS must be at least 1000ms (1 second)');
    }

    if (!config.tradeStreamUrl) {
      errors.push('TRADE_STREAM_URL is required');
    } else if (!this.isValidWebSocketUrl(config.tradeStreamUrl)) {
      errors.push('TRADE_STREAM_URL must be a valid WebSocket URL');
    }

    if (config.trackerSymbol !== undefined && !config.trackerSymbol) {
      errors.push('TRACKER_SYMBOL must not be empty');
    }

    if (!config.databasePath) {
      errors.push('DATABASE_PATH is required');
    }

    if (config.bufferCapacity !== undefined) {
      if (!Number.isInteger(config.bufferCapacity)) {
        errors.push('BUFFER_CAPACITY must be an integer');
      } else if (config.bufferCapacity < BASELINE_WINDOW) {
        errors.push(`BUFFER_CAPACITY must be at least ${BASELINE_WINDOW}`);
      }
    }

    if (config.commandPollIntervalMs !== undefined && config.commandPollIntervalMs < 500) {
      errors.push('COMMAND_POLL_INTERVAL_MS must be at least 500ms');
    }

    if (config.statusLogIntervalSeconds !== undefined && config.statusLogIntervalSeconds <= 0) {
      errors.push('STATUS_LOG_INTERVAL_SECONDS must be greater than 0');
    }

    if (config.tradeStaleThresholdMs !== undefined && config.tradeStaleThresholdMs < 10000) {
      errors.push('TRADE_STALE_THRESHOLD_MS must be at least 10000ms (10 seconds)');
    }

    if (config.defaultSettings) {
      for (const message of validateSettings(config.defaultSettings)) {
        errors.push(`Default settings: ${message}`);
      }
    }

    if (config.logLevel && !this.isValidLogLevel(config.logLevel)) {
      errors.push('LOG_LEVEL must be one of error, warn, info, debug');
    }

    if (errors.length > 0) {
      console.error('Configuration validation errors:');
      errors.forEach(error => console.error(`  - ${error}`));
      return false;
    }

    return true;
  }

  /**
   * Get required environment variable
   */
  private getRequiredEnvVar(name: string): string {
    const value = process.env[name];
    if (!value) {
      throw new Error(`Required environment variable ${name} is not set`);
    }
    return value;
  }

  /**
   * Get optional environment variable with default value
   */
  private getEnvVar(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
  }

  /**
   * Get boolean environment variable with default value
   */
  private getBooleanEnvVar(name: string, defaultValue: boolean): boolean {
    const value = process.env[name];
    if (value === undefined) {
      return defaultValue;
    }

    switch (value.toLowerCase()) {
      case '1':
      case 'true':
      case 'yes':
      case 'on':
        return true;
      case '0':
      case 'false':
      case 'no':
      case 'off':
        return false;
      default:
        console.warn(`Invalid boolean value for ${name}: ${value}. Using default: ${defaultValue}`);
        return defaultValue;
    }
  }

  /**
   * Get numeric environment variable with default value
   */
  private getNumberEnvVar(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (value === undefined || value === '') {
      return defaultValue;
    }

    const numValue = Number(value);
    if (isNaN(numValue)) {
      console.warn(`Invalid numeric value for ${name}: ${value}. Using default: ${defaultValue}`);
      return defaultValue;
    }

    return numValue;
  }

  /**
   * Normalize log level value
   */
  private getLogLevel(value: string): LogLevel {
    const normalized = value.trim().toLowerCase();
    if (this.isValidLogLevel(normalized)) {
      return normalized;
    }
    console.warn(`Invalid LOG_LEVEL: ${value}. Falling back to info.`);
    return 'info';
  }

  private isValidLogLevel(value: string): value is LogLevel {
    return ['error', 'warn', 'info', 'debug'].includes(value);
  }

  /**
   * Expand tilde (~) in file paths to home directory
   */
  private expandPath(filePath: string): string {
    if (filePath.startsWith('~/')) {
      return path.join(os.homedir(), filePath.slice(2));
    }
    return filePath;
  }

  private isValidHttpUrl(url: string): boolean {
    try {
      const urlObj = new URL(url);
      return urlObj.protocol === 'http:' || urlObj.protocol === 'https:';
    } catch {
      return false;
    }
  }

  /**
   * Validate WebSocket URL format
   */
  private isValidWebSocketUrl(url: string): boolean {
    try {
      const urlObj = new URL(url);
      return urlObj.protocol === 'ws:' || urlObj.protocol === 'wss:';
    } catch {
      return false;
    }
  }
}

/**
 * Global configuration manager instance
 */
export const configManager = new ConfigManager();

/**
 * Utility function to get configuration
 */
export function getConfig(): AppConfig {
  return configManager.getConfig();
}

/**
 * Utility function to initialize configuration
 */
export async function initializeConfig(): Promise<void> {
  await configManager.loadConfig();
}
