/**
 * Service interfaces for the Volume Spike Tracker
 */

import { AlertHistory, AlertState, SettingsSnapshot } from '../types';
import { LogLevel } from '../types/config';

/**
 * Application configuration structure
 */
export interface AppConfig {
  telegramBotToken: string;
  telegramChatId: string;
  telegramApiUrl: string;
  telegramRequestTimeoutMs: number;
  tradeStreamUrl: string;
  trackerSymbol: string;
  databasePath: string;
  bufferCapacity: number;
  commandPollIntervalMs: number;
  statusLogIntervalSeconds: number;
  tradeStaleThresholdMs: number;
  sendStartupMessage: boolean;
  defaultSettings: SettingsSnapshot;
  logLevel: LogLevel;
}

/**
 * Outbound text channel. Implementations never throw; failure is reported as `false`.
 */
export interface INotificationSink {
  send(text: string): Promise<boolean>;
}

/**
 * Inbound operator command channel
 */
export interface ICommandSource {
  /**
   * Fetch operator text lines received since the previous call
   */
  fetchCommands(): Promise<string[]>;
}

/**
 * Durable store for the tunable settings
 */
export interface ISettingsStore {
  /**
   * Load the persisted settings, or null when nothing was saved yet
   */
  loadSettings(): Promise<Partial<SettingsSnapshot> | null>;

  /**
   * Persist the full settings snapshot
   */
  saveSettings(settings: SettingsSnapshot): Promise<void>;
}

/**
 * Store for decided alerts
 */
export interface IAlertHistoryStore {
  saveAlertHistory(alert: AlertHistory): Promise<void>;
}

/**
 * Read-only view of the alert engine state
 */
export interface AlertStateReader {
  getState(): AlertState;
}

/**
 * Interface for configuration management
 */
export interface IConfigManager {
  /**
   * Load and validate configuration from environment variables
   */
  loadConfig(): Promise<void>;

  /**
   * Get current configuration
   */
  getConfig(): AppConfig;

  /**
   * Validate configuration values
   */
  validateConfig(config: Partial<AppConfig>): boolean;
}
