/**
 * Service exports for the Volume Spike Tracker
 */

export { DatabaseManager } from './database';
export { TradeStreamClient, parseAggTradeFrame } from './trade-stream-client';
export { TelegramClient } from './telegram-client';
export { AlertManager } from './alert-manager';
export { AlertEngine, WHALE_MIN_Z_SCORE, volumeRatio } from './alert-engine';
export { DataHealthMonitor } from './data-health-monitor';
export { CommandPoller } from './command-poller';
export { ControlProcessor, parseCommand } from './control-processor';
export { RollingBuffer } from './rolling-buffer';
export { TrackerStatistics } from './tracker-statistics';
export { TunableSettings, DEFAULT_SETTINGS, SettingsValidationError } from './tunable-settings';
export { VolumeTracker } from './volume-tracker';
export { createTradeSample } from './trade-sample';
export { ZScoreCalculator, computeMetrics, RECENT_WINDOW, BASELINE_WINDOW } from './calculation-engine';
export * from './interfaces';
