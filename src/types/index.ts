/**
 * Core data types for the Volume Spike Tracker
 */

/**
 * Single executed trade as consumed by the rolling buffer.
 * `timestamp` is in epoch seconds, `notional` is price * quantity.
 */
export interface TradeSample {
  readonly timestamp: number;
  readonly price: number;
  readonly quantity: number;
  readonly notional: number;
}

/**
 * Derived metrics computed from the rolling buffer on every trade
 */
export interface MetricsSnapshot {
  readonly timestamp: number;
  readonly price: number;
  readonly recentVolume: number;
  readonly baselineAverage: number;
  readonly zScore: number;
  readonly isWhale: boolean;
}

/**
 * Operator-tunable thresholds read by the alert decision path
 */
export interface SettingsSnapshot {
  readonly zThreshold: number;
  readonly volumeRatioThreshold: number;
  readonly cooldownSeconds: number;
  readonly whaleThreshold: number;
  readonly paused: boolean;
}

export type AlertKind = 'HighVolume' | 'Whale';

/**
 * Alert decision state. `lastAlertTimestamp` is epoch seconds, 0 = never.
 */
export interface AlertState {
  lastAlertTimestamp: number;
  alertCount: number;
  whaleCount: number;
}

/**
 * Alert decided by the alert engine and handed to the notification side
 */
export interface AlertEvent {
  readonly kind: AlertKind;
  readonly timestamp: number;
  readonly sequence: number;
  readonly volumeRatio: number;
  readonly metrics: MetricsSnapshot;
  readonly settings: SettingsSnapshot;
}

/**
 * Last values observed by the ingestion path, used for stats reports
 */
export interface LastObservation {
  price: number;
  recentVolume: number;
  zScore: number;
}

/**
 * Alert history record structure
 */
export interface AlertHistory {
  id?: number;
  alertType: string;
  timestamp: number;
  value: number;
  threshold: number;
  message: string;
  delivered: boolean;
  createdAt?: string;
}

/**
 * Parsed operator command
 */
export type ControlCommand =
  | { kind: 'GetStatus' }
  | { kind: 'GetStats' }
  | { kind: 'SetZThreshold'; value: number }
  | { kind: 'SetVolumeRatio'; value: number }
  | { kind: 'SetCooldown'; value: number }
  | { kind: 'SetWhaleThreshold'; value: number }
  | { kind: 'Pause' }
  | { kind: 'Resume' }
  | { kind: 'Help' }
  | { kind: 'SendTest' }
  | { kind: 'InvalidArgument'; usage: string }
  | { kind: 'Unrecognized'; text: string };
