/**
 * Tunable Settings
 * Operator-adjustable thresholds shared between the ingestion path and the control channel.
 *
 * The current value is an immutable snapshot. Every successful setter publishes a new frozen
 * object in a single assignment, so a reader either sees the whole previous snapshot or the
 * whole new one, and the next trade evaluated after a setter returns observes the change.
 */

import { EventEmitter } from 'events';
import { SettingsSnapshot } from '../types';

export const SETTINGS_LIMITS = {
  zThreshold: { min: 0.5, max: 20 },
  volumeRatioThreshold: { min: 1, max: 100 },
  cooldownSeconds: { min: 10, max: 3600 },
  whaleThreshold: { min: 10000 },
} as const;

export const DEFAULT_SETTINGS: SettingsSnapshot = Object.freeze({
  zThreshold: 3.0,
  volumeRatioThreshold: 2.0,
  cooldownSeconds: 60,
  whaleThreshold: 100000,
  paused: false,
});

type NumericSettingKey = Exclude<keyof SettingsSnapshot, 'paused'>;

/**
 * Raised when a setter argument is outside its documented range. The message is user-facing.
 */
export class SettingsValidationError extends Error {
  constructor(
    readonly field: keyof SettingsSnapshot,
    message: string
  ) {
    super(message);
    this.name = 'SettingsValidationError';
  }
}

const inRange = (value: number, min: number, max: number): boolean =>
  Number.isFinite(value) && value >= min && value <= max;

export function validateZThreshold(value: number): void {
  const { min, max } = SETTINGS_LIMITS.zThreshold;
  if (!inRange(value, min, max)) {
    throw new SettingsValidationError('zThreshold', `Z-score must be between ${min} and ${max}`);
  }
}

export function validateVolumeRatioThreshold(value: number): void {
  const { min, max } = SETTINGS_LIMITS.volumeRatioThreshold;
  if (!inRange(value, min, max)) {
    throw new SettingsValidationError('volumeRatioThreshold', `Volume must be between ${min} and ${max}`);
  }
}

export function validateCooldownSeconds(value: number): void {
  const { min, max } = SETTINGS_LIMITS.cooldownSeconds;
  if (!Number.isInteger(value) || !inRange(value, min, max)) {
    throw new SettingsValidationError(
      'cooldownSeconds',
      `Cooldown must be between ${min} and ${max} seconds`
    );
  }
}

export function validateWhaleThreshold(value: number): void {
  const { min } = SETTINGS_LIMITS.whaleThreshold;
  if (!Number.isFinite(value) || value < min) {
    throw new SettingsValidationError(
      'whaleThreshold',
      `Whale threshold must be at least $${min.toLocaleString('en-US')}`
    );
  }
}

const VALIDATORS: Record<NumericSettingKey, (value: number) => void> = {
  zThreshold: validateZThreshold,
  volumeRatioThreshold: validateVolumeRatioThreshold,
  cooldownSeconds: validateCooldownSeconds,
  whaleThreshold: validateWhaleThreshold,
};

const NUMERIC_KEYS: NumericSettingKey[] = [
  'zThreshold',
  'volumeRatioThreshold',
  'cooldownSeconds',
  'whaleThreshold',
];

/**
 * Collect the validation messages for every out-of-range field of a snapshot
 */
export function validateSettings(settings: SettingsSnapshot): string[] {
  const errors: string[] = [];
  for (const key of NUMERIC_KEYS) {
    try {
      VALIDATORS[key](settings[key]);
    } catch (error) {
      errors.push(error instanceof Error ? error.message : String(error));
    }
  }
  return errors;
}

export declare interface TunableSettings {
  on(event: 'change', listener: (settings: SettingsSnapshot) => void): this;
}

export class TunableSettings extends EventEmitter {
  private current: SettingsSnapshot;

  constructor(initial: SettingsSnapshot = DEFAULT_SETTINGS) {
    super();

    const errors = validateSettings(initial);
    if (errors.length > 0) {
      throw new Error(`Invalid initial settings: ${errors.join('; ')}`);
    }

    this.current = Object.freeze({ ...initial });
  }

  /**
   * Current published snapshot. Callers should read it once per decision.
   */
  snapshot(): SettingsSnapshot {
    return this.current;
  }

  setZThreshold(value: number): SettingsSnapshot {
    validateZThreshold(value);
    return this.publish({ zThreshold: value });
  }

  setVolumeRatioThreshold(value: number): SettingsSnapshot {
    validateVolumeRatioThreshold(value);
    return this.publish({ volumeRatioThreshold: value });
  }

  setCooldownSeconds(value: number): SettingsSnapshot {
    validateCooldownSeconds(value);
    return this.publish({ cooldownSeconds: value });
  }

  setWhaleThreshold(value: number): SettingsSnapshot {
    validateWhaleThreshold(value);
    return this.publish({ whaleThreshold: value });
  }

  setPaused(paused: boolean): SettingsSnapshot {
    return this.publish({ paused });
  }

  /**
   * Overlay a persisted snapshot field by field. Invalid fields keep their current value;
   * their validation messages are returned.
   */
  restore(persisted: Partial<SettingsSnapshot>): string[] {
    const patch: { -readonly [K in keyof SettingsSnapshot]?: SettingsSnapshot[K] } = {};
    const rejected: string[] = [];

    for (const key of NUMERIC_KEYS) {
      const value = persisted[key];
      if (value === undefined) {
        continue;
      }
      try {
        VALIDATORS[key](value);
        patch[key] = value;
      } catch (error) {
        rejected.push(error instanceof Error ? `${key}: ${error.message}` : String(error));
      }
    }

    if (typeof persisted.paused === 'boolean') {
      patch.paused = persisted.paused;
    }

    this.publish(patch);
    return rejected;
  }

  private publish(patch: Partial<SettingsSnapshot>): SettingsSnapshot {
    const next: SettingsSnapshot = Object.freeze({ ...this.current, ...patch });
    this.current = next;
    this.emit('change', next);
    return next;
  }
}
