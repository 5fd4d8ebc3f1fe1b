import { AlertEngine, WHALE_MIN_Z_SCORE, volumeRatio } from '../alert-engine';
import { DEFAULT_SETTINGS } from '../tunable-settings';
import { MetricsSnapshot, SettingsSnapshot } from '../../types';

const T0 = 1_700_000_000;

function metrics(overrides: Partial<MetricsSnapshot> = {}): MetricsSnapshot {
  return {
    timestamp: T0,
    price: 50_000,
    recentVolume: 1_000,
    baselineAverage: 100,
    zScore: 5,
    isWhale: false,
    ...overrides,
  };
}

function settings(overrides: Partial<SettingsSnapshot> = {}): SettingsSnapshot {
  return { ...DEFAULT_SETTINGS, ...overrides };
}

describe('volumeRatio', () => {
  it('divides recent volume by the baseline average', () => {
    expect(volumeRatio(metrics({ recentVolume: 500, baselineAverage: 200 }))).toBe(2.5);
  });

  it('is 0 on a zero baseline', () => {
    expect(volumeRatio(metrics({ baselineAverage: 0 }))).toBe(0);
  });
});

describe('AlertEngine', () => {
  let engine: AlertEngine;

  beforeEach(() => {
    engine = new AlertEngine();
  });

  it('starts with no alerts and no cooldown', () => {
    expect(engine.getState()).toEqual({ lastAlertTimestamp: 0, alertCount: 0, whaleCount: 0 });
    expect(engine.isCoolingDown(0, 60)).toBe(false);
  });

  it('fires a high volume alert when both thresholds are met', () => {
    const alert = engine.evaluate(metrics({ zScore: 3, recentVolume: 200, baselineAverage: 100 }), settings(), T0);

    expect(alert).not.toBeNull();
    expect(alert?.kind).toBe('HighVolume');
    expect(alert?.sequence).toBe(1);
    expect(alert?.volumeRatio).toBe(2);
    expect(alert?.timestamp).toBe(T0);
    expect(engine.getState()).toEqual({ lastAlertTimestamp: T0, alertCount: 1, whaleCount: 0 });
  });

  it('does not fire when only the z-score is high', () => {
    const alert = engine.evaluate(metrics({ zScore: 10, recentVolume: 150, baselineAverage: 100 }), settings(), T0);

    expect(alert).toBeNull();
    expect(engine.getState().alertCount).toBe(0);
  });

  it('does not fire when only the ratio is high', () => {
    const alert = engine.evaluate(metrics({ zScore: 2.9 }), settings(), T0);
    expect(alert).toBeNull();
  });

  it('never fires a high volume alert on a zero baseline', () => {
    const alert = engine.evaluate(metrics({ baselineAverage: 0, zScore: 10 }), settings(), T0);
    expect(alert).toBeNull();
  });

  it('prefers the high volume alert when the whale rule also matches', () => {
    const alert = engine.evaluate(metrics({ isWhale: true, recentVolume: 200_000, zScore: 8 }), settings(), T0);

    expect(alert?.kind).toBe('HighVolume');
    expect(engine.getState()).toEqual({ lastAlertTimestamp: T0, alertCount: 1, whaleCount: 0 });
  });

  it('fires a whale alert when the ratio gate blocks the high volume rule', () => {
    const alert = engine.evaluate(
      metrics({ isWhale: true, recentVolume: 150_000, baselineAverage: 2_600, zScore: 7.6 }),
      settings({ volumeRatioThreshold: 100 }),
      T0
    );

    expect(alert?.kind).toBe('Whale');
    expect(alert?.sequence).toBe(1);
    expect(engine.getState()).toEqual({ lastAlertTimestamp: T0, alertCount: 0, whaleCount: 1 });
  });

  it('requires the fixed minimum z-score for whale alerts', () => {
    const below = engine.evaluate(
      metrics({ isWhale: true, zScore: WHALE_MIN_Z_SCORE - 0.01 }),
      settings({ zThreshold: 5 }),
      T0
    );
    expect(below).toBeNull();

    const atGate = engine.evaluate(
      metrics({ isWhale: true, zScore: WHALE_MIN_Z_SCORE }),
      settings({ zThreshold: 5 }),
      T0
    );
    expect(atGate?.kind).toBe('Whale');
  });

  it('suppresses every alert kind during the cooldown', () => {
    engine.evaluate(metrics(), settings({ cooldownSeconds: 60 }), T0);

    expect(engine.evaluate(metrics(), settings({ cooldownSeconds: 60 }), T0 + 59)).toBeNull();
    expect(
      engine.evaluate(metrics({ isWhale: true, baselineAverage: 0 }), settings({ cooldownSeconds: 60 }), T0 + 30)
    ).toBeNull();

    const next = engine.evaluate(metrics(), settings({ cooldownSeconds: 60 }), T0 + 60);
    expect(next?.sequence).toBe(2);
    expect(engine.getState().alertCount).toBe(2);
  });

  it('stays cooling when the clock moves backwards', () => {
    engine.evaluate(metrics(), settings(), T0);

    expect(engine.isCoolingDown(T0 - 500, 60)).toBe(true);
    expect(engine.evaluate(metrics(), settings(), T0 - 500)).toBeNull();
  });

  it('does nothing while paused', () => {
    const alert = engine.evaluate(metrics({ zScore: 50 }), settings({ paused: true }), T0);

    expect(alert).toBeNull();
    expect(engine.getState()).toEqual({ lastAlertTimestamp: 0, alertCount: 0, whaleCount: 0 });
  });

  it('returns a copy of its state', () => {
    const state = engine.getState();
    state.alertCount = 99;

    expect(engine.getState().alertCount).toBe(0);
  });
});
