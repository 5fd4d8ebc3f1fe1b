/**
 * Unit tests for DatabaseManager
 * Uses an in-memory SQLite database
 */

import { DatabaseManager } from '../database';
import { AlertHistory, SettingsSnapshot } from '../../types';

describe('DatabaseManager', () => {
  let dbManager: DatabaseManager;

  beforeEach(async () => {
    dbManager = new DatabaseManager(':memory:');
    await dbManager.initializeDatabase();
  });

  afterEach(async () => {
    await dbManager.closeDatabase();
  });

  describe('Settings', () => {
    const saved: SettingsSnapshot = {
      zThreshold: 3.5,
      volumeRatioThreshold: 2.5,
      cooldownSeconds: 120,
      whaleThreshold: 250000,
      paused: true,
    };

    it('returns null before anything is saved', async () => {
      await expect(dbManager.loadSettings()).resolves.toBeNull();
    });

    it('round-trips a settings snapshot', async () => {
      await dbManager.saveSettings(saved);

      await expect(dbManager.loadSettings()).resolves.toEqual(saved);
    });

    it('keeps a single row and overwrites it', async () => {
      await dbManager.saveSettings(saved);
      await dbManager.saveSettings({ ...saved, zThreshold: 5, paused: false });

      await expect(dbManager.loadSettings()).resolves.toEqual({ ...saved, zThreshold: 5, paused: false });
    });
  });

  describe('Alert history', () => {
    const base: AlertHistory = {
      alertType: 'HIGH_VOLUME',
      timestamp: 1_700_000_000,
      value: 7.62,
      threshold: 3,
      message: 'HIGH VOLUME ALERT #1',
      delivered: true,
    };

    it('stores and lists alerts newest first', async () => {
      await dbManager.saveAlertHistory(base);
      await dbManager.saveAlertHistory({
        ...base,
        alertType: 'WHALE',
        timestamp: 1_700_000_100,
        message: 'WHALE DETECTED #1',
        delivered: false,
      });

      const alerts = await dbManager.getRecentAlerts();

      expect(alerts).toHaveLength(2);
      expect(alerts[0]).toEqual(
        expect.objectContaining({ alertType: 'WHALE', timestamp: 1_700_000_100, delivered: false })
      );
      expect(alerts[1]).toEqual(
        expect.objectContaining({ alertType: 'HIGH_VOLUME', value: 7.62, threshold: 3, delivered: true })
      );
      expect(typeof alerts[0]?.id).toBe('number');
      expect(typeof alerts[0]?.createdAt).toBe('string');
    });

    it('filters by alert type and limits the result', async () => {
      for (let i = 0; i < 3; i++) {
        await dbManager.saveAlertHistory({ ...base, timestamp: base.timestamp + i });
      }
      await dbManager.saveAlertHistory({ ...base, alertType: 'WHALE' });

      const alerts = await dbManager.getRecentAlerts(2, 'HIGH_VOLUME');

      expect(alerts.map((alert) => alert.timestamp)).toEqual([1_700_000_002, 1_700_000_001]);
    });
  });

  it('rejects operations before initialization', async () => {
    const uninitialized = new DatabaseManager(':memory:');

    await expect(uninitialized.loadSettings()).rejects.toThrow('Database not initialized');
  });
});
