/**
 * Database Manager Implementation
 * Handles SQLite persistence of tracker settings and alert history
 */

import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs';
import { AlertHistory, SettingsSnapshot } from '../types';
import { IAlertHistoryStore, ISettingsStore } from './interfaces';
import { logger } from '../utils/logger';

const log = logger.child('Database');

const SETTINGS_ROW_ID = 1;

type Row = Record<string, unknown>;

function toRow(value: unknown): Row | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  const entries: Array<[string, unknown]> = Object.entries(value);
  return Object.fromEntries(entries);
}

export class DatabaseManager implements ISettingsStore, IAlertHistoryStore {
  private db: sqlite3.Database | null = null;
  private readonly dbPath: string;

  constructor(databasePath: string) {
    this.dbPath = databasePath;
  }

  /**
   * Initialize database connection and create schema
   */
  async initializeDatabase(): Promise<void> {
    if (this.dbPath !== ':memory:') {
      const dbDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dbDir)) {
        fs.mkdirSync(dbDir, { recursive: true });
      }
    }

    await new Promise<void>((resolve, reject) => {
      const db = new sqlite3.Database(this.dbPath, (err) => {
        if (err) {
          log.error('Failed to connect to database', err);
          reject(err);
          return;
        }
        resolve();
      });
      this.db = db;
    });

    await this.createTables();
    await this.createIndexes();
    log.info(`Database initialized at ${this.dbPath}`);
  }

  private async createTables(): Promise<void> {
    const tables = [
      `CREATE TABLE IF NOT EXISTS tracker_settings (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        z_threshold REAL NOT NULL,
        volume_ratio_threshold REAL NOT NULL,
        cooldown_seconds INTEGER NOT NULL,
        whale_threshold REAL NOT NULL,
        paused INTEGER NOT NULL DEFAULT 0,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
      )`,
      `CREATE TABLE IF NOT EXISTS alert_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        alert_type TEXT NOT NULL,
        timestamp REAL NOT NULL,
        value REAL NOT NULL,
        threshold REAL NOT NULL,
        message TEXT NOT NULL,
        delivered INTEGER NOT NULL DEFAULT 0,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
      )`,
    ];

    for (const sql of tables) {
      await this.run(sql);
    }
  }

  private async createIndexes(): Promise<void> {
    const indexes = [
      'CREATE INDEX IF NOT EXISTS idx_alert_history_timestamp ON alert_history(timestamp)',
      'CREATE INDEX IF NOT EXISTS idx_alert_history_type ON alert_history(alert_type)',
    ];

    for (const sql of indexes) {
      await this.run(sql);
    }
  }

  /**
   * Get database connection (throws error if not initialized)
   */
  private getDatabase(): sqlite3.Database {
    if (!this.db) {
      throw new Error('Database not initialized. Call initializeDatabase() first.');
    }
    return this.db;
  }

  private run(sql: string, params: unknown[] = []): Promise<void> {
    const db = this.getDatabase();
    return new Promise((resolve, reject) => {
      db.run(sql, params, (err: Error | null) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  private get(sql: string, params: unknown[] = []): Promise<Row | null> {
    const db = this.getDatabase();
    return new Promise((resolve, reject) => {
      db.get(sql, params, (err: Error | null, row: unknown) => {
        if (err) {
          reject(err);
        } else {
          resolve(toRow(row));
        }
      });
    });
  }

  private all(sql: string, params: unknown[] = []): Promise<Row[]> {
    const db = this.getDatabase();
    return new Promise((resolve, reject) => {
      db.all(sql, params, (err: Error | null, rows: unknown[]) => {
        if (err) {
          reject(err);
        } else {
          const mapped: Row[] = [];
          for (const row of rows) {
            const normalized = toRow(row);
            if (normalized) {
              mapped.push(normalized);
            }
          }
          resolve(mapped);
        }
      });
    });
  }

  /**
   * Load persisted settings. Returns null when nothing has been saved yet.
   */
  async loadSettings(): Promise<Partial<SettingsSnapshot> | null> {
    let row: Row | null;
    try {
      row = await this.get(
        `
          SELECT z_threshold, volume_ratio_threshold, cooldown_seconds, whale_threshold, paused
          FROM tracker_settings
          WHERE id = ?
        `,
        [SETTINGS_ROW_ID]
      );
    } catch (error) {
      log.error('Failed to load settings', error);
      throw error;
    }

    if (!row) {
      return null;
    }

    return {
      zThreshold: Number(row['z_threshold']),
      volumeRatioThreshold: Number(row['volume_ratio_threshold']),
      cooldownSeconds: Number(row['cooldown_seconds']),
      whaleThreshold: Number(row['whale_threshold']),
      paused: Number(row['paused']) === 1,
    };
  }

  /**
   * Persist the full settings snapshot, replacing any previous one
   */
  async saveSettings(settings: SettingsSnapshot): Promise<void> {
    const upsertSql = `
      INSERT INTO tracker_settings
        (id, z_threshold, volume_ratio_threshold, cooldown_seconds, whale_threshold, paused, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
      ON CONFLICT(id)
      DO UPDATE SET
        z_threshold = excluded.z_threshold,
        volume_ratio_threshold = excluded.volume_ratio_threshold,
        cooldown_seconds = excluded.cooldown_seconds,
        whale_threshold = excluded.whale_threshold,
        paused = excluded.paused,
        updated_at = CURRENT_TIMESTAMP
    `;

    try {
      await this.run(upsertSql, [
        SETTINGS_ROW_ID,
        settings.zThreshold,
        settings.volumeRatioThreshold,
        settings.cooldownSeconds,
        settings.whaleThreshold,
        settings.paused ? 1 : 0,
      ]);
    } catch (error) {
      log.error('Failed to save settings', error);
      throw error;
    }
  }

  /**
   * Save alert history
   */
  async saveAlertHistory(alert: AlertHistory): Promise<void> {
    const insertSql = `
      INSERT INTO alert_history (alert_type, timestamp, value, threshold, message, delivered)
      VALUES (?, ?, ?, ?, ?, ?)
    `;

    try {
      await this.run(insertSql, [
        alert.alertType,
        alert.timestamp,
        alert.value,
        alert.threshold,
        alert.message,
        alert.delivered ? 1 : 0,
      ]);
    } catch (error) {
      log.error('Failed to save alert history', error);
      throw error;
    }
  }

  /**
   * Most recent alert history entries, newest first
   */
  async getRecentAlerts(limit: number = 20, alertType?: string): Promise<AlertHistory[]> {
    const where = alertType ? 'WHERE alert_type = ?' : '';
    const params: unknown[] = alertType ? [alertType] : [];
    params.push(Math.max(1, Math.floor(limit)));

    const rows = await this.all(
      `
        SELECT id, alert_type, timestamp, value, threshold, message, delivered, created_at
        FROM alert_history
        ${where}
        ORDER BY timestamp DESC, id DESC
        LIMIT ?
      `,
      params
    );

    return rows.map((row) => {
      const history: AlertHistory = {
        id: Number(row['id']),
        alertType: String(row['alert_type'] ?? ''),
        timestamp: Number(row['timestamp'] ?? 0),
        value: Number(row['value'] ?? 0),
        threshold: Number(row['threshold'] ?? 0),
        message: String(row['message'] ?? ''),
        delivered: Number(row['delivered'] ?? 0) === 1,
      };

      const createdAt = row['created_at'];
      if (createdAt !== undefined && createdAt !== null) {
        history.createdAt = String(createdAt);
      }

      return history;
    });
  }

  /**
   * Close database connection
   */
  async closeDatabase(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      db.close((err) => {
        if (err) {
          log.error('Failed to close database', err);
          reject(err);
        } else {
          resolve();
        }
      });
    });
    this.db = null;
  }
}
