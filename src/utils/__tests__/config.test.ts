import * as os from 'os';
import * as path from 'path';
import { ConfigManager } from '../config';

const MANAGED_KEYS = [
  'TELEGRAM_BOT_TOKEN',
  'TELEGRAM_CHAT_ID',
  'TELEGRAM_API_URL',
  'TELEGRAM_REQUEST_TIMEOUT_MS',
  'TRADE_STREAM_URL',
  'TRACKER_SYMBOL',
  'DATABASE_PATH',
  'BUFFER_CAPACITY',
  'COMMAND_POLL_INTERVAL_MS',
  'STATUS_LOG_INTERVAL_SECONDS',
  'TRADE_STALE_THRESHOLD_MS',
  'SEND_STARTUP_MESSAGE',
  'DEFAULT_Z_THRESHOLD',
  'DEFAULT_VOLUME_RATIO_THRESHOLD',
  'DEFAULT_COOLDOWN_SECONDS',
  'DEFAULT_WHALE_THRESHOLD',
  'LOG_LEVEL',
];

describe('ConfigManager', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of MANAGED_KEYS) {
      delete process.env[key];
    }
    process.env['TELEGRAM_BOT_TOKEN'] = 'test-token';
    process.env['TELEGRAM_CHAT_ID'] = '123456789';

    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
  });

  it('loads defaults when only the required variables are set', async () => {
    const manager = new ConfigManager();
    await manager.loadConfig();

    expect(manager.getConfig()).toEqual({
      telegramBotToken: 'test-token',
      telegramChatId: '123456789',
      telegramApiUrl: 'https://api.telegram.org',
      telegramRequestTimeoutMs: 10000,
      tradeStreamUrl: 'wss://fstream.binance.com/ws/btcusdt@aggTrade',
      trackerSymbol: 'BTCUSDT',
      databasePath: path.join(os.homedir(), '.volume-tracker/tracker.db'),
      bufferCapacity: 3600,
      commandPollIntervalMs: 2000,
      statusLogIntervalSeconds: 30,
      tradeStaleThresholdMs: 120000,
      sendStartupMessage: true,
      defaultSettings: {
        zThreshold: 3,
        volumeRatioThreshold: 2,
        cooldownSeconds: 60,
        whaleThreshold: 100000,
        paused: false,
      },
      logLevel: 'info',
    });
  });

  it('reads overrides from the environment', async () => {
    process.env['TRACKER_SYMBOL'] = ' ethusdt ';
    process.env['DEFAULT_Z_THRESHOLD'] = '4.5';
    process.env['DEFAULT_COOLDOWN_SECONDS'] = '120';
    process.env['SEND_STARTUP_MESSAGE'] = 'off';
    process.env['DATABASE_PATH'] = '/tmp/tracker-test.db';
    process.env['LOG_LEVEL'] = 'DEBUG';

    const manager = new ConfigManager();
    await manager.loadConfig();
    const config = manager.getConfig();

    expect(config.trackerSymbol).toBe('ETHUSDT');
    expect(config.defaultSettings.zThreshold).toBe(4.5);
    expect(config.defaultSettings.cooldownSeconds).toBe(120);
    expect(config.sendStartupMessage).toBe(false);
    expect(config.databasePath).toBe('/tmp/tracker-test.db');
    expect(config.logLevel).toBe('debug');
  });

  it('fails when the bot token is missing', async () => {
    delete process.env['TELEGRAM_BOT_TOKEN'];

    await expect(new ConfigManager().loadConfig()).rejects.toThrow(
      'Required environment variable TELEGRAM_BOT_TOKEN is not set'
    );
  });

  it('fails on out-of-range default settings', async () => {
    process.env['DEFAULT_Z_THRESHOLD'] = '25';

    await expect(new ConfigManager().loadConfig()).rejects.toThrow('Configuration validation failed');
    expect(console.error).toHaveBeenCalledWith('  - Default settings: Z-score must be between 0.5 and 20');
  });

  it('fails when the buffer cannot hold a baseline window', async () => {
    process.env['BUFFER_CAPACITY'] = '30';

    await expect(new ConfigManager().loadConfig()).rejects.toThrow('Configuration validation failed');
    expect(console.error).toHaveBeenCalledWith('  - BUFFER_CAPACITY must be at least 60');
  });

  it('fails on a non-websocket stream url', async () => {
    process.env['TRADE_STREAM_URL'] = 'https://fstream.binance.com/ws/btcusdt@aggTrade';

    await expect(new ConfigManager().loadConfig()).rejects.toThrow('Configuration validation failed');
    expect(console.error).toHaveBeenCalledWith('  - TRADE_STREAM_URL must be a valid WebSocket URL');
  });

  it('refuses to hand out configuration before loading', () => {
    expect(() => new ConfigManager().getConfig()).toThrow('Configuration not loaded');
  });
});
