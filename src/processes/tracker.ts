import '../utils/setup-logging';
import { initializeConfig, getConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { buildStartupMessage } from '../services/message-formatter';
import {
  AlertEngine,
  AlertManager,
  CommandPoller,
  ControlProcessor,
  DatabaseManager,
  DataHealthMonitor,
  TelegramClient,
  TrackerStatistics,
  TradeStreamClient,
  TunableSettings,
  VolumeTracker,
} from '../services';

async function bootstrap(): Promise<void> {
  await initializeConfig();
  const config = getConfig();

  logger.setLevel(config.logLevel);
  logger.info(`Volume spike tracker for ${config.trackerSymbol} - starting up`);

  const databaseManager = new DatabaseManager(config.databasePath);
  await databaseManager.initializeDatabase();

  const settings = new TunableSettings(config.defaultSettings);
  await restoreSettings(settings, databaseManager);
  settings.on('change', (next) => logger.info('Settings updated', next));

  const alertEngine = new AlertEngine();
  const statistics = new TrackerStatistics();

  const telegram = new TelegramClient({
    botToken: config.telegramBotToken,
    chatId: config.telegramChatId,
    apiUrl: config.telegramApiUrl,
    requestTimeoutMs: config.telegramRequestTimeoutMs,
  });

  const alertManager = new AlertManager(telegram, {
    symbol: config.trackerSymbol,
    historyStore: databaseManager,
  });

  const tracker = new VolumeTracker(
    { settings, alertEngine, alertManager, statistics },
    {
      bufferCapacity: config.bufferCapacity,
      statusLogIntervalSeconds: config.statusLogIntervalSeconds,
    }
  );

  const controlProcessor = new ControlProcessor({
    symbol: config.trackerSymbol,
    settings,
    alertState: alertEngine,
    statistics,
    notifier: telegram,
    settingsStore: databaseManager,
  });

  const commandPoller = new CommandPoller(telegram, controlProcessor, {
    pollIntervalMs: config.commandPollIntervalMs,
  });

  const streamClient = new TradeStreamClient({ url: config.tradeStreamUrl, symbol: config.trackerSymbol });

  const healthMonitor = new DataHealthMonitor({
    tradeStaleThresholdMs: config.tradeStaleThresholdMs,
  });

  bindStreamEvents({
    streamClient,
    tracker,
    healthMonitor,
    telegram,
    startupMessage: config.sendStartupMessage ? buildStartupMessage(config.trackerSymbol, settings.snapshot()) : null,
  });
  bindHealthMonitor(streamClient, healthMonitor);

  setupProcessHandlers({
    streamClient,
    commandPoller,
    alertManager,
    databaseManager,
    healthMonitor,
  });

  await commandPoller.start();
  healthMonitor.start();

  try {
    await streamClient.connect();
  } catch (error) {
    // the client keeps retrying after a failed first attempt
    logger.warn('Initial trade stream connection failed', error instanceof Error ? error.message : error);
  }

  logger.info('Volume spike tracker is running');
}

async function restoreSettings(settings: TunableSettings, databaseManager: DatabaseManager): Promise<void> {
  const persisted = await databaseManager.loadSettings();
  if (!persisted) {
    logger.info('No saved settings found, using defaults', settings.snapshot());
    return;
  }

  const rejected = settings.restore(persisted);
  for (const reason of rejected) {
    logger.warn(`Ignoring saved setting ${reason}`);
  }
  logger.info('Settings restored', settings.snapshot());
}

function bindStreamEvents(params: {
  streamClient: TradeStreamClient;
  tracker: VolumeTracker;
  healthMonitor: DataHealthMonitor;
  telegram: TelegramClient;
  startupMessage: string | null;
}): void {
  const { streamClient, tracker, healthMonitor, telegram, startupMessage } = params;
  let announced = false;

  streamClient.on('trade', (sample) => {
    healthMonitor.trackTrade();
    try {
      tracker.processTrade(sample);
    } catch (error) {
      logger.error('Failed to process trade', error);
    }
  });

  streamClient.on('connected', () => {
    healthMonitor.markWebsocketConnected();
    if (announced || startupMessage === null) {
      return;
    }
    announced = true;
    telegram
      .send(startupMessage)
      .then((delivered) => {
        if (!delivered) {
          logger.warn('Startup message could not be delivered');
        }
      })
      .catch((error) => logger.error('Failed to send startup message', error));
  });

  streamClient.on('disconnected', (info) => {
    logger.warn('Trade stream disconnected', info);
    healthMonitor.markWebsocketDisconnected();
  });

  streamClient.on('malformedMessage', (error) => logger.debug('Malformed trade frame', error.message));
  streamClient.on('error', (error) => logger.error('Trade stream client error', error.message));
}

function bindHealthMonitor(streamClient: TradeStreamClient, healthMonitor: DataHealthMonitor): void {
  const restart = (reason: string): void => {
    streamClient.reconnect(reason).catch((error) => {
      logger.error(`Failed to reconnect trade stream after ${reason}`, error);
    });
  };

  healthMonitor.on('systemResumeDetected', (payload) => {
    logger.warn('Detected potential system sleep or suspension', payload);
    restart('system resume detected');
  });

  healthMonitor.on('tradeDataStale', (payload) => {
    logger.warn('Trade data stream appears stale', payload);
    restart('trade data stale detected');
  });
}

function setupProcessHandlers(params: {
  streamClient: TradeStreamClient;
  commandPoller: CommandPoller;
  alertManager: AlertManager;
  databaseManager: DatabaseManager;
  healthMonitor: DataHealthMonitor;
}): void {
  const { streamClient, commandPoller, alertManager, databaseManager, healthMonitor } = params;
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    logger.info(`Shutdown initiated by signal: ${signal}`);

    healthMonitor.stop();

    try {
      await commandPoller.stop();
    } catch (error) {
      logger.error('Error while stopping command poller', error);
    }

    streamClient.disconnect();

    try {
      await alertManager.flush();
    } catch (error) {
      logger.error('Error while flushing pending alerts', error);
    }

    try {
      await databaseManager.closeDatabase();
    } catch (error) {
      logger.error('Error while closing database', error);
    }

    logger.info('Tracker shutdown complete');
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', reason);
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
  });
}

void bootstrap().catch((error) => {
  logger.error('Fatal error during tracker bootstrap', error);
  process.exit(1);
});
