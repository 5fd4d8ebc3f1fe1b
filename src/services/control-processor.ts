/**
 * Control Processor
 * Parses operator commands, applies settings changes and renders status replies
 */

import { ControlCommand, SettingsSnapshot } from '../types';
import { AlertStateReader, INotificationSink, ISettingsStore } from './interfaces';
import { SettingsValidationError, TunableSettings } from './tunable-settings';
import { TrackerStatistics } from './tracker-statistics';
import {
  ReportContext,
  buildHelpMessage,
  buildStatsReport,
  buildStatusReport,
  buildTestMessage,
  formatUsd,
} from './message-formatter';
import { logger } from '../utils/logger';

type NumericCommandKind = 'SetZThreshold' | 'SetVolumeRatio' | 'SetCooldown' | 'SetWhaleThreshold';

interface NumericCommandDefinition {
  kind: NumericCommandKind;
  integer: boolean;
  usage: string;
}

const NUMERIC_COMMANDS: Record<string, NumericCommandDefinition> = {
  '/z': { kind: 'SetZThreshold', integer: false, usage: '/z 3.5' },
  '/vol': { kind: 'SetVolumeRatio', integer: false, usage: '/vol 2.5' },
  '/cooldown': { kind: 'SetCooldown', integer: true, usage: '/cooldown 60' },
  '/whale': { kind: 'SetWhaleThreshold', integer: false, usage: '/whale 100000' },
};

const SIMPLE_COMMANDS: Record<string, ControlCommand> = {
  '/status': { kind: 'GetStatus' },
  '/start': { kind: 'GetStatus' },
  '/stats': { kind: 'GetStats' },
  '/pause': { kind: 'Pause' },
  '/resume': { kind: 'Resume' },
  '/help': { kind: 'Help' },
  '/test': { kind: 'SendTest' },
};

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse one line of operator text. Matching is case-insensitive and ignores a
 * trailing `@botname` on the command word.
 */
export function parseCommand(text: string): ControlCommand {
  const normalized = text.trim().toLowerCase();
  const [rawWord = '', ...args] = normalized.split(/\s+/);
  const word = rawWord.replace(/@\S*$/, '');

  const simple = SIMPLE_COMMANDS[word];
  if (simple) {
    return args.length === 0 ? simple : { kind: 'Unrecognized', text };
  }

  const numeric = NUMERIC_COMMANDS[word];
  if (!numeric) {
    return { kind: 'Unrecognized', text };
  }

  const [argument] = args;
  const pattern = numeric.integer ? INTEGER_PATTERN : NUMBER_PATTERN;
  if (argument === undefined || !pattern.test(argument)) {
    return { kind: 'InvalidArgument', usage: numeric.usage };
  }

  const value = Number(argument);
  if (!Number.isFinite(value)) {
    return { kind: 'InvalidArgument', usage: numeric.usage };
  }

  return { kind: numeric.kind, value };
}

export interface ControlProcessorDependencies {
  symbol: string;
  settings: TunableSettings;
  alertState: AlertStateReader;
  statistics: TrackerStatistics;
  notifier: INotificationSink;
  settingsStore?: ISettingsStore;
  clock?: () => number;
}

const log = logger.child('ControlProcessor');

export class ControlProcessor {
  private readonly symbol: string;
  private readonly settings: TunableSettings;
  private readonly alertState: AlertStateReader;
  private readonly statistics: TrackerStatistics;
  private readonly notifier: INotificationSink;
  private readonly settingsStore: ISettingsStore | null;
  private readonly clock: () => number;

  constructor(dependencies: ControlProcessorDependencies) {
    this.symbol = dependencies.symbol;
    this.settings = dependencies.settings;
    this.alertState = dependencies.alertState;
    this.statistics = dependencies.statistics;
    this.notifier = dependencies.notifier;
    this.settingsStore = dependencies.settingsStore ?? null;
    this.clock = dependencies.clock ?? (() => Date.now() / 1000);
  }

  /**
   * Parse, apply and answer one operator text line. Unrecognized text gets no reply.
   */
  async handle(text: string): Promise<ControlCommand> {
    const command = parseCommand(text);
    const reply = await this.execute(command);

    if (reply !== null) {
      const delivered = await this.notifier.send(reply);
      if (!delivered) {
        log.warn(`Reply to ${command.kind} could not be delivered`);
      }
    } else {
      log.debug('Ignoring unrecognized command text', { text });
    }

    return command;
  }

  /**
   * Apply a parsed command and return the reply text, or null when nothing should be sent
   */
  async execute(command: ControlCommand): Promise<string | null> {
    switch (command.kind) {
      case 'GetStatus':
        return buildStatusReport(this.reportContext());
      case 'GetStats':
        return buildStatsReport(this.reportContext());
      case 'Help':
        return buildHelpMessage();
      case 'SendTest':
        return buildTestMessage(this.clock());
      case 'InvalidArgument':
        return `❌ Usage: ${command.usage}`;
      case 'Unrecognized':
        return null;
      case 'Pause':
        await this.persist(this.settings.setPaused(true));
        log.info('Alerts paused by operator');
        return '⏸️ Alerts paused. Use /resume to continue.';
      case 'Resume':
        await this.persist(this.settings.setPaused(false));
        log.info('Alerts resumed by operator');
        return '▶️ Alerts resumed!';
      case 'SetZThreshold':
        return this.applySetting(
          () => this.settings.setZThreshold(command.value),
          `✅ Z-score threshold set to: ${command.value}`
        );
      case 'SetVolumeRatio':
        return this.applySetting(
          () => this.settings.setVolumeRatioThreshold(command.value),
          `✅ Volume multiplier set to: ${command.value}x`
        );
      case 'SetCooldown':
        return this.applySetting(
          () => this.settings.setCooldownSeconds(command.value),
          `✅ Cooldown set to: ${command.value} seconds`
        );
      case 'SetWhaleThreshold':
        return this.applySetting(
          () => this.settings.setWhaleThreshold(command.value),
          `✅ Whale threshold set to: ${formatUsd(command.value)}`
        );
    }
  }

  private async applySetting(apply: () => SettingsSnapshot, confirmation: string): Promise<string> {
    let updated: SettingsSnapshot;
    try {
      updated = apply();
    } catch (error) {
      if (error instanceof SettingsValidationError) {
        log.info('Rejected settings change', { field: error.field, reason: error.message });
        return `❌ ${error.message}`;
      }
      throw error;
    }

    log.info('Settings updated', updated);
    await this.persist(updated);
    return confirmation;
  }

  private async persist(settings: SettingsSnapshot): Promise<void> {
    if (!this.settingsStore) {
      return;
    }

    try {
      await this.settingsStore.saveSettings(settings);
      log.debug('Settings saved');
    } catch (error) {
      log.error('Failed to persist settings', error);
    }
  }

  private reportContext(): ReportContext {
    return {
      symbol: this.symbol,
      settings: this.settings.snapshot(),
      alertState: this.alertState.getState(),
      observation: this.statistics.getLastObservation(),
      startedAt: this.statistics.startedAt,
      now: this.clock(),
    };
  }
}
