import { EventEmitter } from 'events';
import { ICommandSource } from './interfaces';
import { ControlProcessor } from './control-processor';
import { ControlCommand } from '../types';
import { logger } from '../utils/logger';

export interface CommandPollerOptions {
  pollIntervalMs?: number;
}

export declare interface CommandPoller {
  on(event: 'commandHandled', listener: (command: ControlCommand) => void): this;
  on(event: 'pollFailed', listener: (error: Error) => void): this;
}

const log = logger.child('CommandPoller');

/**
 * Control loop: polls the command source on a fixed interval and feeds each line
 * to the control processor. Failures are logged and the next cycle proceeds.
 */
export class CommandPoller extends EventEmitter {
  private readonly pollIntervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private processing = false;
  private consecutiveFailures = 0;
  private waiters: Array<() => void> = [];

  constructor(
    private readonly source: ICommandSource,
    private readonly processor: ControlProcessor,
    options: CommandPollerOptions = {}
  ) {
    super();
    this.pollIntervalMs = Math.max(100, Math.floor(options.pollIntervalMs ?? 2000));
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    await this.pollOnce();
    this.scheduleNext();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.processing) {
      await this.waitForIdle();
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  private scheduleNext(): void {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.pollOnce().finally(() => {
        this.scheduleNext();
      });
    }, this.pollIntervalMs);
  }

  /**
   * Run one poll cycle. Never rejects.
   */
  async pollOnce(): Promise<void> {
    if (!this.running || this.processing) {
      return;
    }
    this.processing = true;
    try {
      let commands: string[];
      try {
        commands = await this.source.fetchCommands();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        // warn once per failure streak
        if (this.consecutiveFailures === 0) {
          log.warn('Command poll failed', err.message);
        } else {
          log.debug('Command poll failed', err.message);
        }
        this.consecutiveFailures++;
        this.emit('pollFailed', err);
        return;
      }

      if (this.consecutiveFailures > 0) {
        log.info(`Command polling recovered after ${this.consecutiveFailures} failed attempts`);
        this.consecutiveFailures = 0;
      }

      for (const text of commands) {
        try {
          const command = await this.processor.handle(text);
          this.emit('commandHandled', command);
        } catch (error) {
          log.error('Failed to handle operator command', error);
        }
      }
    } finally {
      this.processing = false;
      this.notifyIdle();
    }
  }

  private waitForIdle(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.processing) {
        resolve();
        return;
      }
      this.waiters.push(resolve);
    });
  }

  private notifyIdle(): void {
    while (this.waiters.length > 0) {
      const resolve = this.waiters.shift();
      resolve?.();
    }
  }
}
