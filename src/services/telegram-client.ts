/**
 * Telegram Bot API client
 * Outbound notification sink (sendMessage) and inbound operator command source (getUpdates)
 */

import axios, { AxiosRequestConfig, AxiosResponse } from 'axios';
import { ICommandSource, INotificationSink } from './interfaces';
import { logger } from '../utils/logger';

export interface HttpClient {
  post(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<AxiosResponse<unknown>>;
  get(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse<unknown>>;
}

export interface TelegramClientOptions {
  botToken: string;
  chatId: string;
  apiUrl?: string;
  requestTimeoutMs?: number;
  pollTimeoutSeconds?: number;
  parseMode?: 'HTML' | 'MarkdownV2';
  httpClient?: HttpClient;
}

export interface TelegramUpdate {
  updateId: number;
  text: string | null;
}

const log = logger.child('Telegram');

/**
 * Extract update ids and message texts from a getUpdates response body.
 * Entries without a numeric update_id are dropped.
 */
export function parseUpdates(body: unknown): TelegramUpdate[] {
  if (typeof body !== 'object' || body === null || !('ok' in body) || body.ok !== true) {
    return [];
  }
  if (!('result' in body) || !Array.isArray(body.result)) {
    return [];
  }

  const entries: unknown[] = body.result;
  const updates: TelegramUpdate[] = [];
  for (const entry of entries) {
    if (typeof entry !== 'object' || entry === null || !('update_id' in entry)) {
      continue;
    }
    const updateId = entry.update_id;
    if (typeof updateId !== 'number') {
      continue;
    }

    let text: string | null = null;
    if ('message' in entry && typeof entry.message === 'object' && entry.message !== null) {
      const message = entry.message;
      if ('text' in message && typeof message.text === 'string') {
        text = message.text;
      }
    }

    updates.push({ updateId, text });
  }

  return updates;
}

function isOkBody(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'ok' in body && body.ok === true;
}

/**
 * Summarize a request failure without the request URL, which carries the bot token
 */
export function describeRequestError(error: unknown): unknown {
  if (axios.isAxiosError(error)) {
    const body: unknown = error.response?.data;
    const description =
      typeof body === 'object' && body !== null && 'description' in body ? body.description : undefined;
    return {
      message: error.message,
      code: error.code,
      status: error.response?.status,
      description,
    };
  }
  return error;
}

export class TelegramClient implements INotificationSink, ICommandSource {
  private readonly baseUrl: string;
  private readonly chatId: string;
  private readonly requestTimeoutMs: number;
  private readonly pollTimeoutSeconds: number;
  private readonly parseMode: 'HTML' | 'MarkdownV2';
  private readonly httpClient: HttpClient;
  private lastUpdateId = 0;

  constructor(options: TelegramClientOptions) {
    const apiUrl = (options.apiUrl ?? 'https://api.telegram.org').replace(/\/+$/, '');
    this.baseUrl = `${apiUrl}/bot${options.botToken}`;
    this.chatId = options.chatId;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000;
    this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? 1;
    this.parseMode = options.parseMode ?? 'HTML';
    this.httpClient = options.httpClient ?? axios;
  }

  /**
   * Send a message to the configured chat. Resolves false on any failure.
   */
  async send(text: string): Promise<boolean> {
    const payload = {
      chat_id: this.chatId,
      text,
      parse_mode: this.parseMode,
      disable_web_page_preview: true,
    };

    try {
      const response = await this.httpClient.post(`${this.baseUrl}/sendMessage`, payload, {
        timeout: this.requestTimeoutMs,
      });

      if (!isOkBody(response.data)) {
        log.error('Telegram rejected message', { status: response.status, body: response.data });
        return false;
      }

      log.debug('Telegram message delivered', { status: response.status });
      return true;
    } catch (error) {
      log.error('Failed to send Telegram message', describeRequestError(error));
      return false;
    }
  }

  /**
   * Fetch command texts received since the previous call. Rejects on transport failure;
   * the offset only advances past updates that were actually returned.
   */
  async fetchCommands(): Promise<string[]> {
    const response = await this.httpClient.get(`${this.baseUrl}/getUpdates`, {
      params: {
        offset: this.lastUpdateId + 1,
        timeout: this.pollTimeoutSeconds,
        allowed_updates: JSON.stringify(['message']),
      },
      timeout: this.requestTimeoutMs + this.pollTimeoutSeconds * 1000,
    });

    const commands: string[] = [];
    for (const update of parseUpdates(response.data)) {
      if (update.updateId > this.lastUpdateId) {
        this.lastUpdateId = update.updateId;
      }
      if (update.text !== null) {
        commands.push(update.text);
      }
    }

    return commands;
  }

  getLastUpdateId(): number {
    return this.lastUpdateId;
  }
}
