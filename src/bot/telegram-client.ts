/**
 * Telegram Bot API Client
 *
 * Minimal fetch-based client for the Bot API methods the review bot uses.
 * Every call is a JSON POST to https://api.telegram.org/bot<token>/<method>;
 * replies are unwrapped from Telegram's { ok, result, description } envelope.
 *
 * Security: the token is part of every URL, so URLs are never logged and
 * errors carry only the method name and Telegram's description.
 */

import { TelegramApiError } from './errors.js';
import type { ChatTransport, InlineKeyboardMarkup, TelegramUpdate } from './types.js';

const TELEGRAM_API_BASE = 'https://api.telegram.org';
const REQUEST_TIMEOUT_MS = 15_000;

interface TelegramEnvelope<T> {
  ok: boolean;
  result?: T;
  description?: string;
}

interface TelegramFile {
  file_id: string;
  file_path?: string;
}

export class TelegramClient implements ChatTransport {
  private readonly token: string;

  constructor(token: string) {
    this.token = token;
  }

  /**
   * Long-polls for updates after `offset`. The request stays open up to
   * `timeoutSeconds`; `signal` aborts it early (shutdown).
   */
  async getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    return this.call<TelegramUpdate[]>(
      'getUpdates',
      { offset, timeout: timeoutSeconds, allowed_updates: ['message', 'callback_query'] },
      { signal, timeoutMs: (timeoutSeconds + 10) * 1000 },
    );
  }

  async sendMessage(chatId: number, text: string, keyboard?: InlineKeyboardMarkup): Promise<void> {
    await this.call('sendMessage', {
      chat_id: chatId,
      text,
      ...(keyboard ? { reply_markup: keyboard } : {}),
    });
  }

  async editMessage(chatId: number, messageId: number, text: string): Promise<void> {
    await this.call('editMessageText', { chat_id: chatId, message_id: messageId, text });
  }

  async answerCallback(callbackQueryId: string, text?: string): Promise<void> {
    await this.call('answerCallbackQuery', {
      callback_query_id: callbackQueryId,
      ...(text ? { text } : {}),
    });
  }

  /** Resolves a file id via getFile, then downloads its bytes */
  async downloadFile(fileId: string): Promise<Buffer> {
    const file = await this.call<TelegramFile>('getFile', { file_id: fileId });
    if (!file.file_path) {
      throw new TelegramApiError('getFile', 200, 'File is not available for download');
    }

    const response = await fetch(`${TELEGRAM_API_BASE}/file/bot${this.token}/${file.file_path}`, {
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new TelegramApiError('downloadFile', response.status, response.statusText);
    }

    return Buffer.from(await response.arrayBuffer());
  }

  private async call<T>(
    method: string,
    params: Record<string, unknown>,
    options: { signal?: AbortSignal; timeoutMs?: number } = {},
  ): Promise<T> {
    const timeout = AbortSignal.timeout(options.timeoutMs ?? REQUEST_TIMEOUT_MS);

    const response = await fetch(`${TELEGRAM_API_BASE}/bot${this.token}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(params),
      signal: options.signal ? AbortSignal.any([options.signal, timeout]) : timeout,
    });

    const data = (await response.json()) as TelegramEnvelope<T>;

    if (!response.ok || !data.ok || data.result === undefined) {
      throw new TelegramApiError(method, response.status, data.description ?? 'No description');
    }

    return data.result;
  }
}
