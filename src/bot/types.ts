/**
 * Review Bot Type Definitions
 *
 * The subset of the Telegram Bot API the bot uses, plus the transport and
 * API seams the review driver depends on (faked in tests).
 */

import type {
  ReviewContactBody,
  ReviewContactResponse,
  SessionContactsResponse,
  UploadCsvResponse,
} from '../api/types.js';

// ---------------------------------------------------------------------------
// Telegram Bot API objects
// ---------------------------------------------------------------------------

export interface TelegramUser {
  id: number;
  first_name: string;
  username?: string;
}

export interface TelegramChat {
  id: number;
  type: string;
}

export interface TelegramDocument {
  file_id: string;
  file_name?: string;
  mime_type?: string;
  file_size?: number;
}

export interface TelegramMessage {
  message_id: number;
  chat: TelegramChat;
  from?: TelegramUser;
  text?: string;
  document?: TelegramDocument;
}

export interface TelegramCallbackQuery {
  id: string;
  from: TelegramUser;
  message?: TelegramMessage;
  data?: string;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
  callback_query?: TelegramCallbackQuery;
}

export interface InlineKeyboardButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboardMarkup {
  inline_keyboard: InlineKeyboardButton[][];
}

// ---------------------------------------------------------------------------
// Driver seams
// ---------------------------------------------------------------------------

/** What the review driver needs from the chat platform */
export interface ChatTransport {
  sendMessage(chatId: number, text: string, keyboard?: InlineKeyboardMarkup): Promise<void>;
  editMessage(chatId: number, messageId: number, text: string): Promise<void>;
  answerCallback(callbackQueryId: string, text?: string): Promise<void>;
  downloadFile(fileId: string): Promise<Buffer>;
}

/** What the review driver needs from the review API */
export interface ReviewApi {
  uploadCsv(fileName: string, bytes: Buffer): Promise<UploadCsvResponse>;
  getContacts(sessionId: string): Promise<SessionContactsResponse>;
  reviewContact(body: ReviewContactBody): Promise<ReviewContactResponse>;
}

/** The four choices offered for each contact */
export type ReviewAction = 'mailingList' | 'crm' | 'both' | 'skip';
