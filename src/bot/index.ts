// ============================================================================
// Review Bot Module — Barrel Export
// ============================================================================
//
// Chat front end for the review API. It is only a client of the HTTP API:
// nothing in the API depends on this module.

export { botConfig } from './config.js';
export type { BotConfig } from './config.js';

export { TelegramClient } from './telegram-client.js';
export { ReviewApiClient } from './api-client.js';
export { ReviewDriver } from './review-driver.js';
export { startBotPoller } from './poller.js';
export type { BotPoller, UpdateSource } from './poller.js';
export { TelegramApiError, ReviewApiError } from './errors.js';

export type { ChatTransport, ReviewApi, ReviewAction, TelegramUpdate } from './types.js';
