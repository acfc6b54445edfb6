/**
 * Review Bot Configuration
 *
 * Environment variables:
 * - TELEGRAM_TOKEN: Bot API token; the bot does not start without it
 * - API_BASE_URL: Where the bot reaches the review API (default http://localhost:{PORT})
 * - BOT_POLL_TIMEOUT_SECONDS: Long-poll timeout for getUpdates (default 30)
 */

import 'dotenv/config';
import { appConfig, intEnv, optionalEnv } from '../config.js';

export interface BotConfig {
  enabled: boolean;
  token: string;
  apiBaseUrl: string;
  pollTimeoutSeconds: number;
}

const token = optionalEnv('TELEGRAM_TOKEN');

export const botConfig: BotConfig = {
  enabled: token !== '',
  token,
  apiBaseUrl: optionalEnv('API_BASE_URL', `http://localhost:${appConfig.server.port}`).replace(/\/+$/, ''),
  pollTimeoutSeconds: intEnv('BOT_POLL_TIMEOUT_SECONDS', 30),
};
