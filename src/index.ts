/**
 * Application Entry Point
 *
 * Starts the review API and, when TELEGRAM_TOKEN is set, the review bot in
 * the same process. The bot reaches the API over HTTP at API_BASE_URL.
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop the bot poller (waits for in-flight updates)
 * 2. Stop accepting new HTTP connections
 * 3. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { createApp } from './api/server.js';
import { botConfig, ReviewApiClient, ReviewDriver, startBotPoller, TelegramClient } from './bot/index.js';
import type { BotPoller } from './bot/index.js';
import { appConfig } from './config.js';
import { logEnrollmentTargets } from './enrollment/index.js';

async function main() {
  console.log('[startup] Contact review service starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Sessions:', {
    ttlMinutes: appConfig.sessions.ttlMs / 60_000,
    maxCount: appConfig.sessions.maxCount,
  });
  logEnrollmentTargets();

  const app = createApp();
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  let poller: BotPoller | null = null;
  if (botConfig.enabled) {
    const telegram = new TelegramClient(botConfig.token);
    const driver = new ReviewDriver(telegram, new ReviewApiClient(botConfig.apiBaseUrl));
    poller = startBotPoller(telegram, driver, { timeoutSeconds: botConfig.pollTimeoutSeconds });
    console.log('[startup] Review bot started', { apiBaseUrl: botConfig.apiBaseUrl });
  } else {
    console.log('[startup] Review bot disabled (TELEGRAM_TOKEN not set)');
  }

  const shutdown = async (signal: string) => {
    console.log(`[shutdown] Received ${signal} — shutting down gracefully...`);

    if (poller) {
      await poller.stop();
    }

    server.close(() => {
      console.log('[shutdown] HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err: Error) => {
      console.error('[shutdown] Failed:', err.message);
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err: Error) => {
      console.error('[shutdown] Failed:', err.message);
      process.exit(1);
    });
  });
}

main().catch((err: Error) => {
  console.error('[startup] Fatal error:', err.message);
  process.exit(1);
});
