/**
 * Review Bot Poller
 *
 * Long-polls Telegram for updates and hands each one to the review driver.
 * Updates are handled concurrently so one reviewer's slow enrollment call
 * does not hold up everyone else; the offset advances as soon as an update
 * is accepted (Telegram will not redeliver it).
 *
 * stop() aborts the open long-poll and waits for in-flight updates.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { describeError } from '../sanitize.js';
import type { ReviewDriver } from './review-driver.js';
import type { TelegramUpdate } from './types.js';

const RETRY_DELAY_MS = 5_000;

/** The part of TelegramClient the poller uses */
export interface UpdateSource {
  getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]>;
}

export interface BotPoller {
  stop(): Promise<void>;
}

export function startBotPoller(
  source: UpdateSource,
  driver: ReviewDriver,
  options: { timeoutSeconds: number; retryDelayMs?: number },
): BotPoller {
  const controller = new AbortController();
  const inFlight = new Set<Promise<void>>();
  let offset = 0;

  const accept = (update: TelegramUpdate) => {
    const task: Promise<void> = driver
      .handleUpdate(update)
      .catch((error: unknown) => {
        console.error('[bot] Update handling failed', {
          updateId: update.update_id,
          error: describeError(error),
        });
      })
      .finally(() => {
        inFlight.delete(task);
      });
    inFlight.add(task);
  };

  const loop = async () => {
    console.log('[bot] Polling for updates');

    while (!controller.signal.aborted) {
      let updates: TelegramUpdate[];
      try {
        updates = await source.getUpdates(offset, options.timeoutSeconds, controller.signal);
      } catch (error) {
        if (controller.signal.aborted) break;
        console.error('[bot] getUpdates failed, retrying', {
          error: describeError(error),
        });
        try {
          await sleep(options.retryDelayMs ?? RETRY_DELAY_MS, undefined, { signal: controller.signal });
        } catch (sleepError) {
          if (!controller.signal.aborted) throw sleepError;
        }
        continue;
      }

      for (const update of updates) {
        offset = Math.max(offset, update.update_id + 1);
        accept(update);
      }
    }
  };

  const running = loop();

  return {
    async stop() {
      controller.abort();
      await running;
      await Promise.all([...inFlight]);
      console.log('[bot] Poller stopped');
    },
  };
}
