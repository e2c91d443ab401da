import { TelegramClient } from './telegram-client';
import { UpdateHandler } from './bot-commands';
import { backoffDelayMs, sleep as defaultSleep, Sleep } from './weather-service';

interface CreateUpdatePollerOptions {
  telegram: TelegramClient;
  handleUpdate: UpdateHandler;
  timeoutSeconds?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  sleep?: Sleep;
}

export interface UpdatePoller {
  /** Resolves once the loop has stopped. */
  start: () => Promise<void>;
  stop: () => void;
  pollOnce: () => Promise<number>;
}

export const createUpdatePoller = ({
  telegram,
  handleUpdate,
  timeoutSeconds = 30,
  retryBaseDelayMs = 1000,
  retryMaxDelayMs = 30 * 1000,
  sleep = defaultSleep,
}: CreateUpdatePollerOptions): UpdatePoller => {
  let offset: number | undefined;
  let running = false;
  let controller = new AbortController();

  // Updates are handled one at a time so replies to a chat keep their order.
  const pollOnce = async (): Promise<number> => {
    const updates = await telegram.getUpdates({ offset, timeoutSeconds, signal: controller.signal });
    for (const update of updates) {
      offset = update.update_id + 1;
      await handleUpdate(update);
    }
    return updates.length;
  };

  const start = async () => {
    running = true;
    controller = new AbortController();
    let failures = 0;
    console.log('[Poller] polling for updates...');
    while (running) {
      try {
        await pollOnce();
        failures = 0;
      } catch (error) {
        if (!running) {
          break;
        }
        const delay = backoffDelayMs(failures, { baseDelayMs: retryBaseDelayMs, maxDelayMs: retryMaxDelayMs });
        failures += 1;
        console.error(`[Poller] getUpdates failed, retrying in ${delay}ms:`, error instanceof Error ? error.message : error);
        await sleep(delay);
      }
    }
    console.log('[Poller] stopped');
  };

  const stop = () => {
    running = false;
    controller.abort();
  };

  return { start, stop, pollOnce };
};
