import { Express } from 'express';
import { createApp, registerErrorHandler } from './src/server/create-app';
import { startServer } from './src/server/start-server';
import {
  PORT,
  IS_PRODUCTION,
  IS_TEST,
  REQUEST_TIMEOUT_MS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  TELEGRAM_WEBHOOK_URL,
  TELEGRAM_WEBHOOK_SECRET,
  requireBotToken,
} from './src/server/runtime';
import { createFetchWithTimeout } from './src/utils/http-client';
import { createWeatherService, WeatherService } from './src/utils/weather-service';
import { createTelegramClient } from './src/utils/telegram-client';
import { BOT_COMMANDS, createUpdateHandler, UpdateHandler } from './src/utils/bot-commands';
import { createUpdatePoller, UpdatePoller } from './src/utils/update-poller';
import { registerHealthRoutes } from './src/routes/health';
import { registerWeatherRoutes } from './src/routes/weather';
import { registerTelegramWebhookRoute } from './src/routes/telegram';

interface BuildAppOptions {
  weatherService: WeatherService;
  handleUpdate?: UpdateHandler;
  webhookSecret?: string;
}

export const buildApp = ({ weatherService, handleUpdate, webhookSecret }: BuildAppOptions): Express => {
  const app = createApp({
    isProduction: IS_PRODUCTION,
    corsAllowlist: CORS_ALLOWLIST,
    rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
  });

  registerHealthRoutes(app);
  registerWeatherRoutes({ app, weatherService });
  if (handleUpdate) {
    registerTelegramWebhookRoute({ app, handleUpdate, secretToken: webhookSecret });
  }
  registerErrorHandler(app);
  return app;
};

const main = async () => {
  console.log('Starting Singapore weather bot...');
  const token = requireBotToken();

  const fetchWithTimeout = createFetchWithTimeout(REQUEST_TIMEOUT_MS);
  const weatherService = createWeatherService({ fetchWithTimeout });
  const telegram = createTelegramClient({ token, fetchWithTimeout });
  const handleUpdate = createUpdateHandler({ telegram, weatherService });

  try {
    await telegram.setMyCommands(BOT_COMMANDS);
  } catch (error) {
    console.warn('[Telegram] could not register command list:', error instanceof Error ? error.message : error);
  }

  let poller: UpdatePoller | null = null;
  if (TELEGRAM_WEBHOOK_URL) {
    await telegram.setWebhook(TELEGRAM_WEBHOOK_URL, TELEGRAM_WEBHOOK_SECRET || undefined);
    console.log(`[Telegram] webhook registered at ${TELEGRAM_WEBHOOK_URL}`);
  } else {
    await telegram.deleteWebhook();
    const activePoller = createUpdatePoller({ telegram, handleUpdate });
    activePoller.start().catch((error) => console.error('[Poller] stopped unexpectedly:', error));
    poller = activePoller;
  }

  const app = buildApp({
    weatherService,
    handleUpdate: TELEGRAM_WEBHOOK_URL ? handleUpdate : undefined,
    webhookSecret: TELEGRAM_WEBHOOK_SECRET,
  });
  startServer({ app, port: PORT, onShutdown: () => poller?.stop() });
};

if (!IS_TEST) {
  main().catch((error) => {
    console.error('Failed to start:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
