import dotenv from 'dotenv';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const readUrl = (rawValue: string | undefined, fallback: string): string => {
  const trimmed = (rawValue || '').trim();
  return trimmed || fallback;
};

export const PORT = parsePositiveInt(process.env.PORT, 8080);
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const IS_TEST = process.env.NODE_ENV === 'test';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 10 * 1000);
export const MAX_RETRIES = parsePositiveInt(process.env.MAX_RETRIES, 3);
export const RETRY_BASE_DELAY_MS = parsePositiveInt(process.env.RETRY_BASE_DELAY_MS, 1000);
export const RETRY_MAX_DELAY_MS = parsePositiveInt(process.env.RETRY_MAX_DELAY_MS, 8 * 1000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);

export const RAINFALL_API_URL = readUrl(process.env.RAINFALL_API_URL, 'https://api-open.data.gov.sg/v2/real-time/api/rainfall');
export const WIND_SPEED_API_URL = readUrl(process.env.WIND_SPEED_API_URL, 'https://api-open.data.gov.sg/v2/real-time/api/wind-speed');
export const WIND_DIRECTION_API_URL = readUrl(
  process.env.WIND_DIRECTION_API_URL,
  'https://api-open.data.gov.sg/v2/real-time/api/wind-direction',
);

export const TELEGRAM_BOT_TOKEN = (process.env.TELEGRAM_BOT_TOKEN || '').trim();
export const TELEGRAM_WEBHOOK_URL = (process.env.TELEGRAM_WEBHOOK_URL || '').trim();
export const TELEGRAM_WEBHOOK_SECRET = (process.env.TELEGRAM_WEBHOOK_SECRET || '').trim();

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);

export const requireBotToken = (token: string = TELEGRAM_BOT_TOKEN): string => {
  if (!token.trim()) {
    throw new Error('Bot token is required. Set the TELEGRAM_BOT_TOKEN environment variable.');
  }
  return token.trim();
};
