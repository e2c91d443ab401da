import {
  MAX_RETRIES,
  RAINFALL_API_URL,
  REQUEST_TIMEOUT_MS,
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_DELAY_MS,
  WIND_DIRECTION_API_URL,
  WIND_SPEED_API_URL,
} from '../server/runtime';
import { DEFAULT_FETCH_HEADERS, FetchWithTimeout, isAbortError } from './http-client';
import { decodeSourcePayload, METRIC_LABELS, MetricKey, SourcePayload, WeatherSnapshot } from './payload';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: MAX_RETRIES,
  baseDelayMs: RETRY_BASE_DELAY_MS,
  maxDelayMs: RETRY_MAX_DELAY_MS,
};

export const backoffDelayMs = (attempt: number, { baseDelayMs, maxDelayMs }: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number =>
  Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);

export interface FetchSourceOptions {
  fetchWithTimeout: FetchWithTimeout;
  label?: string;
  retryPolicy?: RetryPolicy;
  timeoutMs?: number;
  sleep?: Sleep;
}

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * GETs one real-time endpoint. Transport failures, timeouts, non-2xx statuses
 * and unreadable JSON are retried with capped exponential backoff; a non-zero
 * `code` in the body ends the call at once. Resolves to null when the source
 * is unusable and never rejects.
 */
export const fetchSourcePayload = async (
  url: string,
  {
    fetchWithTimeout,
    label = url,
    retryPolicy = DEFAULT_RETRY_POLICY,
    timeoutMs = REQUEST_TIMEOUT_MS,
    sleep: wait = sleep,
  }: FetchSourceOptions,
): Promise<SourcePayload | null> => {
  const attempts = Math.max(1, retryPolicy.maxRetries);
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    const attemptLabel = `attempt ${attempt + 1}/${attempts}`;
    try {
      const response = await fetchWithTimeout(url, { headers: DEFAULT_FETCH_HEADERS }, timeoutMs);
      if (!response.ok) {
        console.warn(`[${label}] HTTP ${response.status} for ${url}, ${attemptLabel}`);
      } else {
        const decoded = decodeSourcePayload(await response.json());
        if (decoded.kind === 'ok') {
          return decoded.payload;
        }
        if (decoded.kind === 'api-error') {
          console.error(`[${label}] API returned error code ${decoded.code}${decoded.message ? `: ${decoded.message}` : ''}`);
        } else {
          console.error(`[${label}] malformed payload from ${url}: ${decoded.message}`);
        }
        return null;
      }
    } catch (error) {
      if (isAbortError(error)) {
        console.warn(`[${label}] timeout for ${url}, ${attemptLabel}`);
      } else {
        console.warn(`[${label}] request to ${url} failed: ${describeError(error)}, ${attemptLabel}`);
      }
    }

    if (attempt < attempts - 1) {
      await wait(backoffDelayMs(attempt, retryPolicy));
    }
  }

  console.error(`[${label}] giving up on ${url} after ${attempts} attempts`);
  return null;
};

export const settledPayload = (
  metric: MetricKey,
  result: PromiseSettledResult<SourcePayload | null>,
): SourcePayload | null => {
  if (result.status === 'fulfilled') {
    return result.value;
  }
  console.error(`[${METRIC_LABELS[metric]}] fetch failed:`, describeError(result.reason));
  return null;
};

export const DEFAULT_SOURCE_URLS: Record<MetricKey, string> = {
  rainfall: RAINFALL_API_URL,
  windSpeed: WIND_SPEED_API_URL,
  windDirection: WIND_DIRECTION_API_URL,
};

export type PayloadFetcher = (url: string, options: FetchSourceOptions) => Promise<SourcePayload | null>;

interface CreateWeatherServiceOptions {
  fetchWithTimeout: FetchWithTimeout;
  urls?: Record<MetricKey, string>;
  retryPolicy?: RetryPolicy;
  timeoutMs?: number;
  sleep?: Sleep;
  fetchPayload?: PayloadFetcher;
}

export interface WeatherService {
  fetchSource: (metric: MetricKey) => Promise<SourcePayload | null>;
  fetchWind: () => Promise<Pick<WeatherSnapshot, 'windSpeed' | 'windDirection'>>;
  fetchAll: () => Promise<WeatherSnapshot>;
}

export const createWeatherService = ({
  fetchWithTimeout,
  urls = DEFAULT_SOURCE_URLS,
  retryPolicy,
  timeoutMs,
  sleep: wait,
  fetchPayload = fetchSourcePayload,
}: CreateWeatherServiceOptions): WeatherService => {
  const fetchSource = async (metric: MetricKey): Promise<SourcePayload | null> => {
    console.log(`[${METRIC_LABELS[metric]}] fetching ${urls[metric]}`);
    return fetchPayload(urls[metric], {
      fetchWithTimeout,
      label: METRIC_LABELS[metric],
      retryPolicy,
      timeoutMs,
      sleep: wait,
    });
  };

  // Each source retries on its own; one failing slot never holds up or cancels the others.
  const fetchAll = async (): Promise<WeatherSnapshot> => {
    const [rainfall, windSpeed, windDirection] = await Promise.allSettled([
      fetchSource('rainfall'),
      fetchSource('windSpeed'),
      fetchSource('windDirection'),
    ]);
    return {
      rainfall: settledPayload('rainfall', rainfall),
      windSpeed: settledPayload('windSpeed', windSpeed),
      windDirection: settledPayload('windDirection', windDirection),
    };
  };

  const fetchWind = async (): Promise<Pick<WeatherSnapshot, 'windSpeed' | 'windDirection'>> => {
    const [windSpeed, windDirection] = await Promise.allSettled([fetchSource('windSpeed'), fetchSource('windDirection')]);
    return {
      windSpeed: settledPayload('windSpeed', windSpeed),
      windDirection: settledPayload('windDirection', windDirection),
    };
  };

  return { fetchSource, fetchWind, fetchAll };
};
