import { decodeSourcePayload, MetricKey, SourcePayload, WeatherSnapshot } from '../src/utils/payload';
import { TelegramClient } from '../src/utils/telegram-client';
import { WeatherService } from '../src/utils/weather-service';

export const READING_TIME = '2026-03-14T14:05:00+08:00';
export const READING_TIME_DISPLAY = '14 Mar 2026, 02:05 PM SGT';

export const rawStation = (id: string, name: string, latitude = 1.3, longitude = 103.8) => ({
  id,
  deviceId: id,
  name,
  location: { latitude, longitude },
});

interface RawBodyOptions {
  stations: ReturnType<typeof rawStation>[];
  values: Array<[string, number | null]>;
  timestamp?: string;
  readingUnit?: string;
}

export const rawBody = ({ stations, values, timestamp = READING_TIME, readingUnit = 'mm' }: RawBodyOptions) => ({
  code: 0,
  errorMsg: '',
  data: {
    stations,
    readings: [{ timestamp, data: values.map(([stationId, value]) => ({ stationId, value })) }],
    readingType: 'test reading',
    readingUnit,
  },
});

export const toPayload = (body: unknown): SourcePayload => {
  const decoded = decodeSourcePayload(body);
  if (decoded.kind !== 'ok') {
    throw new Error(`fixture did not decode: ${decoded.kind}`);
  }
  return decoded.payload;
};

export const rainfallBody = () =>
  rawBody({
    stations: [
      rawStation('S108', 'Marina Gardens Drive'),
      rawStation('S60', 'Sentosa'),
      rawStation('S50', 'Clementi Road'),
      rawStation('S33', 'Jurong Pier Road'),
    ],
    values: [
      ['S108', 0.2],
      ['S60', 0],
      ['S50', 12.4],
      ['S33', null],
    ],
  });

export const windSpeedBody = () =>
  rawBody({
    stations: [rawStation('S108', 'Marina Gardens Drive'), rawStation('S60', 'Sentosa'), rawStation('S115', 'Tuas South Avenue 3')],
    values: [
      ['S108', 5.4],
      ['S60', 12.1],
      ['S115', 30],
    ],
    readingUnit: 'knots',
  });

export const windDirectionBody = () =>
  rawBody({
    stations: [rawStation('S108', 'Marina Gardens Drive'), rawStation('S60', 'Sentosa'), rawStation('S24', 'Upper Changi Road North')],
    values: [
      ['S108', 135],
      ['S60', 350],
      ['S24', null],
    ],
    readingUnit: 'degrees',
  });

export const fullSnapshot = (): WeatherSnapshot => ({
  rainfall: toPayload(rainfallBody()),
  windSpeed: toPayload(windSpeedBody()),
  windDirection: toPayload(windDirectionBody()),
});

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

export const createFakeWeatherService = (snapshot: WeatherSnapshot) => {
  const service = {
    fetchSource: jest.fn(async (metric: MetricKey) => snapshot[metric]),
    fetchWind: jest.fn(async () => ({ windSpeed: snapshot.windSpeed, windDirection: snapshot.windDirection })),
    fetchAll: jest.fn(async () => snapshot),
  } satisfies WeatherService;
  return service;
};

export const createFakeTelegram = () =>
  ({
    sendMessage: jest.fn<ReturnType<TelegramClient['sendMessage']>, Parameters<TelegramClient['sendMessage']>>().mockResolvedValue(undefined),
    editMessageText: jest
      .fn<ReturnType<TelegramClient['editMessageText']>, Parameters<TelegramClient['editMessageText']>>()
      .mockResolvedValue(undefined),
    answerCallbackQuery: jest
      .fn<ReturnType<TelegramClient['answerCallbackQuery']>, Parameters<TelegramClient['answerCallbackQuery']>>()
      .mockResolvedValue(undefined),
    getUpdates: jest.fn<ReturnType<TelegramClient['getUpdates']>, Parameters<TelegramClient['getUpdates']>>().mockResolvedValue([]),
    setMyCommands: jest
      .fn<ReturnType<TelegramClient['setMyCommands']>, Parameters<TelegramClient['setMyCommands']>>()
      .mockResolvedValue(undefined),
    setWebhook: jest.fn<ReturnType<TelegramClient['setWebhook']>, Parameters<TelegramClient['setWebhook']>>().mockResolvedValue(undefined),
    deleteWebhook: jest
      .fn<ReturnType<TelegramClient['deleteWebhook']>, Parameters<TelegramClient['deleteWebhook']>>()
      .mockResolvedValue(undefined),
  }) satisfies TelegramClient;

export const silenceConsole = () => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
};
