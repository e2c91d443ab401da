import { z } from 'zod';

export const SUCCESS_CODE = 0;

export const METRIC_KEYS = ['rainfall', 'windSpeed', 'windDirection'] as const;
export type MetricKey = (typeof METRIC_KEYS)[number];

export const METRIC_LABELS: Record<MetricKey, string> = {
  rainfall: 'Rainfall',
  windSpeed: 'Wind Speed',
  windDirection: 'Wind Direction',
};

export const METRIC_UNITS: Record<MetricKey, string> = {
  rainfall: 'mm',
  windSpeed: 'knots',
  windDirection: '°',
};

export const isMetricKey = (value: unknown): value is MetricKey =>
  typeof value === 'string' && METRIC_KEYS.some((key) => key === value);

const StationSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    location: z.object({
      latitude: z.number(),
      longitude: z.number(),
    }),
  })
  .transform(({ id, name, location }) => ({
    id,
    name,
    location: { lat: location.latitude, lon: location.longitude },
  }));

const StationValueSchema = z.object({
  stationId: z.string(),
  value: z.number().nullable().optional().transform((value) => value ?? null),
});

const ReadingSchema = z.object({
  timestamp: z.string(),
  data: z.array(StationValueSchema).default([]),
});

const EnvelopeSchema = z.object({
  code: z.number().int(),
  errorMsg: z.string().nullable().optional(),
  data: z.unknown().optional(),
});

const DataSchema = z.object({
  stations: z.array(StationSchema).default([]),
  readings: z.array(ReadingSchema).default([]),
  readingUnit: z.string().nullable().optional().transform((value) => value ?? null),
});

export type Station = z.output<typeof StationSchema>;
export type StationValue = z.output<typeof StationValueSchema>;
export type Reading = z.output<typeof ReadingSchema>;

export interface SourcePayload {
  statusCode: number;
  data: z.output<typeof DataSchema>;
}

export type WeatherSnapshot = Record<MetricKey, SourcePayload | null>;

export type DecodeResult =
  | { kind: 'ok'; payload: SourcePayload }
  | { kind: 'api-error'; code: number; message: string | null }
  | { kind: 'malformed'; message: string };

/**
 * Decodes a real-time endpoint body. A non-zero `code` is reported as an
 * application error even when `data` is missing or unreadable.
 */
export const decodeSourcePayload = (body: unknown): DecodeResult => {
  const envelope = EnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    return { kind: 'malformed', message: envelope.error.issues[0]?.message || 'unexpected body' };
  }
  if (envelope.data.code !== SUCCESS_CODE) {
    return { kind: 'api-error', code: envelope.data.code, message: envelope.data.errorMsg ?? null };
  }

  const data = DataSchema.safeParse(envelope.data.data);
  if (!data.success) {
    const issue = data.error.issues[0];
    const where = issue?.path.length ? ` at data.${issue.path.join('.')}` : '';
    return { kind: 'malformed', message: `${issue?.message || 'unexpected data'}${where}` };
  }

  return { kind: 'ok', payload: { statusCode: envelope.data.code, data: data.data } };
};

export const createEmptySnapshot = (): WeatherSnapshot => ({
  rainfall: null,
  windSpeed: null,
  windDirection: null,
});
