import { METRIC_KEYS, MetricKey, Reading, SourcePayload, Station, WeatherSnapshot } from './payload';
import { resolveById } from './stations';
import { classifyWindDirection } from './wind';

export interface SummaryStats {
  min: number;
  max: number;
  avg: number;
  count: number;
}

export const EMPTY_SUMMARY_STATS: Readonly<SummaryStats> = { min: 0, max: 0, avg: 0, count: 0 };

export const latestReading = (readings: Reading[]): Reading | null => readings[0] ?? null;

export const latestTimestamp = (payload: SourcePayload | null): string | null =>
  payload ? latestReading(payload.data.readings)?.timestamp ?? null : null;

/** Value for a station in the freshest reading; later readings are never consulted. */
export const latestValue = (readings: Reading[], stationId: string): number | null => {
  const reading = latestReading(readings);
  if (!reading) {
    return null;
  }
  const point = reading.data.find((entry) => entry.stationId === stationId);
  return point ? point.value : null;
};

export const summaryStats = (readings: Reading[]): SummaryStats => {
  const reading = latestReading(readings);
  const values = (reading?.data ?? [])
    .map((entry) => entry.value)
    .filter((value): value is number => value !== null);
  if (!values.length) {
    return { ...EMPTY_SUMMARY_STATS };
  }
  return {
    min: Math.min(...values),
    max: Math.max(...values),
    avg: values.reduce((sum, value) => sum + value, 0) / values.length,
    count: values.length,
  };
};

export interface StationValueRow {
  station: Station;
  value: number | null;
}

// Data points whose station id is missing from the station list are skipped.
export const listStationValues = (payload: SourcePayload): StationValueRow[] => {
  const reading = latestReading(payload.data.readings);
  if (!reading) {
    return [];
  }
  return reading.data.flatMap((entry) => {
    const station = resolveById(payload.data.stations, entry.stationId);
    return station ? [{ station, value: entry.value }] : [];
  });
};

export interface RankStationsOptions {
  positiveOnly?: boolean;
}

export const rankStations = (
  payload: SourcePayload,
  limit: number,
  { positiveOnly = false }: RankStationsOptions = {},
): Array<{ station: Station; value: number }> =>
  listStationValues(payload)
    .flatMap(({ station, value }) =>
      value !== null && (!positiveOnly || value > 0) ? [{ station, value }] : [],
    )
    .sort((a, b) => b.value - a.value)
    .slice(0, limit);

export interface DirectoryEntry {
  station: Station;
  sources: MetricKey[];
}

/** Union of the station lists of every available source, keyed by id and sorted by name. */
export const buildStationDirectory = (snapshot: WeatherSnapshot): DirectoryEntry[] => {
  const entries = new Map<string, DirectoryEntry>();
  for (const metric of METRIC_KEYS) {
    const payload = snapshot[metric];
    if (!payload) {
      continue;
    }
    for (const station of payload.data.stations) {
      const existing = entries.get(station.id);
      if (existing) {
        if (!existing.sources.includes(metric)) {
          existing.sources.push(metric);
        }
      } else {
        entries.set(station.id, { station, sources: [metric] });
      }
    }
  }
  return [...entries.values()].sort((a, b) => a.station.name.localeCompare(b.station.name));
};

export interface WindObservation {
  id: string;
  name: string;
  speed: number | null;
  direction: number | null;
  directionLabel: string | null;
}

export const buildWindObservations = (
  speedPayload: SourcePayload | null,
  directionPayload: SourcePayload | null,
): WindObservation[] => {
  const observations = new Map<string, WindObservation>();
  if (speedPayload) {
    for (const station of speedPayload.data.stations) {
      observations.set(station.id, {
        id: station.id,
        name: station.name,
        speed: latestValue(speedPayload.data.readings, station.id),
        direction: null,
        directionLabel: null,
      });
    }
  }
  if (directionPayload) {
    for (const station of directionPayload.data.stations) {
      const direction = latestValue(directionPayload.data.readings, station.id);
      const directionLabel = direction !== null ? classifyWindDirection(direction) : null;
      const existing = observations.get(station.id);
      if (existing) {
        existing.direction = direction;
        existing.directionLabel = directionLabel;
      } else {
        observations.set(station.id, { id: station.id, name: station.name, speed: null, direction, directionLabel });
      }
    }
  }
  return [...observations.values()];
};
