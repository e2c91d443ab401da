import { Express, Request, Response } from 'express';
import { isMetricKey, METRIC_KEYS, METRIC_UNITS, MetricKey, SourcePayload } from '../utils/payload';
import { classifyRainfall } from '../utils/rainfall';
import { buildStationDirectory, latestTimestamp, latestValue, summaryStats } from '../utils/readings';
import { resolveStation } from '../utils/stations';
import { formatReadingTimestamp } from '../utils/time';
import { WeatherService } from '../utils/weather-service';
import { classifyWindDirection, classifyWindSpeed } from '../utils/wind';

interface RegisterWeatherRoutesOptions {
  app: Express;
  weatherService: WeatherService;
}

const unitFor = (metric: MetricKey, payload: SourcePayload | null) => payload?.data.readingUnit || METRIC_UNITS[metric];

const describeSource = (metric: MetricKey, payload: SourcePayload | null) => {
  const timestamp = latestTimestamp(payload);
  return {
    available: payload !== null,
    timestamp,
    displayTime: timestamp ? formatReadingTimestamp(timestamp) : null,
    unit: unitFor(metric, payload),
    stationCount: payload ? payload.data.stations.length : 0,
    stats: payload ? summaryStats(payload.data.readings) : null,
  };
};

const classifyValue = (metric: MetricKey, value: number): string => {
  if (metric === 'rainfall') {
    return classifyRainfall(value).label;
  }
  if (metric === 'windSpeed') {
    return classifyWindSpeed(value).label;
  }
  return classifyWindDirection(value);
};

const sendServerError = (res: Response, error: unknown) => {
  console.error('[API] weather route failed:', error);
  res.status(500).json({
    error: 'Failed to fetch weather data.',
    details: error instanceof Error ? error.message : 'Unknown backend error.',
  });
};

export const registerWeatherRoutes = ({ app, weatherService }: RegisterWeatherRoutesOptions) => {
  app.get('/api/weather', async (_req: Request, res: Response) => {
    try {
      const snapshot = await weatherService.fetchAll();
      if (METRIC_KEYS.every((metric) => snapshot[metric] === null)) {
        res.status(503).json({ error: 'Unable to fetch weather data. Please try again later.' });
        return;
      }
      res.json({
        generatedAt: new Date().toISOString(),
        rainfall: describeSource('rainfall', snapshot.rainfall),
        windSpeed: describeSource('windSpeed', snapshot.windSpeed),
        windDirection: describeSource('windDirection', snapshot.windDirection),
      });
    } catch (error) {
      sendServerError(res, error);
    }
  });

  app.get('/api/stations', async (_req: Request, res: Response) => {
    try {
      const directory = buildStationDirectory(await weatherService.fetchAll());
      if (!directory.length) {
        res.status(503).json({ error: 'Unable to fetch station data. Please try again later.' });
        return;
      }
      res.json(directory.map(({ station, sources }) => ({ ...station, sources })));
    } catch (error) {
      sendServerError(res, error);
    }
  });

  app.get('/api/stations/:query', async (req: Request, res: Response) => {
    const query = String(req.params.query || '').trim().slice(0, 120);
    const rawMetric = typeof req.query.metric === 'string' ? req.query.metric : 'rainfall';
    if (!isMetricKey(rawMetric)) {
      res.status(400).json({ error: `metric must be one of: ${METRIC_KEYS.join(', ')}` });
      return;
    }

    try {
      const payload = await weatherService.fetchSource(rawMetric);
      if (!payload) {
        res.status(503).json({ error: 'Upstream data is unavailable. Please try again later.' });
        return;
      }

      const station = resolveStation(payload.data.stations, query);
      if (!station) {
        res.status(404).json({ error: 'Station not found', query });
        return;
      }

      const value = latestValue(payload.data.readings, station.id);
      const timestamp = latestTimestamp(payload);
      res.json({
        station,
        metric: rawMetric,
        value,
        unit: unitFor(rawMetric, payload),
        classification: value !== null ? classifyValue(rawMetric, value) : null,
        timestamp,
        displayTime: timestamp ? formatReadingTimestamp(timestamp) : null,
      });
    } catch (error) {
      sendServerError(res, error);
    }
  });
};
