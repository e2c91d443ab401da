import { Express, Request, Response } from 'express';
import pkg from '../../package.json';

const { version } = pkg;

export const ALIVE_MESSAGE = "I'm alive!";

const healthPayload = () => {
  const mem = process.memoryUsage();
  return {
    ok: true,
    service: 'sg-weather-bot',
    version,
    env: process.env.NODE_ENV || 'development',
    uptime: Math.floor(process.uptime()),
    nodeVersion: process.version,
    memory: {
      heapUsedMb: Math.round(mem.heapUsed / 1024 / 1024),
      rssMb: Math.round(mem.rss / 1024 / 1024),
    },
    timestamp: new Date().toISOString(),
  };
};

export const registerHealthRoutes = (app: Express) => {
  // Plain-text ping for external uptime monitors.
  app.get('/', (_req: Request, res: Response) => {
    res.type('text/plain').send(ALIVE_MESSAGE);
  });

  const respond = (_req: Request, res: Response) => {
    res.json(healthPayload());
  };

  app.get('/healthz', respond);
  app.get('/health', respond);
};
