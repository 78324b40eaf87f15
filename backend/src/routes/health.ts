import fs from 'node:fs';
import path from 'node:path';
import { Express, Request, Response } from 'express';
import { FishingConfig, validateFishingConfig } from '../utils/fishing-config.js';
import { dateKeyInTimeZone } from '../utils/time.js';

const readPackageVersion = (): string => {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, '../../../package.json'), 'utf8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch (error) {
    console.warn('[health] unable to read package version:', error instanceof Error ? error.message : error);
  }
  return 'unknown';
};

const version = readPackageVersion();

const healthPayload = (config: FishingConfig, now: Date) => {
  const mem = process.memoryUsage();
  return {
    ok: true,
    service: 'kayak-fishing-forecast-backend',
    version,
    env: process.env.NODE_ENV || 'development',
    spot: config.spot.name,
    timezone: config.fishing.timezone,
    localDate: dateKeyInTimeZone(now, config.fishing.timezone),
    configWarnings: validateFishingConfig(config).length,
    uptime: Math.floor(process.uptime()),
    nodeVersion: process.version,
    memory: {
      heapUsedMb: Math.round(mem.heapUsed / 1024 / 1024),
      rssMb: Math.round(mem.rss / 1024 / 1024),
    },
    timestamp: now.toISOString(),
  };
};

interface RegisterHealthRoutesOptions {
  app: Express;
  config: FishingConfig;
  now?: () => Date;
}

export const registerHealthRoutes = ({ app, config, now = () => new Date() }: RegisterHealthRoutesOptions) => {
  const respond = (_req: Request, res: Response) => {
    res.json(healthPayload(config, now()));
  };

  app.get('/healthz', respond);
  app.get('/health', respond);
  app.get('/api/healthz', respond);
  app.get('/api/health', respond);
};
