import path from 'node:path';
import dotenv from 'dotenv';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

export const PORT = parsePositiveInt(process.env.PORT, 3001);
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 12000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);
export const FORECAST_RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.FORECAST_RATE_LIMIT_MAX_REQUESTS, 60);

export const FISHING_CONFIG_PATH = path.resolve(
  process.env.FISHING_CONFIG_PATH || path.resolve(__dirname, '../../config/config.json'),
);

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);
