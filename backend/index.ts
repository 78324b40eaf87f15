import { Express } from 'express';
import { createApp, registerFallbackHandlers } from './src/server/create-app.js';
import { startServer as startBackendServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  REQUEST_TIMEOUT_MS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  FORECAST_RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  FISHING_CONFIG_PATH,
} from './src/server/runtime.js';
import { FetchWithTimeout, createFetchWithTimeout } from './src/utils/http-client.js';
import { FishingConfig, loadFishingConfig, validateFishingConfig } from './src/utils/fishing-config.js';
import { registerHealthRoutes } from './src/routes/health.js';
import { registerForecastRoutes } from './src/routes/forecast.js';
import { registerScoreRoute } from './src/routes/score.js';

interface BuildForecastAppOptions {
  config: FishingConfig;
  fetchWithTimeout?: FetchWithTimeout;
  now?: () => Date;
}

export const buildForecastApp = ({
  config,
  fetchWithTimeout = createFetchWithTimeout(REQUEST_TIMEOUT_MS),
  now,
}: BuildForecastAppOptions): Express => {
  const app = createApp({
    isProduction: IS_PRODUCTION,
    corsAllowlist: CORS_ALLOWLIST,
    rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
    forecastRateLimitMaxRequests: FORECAST_RATE_LIMIT_MAX_REQUESTS,
  });

  registerHealthRoutes({ app, config, now });
  registerForecastRoutes({ app, config, fetchWithTimeout, now });
  registerScoreRoute({ app, config, now });
  registerFallbackHandlers(app, { isProduction: IS_PRODUCTION });
  return app;
};

export const fishingConfig = loadFishingConfig(FISHING_CONFIG_PATH);

for (const warning of validateFishingConfig(fishingConfig)) {
  console.warn(`[config] ${warning}`);
}

export const app = buildForecastApp({ config: fishingConfig });

if (process.env.NODE_ENV !== 'test') {
  startBackendServer({ app, port: PORT, spotName: fishingConfig.spot.name });
}

export { buildFishingForecast } from './src/utils/fishing-forecast.js';
export {
  scoreWind,
  scoreGust,
  scoreWaveHeight,
  scoreWavePeriod,
  scoreRain,
  scoreTemperature,
  isBlocking,
  scoreHour,
  scoreRecords,
  getVerdict,
} from './src/utils/scoring.js';
export { aggregateDay, summarizeDays, computeWindows, getTodayHourly } from './src/utils/aggregation.js';
