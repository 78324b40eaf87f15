import { Express, NextFunction, Request, Response } from 'express';
import { FishingConfig, validateFishingConfig } from '../utils/fishing-config.js';
import { ForecastFetchError, clampForecastDays, fetchForecastRecords } from '../utils/forecast-service.js';
import { buildFishingForecast } from '../utils/fishing-forecast.js';
import { buildTextDigest } from '../utils/digest.js';
import { FetchWithTimeout } from '../utils/http-client.js';
import { dateKeyInTimeZone } from '../utils/time.js';

interface RegisterForecastRoutesOptions {
  app: Express;
  config: FishingConfig;
  fetchWithTimeout: FetchWithTimeout;
  now?: () => Date;
}

export const registerForecastRoutes = ({ app, config, fetchWithTimeout, now = () => new Date() }: RegisterForecastRoutesOptions) => {
  app.get('/api/forecast', async (req: Request, res: Response, next: NextFunction) => {
    const { days } = req.query;
    const requestedDays = Number(days);
    if (days !== undefined && (!Number.isInteger(requestedDays) || requestedDays < 1 || requestedDays > 16)) {
      return res.status(400).json({ error: 'days must be an integer between 1 and 16.' });
    }

    const { spot, fishing } = config;
    const forecastDays = days !== undefined ? requestedDays : clampForecastDays(fishing.forecastDays);
    const startedAt = Date.now();

    try {
      const { records, marineAvailable } = await fetchForecastRecords({
        lat: spot.lat,
        lon: spot.lon,
        timezone: fishing.timezone,
        forecastDays,
        hoursStart: fishing.hoursStart,
        hoursEnd: fishing.hoursEnd,
        fetchWithTimeout,
      });

      const generatedAt = now();
      const today = dateKeyInTimeZone(generatedAt, fishing.timezone) ?? generatedAt.toISOString().slice(0, 10);
      const forecast = buildFishingForecast(records, config, today);
      const todaySummary = forecast.daily.find((summary) => summary.date === today);
      if (todaySummary) {
        console.log(`[forecast] ${spot.name} ${today}: ${todaySummary.dailyScore}/100 ${todaySummary.verdict}`);
      }
      console.log(`[forecast] scored ${forecast.hourly.length} rows in ${Date.now() - startedAt}ms`);

      return res.json({
        spot,
        generatedAt: generatedAt.toISOString(),
        forecastDays,
        marineAvailable,
        ...forecast,
        digest: buildTextDigest({ spotName: spot.name, today, summaries: forecast.daily }),
      });
    } catch (error) {
      if (error instanceof ForecastFetchError) {
        console.error(`[forecast] ${error.source} failed:`, error.message);
        return res.status(502).json({
          error: 'Forecast provider unavailable.',
          source: error.source,
          details: error.message,
        });
      }
      return next(error);
    }
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json({ ...config, warnings: validateFishingConfig(config) });
  });
};
