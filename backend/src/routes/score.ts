import { Express, Request, Response } from 'express';
import { FishingConfig } from '../utils/fishing-config.js';
import { buildFishingForecast } from '../utils/fishing-forecast.js';
import { parseHourlyRecordInputs } from '../utils/record-input.js';
import { dateKeyInTimeZone, isDateKey } from '../utils/time.js';

interface RegisterScoreRouteOptions {
  app: Express;
  config: FishingConfig;
  now?: () => Date;
}

export const registerScoreRoute = ({ app, config, now = () => new Date() }: RegisterScoreRouteOptions) => {
  app.post('/api/score', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      return res.status(400).json({ error: 'Request body must be a JSON object with a records array.' });
    }

    const requestedToday = 'today' in body ? body.today : undefined;
    let today: string;
    if (requestedToday === undefined) {
      const current = now();
      today = dateKeyInTimeZone(current, config.fishing.timezone) ?? current.toISOString().slice(0, 10);
    } else if (isDateKey(requestedToday)) {
      today = requestedToday;
    } else {
      return res.status(400).json({ error: 'Invalid today format. Use YYYY-MM-DD.' });
    }

    const parsed = parseHourlyRecordInputs('records' in body ? body.records : undefined);
    if (!parsed.ok) {
      return res.status(400).json({ error: 'Invalid records.', details: parsed.errors });
    }
    return res.json(buildFishingForecast(parsed.records, config, today));
  });
};
