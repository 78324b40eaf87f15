import { HourlyRecord } from './scoring.js';
import { windDegreesToCardinal } from './wind.js';
import { formatUtcOffset, parseIsoTimeToMs, parseLocalTimestamp } from './time.js';
import { DEFAULT_FETCH_HEADERS, FetchResponseLike, FetchWithTimeout } from './http-client.js';

const OPEN_METEO_FORECAST_HOST = 'api.open-meteo.com';
const OPEN_METEO_MARINE_HOST = 'marine-api.open-meteo.com';

const OPEN_METEO_FORECAST_HOURLY_FIELDS = [
  'wind_speed_10m',
  'wind_gusts_10m',
  'wind_direction_10m',
  'temperature_2m',
  'precipitation',
].join(',');

const OPEN_METEO_MARINE_HOURLY_FIELDS = ['wave_height', 'wave_period'].join(',');

// Some feeds fill gaps with +/-9999 instead of leaving them empty.
const MISSING_VALUE_SENTINEL = 9999;

export type ForecastSource = 'open-meteo-forecast' | 'open-meteo-marine';

export class ForecastFetchError extends Error {
  constructor(message: string, readonly source: ForecastSource, readonly status: number | null = null) {
    super(message);
    this.name = 'ForecastFetchError';
  }
}

export interface OpenMeteoHourlyPayload {
  utcOffsetSeconds: number;
  timezone: string | null;
  hourly: Record<string, unknown[]>;
  times: string[];
}

export const clampForecastDays = (value: number): number => Math.min(16, Math.max(1, Math.round(Number(value) || 1)));

interface BuildOpenMeteoUrlOptions {
  lat: number;
  lon: number;
  timezone: string;
  forecastDays: number;
}

export const buildOpenMeteoForecastUrl = ({ lat, lon, timezone, forecastDays }: BuildOpenMeteoUrlOptions): string => {
  const params = new URLSearchParams({
    latitude: String(lat),
    longitude: String(lon),
    hourly: OPEN_METEO_FORECAST_HOURLY_FIELDS,
    wind_speed_unit: 'kn',
    temperature_unit: 'celsius',
    precipitation_unit: 'mm',
    timezone,
    forecast_days: String(clampForecastDays(forecastDays)),
  });
  return `https://${OPEN_METEO_FORECAST_HOST}/v1/forecast?${params.toString()}`;
};

export const buildOpenMeteoMarineUrl = ({ lat, lon, timezone, forecastDays }: BuildOpenMeteoUrlOptions): string => {
  const params = new URLSearchParams({
    latitude: String(lat),
    longitude: String(lon),
    hourly: OPEN_METEO_MARINE_HOURLY_FIELDS,
    timezone,
    forecast_days: String(clampForecastDays(forecastDays)),
  });
  return `https://${OPEN_METEO_MARINE_HOST}/v1/marine?${params.toString()}`;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const parseOpenMeteoPayload = (payload: unknown, source: ForecastSource): OpenMeteoHourlyPayload => {
  if (!isRecord(payload) || !isRecord(payload.hourly)) {
    throw new ForecastFetchError(`${source} response did not include an hourly block.`, source);
  }
  const rawHourly = payload.hourly;
  const rawTimes = rawHourly.time;
  if (!Array.isArray(rawTimes) || !rawTimes.length) {
    throw new ForecastFetchError(`${source} response did not include hourly time series.`, source);
  }

  const hourly: Record<string, unknown[]> = {};
  for (const [key, series] of Object.entries(rawHourly)) {
    if (Array.isArray(series)) {
      hourly[key] = series;
    }
  }

  const offset = Number(payload.utc_offset_seconds);
  return {
    utcOffsetSeconds: Number.isFinite(offset) ? offset : 0,
    timezone: typeof payload.timezone === 'string' ? payload.timezone : null,
    hourly,
    times: rawTimes.map((value) => String(value)),
  };
};

export const readSeriesValue = (series: readonly unknown[] | undefined, index: number): number | null => {
  if (!series || index < 0 || index >= series.length) {
    return null;
  }
  const raw = series[index];
  if (raw === null || raw === undefined || (typeof raw === 'string' && !raw.trim())) {
    return null;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || Math.abs(value) >= MISSING_VALUE_SENTINEL) {
    return null;
  }
  return value;
};

/**
 * Joins the forecast and marine hourly series on their local timestamps into
 * records. Rows whose timestamp cannot be read, or that do not move strictly
 * forward in time, are dropped.
 */
export const normalizeOpenMeteoSeries = (
  forecast: OpenMeteoHourlyPayload,
  marine: OpenMeteoHourlyPayload | null,
): HourlyRecord[] => {
  const offset = formatUtcOffset(forecast.utcOffsetSeconds);
  const marineIndexByTime = new Map<string, number>();
  marine?.times.forEach((time, index) => {
    if (!marineIndexByTime.has(time)) {
      marineIndexByTime.set(time, index);
    }
  });

  const records: HourlyRecord[] = [];
  let previousMs = Number.NEGATIVE_INFINITY;
  forecast.times.forEach((localTime, index) => {
    const parts = parseLocalTimestamp(localTime);
    if (!parts) {
      return;
    }
    const time = parts.offset ? localTime : `${localTime.length === 16 ? `${localTime}:00` : localTime}${offset}`;
    const timeMs = parseIsoTimeToMs(time);
    if (timeMs === null || timeMs <= previousMs) {
      return;
    }
    previousMs = timeMs;

    const marineIndex = marineIndexByTime.get(localTime) ?? -1;
    records.push({
      time,
      date: parts.date,
      hour: parts.hour,
      windKts: readSeriesValue(forecast.hourly.wind_speed_10m, index),
      gustKts: readSeriesValue(forecast.hourly.wind_gusts_10m, index),
      windDir: windDegreesToCardinal(readSeriesValue(forecast.hourly.wind_direction_10m, index)),
      waveHeightM: readSeriesValue(marine?.hourly.wave_height, marineIndex),
      wavePeriodS: readSeriesValue(marine?.hourly.wave_period, marineIndex),
      tempC: readSeriesValue(forecast.hourly.temperature_2m, index),
      rainMmh: readSeriesValue(forecast.hourly.precipitation, index),
    });
  });
  return records;
};

export const filterFishingHours = (records: readonly HourlyRecord[], hoursStart: number, hoursEnd: number): HourlyRecord[] =>
  records.filter((record) => record.hour >= hoursStart && record.hour <= hoursEnd);

const fetchOpenMeteoPayload = async (
  fetchWithTimeout: FetchWithTimeout,
  url: string,
  source: ForecastSource,
): Promise<OpenMeteoHourlyPayload> => {
  let response: FetchResponseLike;
  try {
    response = await fetchWithTimeout(url, { headers: DEFAULT_FETCH_HEADERS });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ForecastFetchError(`${source} request failed: ${reason}`, source);
  }
  if (!response.ok) {
    throw new ForecastFetchError(`${source} request failed with status ${response.status}`, source, response.status);
  }
  return parseOpenMeteoPayload(await response.json(), source);
};

interface FetchForecastRecordsOptions {
  lat: number;
  lon: number;
  timezone: string;
  forecastDays: number;
  hoursStart: number;
  hoursEnd: number;
  fetchWithTimeout: FetchWithTimeout;
}

export interface ForecastRecordsResult {
  records: HourlyRecord[];
  timezone: string | null;
  marineAvailable: boolean;
}

export const fetchForecastRecords = async ({
  lat,
  lon,
  timezone,
  forecastDays,
  hoursStart,
  hoursEnd,
  fetchWithTimeout,
}: FetchForecastRecordsOptions): Promise<ForecastRecordsResult> => {
  const urlOptions = { lat, lon, timezone, forecastDays };
  const [forecastResult, marineResult] = await Promise.allSettled([
    fetchOpenMeteoPayload(fetchWithTimeout, buildOpenMeteoForecastUrl(urlOptions), 'open-meteo-forecast'),
    fetchOpenMeteoPayload(fetchWithTimeout, buildOpenMeteoMarineUrl(urlOptions), 'open-meteo-marine'),
  ]);

  if (forecastResult.status === 'rejected') {
    throw forecastResult.reason;
  }

  let marine: OpenMeteoHourlyPayload | null = null;
  if (marineResult.status === 'fulfilled') {
    marine = marineResult.value;
  } else {
    const reason = marineResult.reason instanceof Error ? marineResult.reason.message : String(marineResult.reason);
    console.warn(`[forecast] marine data unavailable, wave fields left unknown: ${reason}`);
  }

  const allRecords = normalizeOpenMeteoSeries(forecastResult.value, marine);
  const records = filterFishingHours(allRecords, hoursStart, hoursEnd);
  const missingWaves = records.filter((record) => record.waveHeightM === null).length;
  console.log(
    `[forecast] ${records.length} fishing-hour rows over ${new Set(records.map((record) => record.date)).size} days (${allRecords.length} raw).`,
  );
  if (missingWaves > 0) {
    console.warn(`[forecast] ${missingWaves} rows without wave height.`);
  }

  return {
    records,
    timezone: forecastResult.value.timezone,
    marineAvailable: marine !== null,
  };
};
