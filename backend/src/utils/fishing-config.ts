import fs from 'node:fs';
import {
  ScoringWeights,
  VerdictThresholds,
  DEFAULT_WEIGHTS,
  DEFAULT_VERDICT_THRESHOLDS,
  isKnownValue,
  resolveWeights,
  resolveVerdictThresholds,
} from './scoring.js';

export interface SpotConfig {
  name: string;
  lat: number;
  lon: number;
}

export interface FishingWindowConfig {
  hoursStart: number;
  hoursEnd: number;
  timezone: string;
  forecastDays: number;
  windowDays: number;
}

export interface FishingConfig {
  spot: SpotConfig;
  scoring: {
    weights: ScoringWeights;
    verdicts: VerdictThresholds;
  };
  fishing: FishingWindowConfig;
}

export class FishingConfigError extends Error {
  constructor(message: string, readonly configPath: string) {
    super(message);
    this.name = 'FishingConfigError';
  }
}

export const DEFAULT_FISHING_CONFIG: FishingConfig = {
  spot: { name: 'La Couarde-sur-Mer', lat: 46.19, lon: -1.42 },
  scoring: {
    weights: { ...DEFAULT_WEIGHTS },
    verdicts: { ...DEFAULT_VERDICT_THRESHOLDS },
  },
  fishing: {
    hoursStart: 6,
    hoursEnd: 21,
    timezone: 'Europe/Paris',
    forecastDays: 14,
    windowDays: 3,
  },
};

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readObject = (source: JsonObject, key: string): JsonObject => {
  const value = source[key];
  return isObject(value) ? value : {};
};

const readNumber = (source: JsonObject, key: string): number | undefined => {
  const value = source[key];
  return typeof value === 'number' && isKnownValue(value) ? value : undefined;
};

const readString = (source: JsonObject, key: string): string | undefined => {
  const value = source[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
};

const readInteger = (source: JsonObject, key: string, fallback: number): number => {
  const value = readNumber(source, key);
  return value !== undefined && Number.isInteger(value) ? value : fallback;
};

/**
 * Merges a parsed config document over the defaults. Accepts both camelCase and
 * snake_case keys for the fishing window (`hoursStart` / `hours_start`).
 */
export const resolveFishingConfig = (raw: unknown): FishingConfig => {
  const source = isObject(raw) ? raw : {};
  const spot = readObject(source, 'spot');
  const scoring = readObject(source, 'scoring');
  const weights = readObject(scoring, 'weights');
  const verdicts = readObject(scoring, 'verdicts');
  const fishing = readObject(source, 'fishing');
  const defaults = DEFAULT_FISHING_CONFIG.fishing;

  return {
    spot: {
      name: readString(spot, 'name') ?? DEFAULT_FISHING_CONFIG.spot.name,
      lat: readNumber(spot, 'lat') ?? DEFAULT_FISHING_CONFIG.spot.lat,
      lon: readNumber(spot, 'lon') ?? DEFAULT_FISHING_CONFIG.spot.lon,
    },
    scoring: {
      weights: resolveWeights({
        wind: readNumber(weights, 'wind'),
        gust: readNumber(weights, 'gust'),
        waveHeight: readNumber(weights, 'waveHeight') ?? readNumber(weights, 'wave_height'),
        wavePeriod: readNumber(weights, 'wavePeriod') ?? readNumber(weights, 'wave_period'),
        rain: readNumber(weights, 'rain'),
        temperature: readNumber(weights, 'temperature'),
      }),
      verdicts: resolveVerdictThresholds({
        excellent: readNumber(verdicts, 'excellent'),
        favorable: readNumber(verdicts, 'favorable'),
        moyen: readNumber(verdicts, 'moyen'),
      }),
    },
    fishing: {
      hoursStart: readInteger(fishing, 'hoursStart', readInteger(fishing, 'hours_start', defaults.hoursStart)),
      hoursEnd: readInteger(fishing, 'hoursEnd', readInteger(fishing, 'hours_end', defaults.hoursEnd)),
      timezone: readString(fishing, 'timezone') ?? defaults.timezone,
      forecastDays: readInteger(fishing, 'forecastDays', readInteger(fishing, 'forecast_days', defaults.forecastDays)),
      windowDays: readInteger(fishing, 'windowDays', readInteger(fishing, 'window_days', defaults.windowDays)),
    },
  };
};

export const loadFishingConfig = (configPath: string): FishingConfig => {
  if (!fs.existsSync(configPath)) {
    console.warn(`[config] ${configPath} not found, using defaults.`);
    return resolveFishingConfig({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FishingConfigError(`Unable to parse fishing config: ${reason}`, configPath);
  }
  if (!isObject(parsed)) {
    throw new FishingConfigError('Fishing config must be a JSON object.', configPath);
  }
  return resolveFishingConfig(parsed);
};

const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
};

// Advisory only: scoring runs on whatever the config says.
export const validateFishingConfig = (config: FishingConfig): string[] => {
  const warnings: string[] = [];
  const { weights, verdicts } = config.scoring;
  const { hoursStart, hoursEnd, timezone, forecastDays, windowDays } = config.fishing;

  const weightSum = Object.values(weights).reduce((sum, weight) => sum + weight, 0);
  if (Math.abs(weightSum - 1) > 0.01) {
    warnings.push(`Scoring weights sum to ${weightSum.toFixed(2)} instead of 1.00.`);
  }
  if (Object.values(weights).some((weight) => weight < 0)) {
    warnings.push('Scoring weights should not be negative.');
  }
  if (!(verdicts.excellent > verdicts.favorable && verdicts.favorable > verdicts.moyen)) {
    warnings.push(
      `Verdict thresholds should be strictly descending (excellent ${verdicts.excellent}, favorable ${verdicts.favorable}, moyen ${verdicts.moyen}).`,
    );
  }
  if (hoursStart < 0 || hoursStart > 23 || hoursEnd < 0 || hoursEnd > 23) {
    warnings.push(`Fishing hours must lie within 0-23 (got ${hoursStart}-${hoursEnd}).`);
  } else if (hoursStart > hoursEnd) {
    warnings.push(`Fishing hours start (${hoursStart}) is after end (${hoursEnd}).`);
  }
  if (!isValidTimeZone(timezone)) {
    warnings.push(`Unknown time zone "${timezone}".`);
  }
  if (forecastDays < 1 || forecastDays > 16) {
    warnings.push(`forecastDays ${forecastDays} is outside the 1-16 range the forecast provider serves.`);
  }
  if (windowDays < 0) {
    warnings.push(`windowDays ${windowDays} should not be negative.`);
  }

  return warnings;
};
