import {
  ScoredHourlyRecord,
  Verdict,
  VerdictCssClass,
  VerdictThresholds,
  getVerdict,
  verdictCssClass,
  isKnownValue,
  roundTo,
  scoreWind,
  scoreGust,
  scoreWaveHeight,
  scoreWavePeriod,
  scoreRain,
} from './scoring.js';
import { findDominantDirection, windDirectionArrow, windDirectionNameFr } from './wind.js';
import { addDaysToDateKey, formatHourLabel, formatHourRangeLabel } from './time.js';

export type LimitingFactor = 'wind' | 'gust' | 'waveHeight' | 'wavePeriod' | 'rain';

export const LIMITING_FACTOR_LABELS: Readonly<Record<LimitingFactor, string>> = {
  wind: 'vent fort',
  gust: 'rafales',
  waveHeight: 'vagues',
  wavePeriod: 'houle courte',
  rain: 'pluie',
};

export const NO_WINDOW_LABEL = '–';
export const WINDOW_SLOT_HOURS = 3;

export interface ConditionStats {
  avgWindKts: number | null;
  maxGustKts: number | null;
  avgWaveM: number | null;
  avgWavePeriodS: number | null;
  maxRainMmh: number | null;
  avgTempC: number | null;
  windDir: string | null;
  windDirArrow: string;
  windDirName: string;
  limitingFactor: LimitingFactor;
  limitingFactorLabel: string;
}

export interface DailySummary extends ConditionStats {
  date: string;
  dailyScore: number;
  verdict: Verdict;
  cssClass: VerdictCssClass;
  bestWindow: string;
}

export interface WindowSummary extends ConditionStats {
  date: string;
  slot: string;
  startHour: number;
  endHour: number;
  score: number;
  verdict: Verdict;
  cssClass: VerdictCssClass;
}

export interface TodayHour {
  hour: number;
  timeLabel: string;
  score: number;
  verdict: Verdict;
  cssClass: VerdictCssClass;
  windKts: number | null;
  gustKts: number | null;
  windDir: string | null;
  waveHeightM: number | null;
  wavePeriodS: number | null;
  rainMmh: number | null;
  tempC: number | null;
}

// Groups in first-seen key order without touching the items.
export const groupBy = <T, K>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> => {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
};

export const meanOfKnown = (values: readonly (number | null)[]): number | null => {
  const known = values.filter(isKnownValue);
  if (!known.length) {
    return null;
  }
  return known.reduce((sum, value) => sum + value, 0) / known.length;
};

export const maxOfKnown = (values: readonly (number | null)[]): number | null => {
  const known = values.filter(isKnownValue);
  return known.length ? Math.max(...known) : null;
};

const roundOrNull = (value: number | null, digits: number): number | null => (value === null ? null : roundTo(value, digits));

const meanScore = (rows: readonly ScoredHourlyRecord[]): number =>
  rows.reduce((sum, row) => sum + row.score, 0) / rows.length;

/**
 * Label of the best run of three consecutive rows, by mean score. The first
 * strict maximum wins, so ties keep the earliest start. Two rows form a single
 * window; fewer yield {@link NO_WINDOW_LABEL}.
 */
export const findBestWindow = (rows: readonly ScoredHourlyRecord[]): string => {
  if (rows.length < 2) {
    return NO_WINDOW_LABEL;
  }

  const lastStart = Math.max(0, rows.length - WINDOW_SLOT_HOURS);
  let bestMean = Number.NEGATIVE_INFINITY;
  let bestLabel = NO_WINDOW_LABEL;
  for (let start = 0; start <= lastStart; start += 1) {
    const window = rows.slice(start, start + WINDOW_SLOT_HOURS);
    const windowMean = meanScore(window);
    if (windowMean > bestMean) {
      bestMean = windowMean;
      bestLabel = formatHourRangeLabel(window[0].hour, window[window.length - 1].hour);
    }
  }
  return bestLabel;
};

/**
 * Scores each variable's mean raw value across the rows and returns the worst.
 * A variable with no known value scores 100 so it is never picked. Working from
 * the mean can hide a single extreme hour among calm ones.
 */
export const findLimitingFactor = (rows: readonly ScoredHourlyRecord[]): LimitingFactor => {
  const scoreMean = (values: (number | null)[], scorer: (value: number) => number): number => {
    const mean = meanOfKnown(values);
    return mean === null ? 100 : scorer(mean);
  };

  const candidates: [LimitingFactor, number][] = [
    ['wind', scoreMean(rows.map((row) => row.windKts), scoreWind)],
    ['gust', scoreMean(rows.map((row) => row.gustKts), scoreGust)],
    ['waveHeight', scoreMean(rows.map((row) => row.waveHeightM), scoreWaveHeight)],
    ['wavePeriod', scoreMean(rows.map((row) => row.wavePeriodS), scoreWavePeriod)],
    ['rain', scoreMean(rows.map((row) => row.rainMmh), scoreRain)],
  ];

  let [worst, worstScore] = candidates[0];
  for (const [factor, score] of candidates.slice(1)) {
    if (score < worstScore) {
      worst = factor;
      worstScore = score;
    }
  }
  return worst;
};

export const buildConditionStats = (rows: readonly ScoredHourlyRecord[]): ConditionStats => {
  const windDir = findDominantDirection(rows.map((row) => row.windDir));
  const limitingFactor = findLimitingFactor(rows);
  return {
    avgWindKts: roundOrNull(meanOfKnown(rows.map((row) => row.windKts)), 1),
    maxGustKts: roundOrNull(maxOfKnown(rows.map((row) => row.gustKts)), 1),
    avgWaveM: roundOrNull(meanOfKnown(rows.map((row) => row.waveHeightM)), 2),
    avgWavePeriodS: roundOrNull(meanOfKnown(rows.map((row) => row.wavePeriodS)), 1),
    maxRainMmh: roundOrNull(maxOfKnown(rows.map((row) => row.rainMmh)), 1),
    avgTempC: roundOrNull(meanOfKnown(rows.map((row) => row.tempC)), 1),
    windDir,
    windDirArrow: windDirectionArrow(windDir),
    windDirName: windDirectionNameFr(windDir),
    limitingFactor,
    limitingFactorLabel: LIMITING_FACTOR_LABELS[limitingFactor],
  };
};

export const aggregateDay = (
  rows: readonly ScoredHourlyRecord[],
  verdicts: Partial<VerdictThresholds> = {},
): DailySummary | null => {
  if (!rows.length) {
    return null;
  }
  const dailyScore = roundTo(meanScore(rows), 1);
  const verdict = getVerdict(dailyScore, verdicts);
  return {
    date: rows[0].date,
    dailyScore,
    verdict,
    cssClass: verdictCssClass(verdict),
    bestWindow: findBestWindow(rows),
    ...buildConditionStats(rows),
  };
};

export const summarizeDays = (
  rows: readonly ScoredHourlyRecord[],
  verdicts: Partial<VerdictThresholds> = {},
): DailySummary[] => {
  const summaries: DailySummary[] = [];
  for (const dayRows of groupBy(rows, (row) => row.date).values()) {
    const summary = aggregateDay(dayRows, verdicts);
    if (summary) {
      summaries.push(summary);
    }
  }
  return summaries.sort((a, b) => a.date.localeCompare(b.date));
};

interface ComputeWindowsOptions {
  hoursStart: number;
  nDays: number;
  /** Local date (`YYYY-MM-DD`) the run considers "today"; windows start the day after. */
  today: string;
  verdicts?: Partial<VerdictThresholds>;
}

export const computeWindows = (
  rows: readonly ScoredHourlyRecord[],
  { hoursStart, nDays, today, verdicts = {} }: ComputeWindowsOptions,
): WindowSummary[] => {
  const byDate = groupBy(rows, (row) => row.date);
  const windows: WindowSummary[] = [];

  for (let offset = 1; offset <= nDays; offset += 1) {
    const day = addDaysToDateKey(today, offset);
    const dayRows = day ? byDate.get(day) : undefined;
    if (!day || !dayRows?.length) {
      continue;
    }

    const slots = [...groupBy(dayRows, (row) => Math.floor((row.hour - hoursStart) / WINDOW_SLOT_HOURS)).entries()]
      .sort(([a], [b]) => a - b);
    for (const [, slotRows] of slots) {
      const startHour = slotRows[0].hour;
      const endHour = slotRows[slotRows.length - 1].hour;
      const score = roundTo(meanScore(slotRows), 1);
      const verdict = getVerdict(score, verdicts);
      windows.push({
        date: day,
        slot: formatHourRangeLabel(startHour, endHour),
        startHour,
        endHour,
        score,
        verdict,
        cssClass: verdictCssClass(verdict),
        ...buildConditionStats(slotRows),
      });
    }
  }

  return windows;
};

interface GetTodayHourlyOptions {
  today: string;
  verdicts?: Partial<VerdictThresholds>;
}

export const getTodayHourly = (
  rows: readonly ScoredHourlyRecord[],
  { today, verdicts = {} }: GetTodayHourlyOptions,
): TodayHour[] =>
  rows
    .filter((row) => row.date === today)
    .sort((a, b) => a.hour - b.hour)
    .map((row) => {
      const verdict = getVerdict(row.score, verdicts);
      return {
        hour: row.hour,
        timeLabel: formatHourLabel(row.hour),
        score: row.score,
        verdict,
        cssClass: verdictCssClass(verdict),
        windKts: roundOrNull(row.windKts, 1),
        gustKts: roundOrNull(row.gustKts, 1),
        windDir: row.windDir,
        waveHeightM: roundOrNull(row.waveHeightM, 2),
        wavePeriodS: roundOrNull(row.wavePeriodS, 1),
        rainMmh: roundOrNull(row.rainMmh, 1),
        tempC: roundOrNull(row.tempC, 1),
      };
    });
