import { HourlyRecord, ScoredHourlyRecord, scoreRecords } from './scoring.js';
import {
  DailySummary,
  TodayHour,
  WindowSummary,
  computeWindows,
  getTodayHourly,
  summarizeDays,
} from './aggregation.js';
import { FishingConfig } from './fishing-config.js';

export interface FishingForecast {
  today: string;
  hourly: ScoredHourlyRecord[];
  daily: DailySummary[];
  windows: WindowSummary[];
  todayHourly: TodayHour[];
}

/** Runs the whole scoring core over already-normalized records. */
export const buildFishingForecast = (
  records: readonly HourlyRecord[],
  config: FishingConfig,
  today: string,
): FishingForecast => {
  const { weights, verdicts } = config.scoring;
  const hourly = scoreRecords(records, { weights, verdicts });
  const daily = summarizeDays(hourly, verdicts);
  const windows = computeWindows(hourly, {
    hoursStart: config.fishing.hoursStart,
    nDays: config.fishing.windowDays,
    today,
    verdicts,
  });

  return {
    today,
    hourly,
    daily,
    windows,
    todayHourly: getTodayHourly(hourly, { today, verdicts }),
  };
};
