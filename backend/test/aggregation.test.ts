import { ScoredHourlyRecord, getVerdict } from '../src/utils/scoring.js';
import {
  aggregateDay,
  buildConditionStats,
  computeWindows,
  findBestWindow,
  findLimitingFactor,
  getTodayHourly,
  summarizeDays,
} from '../src/utils/aggregation.js';

const scoredRow = (
  date: string,
  hour: number,
  score: number,
  overrides: Partial<ScoredHourlyRecord> = {},
): ScoredHourlyRecord => ({
  time: `${date}T${String(hour).padStart(2, '0')}:00:00+02:00`,
  date,
  hour,
  windKts: null,
  gustKts: null,
  waveHeightM: null,
  wavePeriodS: null,
  rainMmh: null,
  tempC: null,
  windDir: null,
  score,
  verdict: getVerdict(score),
  ...overrides,
});

const dayRows = (date: string, firstHour: number, scores: number[]): ScoredHourlyRecord[] =>
  scores.map((score, index) => scoredRow(date, firstHour + index, score));

test('aggregateDay averages hourly scores into a verdict', () => {
  const summary = aggregateDay(dayRows('2025-06-14', 6, [80, 60, 40]));
  expect(summary).not.toBeNull();
  expect(summary?.date).toBe('2025-06-14');
  expect(summary?.dailyScore).toBe(60);
  expect(summary?.verdict).toBe('Favorable');
  expect(summary?.cssClass).toBe('favorable');
  expect(summary?.bestWindow).toBe('06h–08h');
});

test('aggregateDay rounds an exact tie to the even tenth', () => {
  expect(aggregateDay(dayRows('2025-06-14', 6, [60.5, 60]))?.dailyScore).toBe(60.2);
});

test('aggregateDay returns null for an empty day', () => {
  expect(aggregateDay([])).toBeNull();
});

test('findBestWindow picks the highest three-hour mean', () => {
  expect(findBestWindow(dayRows('2025-06-14', 6, [40, 90, 90, 90]))).toBe('07h–09h');
});

test('findBestWindow keeps the earliest window on ties', () => {
  expect(findBestWindow(dayRows('2025-06-14', 10, [50, 50, 50, 50]))).toBe('10h–12h');
});

test('findBestWindow handles short days', () => {
  expect(findBestWindow(dayRows('2025-06-14', 6, [70, 20]))).toBe('06h–07h');
  expect(findBestWindow(dayRows('2025-06-14', 6, [70]))).toBe('–');
  expect(findBestWindow([])).toBe('–');
});

test('findLimitingFactor picks the worst scoring variable', () => {
  const windy = [
    scoredRow('2025-06-14', 6, 50, { windKts: 20, gustKts: 15, waveHeightM: 0.4, wavePeriodS: 12, rainMmh: 0 }),
  ];
  expect(findLimitingFactor(windy)).toBe('wind');

  const choppy = [
    scoredRow('2025-06-14', 6, 50, { windKts: 20, gustKts: 15, waveHeightM: 0.4, wavePeriodS: 5, rainMmh: 0 }),
  ];
  expect(findLimitingFactor(choppy)).toBe('wavePeriod');
});

test('findLimitingFactor ignores temperature', () => {
  const rainyAndCold = [
    scoredRow('2025-06-14', 6, 50, { windKts: 5, gustKts: 5, waveHeightM: 0.3, wavePeriodS: 14, rainMmh: 4, tempC: -5 }),
  ];
  expect(findLimitingFactor(rainyAndCold)).toBe('rain');
});

test('findLimitingFactor defaults to wind when nothing is known', () => {
  expect(findLimitingFactor([scoredRow('2025-06-14', 6, 55)])).toBe('wind');
});

test('buildConditionStats rounds averages and labels the dominant wind', () => {
  const rows = [
    scoredRow('2025-06-14', 6, 80, { windKts: 10, gustKts: 14, waveHeightM: 0.4, windDir: 'W', rainMmh: 0.2 }),
    scoredRow('2025-06-14', 7, 80, { windKts: 12, gustKts: 18, waveHeightM: 0.5, windDir: 'W', rainMmh: 1.46 }),
    scoredRow('2025-06-14', 8, 80, { windKts: null, gustKts: 20, waveHeightM: 0.45, windDir: 'SW' }),
  ];
  const stats = buildConditionStats(rows);
  expect(stats.avgWindKts).toBe(11);
  expect(stats.maxGustKts).toBe(20);
  expect(stats.avgWaveM).toBe(0.45);
  expect(stats.avgWavePeriodS).toBeNull();
  expect(stats.maxRainMmh).toBe(1.5);
  expect(stats.avgTempC).toBeNull();
  expect(stats.windDir).toBe('W');
  expect(stats.windDirArrow).toBe('→');
  expect(stats.windDirName).toBe('Ouest');
  expect(stats.limitingFactor).toBe('gust');
  expect(stats.limitingFactorLabel).toBe('rafales');
});

test('summarizeDays returns one summary per date in date order', () => {
  const rows = [...dayRows('2025-06-15', 6, [30, 30, 30]), ...dayRows('2025-06-14', 6, [90, 90, 90])];
  const summaries = summarizeDays(rows);
  expect(summaries.map((summary) => [summary.date, summary.dailyScore, summary.verdict])).toEqual([
    ['2025-06-14', 90, 'Excellent'],
    ['2025-06-15', 30, 'Moyen'],
  ]);
});

test('computeWindows slices the following days into three-hour slots', () => {
  const rows = [
    ...dayRows('2025-06-14', 6, [10, 10, 10]),
    ...dayRows('2025-06-15', 6, [80, 80, 80, 40, 40, 40]),
    ...dayRows('2025-06-18', 6, [90, 90, 90]),
  ];
  const windows = computeWindows(rows, { hoursStart: 6, nDays: 3, today: '2025-06-14' });
  expect(windows.map((window) => [window.date, window.slot, window.score, window.verdict])).toEqual([
    ['2025-06-15', '06h–08h', 80, 'Excellent'],
    ['2025-06-15', '09h–11h', 40, 'Moyen'],
  ]);
  expect(windows[0].startHour).toBe(6);
  expect(windows[0].endHour).toBe(8);
});

test('computeWindows anchors slots on the first fishing hour', () => {
  const rows = dayRows('2025-06-15', 14, [60, 60, 60, 60]);
  const windows = computeWindows(rows, { hoursStart: 6, nDays: 1, today: '2025-06-14' });
  expect(windows.map((window) => window.slot)).toEqual(['14h–14h', '15h–17h']);
});

test('computeWindows follows a moved anchor', () => {
  const rows = dayRows('2025-06-15', 14, [60, 60, 60, 60]);
  const windows = computeWindows(rows, { hoursStart: 5, nDays: 1, today: '2025-06-14' });
  expect(windows.map((window) => window.slot)).toEqual(['14h–16h', '17h–17h']);
});

test('getTodayHourly lists today in hour order with rounded values', () => {
  const rows = [
    scoredRow('2025-06-14', 8, 64, { windKts: 12.34, waveHeightM: 0.456 }),
    scoredRow('2025-06-14', 7, 72),
    scoredRow('2025-06-15', 7, 90),
  ];
  const hours = getTodayHourly(rows, { today: '2025-06-14' });
  expect(hours.map((hour) => hour.timeLabel)).toEqual(['07h', '08h']);
  expect(hours[1]).toMatchObject({
    hour: 8,
    score: 64,
    verdict: 'Favorable',
    cssClass: 'favorable',
    windKts: 12.3,
    waveHeightM: 0.46,
  });
});

test('aggregation is repeatable and leaves its input untouched', () => {
  const rows = [
    ...dayRows('2025-06-15', 6, [30, 50, 70]),
    ...dayRows('2025-06-14', 6, [90, 80, 70]),
  ];
  const snapshot = structuredClone(rows);
  const options = { hoursStart: 6, nDays: 3, today: '2025-06-14' };

  expect(summarizeDays(rows)).toEqual(summarizeDays(rows));
  expect(computeWindows(rows, options)).toEqual(computeWindows(rows, options));
  expect(getTodayHourly(rows, { today: '2025-06-14' })).toEqual(getTodayHourly(rows, { today: '2025-06-14' }));
  expect(rows).toEqual(snapshot);
});
