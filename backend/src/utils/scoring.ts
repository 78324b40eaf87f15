export type FishingVariable = 'wind' | 'gust' | 'waveHeight' | 'wavePeriod' | 'rain' | 'temperature';

export type CurvePoint = readonly [x: number, y: number];
export type ScoringCurve = readonly [CurvePoint, ...CurvePoint[]];

export type Verdict = 'Excellent' | 'Favorable' | 'Moyen' | 'Déconseillé';
export type VerdictCssClass = 'excellent' | 'favorable' | 'moyen' | 'deconseille';

export interface ScoringWeights {
  wind: number;
  gust: number;
  waveHeight: number;
  wavePeriod: number;
  rain: number;
  temperature: number;
}

export interface VerdictThresholds {
  excellent: number;
  favorable: number;
  moyen: number;
}

export interface HourlyConditions {
  windKts: number | null;
  gustKts: number | null;
  waveHeightM: number | null;
  wavePeriodS: number | null;
  rainMmh: number | null;
  tempC: number | null;
}

export interface HourlyRecord extends HourlyConditions {
  /** Local ISO timestamp carrying its UTC offset, e.g. `2025-06-14T07:00:00+02:00`. */
  time: string;
  date: string;
  hour: number;
  windDir: string | null;
}

export interface ScoredHourlyRecord extends HourlyRecord {
  score: number;
  verdict: Verdict;
}

// Tunable control points, ordered by x. Kept as data so curve changes never touch control flow.
export const SCORING_CURVES: Readonly<Record<FishingVariable, ScoringCurve>> = {
  wind: [[0, 100], [10, 100], [15, 90], [20, 60], [25, 25], [30, 5], [35, 0]],
  gust: [[0, 100], [12, 100], [17, 85], [20, 55], [25, 15], [30, 0]],
  waveHeight: [[0, 100], [0.5, 100], [0.8, 75], [1.2, 40], [1.5, 10], [2.0, 0]],
  wavePeriod: [[3, 0], [6, 20], [8, 55], [10, 80], [12, 100], [20, 100]],
  rain: [[0, 100], [1, 85], [3, 50], [6, 15], [10, 0]],
  temperature: [[-5, 0], [5, 30], [10, 60], [15, 90], [20, 100], [25, 100], [30, 70], [35, 40]],
};

// Missing data scores neutral rather than zero.
export const NEUTRAL_SCORES: Readonly<Record<FishingVariable, number>> = {
  wind: 50,
  gust: 50,
  waveHeight: 50,
  wavePeriod: 50,
  rain: 80,
  temperature: 70,
};

export const DEFAULT_WEIGHTS: Readonly<ScoringWeights> = {
  wind: 0.25,
  gust: 0.2,
  waveHeight: 0.15,
  wavePeriod: 0.2,
  rain: 0.1,
  temperature: 0.1,
};

export const DEFAULT_VERDICT_THRESHOLDS: Readonly<VerdictThresholds> = {
  excellent: 70,
  favorable: 50,
  moyen: 30,
};

export const BLOCKING_SCORE_CAP = 20;

export const BLOCKING_LIMITS = {
  maxWindKts: 25,
  maxGustKts: 30,
  maxWaveHeightM: 2.0,
  maxSteepness: 0.18,
  maxWaveHeightWithoutPeriodM: 1.4,
} as const;

const VERDICT_CSS_CLASSES: Record<Verdict, VerdictCssClass> = {
  Excellent: 'excellent',
  Favorable: 'favorable',
  Moyen: 'moyen',
  'Déconseillé': 'deconseille',
};

export const isKnownValue = (value: number | null | undefined): value is number =>
  typeof value === 'number' && Number.isFinite(value);

// Exact binary ties round to even (60.25 -> 60.2); everything else rounds to nearest.
export const roundTo = (value: number, digits: number): number => {
  if (!Number.isFinite(value)) {
    return value;
  }
  const expansion = Math.abs(value).toFixed(digits + 25);
  const tail = expansion.slice(expansion.indexOf('.') + 1 + digits);
  if (!/^50*$/.test(tail)) {
    return Number(value.toFixed(digits));
  }
  const factor = 10 ** digits;
  const lower = Math.floor(Math.abs(value) * factor);
  const even = lower % 2 === 0 ? lower : lower + 1;
  return (Math.sign(value) * even) / factor;
};

export const interpolatePiecewiseLinear = (value: number, curve: ScoringCurve): number => {
  const first = curve[0];
  const last = curve[curve.length - 1];
  if (value <= first[0]) {
    return first[1];
  }
  if (value >= last[0]) {
    return last[1];
  }

  for (let index = 0; index < curve.length - 1; index += 1) {
    const [x0, y0] = curve[index];
    const [x1, y1] = curve[index + 1];
    if (value >= x0 && value <= x1) {
      const t = (value - x0) / (x1 - x0);
      return y0 + t * (y1 - y0);
    }
  }

  return last[1];
};

export const scoreVariable = (
  variable: FishingVariable,
  value: number | null | undefined,
  curve: ScoringCurve = SCORING_CURVES[variable],
): number => {
  if (!isKnownValue(value)) {
    return NEUTRAL_SCORES[variable];
  }
  return Math.min(100, Math.max(0, interpolatePiecewiseLinear(value, curve)));
};

export const scoreWind = (windKts: number | null | undefined, curve?: ScoringCurve): number => scoreVariable('wind', windKts, curve);
export const scoreGust = (gustKts: number | null | undefined, curve?: ScoringCurve): number => scoreVariable('gust', gustKts, curve);
export const scoreWaveHeight = (waveHeightM: number | null | undefined, curve?: ScoringCurve): number =>
  scoreVariable('waveHeight', waveHeightM, curve);
export const scoreWavePeriod = (wavePeriodS: number | null | undefined, curve?: ScoringCurve): number =>
  scoreVariable('wavePeriod', wavePeriodS, curve);
export const scoreRain = (rainMmh: number | null | undefined, curve?: ScoringCurve): number => scoreVariable('rain', rainMmh, curve);
export const scoreTemperature = (tempC: number | null | undefined, curve?: ScoringCurve): number =>
  scoreVariable('temperature', tempC, curve);

/**
 * Hard veto for an hour. Any rule that holds blocks the hour; unknown values never trigger a rule.
 *
 * Steepness (height / period) separates short breaking chop from long swell:
 * 1 m at 5 s (0.20) is blocked while 1.5 m at 14 s (~0.107) is not. When the
 * period is unknown the height alone is held to a lower ceiling.
 */
export const isBlocking = (
  windKts: number | null | undefined,
  gustKts: number | null | undefined,
  waveHeightM: number | null | undefined,
  wavePeriodS: number | null | undefined,
): boolean => {
  if (isKnownValue(windKts) && windKts > BLOCKING_LIMITS.maxWindKts) {
    return true;
  }
  if (isKnownValue(gustKts) && gustKts > BLOCKING_LIMITS.maxGustKts) {
    return true;
  }
  if (!isKnownValue(waveHeightM)) {
    return false;
  }
  if (waveHeightM > BLOCKING_LIMITS.maxWaveHeightM) {
    return true;
  }
  if (isKnownValue(wavePeriodS) && wavePeriodS > 0) {
    return waveHeightM / wavePeriodS > BLOCKING_LIMITS.maxSteepness;
  }
  return waveHeightM > BLOCKING_LIMITS.maxWaveHeightWithoutPeriodM;
};

export const resolveWeights = (weights: Partial<ScoringWeights> = {}): ScoringWeights => ({
  wind: isKnownValue(weights.wind) ? weights.wind : DEFAULT_WEIGHTS.wind,
  gust: isKnownValue(weights.gust) ? weights.gust : DEFAULT_WEIGHTS.gust,
  waveHeight: isKnownValue(weights.waveHeight) ? weights.waveHeight : DEFAULT_WEIGHTS.waveHeight,
  wavePeriod: isKnownValue(weights.wavePeriod) ? weights.wavePeriod : DEFAULT_WEIGHTS.wavePeriod,
  rain: isKnownValue(weights.rain) ? weights.rain : DEFAULT_WEIGHTS.rain,
  temperature: isKnownValue(weights.temperature) ? weights.temperature : DEFAULT_WEIGHTS.temperature,
});

export const resolveVerdictThresholds = (thresholds: Partial<VerdictThresholds> = {}): VerdictThresholds => ({
  excellent: isKnownValue(thresholds.excellent) ? thresholds.excellent : DEFAULT_VERDICT_THRESHOLDS.excellent,
  favorable: isKnownValue(thresholds.favorable) ? thresholds.favorable : DEFAULT_VERDICT_THRESHOLDS.favorable,
  moyen: isKnownValue(thresholds.moyen) ? thresholds.moyen : DEFAULT_VERDICT_THRESHOLDS.moyen,
});

export const scoreHour = (record: HourlyConditions, weights: Partial<ScoringWeights> = {}): number => {
  const resolved = resolveWeights(weights);
  const total =
    scoreWind(record.windKts) * resolved.wind +
    scoreGust(record.gustKts) * resolved.gust +
    scoreWaveHeight(record.waveHeightM) * resolved.waveHeight +
    scoreWavePeriod(record.wavePeriodS) * resolved.wavePeriod +
    scoreRain(record.rainMmh) * resolved.rain +
    scoreTemperature(record.tempC) * resolved.temperature;

  const capped = isBlocking(record.windKts, record.gustKts, record.waveHeightM, record.wavePeriodS)
    ? Math.min(total, BLOCKING_SCORE_CAP)
    : total;
  return roundTo(capped, 1);
};

export const getVerdict = (score: number, thresholds: Partial<VerdictThresholds> = {}): Verdict => {
  const resolved = resolveVerdictThresholds(thresholds);
  if (score >= resolved.excellent) return 'Excellent';
  if (score >= resolved.favorable) return 'Favorable';
  if (score >= resolved.moyen) return 'Moyen';
  return 'Déconseillé';
};

export const verdictCssClass = (verdict: Verdict): VerdictCssClass => VERDICT_CSS_CLASSES[verdict];

interface ScoreRecordsOptions {
  weights?: Partial<ScoringWeights>;
  verdicts?: Partial<VerdictThresholds>;
}

export const scoreRecords = (
  records: readonly HourlyRecord[],
  { weights = {}, verdicts = {} }: ScoreRecordsOptions = {},
): ScoredHourlyRecord[] =>
  records.map((record) => {
    const score = scoreHour(record, weights);
    return { ...record, score, verdict: getVerdict(score, verdicts) };
  });
