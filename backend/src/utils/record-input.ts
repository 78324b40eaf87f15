import { HourlyRecord } from './scoring.js';
import { normalizeWindDirection } from './wind.js';
import { parseIsoTimeToMs, parseLocalTimestamp } from './time.js';

const NUMERIC_FIELDS = ['windKts', 'gustKts', 'waveHeightM', 'wavePeriodS', 'tempC', 'rainMmh'] as const;

type NumericField = (typeof NUMERIC_FIELDS)[number];

export type RecordParseResult =
  | { ok: true; records: HourlyRecord[] }
  | { ok: false; errors: string[] };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseNumericField = (value: unknown): { value: number | null } | null => {
  if (value === undefined || value === null) {
    return { value: null };
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return { value };
  }
  return null;
};

/**
 * Validates posted hourly rows. Missing or null quantities become unknown.
 * Wrong types, timestamps without a UTC offset and timestamps that do not
 * strictly increase are reported per row.
 */
export const parseHourlyRecordInputs = (input: unknown): RecordParseResult => {
  if (!Array.isArray(input) || !input.length) {
    return { ok: false, errors: ['records must be a non-empty array.'] };
  }

  const errors: string[] = [];
  const records: HourlyRecord[] = [];
  let previousMs = Number.NEGATIVE_INFINITY;

  input.forEach((row: unknown, index) => {
    if (!isRecord(row)) {
      errors.push(`records[${index}] must be an object.`);
      return;
    }

    const time = typeof row.time === 'string' ? row.time.trim() : '';
    const parts = parseLocalTimestamp(time);
    const timeMs = parseIsoTimeToMs(time);
    if (!parts || timeMs === null) {
      errors.push(`records[${index}].time must be an ISO local timestamp (YYYY-MM-DDTHH:mm[:ss]±HH:mm).`);
      return;
    }
    if (parts.offset === null) {
      errors.push(`records[${index}].time must carry a UTC offset (Z or ±HH:mm).`);
      return;
    }
    if (timeMs <= previousMs) {
      errors.push(`records[${index}].time must be later than the previous record.`);
      return;
    }
    previousMs = timeMs;

    const values: Record<NumericField, number | null> = {
      windKts: null,
      gustKts: null,
      waveHeightM: null,
      wavePeriodS: null,
      tempC: null,
      rainMmh: null,
    };
    let rowValid = true;
    for (const field of NUMERIC_FIELDS) {
      const parsed = parseNumericField(row[field]);
      if (!parsed) {
        errors.push(`records[${index}].${field} must be a finite number or null.`);
        rowValid = false;
        continue;
      }
      values[field] = parsed.value;
    }

    const rawDirection = row.windDir;
    if (rawDirection !== undefined && rawDirection !== null && typeof rawDirection !== 'string') {
      errors.push(`records[${index}].windDir must be a compass direction string or null.`);
      rowValid = false;
    }
    if (!rowValid) {
      return;
    }

    records.push({
      time,
      date: parts.date,
      hour: parts.hour,
      windDir: typeof rawDirection === 'string' ? normalizeWindDirection(rawDirection) : null,
      ...values,
    });
  });

  return errors.length ? { ok: false, errors } : { ok: true, records };
};
