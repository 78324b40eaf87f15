import { parseHourlyRecordInputs } from '../src/utils/record-input.js';

test('parseHourlyRecordInputs builds records from posted rows', () => {
  const result = parseHourlyRecordInputs([
    { time: '2025-06-14T07:00:00+02:00', windKts: 12, windDir: 'north west' },
    { time: '2025-06-14T08:00+02:00', gustKts: null, tempC: 18.5 },
  ]);
  expect(result).toEqual({
    ok: true,
    records: [
      {
        time: '2025-06-14T07:00:00+02:00',
        date: '2025-06-14',
        hour: 7,
        windDir: 'NW',
        windKts: 12,
        gustKts: null,
        waveHeightM: null,
        wavePeriodS: null,
        tempC: null,
        rainMmh: null,
      },
      {
        time: '2025-06-14T08:00+02:00',
        date: '2025-06-14',
        hour: 8,
        windDir: null,
        windKts: null,
        gustKts: null,
        waveHeightM: null,
        wavePeriodS: null,
        tempC: 18.5,
        rainMmh: null,
      },
    ],
  });
});

test('parseHourlyRecordInputs rejects an empty or missing list', () => {
  expect(parseHourlyRecordInputs([])).toEqual({ ok: false, errors: ['records must be a non-empty array.'] });
  expect(parseHourlyRecordInputs(undefined)).toEqual({ ok: false, errors: ['records must be a non-empty array.'] });
});

test('parseHourlyRecordInputs reports each bad row', () => {
  const result = parseHourlyRecordInputs([
    { time: '2025-06-14T08:00:00+02:00' },
    { time: '2025-06-14T07:00:00+02:00' },
    { time: 'nope' },
    { time: '2025-06-14T09:00:00+02:00', windKts: '12', windDir: 270 },
    5,
  ]);
  expect(result).toEqual({
    ok: false,
    errors: [
      'records[1].time must be later than the previous record.',
      'records[2].time must be an ISO local timestamp (YYYY-MM-DDTHH:mm[:ss]±HH:mm).',
      'records[3].windKts must be a finite number or null.',
      'records[3].windDir must be a compass direction string or null.',
      'records[4] must be an object.',
    ],
  });
});

test('parseHourlyRecordInputs requires a UTC offset on every row', () => {
  const result = parseHourlyRecordInputs([
    { time: '2025-06-15T06:00:00+02:00', windKts: 8 },
    { time: '2025-06-15T05:00', windKts: 9 },
  ]);
  expect(result).toEqual({
    ok: false,
    errors: ['records[1].time must carry a UTC offset (Z or ±HH:mm).'],
  });
});

test('parseHourlyRecordInputs drops non-compass wind labels', () => {
  const result = parseHourlyRecordInputs([{ time: '2025-06-15T06:00:00+02:00', windDir: 'calm' }]);
  expect(result.ok).toBe(true);
  if (result.ok) {
    expect(result.records[0].windDir).toBeNull();
  }
});
