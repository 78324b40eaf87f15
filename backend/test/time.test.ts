import {
  addDaysToDateKey,
  dateKeyInTimeZone,
  formatHourRangeLabel,
  formatUtcOffset,
  isDateKey,
  parseLocalTimestamp,
} from '../src/utils/time.js';

test('parseLocalTimestamp keeps wall-clock date and hour', () => {
  expect(parseLocalTimestamp('2025-06-14T07:00:00+02:00')).toEqual({ date: '2025-06-14', hour: 7, offset: '+02:00' });
  expect(parseLocalTimestamp('2025-06-14T23:30')).toEqual({ date: '2025-06-14', hour: 23, offset: null });
  expect(parseLocalTimestamp('2025-06-14T07:00:00z')).toEqual({ date: '2025-06-14', hour: 7, offset: 'Z' });
});

test('parseLocalTimestamp rejects malformed timestamps', () => {
  expect(parseLocalTimestamp('2025-06-14T24:00')).toBeNull();
  expect(parseLocalTimestamp('2025-13-14T07:00')).toBeNull();
  expect(parseLocalTimestamp('garbage')).toBeNull();
  expect(parseLocalTimestamp(undefined)).toBeNull();
});

test('formatUtcOffset renders signed hours and minutes', () => {
  expect(formatUtcOffset(7200)).toBe('+02:00');
  expect(formatUtcOffset(-16200)).toBe('-04:30');
  expect(formatUtcOffset(0)).toBe('+00:00');
});

test('date keys', () => {
  expect(isDateKey('2025-06-14')).toBe(true);
  expect(isDateKey('2025-6-14')).toBe(false);
  expect(isDateKey('2025-13-01')).toBe(false);
  expect(addDaysToDateKey('2025-02-28', 1)).toBe('2025-03-01');
  expect(addDaysToDateKey('2024-12-31', 1)).toBe('2025-01-01');
  expect(addDaysToDateKey('bad', 1)).toBeNull();
});

test('dateKeyInTimeZone uses the local calendar day', () => {
  const lateEvening = new Date('2025-06-14T22:30:00Z');
  expect(dateKeyInTimeZone(lateEvening, 'Europe/Paris')).toBe('2025-06-15');
  expect(dateKeyInTimeZone(lateEvening, 'UTC')).toBe('2025-06-14');
  expect(dateKeyInTimeZone(lateEvening, 'Mars/Olympus')).toBe('2025-06-14');
  expect(dateKeyInTimeZone('not a date', 'UTC')).toBeNull();
});

test('formatHourRangeLabel pads hours', () => {
  expect(formatHourRangeLabel(6, 8)).toBe('06h–08h');
  expect(formatHourRangeLabel(21, 21)).toBe('21h–21h');
});
