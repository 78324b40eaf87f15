export const parseIsoTimeToMs = (value: string | null | undefined): number | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  const withTimezone = /([zZ]|[+\-]\d{2}:\d{2})$/.test(trimmed);
  const parsed = Date.parse(withTimezone ? trimmed : `${trimmed}Z`);
  return Number.isFinite(parsed) ? parsed : null;
};

export interface LocalTimestampParts {
  date: string;
  hour: number;
  offset: string | null;
}

// Reads the wall-clock date and hour straight from the string; the offset is kept, never applied.
export const parseLocalTimestamp = (value: string | null | undefined): LocalTimestampParts | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const match = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::\d{2}(?:\.\d+)?)?([zZ]|[+\-]\d{2}:\d{2})?$/);
  if (!match) {
    return null;
  }

  const month = Number(match[2]);
  const day = Number(match[3]);
  const hour = Number(match[4]);
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23) {
    return null;
  }

  return {
    date: `${match[1]}-${match[2]}-${match[3]}`,
    hour,
    offset: match[6] ? (match[6].toUpperCase() === 'Z' ? 'Z' : match[6]) : null,
  };
};

export const formatUtcOffset = (offsetSeconds: number): string => {
  const totalMinutes = Math.round((Number.isFinite(offsetSeconds) ? offsetSeconds : 0) / 60);
  const sign = totalMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(totalMinutes);
  const hours = Math.floor(absolute / 60);
  const minutes = absolute % 60;
  return `${sign}${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
};

export const dateKeyInTimeZone = (value: Date | string | number = new Date(), timeZone: string | null = null): string | null => {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    return null;
  }

  const formatWithZone = (zone: string | null): string | null => {
    try {
      const formatter = new Intl.DateTimeFormat('en-US', {
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        ...(zone ? { timeZone: zone } : {}),
      });
      const parts = formatter.formatToParts(date);
      const year = parts.find((part) => part.type === 'year')?.value;
      const month = parts.find((part) => part.type === 'month')?.value;
      const day = parts.find((part) => part.type === 'day')?.value;
      if (!year || !month || !day) {
        return null;
      }
      // MM/DD/YYYY -> YYYY-MM-DD
      return `${year}-${month}-${day}`;
    } catch {
      return null;
    }
  };

  const normalizedTimeZone = typeof timeZone === 'string' ? timeZone.trim() : '';
  return formatWithZone(normalizedTimeZone || null) || formatWithZone('UTC') || date.toISOString().slice(0, 10);
};

export const isDateKey = (value: unknown): value is string =>
  typeof value === 'string' && /^\d{4}-\d{2}-\d{2}$/.test(value) && Number.isFinite(Date.parse(`${value}T00:00:00Z`));

export const addDaysToDateKey = (dateKey: string, days: number): string | null => {
  if (!isDateKey(dateKey) || !Number.isInteger(days)) {
    return null;
  }
  const baseMs = Date.parse(`${dateKey}T00:00:00Z`);
  return new Date(baseMs + days * 24 * 60 * 60 * 1000).toISOString().slice(0, 10);
};

export const formatHourLabel = (hour: number): string => `${String(hour).padStart(2, '0')}h`;

export const formatHourRangeLabel = (startHour: number, endHour: number): string =>
  `${formatHourLabel(startHour)}–${formatHourLabel(endHour)}`;
