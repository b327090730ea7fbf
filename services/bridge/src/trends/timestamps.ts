import type { NormalizedTimestamp } from './types';

export class TimestampError extends Error {
  readonly value: string;

  constructor(value: string, reason: string) {
    super(`Unparseable timestamp '${value}': ${reason}`);
    this.name = 'TimestampError';
    this.value = value;
  }
}

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?(?:(Z)|([+-])(\d{2})(?::?(\d{2}))?)?$/i;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return month === 2 && leap ? 29 : DAYS_IN_MONTH[month - 1];
}

function toInt(value: string | undefined): number {
  return value === undefined ? 0 : Number.parseInt(value, 10);
}

/**
 * Parses a log timestamp into an absolute instant.
 *
 * Strings carrying `Z` or a numeric offset keep that offset, fractional seconds included
 * (millisecond precision). Strings without zone information lose their fractional part and
 * are read as UTC wall-clock time.
 */
export function normalizeTimestamp(value: string): NormalizedTimestamp {
  const trimmed = value.trim();
  const match = TIMESTAMP_PATTERN.exec(trimmed);
  if (!match) {
    throw new TimestampError(value, 'does not match YYYY-MM-DDTHH:MM[:SS[.fff]][zone]');
  }

  const [, yearRaw, monthRaw, dayRaw, hourRaw, minuteRaw, secondRaw, fractionRaw, utcMarker, sign, offsetHoursRaw, offsetMinutesRaw] =
    match;
  const year = toInt(yearRaw);
  const month = toInt(monthRaw);
  const day = toInt(dayRaw);
  const hour = toInt(hourRaw);
  const minute = toInt(minuteRaw);
  const second = toInt(secondRaw);

  if (month < 1 || month > 12) {
    throw new TimestampError(value, `month ${month} out of range`);
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    throw new TimestampError(value, `day ${day} out of range`);
  }
  if (hour > 23 || minute > 59 || second > 59) {
    throw new TimestampError(value, 'time of day out of range');
  }

  const zoned = utcMarker !== undefined || sign !== undefined;
  let offsetMinutes = 0;
  if (sign !== undefined) {
    const offsetHours = toInt(offsetHoursRaw);
    const offsetRemainder = toInt(offsetMinutesRaw);
    if (offsetHours > 23 || offsetRemainder > 59) {
      throw new TimestampError(value, 'utc offset out of range');
    }
    offsetMinutes = (sign === '-' ? -1 : 1) * (offsetHours * 60 + offsetRemainder);
  }

  const millisecond = zoned && fractionRaw !== undefined ? toInt(fractionRaw.slice(0, 3).padEnd(3, '0')) : 0;

  const wallClock = new Date(Date.UTC(2000, month - 1, day, hour, minute, second, millisecond));
  wallClock.setUTCFullYear(year);

  return {
    epochMs: wallClock.getTime() - offsetMinutes * 60_000,
    offsetMinutes
  };
}
