import { ConfigurationError } from '../utils/errors.js';

/**
 * Wall-clock components of an instant in a particular time zone.
 * `month` is 1-12 and `weekday` is 0 (Sunday) to 6 (Saturday).
 */
export interface ZonedDateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekday: number;
}

const WEEKDAYS: Partial<Record<string, number>> = {
  Sun: 0,
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6,
};

export function isValidTimeZone(timeZone: string): boolean {
  try {
    Intl.DateTimeFormat(undefined, { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Converts UTC instants into the wall-clock time of an IANA zone.
 */
export class ZonedTime {
  private readonly formatter: Intl.DateTimeFormat | null;

  constructor(public readonly timeZone: string) {
    if (!isValidTimeZone(timeZone)) {
      throw new ConfigurationError(`Unknown time zone "${timeZone}"`, { timeZone });
    }
    this.formatter =
      timeZone === 'UTC'
        ? null
        : new Intl.DateTimeFormat('en-US', {
            timeZone,
            hourCycle: 'h23',
            year: 'numeric',
            month: 'numeric',
            day: 'numeric',
            hour: 'numeric',
            minute: 'numeric',
            second: 'numeric',
            weekday: 'short',
          });
  }

  static utc(): ZonedTime {
    return new ZonedTime('UTC');
  }

  convert(utc: Date): ZonedDateParts {
    if (!this.formatter) {
      return {
        year: utc.getUTCFullYear(),
        month: utc.getUTCMonth() + 1,
        day: utc.getUTCDate(),
        hour: utc.getUTCHours(),
        minute: utc.getUTCMinutes(),
        second: utc.getUTCSeconds(),
        weekday: utc.getUTCDay(),
      };
    }

    const parts: Partial<Record<Intl.DateTimeFormatPartTypes, string>> = {};
    for (const part of this.formatter.formatToParts(utc)) {
      parts[part.type] = part.value;
    }

    const weekday = WEEKDAYS[parts.weekday ?? ''];
    if (weekday === undefined) {
      throw new Error(`Cannot read weekday for ${utc.toISOString()} in ${this.timeZone}`);
    }

    return {
      year: Number(parts.year),
      month: Number(parts.month),
      day: Number(parts.day),
      // some ICU builds still print midnight as 24 with h23
      hour: Number(parts.hour) % 24,
      minute: Number(parts.minute),
      second: Number(parts.second),
      weekday,
    };
  }
}
