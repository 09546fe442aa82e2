import type { TimeOfDay } from '../types/index.js';

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Parse "HH:MM" or "HH:MM:SS" into a TimeOfDay, or null when invalid
 */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = TIME_OF_DAY_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  const second = match[3] === undefined ? 0 : parseInt(match[3], 10);

  const time = { hour, minute, second };
  return isValidTimeOfDay(time) ? time : null;
}

/**
 * Whole hour 0-23, minute 0-59 and second 0-59
 */
export function isValidTimeOfDay(time: TimeOfDay): boolean {
  const inRange = (value: number, max: number) => Number.isInteger(value) && value >= 0 && value <= max;
  return inRange(time.hour, 23) && inRange(time.minute, 59) && inRange(time.second, 59);
}

/**
 * Milliseconds since UTC midnight
 */
export function timeOfDayMs(time: TimeOfDay): number {
  return time.hour * MS_PER_HOUR + time.minute * MS_PER_MINUTE + time.second * MS_PER_SECOND;
}

/**
 * The instant on the same UTC calendar date as `date` at the given time of day
 */
export function atTimeOfDay(date: Date, time: TimeOfDay): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate(), time.hour, time.minute, time.second)
  );
}

/**
 * Milliseconds elapsed since UTC midnight of `date`
 */
export function msSinceMidnight(date: Date): number {
  return (
    date.getUTCHours() * MS_PER_HOUR +
    date.getUTCMinutes() * MS_PER_MINUTE +
    date.getUTCSeconds() * MS_PER_SECOND +
    date.getUTCMilliseconds()
  );
}

export function addMs(date: Date, ms: number): Date {
  return new Date(date.getTime() + ms);
}
