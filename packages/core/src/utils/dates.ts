/**
 * Date utilities - all calendar math is done on YYYY-MM-DD strings in UTC
 */
import { DayPeriod, periodForHour } from '../types';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

/**
 * Format a date as ISO string (YYYY-MM-DD)
 */
export function toISODateString(date: Date): string {
  return date.toISOString().substring(0, 10);
}

function parseISODate(isoDate: string): number {
  const [year, month, day] = isoDate.split('-').map(Number);
  return Date.UTC(year, month - 1, day);
}

/**
 * Shift a YYYY-MM-DD date by a number of days
 */
export function addDays(isoDate: string, days: number): string {
  return toISODateString(new Date(parseISODate(isoDate) + days * MS_PER_DAY));
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseISODate(to) - parseISODate(from)) / MS_PER_DAY);
}

/**
 * Day of week for a YYYY-MM-DD date (0 = Sunday)
 */
export function dayOfWeek(isoDate: string): number {
  return new Date(parseISODate(isoDate)).getUTCDay();
}

/**
 * Store-local date and day period for an instant
 */
export function localDateAndPeriod(
  instant: Date,
  utcOffsetMinutes: number
): { date: string; period: DayPeriod } {
  const local = new Date(instant.getTime() + utcOffsetMinutes * 60 * 1000);
  return {
    date: toISODateString(local),
    period: periodForHour(local.getUTCHours()),
  };
}

/**
 * Hours elapsed between an ISO timestamp and now (never negative)
 */
export function hoursSince(isoTimestamp: string, now: Date): number {
  return Math.max(0, (now.getTime() - new Date(isoTimestamp).getTime()) / (60 * 60 * 1000));
}
