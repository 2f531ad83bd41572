/**
 * Time utilities for Session Insights
 */

// Time constants (milliseconds)
export const MS_PER_SECOND = 1000;

export const SECONDS_PER_MINUTE = 60;
export const SECONDS_PER_HOUR = 3600;

/**
 * Monday 00:00:00 local time for the week containing `timestamp`.
 *
 * @example
 * getWeekStart(new Date(2024, 0, 3).getTime()) // Wednesday -> Mon 2024-01-01 00:00
 */
export function getWeekStart(timestamp: number): number {
  const date = new Date(timestamp);
  // getDay(): 0 = Sunday ... 6 = Saturday
  const daysSinceMonday = (date.getDay() + 6) % 7;
  date.setDate(date.getDate() - daysSinceMonday);
  date.setHours(0, 0, 0, 0);
  return date.getTime();
}

/**
 * Shift a local-midnight timestamp by whole days, staying on local midnight
 * across DST changes.
 */
export function addDays(timestamp: number, days: number): number {
  const date = new Date(timestamp);
  date.setDate(date.getDate() + days);
  return date.getTime();
}

export function addWeeks(timestamp: number, weeks: number): number {
  return addDays(timestamp, weeks * 7);
}

/**
 * Start of the previous week, as a storage key.
 */
export function previousWeekStart(weekStart: number): number {
  return addWeeks(weekStart, -1);
}

/**
 * Format a timestamp as YYYY-MM-DD in local time
 */
export function formatDay(timestamp: number): string {
  const date = new Date(timestamp);
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Format seconds as "Xh Ym"
 */
export function formatHoursMinutes(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / SECONDS_PER_HOUR);
  const minutes = Math.floor((totalSeconds % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  return `${hours}h ${minutes}m`;
}
