/**
 * @quarry/core - Date/time predicates
 *
 * Calendar checks read UTC fields so results do not depend on the host time
 * zone. Timestamps are epoch milliseconds.
 */

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/** Business hours are [09:00, 17:00) */
export const BUSINESS_DAY_START_HOUR = 9;
export const BUSINESS_DAY_END_HOUR = 17;

export function isAfter(time: Date, reference: Date): boolean {
  return time.getTime() > reference.getTime();
}

export function isBefore(time: Date, reference: Date): boolean {
  return time.getTime() < reference.getTime();
}

/**
 * Inclusive on both ends.
 */
export function isBetween(time: Date, start: Date, end: Date): boolean {
  const t = time.getTime();
  return t >= start.getTime() && t <= end.getTime();
}

export function isSameDay(a: Date, b: Date): boolean {
  return (
    a.getUTCFullYear() === b.getUTCFullYear() &&
    a.getUTCMonth() === b.getUTCMonth() &&
    a.getUTCDate() === b.getUTCDate()
  );
}

/**
 * Day of week with Monday = 0 and Sunday = 6.
 */
export function dayOfWeek(time: Date): number {
  return (time.getUTCDay() + 6) % 7;
}

export function isWeekend(time: Date): boolean {
  return dayOfWeek(time) >= 5;
}

export function isWeekday(time: Date): boolean {
  return dayOfWeek(time) < 5;
}

export function isBusinessHours(time: Date): boolean {
  const hour = time.getUTCHours();
  return hour >= BUSINESS_DAY_START_HOUR && hour < BUSINESS_DAY_END_HOUR;
}

/** Month is 1-12 */
export function extractMonth(time: Date): number {
  return time.getUTCMonth() + 1;
}

export function startOfDay(time: Date): Date {
  return new Date(Date.UTC(time.getUTCFullYear(), time.getUTCMonth(), time.getUTCDate()));
}

export function addDays(time: Date, days: number): Date {
  return new Date(time.getTime() + days * DAY_MS);
}

/**
 * Whole days from `a` to `b`, truncated toward zero.
 */
export function daysBetween(a: Date, b: Date): number {
  return Math.trunc((b.getTime() - a.getTime()) / DAY_MS);
}

export function hoursBetween(a: Date, b: Date): number {
  return Math.trunc((b.getTime() - a.getTime()) / HOUR_MS);
}
