import { describe, it, expect } from 'vitest';
import {
  addDays,
  dayOfWeek,
  daysBetween,
  extractMonth,
  hoursBetween,
  isBetween,
  isBusinessHours,
  isSameDay,
  isWeekday,
  isWeekend,
  startOfDay,
} from '../datetime.js';

const utc = (iso: string) => new Date(iso);

describe('datetime helpers', () => {
  it('should number days from Monday', () => {
    expect(dayOfWeek(utc('2024-03-04T12:00:00Z'))).toBe(0);
    expect(dayOfWeek(utc('2024-03-10T12:00:00Z'))).toBe(6);
  });

  it('should classify weekends and weekdays', () => {
    expect(isWeekend(utc('2024-03-09T00:00:00Z'))).toBe(true);
    expect(isWeekday(utc('2024-03-08T23:59:59Z'))).toBe(true);
  });

  it('should use a 09:00-17:00 business window, end exclusive', () => {
    expect(isBusinessHours(utc('2024-03-04T09:00:00Z'))).toBe(true);
    expect(isBusinessHours(utc('2024-03-04T16:59:59Z'))).toBe(true);
    expect(isBusinessHours(utc('2024-03-04T17:00:00Z'))).toBe(false);
    expect(isBusinessHours(utc('2024-03-04T08:59:59Z'))).toBe(false);
  });

  it('should compare calendar days in UTC', () => {
    expect(isSameDay(utc('2024-03-04T00:00:00Z'), utc('2024-03-04T23:59:59Z'))).toBe(true);
    expect(isSameDay(utc('2024-03-04T23:59:59Z'), utc('2024-03-05T00:00:00Z'))).toBe(false);
  });

  it('should include both ends in isBetween', () => {
    const start = utc('2024-01-01T00:00:00Z');
    const end = utc('2024-01-02T00:00:00Z');
    expect(isBetween(start, start, end)).toBe(true);
    expect(isBetween(end, start, end)).toBe(true);
  });

  it('should extract months 1-12', () => {
    expect(extractMonth(utc('2024-01-15T00:00:00Z'))).toBe(1);
    expect(extractMonth(utc('2024-12-15T00:00:00Z'))).toBe(12);
  });

  it('should do day arithmetic', () => {
    expect(startOfDay(utc('2024-03-04T18:30:00Z')).toISOString()).toBe('2024-03-04T00:00:00.000Z');
    expect(addDays(utc('2024-02-28T00:00:00Z'), 2).toISOString()).toBe('2024-03-01T00:00:00.000Z');
    expect(daysBetween(utc('2024-03-01T00:00:00Z'), utc('2024-03-04T12:00:00Z'))).toBe(3);
    expect(hoursBetween(utc('2024-03-04T00:00:00Z'), utc('2024-03-04T05:59:00Z'))).toBe(5);
  });
});
