import { describe, expect, it } from 'vitest';
import { addDays, dayKey, parseDayKey, startOfDay } from './day';

describe('day helpers', () => {
  const afternoon = new Date(2026, 0, 5, 15, 30, 0).getTime();

  it('keys days in local time', () => {
    expect(dayKey(afternoon)).toBe('2026-01-05');
    expect(dayKey(new Date(2026, 11, 31, 23, 59, 59))).toBe('2026-12-31');
  });

  it('finds local midnight', () => {
    expect(startOfDay(afternoon)).toBe(new Date(2026, 0, 5).getTime());
  });

  it('shifts by calendar days across month boundaries', () => {
    expect(dayKey(addDays(afternoon, -5))).toBe('2025-12-31');
    expect(new Date(addDays(afternoon, -5)).getHours()).toBe(15);
  });

  it('parses keys back to midnight and rejects malformed ones', () => {
    expect(parseDayKey('2026-01-05')).toBe(new Date(2026, 0, 5).getTime());
    expect(parseDayKey('2026-1-5')).toBeNull();
    expect(parseDayKey('yesterday')).toBeNull();
  });
});
