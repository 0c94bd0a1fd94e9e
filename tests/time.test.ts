import { describe, expect, it } from 'vitest';
import { calendarDaysSpanned, daysBetween, dayKey, parseLocalIso, periodRange, toLocalIso } from '../src/shared/time';

describe('local time helpers', () => {
  it('parses local timestamps with optional seconds', () => {
    expect(parseLocalIso('2024-05-06T07:08')).toEqual(new Date(2024, 4, 6, 7, 8, 0));
    expect(parseLocalIso('2024-05-06T07:08:09.250')).toEqual(new Date(2024, 4, 6, 7, 8, 9, 250));
  });

  it('rejects malformed or impossible timestamps', () => {
    expect(parseLocalIso('2024-02-30T10:00:00')).toBeNull();
    expect(parseLocalIso('2024-05-06 10:00:00')).toBeNull();
    expect(parseLocalIso('yesterday')).toBeNull();
  });

  it('formats without a zone suffix', () => {
    expect(toLocalIso(new Date(2024, 0, 2, 3, 4, 5))).toBe('2024-01-02T03:04:05');
  });

  it('starts weeks on Monday', () => {
    const { start, end } = periodRange('week', new Date(2024, 4, 8, 12));
    expect(dayKey(start)).toBe('2024-05-06');
    expect(dayKey(end)).toBe('2024-05-13');
  });

  it('counts calendar days touched by a half-open range', () => {
    const days = calendarDaysSpanned(new Date(2024, 4, 6, 10), new Date(2024, 4, 8));
    expect(days.map(dayKey)).toEqual(['2024-05-06', '2024-05-07']);
    expect(daysBetween(new Date(2023, 11, 31, 23), new Date(2024, 0, 1, 1))).toBe(1);
  });
});
