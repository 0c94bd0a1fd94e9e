import type { TimePeriod } from './types';

/*
  Calendar helpers. Everything here works on local wall-clock time; weeks start
  on Monday regardless of locale.
*/

const LOCAL_ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/;
const DAY_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/** `YYYY-MM-DDTHH:mm:ss` in local time, the storage format for session timestamps. */
export function toLocalIso(date: Date): string {
  return `${dayKey(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Parses a local ISO-8601 date-time (seconds and fraction optional).
 * Returns null for anything else, including out-of-range fields such as month 13.
 */
export function parseLocalIso(value: string): Date | null {
  const match = LOCAL_ISO_PATTERN.exec(value.trim());
  if (!match) return null;
  const [, y, mo, d, h, mi, s, fraction] = match;
  const ms = fraction ? Math.floor(Number(`0.${fraction}`) * 1000) : 0;
  const date = new Date(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s ?? 0), ms);
  if (
    date.getFullYear() !== Number(y) ||
    date.getMonth() !== Number(mo) - 1 ||
    date.getDate() !== Number(d) ||
    date.getHours() !== Number(h) ||
    date.getMinutes() !== Number(mi)
  ) {
    return null;
  }
  return date;
}

/** `YYYY-MM-DD` of the local calendar day. */
export function dayKey(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function parseDayKey(key: string): Date | null {
  const match = DAY_KEY_PATTERN.exec(key);
  if (!match) return null;
  const date = new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return dayKey(date) === key ? date : null;
}

export function floorToSecond(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days, date.getHours(), date.getMinutes(), date.getSeconds(), date.getMilliseconds());
}

/** ISO weekday: 1 = Monday ... 7 = Sunday. */
export function isoWeekday(date: Date): number {
  return ((date.getDay() + 6) % 7) + 1;
}

export function startOfWeek(date: Date): Date {
  return addDays(startOfDay(date), 1 - isoWeekday(date));
}

export function startOfMonth(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), 1);
}

export function startOfYear(date: Date): Date {
  return new Date(date.getFullYear(), 0, 1);
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: Date, to: Date): number {
  const a = Date.UTC(from.getFullYear(), from.getMonth(), from.getDate());
  const b = Date.UTC(to.getFullYear(), to.getMonth(), to.getDate());
  return Math.round((b - a) / 86_400_000);
}

export function periodStart(period: TimePeriod, reference: Date): Date {
  switch (period) {
    case 'today':
      return startOfDay(reference);
    case 'week':
      return startOfWeek(reference);
    case 'month':
      return startOfMonth(reference);
    case 'year':
      return startOfYear(reference);
  }
}

/** Closed-open bounds of the period that contains `reference`. */
export function periodRange(period: TimePeriod, reference: Date): { start: Date; end: Date } {
  const start = periodStart(period, reference);
  switch (period) {
    case 'today':
      return { start, end: addDays(start, 1) };
    case 'week':
      return { start, end: addDays(start, 7) };
    case 'month':
      return { start, end: new Date(start.getFullYear(), start.getMonth() + 1, 1) };
    case 'year':
      return { start, end: new Date(start.getFullYear() + 1, 0, 1) };
  }
}

/**
 * Calendar days touched by `[start, end)`, counting the day of `start` and the day
 * holding the last instant before `end`.
 */
export function calendarDaysSpanned(start: Date, end: Date): Date[] {
  if (end.getTime() <= start.getTime()) return [];
  const last = startOfDay(new Date(end.getTime() - 1));
  const days: Date[] = [];
  for (let day = startOfDay(start); day.getTime() <= last.getTime(); day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}
