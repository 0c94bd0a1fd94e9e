import type { TimeOfDay } from '@shared/types';

export const SECOND_MS = 1000;
export const HOUR_MS = 60 * 60 * 1000;

export type Fragment = {
  startMs: number;
  endMs: number;
};

export const TIME_OF_DAY_BUCKETS: ReadonlyArray<{ bucket: TimeOfDay; fromHour: number; toHour: number }> = [
  { bucket: 'Night', fromHour: 0, toHour: 6 },
  { bucket: 'Morning', fromHour: 6, toHour: 12 },
  { bucket: 'Daytime', fromHour: 12, toHour: 18 },
  { bucket: 'Evening', fromHour: 18, toHour: 24 }
];

export function overlapMs(startMs: number, endMs: number, windowStartMs: number, windowEndMs: number) {
  const start = Math.max(startMs, windowStartMs);
  const end = Math.min(endMs, windowEndMs);
  return Math.max(0, end - start);
}

/** The part of `[startMs, endMs)` inside the window, or null when they do not intersect. */
export function clipToWindow(startMs: number, endMs: number, windowStartMs: number, windowEndMs: number): Fragment | null {
  const start = Math.max(startMs, windowStartMs);
  const end = Math.min(endMs, windowEndMs);
  return end > start ? { startMs: start, endMs: end } : null;
}

export function nextMidnightMs(valueMs: number) {
  const date = new Date(valueMs);
  date.setHours(24, 0, 0, 0);
  return date.getTime();
}

export function nextHourMs(valueMs: number) {
  const date = new Date(valueMs);
  date.setMinutes(60, 0, 0);
  return date.getTime();
}

export function timeOfDayFor(hour: number): TimeOfDay {
  const match = TIME_OF_DAY_BUCKETS.find((entry) => hour >= entry.fromHour && hour < entry.toHour);
  return match ? match.bucket : 'Evening';
}

export function nextTimeOfDayBoundaryMs(valueMs: number) {
  const date = new Date(valueMs);
  const bucketEnd = (Math.floor(date.getHours() / 6) + 1) * 6;
  date.setHours(bucketEnd, 0, 0, 0);
  return date.getTime();
}

/**
 * Cuts `fragment` wherever `nextBoundary` lands inside it. The pieces are contiguous,
 * so their lengths always add up to the original length.
 */
export function splitAt(fragment: Fragment, nextBoundary: (ms: number) => number): Fragment[] {
  const pieces: Fragment[] = [];
  let cursor = fragment.startMs;
  while (cursor < fragment.endMs) {
    const boundary = nextBoundary(cursor);
    const end = boundary > cursor ? Math.min(boundary, fragment.endMs) : fragment.endMs;
    pieces.push({ startMs: cursor, endMs: end });
    cursor = end;
  }
  return pieces;
}

export const splitByDay = (fragment: Fragment) => splitAt(fragment, nextMidnightMs);
export const splitByHour = (fragment: Fragment) => splitAt(fragment, nextHourMs);
export const splitByTimeOfDay = (fragment: Fragment) => splitAt(fragment, nextTimeOfDayBoundaryMs);

export function fragmentSeconds(fragment: Fragment) {
  return (fragment.endMs - fragment.startMs) / SECOND_MS;
}
