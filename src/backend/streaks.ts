import type { CodingStreaks } from '@shared/types';
import { daysBetween, parseDayKey } from '@shared/time';

/**
 * Streaks over a set of `YYYY-MM-DD` day keys.
 *
 * `maxStreak` is the longest run of consecutive days anywhere in the set.
 * `currentStreak` is the run ending at the most recent day, and only counts while
 * that day is today or yesterday.
 */
export function computeStreaks(dayKeys: Iterable<string>, today: Date): CodingStreaks {
  const days = [...new Set(dayKeys)]
    .map((key) => parseDayKey(key))
    .filter((day): day is Date => day !== null)
    .sort((a, b) => b.getTime() - a.getTime());

  if (days.length === 0) {
    return { currentStreak: 0, maxStreak: 0 };
  }

  let maxStreak = 1;
  let run = 1;
  let leadingRun = 0;
  for (let i = 1; i < days.length; i++) {
    if (daysBetween(days[i], days[i - 1]) === 1) {
      run += 1;
    } else {
      if (leadingRun === 0) leadingRun = run;
      run = 1;
    }
    maxStreak = Math.max(maxStreak, run);
  }
  if (leadingRun === 0) leadingRun = run;

  const sinceLatest = daysBetween(days[0], today);
  const currentStreak = sinceLatest === 0 || sinceLatest === 1 ? leadingRun : 0;

  return { currentStreak, maxStreak };
}
