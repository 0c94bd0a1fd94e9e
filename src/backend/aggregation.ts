/**
 * Aggregation engine. Turns persisted sessions into time-bucketed statistics.
 *
 * Every range query counts only the overlap between a session and `[start, end)`;
 * bucketed queries then split that overlap at day, hour or time-of-day boundaries.
 */

import type {
  ActivityCalendar,
  CodingStreaks,
  DailyHourUsage,
  DailySummary,
  HourlyUsage,
  LanguageUsage,
  ProjectUsage,
  RecentActivity,
  SessionFacts,
  TimeOfDay,
  TimeOfDayUsage
} from '@shared/types';
import { logger } from '@shared/logger';
import { addDays, calendarDaysSpanned, dayKey, floorToSecond, isoWeekday, startOfDay } from '@shared/time';
import type { SessionRange, SessionRepository } from './sessionRepository';
import {
  TIME_OF_DAY_BUCKETS,
  clipToWindow,
  fragmentSeconds,
  splitByDay,
  splitByHour,
  splitByTimeOfDay,
  timeOfDayFor,
  type Fragment
} from './activityTime';
import { computeStreaks } from './streaks';
import { RECENT_ACTIVITY_DAYS } from './defaults';

export type SessionReader = Pick<
  SessionRepository,
  'findOverlapping' | 'findAll' | 'getTimeBounds' | 'sumDurationSeconds'
>;

type Clock = () => Date;

/** Validates a caller-supplied range; a bad range is a programming error. */
export function requireRange(start: Date | undefined, end: Date | undefined): SessionRange {
  if (!(start instanceof Date) || !(end instanceof Date)) {
    throw new Error('A start and end time are required for this query');
  }
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw new Error('Query range contains an invalid date');
  }
  if (end.getTime() < start.getTime()) {
    throw new Error(`Query range end ${end.toISOString()} is before start ${start.toISOString()}`);
  }
  return { start: floorToSecond(start), end: floorToSecond(end) };
}

function optionalRange(start?: Date, end?: Date): SessionRange | null {
  if (start === undefined && end === undefined) return null;
  return requireRange(start, end);
}

function clipSession(session: SessionFacts, range: SessionRange | null): Fragment | null {
  const startMs = session.startTime.getTime();
  const endMs = session.endTime.getTime();
  if (!range) {
    return endMs > startMs ? { startMs, endMs } : null;
  }
  return clipToWindow(startMs, endMs, range.start.getTime(), range.end.getTime());
}

function sumBy<K>(entries: Array<[K, number]>): Map<K, number> {
  const totals = new Map<K, number>();
  for (const [key, seconds] of entries) {
    totals.set(key, (totals.get(key) ?? 0) + seconds);
  }
  return totals;
}

export class AggregationService {
  constructor(
    private readonly sessions: SessionReader,
    private readonly now: Clock = () => new Date()
  ) { }

  totalCodingTime(projectName?: string): number {
    try {
      return this.sessions.sumDurationSeconds(projectName);
    } catch (error) {
      logger.error('Failed to get total coding time', error);
      return 0;
    }
  }

  codingTimeForPeriod(start: Date, end: Date, projectName?: string): number {
    const range = requireRange(start, end);
    return this.guard('coding time for period', 0, () =>
      this.sessions
        .findOverlapping(range, projectName)
        .reduce((total, session) => {
          const fragment = clipSession(session, range);
          return fragment ? total + fragmentSeconds(fragment) : total;
        }, 0)
    );
  }

  dailyCodingTimeForHeatmap(start: Date, end: Date): DailySummary[] {
    const range = requireRange(start, end);
    return this.guard('daily coding time', [], () => this.dailyTotals(range));
  }

  codingStreaks(start: Date, end: Date): CodingStreaks {
    const range = requireRange(start, end);
    return this.guard('coding streaks', { currentStreak: 0, maxStreak: 0 }, () =>
      computeStreaks(this.activeDayKeys(this.sessions.findOverlapping(range), range), this.now())
    );
  }

  activityCalendar(start: Date, end: Date): ActivityCalendar {
    const range = requireRange(start, end);
    return this.guard('activity calendar', { days: [], streaks: { currentStreak: 0, maxStreak: 0, totalDays: 0 } }, () => {
      const days = this.dailyTotals(range);
      const streaks = computeStreaks(days.map((day) => day.date), this.now());
      return { days, streaks: { ...streaks, totalDays: days.length } };
    });
  }

  /** The last `days` calendar days up to today, with empty days filled in as zero. */
  recentActivity(days = RECENT_ACTIVITY_DAYS): RecentActivity {
    const now = this.now();
    const start = addDays(startOfDay(now), -(days - 1));
    const end = addDays(startOfDay(now), 1);
    const totals = new Map(
      this.guard('recent activity', [], () => this.dailyTotals({ start, end })).map((day) => [day.date, day.totalSeconds])
    );
    const filled = calendarDaysSpanned(start, end).map((day) => {
      const key = dayKey(day);
      return { date: key, seconds: totals.get(key) ?? 0 };
    });
    return { days: filled, totalSeconds: filled.reduce((sum, day) => sum + day.seconds, 0) };
  }

  /**
   * Average seconds per (weekday, hour), normalised by how often each weekday occurs
   * in the range. Without bounds the range runs from the first to the last session.
   */
  dailyHourDistribution(start?: Date, end?: Date): DailyHourUsage[] {
    const explicit = optionalRange(start, end);
    return this.guard('daily hour distribution', [], () => {
      const range = explicit ?? this.sessions.getTimeBounds();
      if (!range) return [];

      const occurrences = new Map<number, number>();
      for (const day of calendarDaysSpanned(range.start, range.end)) {
        const weekday = isoWeekday(day);
        occurrences.set(weekday, (occurrences.get(weekday) ?? 0) + 1);
      }

      const totals = sumBy(
        this.fragments(range).flatMap(splitByHour).map((piece): [string, number] => {
          const date = new Date(piece.startMs);
          return [`${isoWeekday(date)}:${date.getHours()}`, fragmentSeconds(piece)];
        })
      );

      return [...totals.entries()]
        .map(([key, seconds]) => {
          const [dayOfWeek, hour] = key.split(':').map(Number);
          return { dayOfWeek, hour, seconds: Math.floor(seconds / Math.max(1, occurrences.get(dayOfWeek) ?? 1)) };
        })
        .sort((a, b) => a.dayOfWeek - b.dayOfWeek || a.hour - b.hour);
    });
  }

  /**
   * Average seconds per hour of day, 24 entries. With an explicit range the divisor is
   * the calendar days spanned; without one it is the number of days with any coding.
   */
  overallHourlyDistribution(start?: Date, end?: Date): HourlyUsage[] {
    const explicit = optionalRange(start, end);
    const empty = Array.from({ length: 24 }, (_, hour) => ({ hour, seconds: 0 }));
    return this.guard('overall hourly distribution', empty, () => {
      const pieces = this.fragments(explicit).flatMap(splitByHour);
      if (pieces.length === 0) return empty;

      const divisor = explicit
        ? calendarDaysSpanned(explicit.start, explicit.end).length
        : new Set(pieces.map((piece) => dayKey(new Date(piece.startMs)))).size;

      const totals = sumBy(pieces.map((piece): [number, number] => [new Date(piece.startMs).getHours(), fragmentSeconds(piece)]));
      return empty.map(({ hour }) => ({ hour, seconds: Math.floor((totals.get(hour) ?? 0) / Math.max(1, divisor)) }));
    });
  }

  languageDistribution(start?: Date, end?: Date): LanguageUsage[] {
    const range = optionalRange(start, end);
    return this.guard('language distribution', [], () =>
      this.groupSeconds(range, (session) => session.language).map(([language, seconds]) => ({ language, seconds }))
    );
  }

  projectDistribution(start?: Date, end?: Date): ProjectUsage[] {
    const range = optionalRange(start, end);
    return this.guard('project distribution', [], () =>
      this.groupSeconds(range, (session) => session.projectName).map(([projectName, seconds]) => ({ projectName, seconds }))
    );
  }

  timeOfDayDistribution(start?: Date, end?: Date): TimeOfDayUsage[] {
    const range = optionalRange(start, end);
    const empty = TIME_OF_DAY_BUCKETS.map(({ bucket }) => ({ bucket, seconds: 0 }));
    return this.guard('time of day distribution', empty, () => {
      const totals = sumBy(
        this.fragments(range)
          .flatMap(splitByTimeOfDay)
          .map((piece): [TimeOfDay, number] => [timeOfDayFor(new Date(piece.startMs).getHours()), fragmentSeconds(piece)])
      );
      return empty.map(({ bucket }) => ({ bucket, seconds: totals.get(bucket) ?? 0 }));
    });
  }

  private dailyTotals(range: SessionRange): DailySummary[] {
    const totals = sumBy(
      this.fragments(range)
        .flatMap(splitByDay)
        .map((piece): [string, number] => [dayKey(new Date(piece.startMs)), fragmentSeconds(piece)])
    );
    return [...totals.entries()]
      .map(([date, totalSeconds]) => ({ date, totalSeconds }))
      .sort((a, b) => a.date.localeCompare(b.date));
  }

  private activeDayKeys(sessions: SessionFacts[], range: SessionRange): Set<string> {
    const keys = new Set<string>();
    for (const session of sessions) {
      const fragment = clipSession(session, range);
      if (!fragment) continue;
      splitByDay(fragment).forEach((piece) => keys.add(dayKey(new Date(piece.startMs))));
    }
    return keys;
  }

  private fragments(range: SessionRange | null): Fragment[] {
    const sessions = range ? this.sessions.findOverlapping(range) : this.sessions.findAll();
    return sessions.flatMap((session) => {
      const fragment = clipSession(session, range);
      return fragment ? [fragment] : [];
    });
  }

  private groupSeconds(range: SessionRange | null, keyOf: (session: SessionFacts) => string): Array<[string, number]> {
    const sessions = range ? this.sessions.findOverlapping(range) : this.sessions.findAll();
    const totals = sumBy(
      sessions.flatMap((session): Array<[string, number]> => {
        const fragment = clipSession(session, range);
        return fragment ? [[keyOf(session), fragmentSeconds(fragment)]] : [];
      })
    );
    return [...totals.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  }

  private guard<T>(label: string, fallback: T, compute: () => T): T {
    try {
      return compute();
    } catch (error) {
      logger.error(`Failed to compute ${label}`, error);
      return fallback;
    }
  }
}
