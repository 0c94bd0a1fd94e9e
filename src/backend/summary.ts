import { TIME_PERIODS, type SummaryStats, type TimePeriod } from '@shared/types';
import { logger } from '@shared/logger';
import { daysBetween, periodRange, startOfDay } from '@shared/time';
import type { SessionRepository } from './sessionRepository';
import { overlapMs } from './activityTime';
import { DEFAULT_SUMMARY_IN_MEMORY_THRESHOLD } from './defaults';

export type SummaryStrategyName = 'in-memory' | 'pushdown';

export type SummarySource = Pick<
  SessionRepository,
  'countSessions' | 'getAllSessionSpans' | 'sumOverlapSeconds' | 'sumDurationSeconds' | 'getFirstRecordTime'
>;

export interface SummaryStrategy {
  readonly name: SummaryStrategyName;
  compute(now: Date): SummaryStats;
}

const EMPTY_SUMMARY: SummaryStats = {
  today: 0,
  dailyAverage: 0,
  thisWeek: 0,
  thisMonth: 0,
  thisYear: 0,
  total: 0
};

export function selectSummaryStrategy(recordCount: number, threshold: number): SummaryStrategyName {
  return recordCount < threshold ? 'in-memory' : 'pushdown';
}

function dailyAverage(totalSeconds: number, firstDay: Date | null, today: Date): number {
  if (!firstDay) return 0;
  return Math.floor(totalSeconds / Math.max(1, daysBetween(firstDay, today)));
}

/**
 * Loads only `(start, end)` pairs and computes every figure in one pass.
 * Cheap while the table is small.
 */
export class InMemorySummaryStrategy implements SummaryStrategy {
  readonly name = 'in-memory';

  constructor(private readonly source: SummarySource) { }

  compute(now: Date): SummaryStats {
    const spans = this.source.getAllSessionSpans();
    if (spans.length === 0) return { ...EMPTY_SUMMARY };

    const windows: Record<TimePeriod, { start: Date; end: Date }> = {
      today: periodRange('today', now),
      week: periodRange('week', now),
      month: periodRange('month', now),
      year: periodRange('year', now)
    };
    const totals: Record<TimePeriod, number> = { today: 0, week: 0, month: 0, year: 0 };
    let totalMs = 0;
    let firstStart: Date | null = null;

    for (const span of spans) {
      const startMs = span.startTime.getTime();
      const endMs = span.endTime.getTime();
      totalMs += Math.max(0, endMs - startMs);
      if (!firstStart || startMs < firstStart.getTime()) firstStart = span.startTime;
      for (const period of TIME_PERIODS) {
        totals[period] += overlapMs(startMs, endMs, windows[period].start.getTime(), windows[period].end.getTime());
      }
    }

    const total = Math.floor(totalMs / 1000);
    return {
      today: Math.floor(totals.today / 1000),
      thisWeek: Math.floor(totals.week / 1000),
      thisMonth: Math.floor(totals.month / 1000),
      thisYear: Math.floor(totals.year / 1000),
      total,
      dailyAverage: dailyAverage(total, firstStart ? startOfDay(firstStart) : null, now)
    };
  }
}

/** One indexed range-sum per period, computed inside SQLite. */
export class PushdownSummaryStrategy implements SummaryStrategy {
  readonly name = 'pushdown';

  constructor(private readonly source: SummarySource) { }

  compute(now: Date): SummaryStats {
    const total = this.source.sumDurationSeconds();
    const firstRecord = this.source.getFirstRecordTime();
    return {
      today: this.source.sumOverlapSeconds(periodRange('today', now)),
      thisWeek: this.source.sumOverlapSeconds(periodRange('week', now)),
      thisMonth: this.source.sumOverlapSeconds(periodRange('month', now)),
      thisYear: this.source.sumOverlapSeconds(periodRange('year', now)),
      total,
      dailyAverage: dailyAverage(total, firstRecord ? startOfDay(firstRecord) : null, now)
    };
  }
}

export class SummaryService {
  private readonly strategies: Record<SummaryStrategyName, SummaryStrategy>;

  constructor(
    private readonly source: SummarySource,
    private readonly getThreshold: () => number = () => DEFAULT_SUMMARY_IN_MEMORY_THRESHOLD,
    private readonly now: () => Date = () => new Date()
  ) {
    this.strategies = {
      'in-memory': new InMemorySummaryStrategy(source),
      pushdown: new PushdownSummaryStrategy(source)
    };
  }

  /** Never throws: the display falls back to zeros when anything fails. */
  computeSummary(): SummaryStats {
    try {
      const recordCount = this.source.countSessions();
      const strategy = this.strategies[selectSummaryStrategy(recordCount, this.getThreshold())];
      logger.debug(`Computing summary with ${strategy.name} strategy (records: ${recordCount})`);
      return strategy.compute(this.now());
    } catch (error) {
      logger.error('Summary statistics failed', error);
      return { ...EMPTY_SUMMARY };
    }
  }
}
