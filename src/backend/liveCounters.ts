import { TIME_PERIODS, type LiveCounterSnapshot, type SummaryStats, type TimePeriod } from '@shared/types';

/**
 * Best-effort running totals for the status display. They are seeded from stored
 * data, advanced by the tracker between activity ticks, and zeroed when a period
 * rolls over. Stored sessions remain the source of truth.
 */
export class LiveCounters {
  private totals: Record<TimePeriod, number> = { today: 0, week: 0, month: 0, year: 0 };

  seed(summary: Pick<SummaryStats, 'today' | 'thisWeek' | 'thisMonth' | 'thisYear'>) {
    this.totals = {
      today: summary.today * 1000,
      week: summary.thisWeek * 1000,
      month: summary.thisMonth * 1000,
      year: summary.thisYear * 1000
    };
  }

  record(deltaMs: number) {
    if (!(deltaMs > 0)) return;
    for (const period of TIME_PERIODS) {
      this.totals[period] += deltaMs;
    }
  }

  reset(period: TimePeriod) {
    this.totals[period] = 0;
  }

  snapshot(): LiveCounterSnapshot {
    return {
      today: Math.floor(this.totals.today / 1000),
      week: Math.floor(this.totals.week / 1000),
      month: Math.floor(this.totals.month / 1000),
      year: Math.floor(this.totals.year / 1000)
    };
  }
}
