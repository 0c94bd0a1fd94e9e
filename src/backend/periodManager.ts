import { TIME_PERIODS, type TimePeriod } from '@shared/types';
import { periodStart } from '@shared/time';

/**
 * Remembers the start of the current day, ISO week, month and year, and reports
 * when the clock has moved past one of them.
 */
export class PeriodManager {
  private readonly boundaries = new Map<TimePeriod, number>();

  constructor(now: Date = new Date()) {
    for (const period of TIME_PERIODS) {
      this.boundaries.set(period, periodStart(period, now).getTime());
    }
  }

  isPeriodChanged(period: TimePeriod, now: Date): boolean {
    return this.boundaries.get(period) !== periodStart(period, now).getTime();
  }

  resetPeriod(period: TimePeriod, now: Date) {
    this.boundaries.set(period, periodStart(period, now).getTime());
  }

  currentStart(period: TimePeriod): Date | null {
    const boundary = this.boundaries.get(period);
    return boundary === undefined ? null : new Date(boundary);
  }
}
