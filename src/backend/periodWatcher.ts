import { EventEmitter } from 'node:events';
import { TIME_PERIODS, type TimePeriod } from '@shared/types';
import { logger } from '@shared/logger';
import { PeriodManager } from './periodManager';
import type { LiveCounters } from './liveCounters';
import { PERIOD_CHECK_INTERVAL_MS } from './defaults';

export type PeriodResetEvent = {
  period: TimePeriod;
  startedAt: Date;
};

/**
 * Ticks every second but only looks at period boundaries when the wall-clock minute
 * changes. Emits `period-reset` once per boundary crossed.
 */
export class PeriodWatcher extends EventEmitter {
  private timer: NodeJS.Timeout | null = null;
  private lastMinute: number;
  private readonly periods: PeriodManager;

  constructor(
    private readonly counters: LiveCounters,
    private readonly now: () => Date = () => new Date(),
    private readonly intervalMs = PERIOD_CHECK_INTERVAL_MS
  ) {
    super();
    const current = this.now();
    this.periods = new PeriodManager(current);
    this.lastMinute = minuteOf(current);
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Returns the periods that rolled over on this tick. */
  tick(now: Date = this.now()): TimePeriod[] {
    const minute = minuteOf(now);
    if (minute === this.lastMinute) return [];
    this.lastMinute = minute;

    const rolled = TIME_PERIODS.filter((period) => this.periods.isPeriodChanged(period, now));
    for (const period of rolled) {
      this.periods.resetPeriod(period, now);
      this.counters.reset(period);
      logger.info(`Period rolled over: ${period}`);
      const event: PeriodResetEvent = { period, startedAt: now };
      this.emit('period-reset', event);
    }
    return rolled;
  }
}

function minuteOf(date: Date) {
  return Math.floor(date.getTime() / 60_000);
}
