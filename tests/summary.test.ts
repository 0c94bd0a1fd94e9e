import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Database } from '../src/backend/storage';
import { SessionRepository } from '../src/backend/sessionRepository';
import { SummaryService, selectSummaryStrategy, type SummarySource } from '../src/backend/summary';
import { codingSession, may } from './helpers/sessions';

const now = () => may(8, 12);

describe('selectSummaryStrategy', () => {
  it('switches to pushdown at the threshold', () => {
    expect(selectSummaryStrategy(19_999, 20_000)).toBe('in-memory');
    expect(selectSummaryStrategy(20_000, 20_000)).toBe('pushdown');
  });
});

describe('SummaryService', () => {
  let database: Database;
  let repository: SessionRepository;

  beforeEach(async () => {
    database = new Database({ filePath: ':memory:' });
    repository = new SessionRepository(database);
    await repository.insertBatch([
      codingSession('alpha', 'Kotlin', may(8, 9), may(8, 10)),
      codingSession('alpha', 'Kotlin', may(6, 9), may(6, 9, 30)),
      codingSession('alpha', 'Java', may(1, 10), may(1, 11)),
      codingSession('beta', 'Python', new Date(2024, 1, 1, 10), new Date(2024, 1, 1, 10, 30)),
      codingSession('beta', 'Python', new Date(2023, 11, 31, 23), new Date(2024, 0, 1, 1))
    ]);
  });

  afterEach(async () => {
    await database.close();
  });

  const expected = {
    today: 3600,
    thisWeek: 5400,
    thisMonth: 9000,
    thisYear: 14_400,
    total: 18_000,
    // 18 000 s over the 129 days since 2023-12-31
    dailyAverage: 139
  };

  it('computes every period in memory below the threshold', () => {
    const summary = new SummaryService(repository, () => 100, now);
    expect(summary.computeSummary()).toEqual(expected);
  });

  it('gives the same figures with SQL pushdown', () => {
    const summary = new SummaryService(repository, () => 1, now);
    expect(summary.computeSummary()).toEqual(expected);
  });

  it('counts a row that ends before it starts as zero in both strategies', async () => {
    await repository.insertBatch([codingSession('beta', 'Python', may(7, 10), may(7, 9, 30))]);

    expect(new SummaryService(repository, () => 100, now).computeSummary()).toEqual(expected);
    expect(new SummaryService(repository, () => 1, now).computeSummary()).toEqual(expected);
    expect(repository.sumDurationSeconds('beta')).toBe(9000);
  });

  it('falls back to zeros when the source fails', () => {
    const broken: SummarySource = {
      countSessions: () => {
        throw new Error('database is locked');
      },
      getAllSessionSpans: () => [],
      sumOverlapSeconds: () => 0,
      sumDurationSeconds: () => 0,
      getFirstRecordTime: () => null
    };
    expect(new SummaryService(broken, () => 100, now).computeSummary()).toEqual({
      today: 0,
      dailyAverage: 0,
      thisWeek: 0,
      thisMonth: 0,
      thisYear: 0,
      total: 0
    });
  });
});
