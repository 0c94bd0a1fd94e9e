import type { CodingSession } from '../../src/shared/types';

let counter = 0;

/** A stored session with test defaults; times are local wall-clock. */
export function codingSession(
  projectName: string,
  language: string,
  startTime: Date,
  endTime: Date,
  overrides: Partial<CodingSession> = {}
): CodingSession {
  counter += 1;
  return {
    sessionUuid: `session-${counter}`,
    userId: 'test-user',
    projectName,
    language,
    platform: 'Linux',
    ideName: 'TestIDE',
    startTime,
    endTime,
    lastModified: endTime,
    isDeleted: false,
    isSynced: false,
    syncedAt: null,
    syncVersion: 0,
    ...overrides
  };
}

/** 2024-05-`day` at the given local time. May 6, 2024 is a Monday. */
export const may = (day: number, hour = 0, minute = 0, second = 0) => new Date(2024, 4, day, hour, minute, second);
