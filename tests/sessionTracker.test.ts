import { beforeEach, describe, expect, it } from 'vitest';
import type { CodingSession, EditorTarget } from '../src/shared/types';
import type { SessionWriter } from '../src/backend/sessionRepository';
import { LiveCounters } from '../src/backend/liveCounters';
import { SessionTracker } from '../src/backend/sessionTracker';

class FakeWriter implements SessionWriter {
  batches: CodingSession[][] = [];
  drainTimeouts: number[] = [];

  async saveSessions(sessions: CodingSession[]) {
    this.batches.push(sessions);
    return sessions.length;
  }

  async drain(timeoutMs: number) {
    this.drainTimeouts.push(timeoutMs);
    return true;
  }
}

const at = (hour: number, minute: number, second = 0) => new Date(2024, 4, 6, hour, minute, second);

const kotlin: EditorTarget = { filePath: '/work/alpha/src/Main.kt', projectPath: '/work/alpha' };
const java: EditorTarget = { filePath: '/work/alpha/src/Util.java', projectPath: '/work/alpha' };
const python: EditorTarget = { filePath: '/work/beta/app.py', projectPath: '/work/beta' };

describe('SessionTracker', () => {
  let writer: FakeWriter;
  let counters: LiveCounters;
  let tracker: SessionTracker;
  let events: string[];

  beforeEach(() => {
    writer = new FakeWriter();
    counters = new LiveCounters();
    events = [];
    tracker = new SessionTracker({
      writer,
      counters,
      getUserId: () => 'test-user',
      platform: 'Linux',
      ideName: 'TestIDE',
      getIdleThresholdSeconds: () => 60,
      isCountable: (target) => !target.filePath.endsWith('.lock'),
      now: () => at(12, 0),
      drainTimeoutMs: 250
    });
    tracker.on('activity-started', () => events.push('started'));
    tracker.on('activity-stopped', () => events.push('stopped'));
  });

  it('ignores activity on files that do not count', () => {
    expect(tracker.onActivity({ filePath: '/work/alpha/yarn.lock', projectPath: '/work/alpha' }, at(9, 0))).toBe(false);
    expect(tracker.status().liveSessions).toEqual([]);
    expect(events).toEqual([]);
  });

  it('extends one session per project and language', () => {
    tracker.onActivity(kotlin, at(9, 0));
    tracker.onActivity(kotlin, at(9, 0, 30));

    const [session] = tracker.status().liveSessions;
    expect(tracker.status().liveSessions).toHaveLength(1);
    expect(session).toMatchObject({
      projectPath: '/work/alpha',
      projectName: 'alpha',
      language: 'Kotlin',
      startTime: '2024-05-06T09:00:00',
      endTime: '2024-05-06T09:00:30'
    });
    expect(events).toEqual(['started']);
  });

  it('closes the previous language at the switch time', async () => {
    tracker.onActivity(kotlin, at(9, 0));
    tracker.onActivity(kotlin, at(9, 0, 30));
    tracker.onActivity(java, at(9, 1));
    await tracker.settled();

    expect(writer.batches).toHaveLength(1);
    expect(writer.batches[0]).toHaveLength(1);
    expect(writer.batches[0][0]).toMatchObject({
      userId: 'test-user',
      projectName: 'alpha',
      language: 'Kotlin',
      platform: 'Linux',
      ideName: 'TestIDE',
      startTime: at(9, 0),
      endTime: at(9, 1),
      isDeleted: false
    });
    expect(tracker.status().liveSessions.map((s) => [s.language, s.startTime])).toEqual([['Java', '2024-05-06T09:01:00']]);
  });

  it('never moves an end time backwards', () => {
    tracker.onActivity(kotlin, at(9, 0, 30));
    tracker.onActivity(kotlin, at(9, 0, 10));

    const status = tracker.status();
    expect(status.liveSessions[0].endTime).toBe('2024-05-06T09:00:30');
    expect(status.lastActivity).toBe('2024-05-06T09:00:30');
  });

  it('clamps idle sessions to the last activity plus the threshold', async () => {
    tracker.onActivity(kotlin, at(9, 0));
    tracker.onActivity(kotlin, at(9, 0, 20));

    await tracker.checkIdleStatus(at(9, 0, 50));
    expect(writer.batches).toHaveLength(0);
    expect(tracker.isUserActive()).toBe(true);

    await tracker.checkIdleStatus(at(9, 5));
    expect(writer.batches).toHaveLength(1);
    expect(writer.batches[0][0].endTime).toEqual(at(9, 1, 20));
    expect(tracker.isUserActive()).toBe(false);
    expect(events).toEqual(['started', 'stopped']);
  });

  it('opens a fresh session after an idle flush', async () => {
    tracker.onActivity(kotlin, at(9, 0));
    await tracker.checkIdleStatus(at(9, 5));
    tracker.onActivity(kotlin, at(9, 10));

    const [session] = tracker.status().liveSessions;
    expect(session.startTime).toBe('2024-05-06T09:10:00');
    expect(session.sessionUuid).not.toBe(writer.batches[0][0].sessionUuid);
    expect(events).toEqual(['started', 'stopped', 'started']);
  });

  it('stops one project and keeps the user active while others remain', async () => {
    tracker.onActivity(kotlin, at(9, 0));
    tracker.onActivity(python, at(9, 0, 5));

    await tracker.stopProjectTracking('/work/alpha/');
    expect(writer.batches[0].map((s) => s.projectName)).toEqual(['alpha']);
    expect(tracker.isUserActive()).toBe(true);

    await tracker.stopProjectTracking('/work/beta');
    expect(writer.batches[1].map((s) => s.language)).toEqual(['Python']);
    expect(tracker.isUserActive()).toBe(false);
    expect(events).toEqual(['started', 'stopped']);
  });

  it('adds only short gaps to the live counters', () => {
    tracker.onActivity(kotlin, at(9, 0));
    tracker.onActivity(kotlin, at(9, 0, 10));
    tracker.onActivity(kotlin, at(9, 5));

    expect(counters.snapshot()).toEqual({ today: 10, week: 10, month: 10, year: 10 });
  });

  it('forced flushes persist without going idle', async () => {
    tracker.onActivity(kotlin, at(9, 0));
    await tracker.forcePersistSessions();

    expect(writer.batches).toHaveLength(1);
    expect(tracker.status().liveSessions).toEqual([]);
    expect(tracker.isUserActive()).toBe(true);
  });

  it('flushes everything and drains the writer on shutdown', async () => {
    tracker.onActivity(kotlin, at(9, 0));
    tracker.onActivity(python, at(9, 1));

    await tracker.stopTracking();

    expect(writer.batches).toHaveLength(1);
    expect(writer.batches[0].map((s) => s.language).sort()).toEqual(['Kotlin', 'Python']);
    expect(writer.drainTimeouts).toEqual([250]);
    expect(tracker.isUserActive()).toBe(false);
  });
});
