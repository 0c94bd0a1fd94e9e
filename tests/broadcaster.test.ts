import WebSocket from 'ws';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { CodingSession } from '../src/shared/types';
import type { SessionWriter } from '../src/backend/sessionRepository';
import { LiveCounters } from '../src/backend/liveCounters';
import { PeriodWatcher } from '../src/backend/periodWatcher';
import { SessionTracker } from '../src/backend/sessionTracker';
import { WebSocketBroadcaster, type ClientSocket } from '../src/backend/websocket/broadcaster';

class NullWriter implements SessionWriter {
  async saveSessions(sessions: CodingSession[]) {
    return sessions.length;
  }

  async drain() {
    return true;
  }
}

describe('WebSocketBroadcaster', () => {
  let tracker: SessionTracker;
  let broadcaster: WebSocketBroadcaster;
  let broadcasts: Array<Record<string, unknown>>;
  const socket = { send: vi.fn() };

  beforeEach(() => {
    socket.send.mockReset();
    const counters = new LiveCounters();
    const now = () => new Date(2024, 4, 6, 9, 0);
    tracker = new SessionTracker({
      writer: new NullWriter(),
      counters,
      getUserId: () => 'test-user',
      platform: 'Linux',
      ideName: 'TestIDE',
      isCountable: (target) => target.filePath.endsWith('.kt'),
      now
    });
    const periods = new PeriodWatcher(counters, now);
    broadcaster = new WebSocketBroadcaster({ tracker, periods, counters });
    broadcasts = [];
    vi.spyOn(broadcaster, 'broadcast').mockImplementation((event) => {
      broadcasts.push(event);
    });
  });

  it('feeds socket activity into the tracker', () => {
    broadcaster.handleMessage(
      JSON.stringify({
        type: 'activity',
        payload: { filePath: '/work/alpha/Main.kt', projectPath: '/work/alpha', timestamp: '2024-05-06T09:00:00' }
      }),
      socket
    );

    expect(tracker.status().liveSessions.map((s) => s.language)).toEqual(['Kotlin']);
    expect(broadcasts).toEqual([{ type: 'activity-started', payload: { today: 0, week: 0, month: 0, year: 0 } }]);
    expect(socket.send).not.toHaveBeenCalled();
  });

  it('tells the sender when activity is ignored', () => {
    broadcaster.handleMessage(
      JSON.stringify({ type: 'activity', payload: { filePath: '/work/alpha/notes.txt', projectPath: '/work/alpha' } }),
      socket
    );
    expect(socket.send).toHaveBeenCalledWith(
      JSON.stringify({ type: 'activity-ignored', payload: { filePath: '/work/alpha/notes.txt' } })
    );
  });

  it('answers malformed messages with an error', () => {
    broadcaster.handleMessage('{oops', socket);
    broadcaster.handleMessage(JSON.stringify({ type: 'activity', payload: { projectPath: '/work/alpha' } }), socket);

    expect(socket.send).toHaveBeenNthCalledWith(
      1,
      JSON.stringify({ type: 'error', payload: { message: 'Message is not valid JSON' } })
    );
    expect(socket.send).toHaveBeenNthCalledWith(
      2,
      JSON.stringify({ type: 'error', payload: { message: 'payload.filePath: Required' } })
    );
  });

  it('tracks connected clients and greets them with counters', () => {
    const client = { send: vi.fn(), on: vi.fn(), readyState: WebSocket.OPEN, OPEN: WebSocket.OPEN } satisfies ClientSocket;

    broadcaster.handleConnection(client);

    expect(broadcaster.clientCount).toBe(1);
    expect(client.send).toHaveBeenCalledWith(
      JSON.stringify({ type: 'counters', payload: { today: 0, week: 0, month: 0, year: 0 } })
    );

    const close = client.on.mock.calls.find(([event]) => event === 'close');
    expect(close).toBeDefined();
    close?.[1]();
    expect(broadcaster.clientCount).toBe(0);
  });

  it('announces period resets with fresh counters', () => {
    const counters = new LiveCounters();
    counters.seed({ today: 60, thisWeek: 120, thisMonth: 180, thisYear: 240 });
    const periods = new PeriodWatcher(counters, () => new Date(2024, 4, 5, 23, 59));
    const wired = new WebSocketBroadcaster({ tracker, periods, counters });
    const sent: Array<Record<string, unknown>> = [];
    vi.spyOn(wired, 'broadcast').mockImplementation((event) => {
      sent.push(event);
    });

    periods.tick(new Date(2024, 4, 6, 0, 0));

    expect(sent).toEqual([
      { type: 'period-reset', payload: { period: 'today' } },
      { type: 'counters', payload: { today: 0, week: 120, month: 180, year: 240 } },
      { type: 'period-reset', payload: { period: 'week' } },
      { type: 'counters', payload: { today: 0, week: 0, month: 180, year: 240 } }
    ]);
  });
});
