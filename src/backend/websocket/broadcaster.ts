import type WebSocket from 'ws';
import { logger } from '@shared/logger';
import type { LiveCounters } from '../liveCounters';
import type { SessionTracker } from '../sessionTracker';
import type { PeriodResetEvent, PeriodWatcher } from '../periodWatcher';
import { activityPayloadSchema, formatRouteError, z } from '../routes/validation';

export type WebSocketBroadcasterContext = {
  tracker: SessionTracker;
  periods: PeriodWatcher;
  counters: LiveCounters;
};

export type ClientSocket = Pick<WebSocket, 'send' | 'on' | 'readyState' | 'OPEN'>;

const incomingSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('activity'), payload: activityPayloadSchema }),
  z.object({ type: z.literal('status') })
]);

/**
 * Fans tracker and period events out to every connected `/events` client, and
 * accepts activity reports from editors that prefer the socket to HTTP.
 */
export class WebSocketBroadcaster {
  private clients = new Set<ClientSocket>();

  constructor(private ctx: WebSocketBroadcasterContext) {
    this.setupTrackerListeners();
    this.setupPeriodListeners();
  }

  private setupTrackerListeners() {
    const { tracker } = this.ctx;
    tracker.on('activity-started', () => this.broadcast({ type: 'activity-started', payload: this.countersPayload() }));
    tracker.on('activity-stopped', () => this.broadcast({ type: 'activity-stopped', payload: this.countersPayload() }));
  }

  private setupPeriodListeners() {
    const { periods } = this.ctx;
    periods.on('period-reset', (event: PeriodResetEvent) => {
      this.broadcast({ type: 'period-reset', payload: { period: event.period } });
      this.broadcast({ type: 'counters', payload: this.countersPayload() });
    });
  }

  private countersPayload() {
    return this.ctx.counters.snapshot();
  }

  broadcast(event: Record<string, unknown>) {
    const payload = JSON.stringify(event);
    for (const client of this.clients) {
      if (client.readyState === client.OPEN) {
        client.send(payload);
      }
    }
  }

  handleConnection(socket: ClientSocket) {
    this.clients.add(socket);
    logger.info('WS client connected', this.clients.size);
    socket.send(JSON.stringify({ type: 'counters', payload: this.countersPayload() }));

    socket.on('message', (msg: WebSocket.RawData) => {
      this.handleMessage(msg.toString(), socket);
    });

    socket.on('close', () => {
      this.clients.delete(socket);
    });
  }

  handleMessage(raw: string, socket: Pick<WebSocket, 'send'>) {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      logger.error('Failed to parse WS message', error);
      socket.send(JSON.stringify({ type: 'error', payload: { message: 'Message is not valid JSON' } }));
      return;
    }

    const parsed = incomingSchema.safeParse(data);
    if (!parsed.success) {
      socket.send(JSON.stringify({ type: 'error', payload: { message: formatRouteError(parsed.error) } }));
      return;
    }

    const message = parsed.data;
    if (message.type === 'activity') {
      const { timestamp, ...target } = message.payload;
      logger.debug('Received activity over WS:', target.filePath);
      const accepted = this.ctx.tracker.onActivity(target, timestamp);
      if (!accepted) {
        socket.send(JSON.stringify({ type: 'activity-ignored', payload: { filePath: target.filePath } }));
      }
    } else {
      socket.send(JSON.stringify({ type: 'status', payload: this.ctx.tracker.status(this.countersPayload()) }));
    }
  }

  get clientCount() {
    return this.clients.size;
  }
}
