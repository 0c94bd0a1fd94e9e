import express from 'express';
import expressWs from 'express-ws';
import type { Server } from 'node:http';
import type WebSocket from 'ws';
import { SettingsService } from './settings';
import { SessionRepository } from './sessionRepository';
import { SessionTracker } from './sessionTracker';
import { LiveCounters } from './liveCounters';
import { PeriodWatcher } from './periodWatcher';
import { AggregationService } from './aggregation';
import { SummaryService } from './summary';
import { ExportImportService } from './exportImport';
import { UserIdentity } from './userIdentity';
import { WebSocketBroadcaster } from './websocket/broadcaster';
import { createSessionsRoutes, createSettingsRoutes, createStatsRoutes, createTrackerRoutes } from './routes';
import type { Database } from './storage';
import { logger } from '@shared/logger';
import { getPlatformName } from '@shared/platform';

export type BackendOptions = {
  port: number;
  host: string;
  ideName: string;
  platform?: string;
};

export type BackendServices = {
  settings: SettingsService;
  sessions: SessionRepository;
  tracker: SessionTracker;
  counters: LiveCounters;
  periods: PeriodWatcher;
  aggregation: AggregationService;
  summary: SummaryService;
  transfer: ExportImportService;
  identity: UserIdentity;
  broadcaster: WebSocketBroadcaster;
  stop: () => Promise<void>;
  port: number;
};

export async function createBackend(database: Database, options: BackendOptions): Promise<BackendServices> {
  const settings = new SettingsService(database);
  const sessions = new SessionRepository(database);
  const identity = new UserIdentity(sessions, settings);
  const aggregation = new AggregationService(sessions);
  const summary = new SummaryService(sessions, () => settings.getSummaryInMemoryThreshold());
  const transfer = new ExportImportService(sessions);

  const counters = new LiveCounters();
  counters.seed(summary.computeSummary());

  const tracker = new SessionTracker({
    writer: sessions,
    counters,
    getUserId: () => identity.getUserId(),
    platform: options.platform ?? getPlatformName(),
    ideName: options.ideName,
    getIdleThresholdSeconds: () => settings.getIdleThreshold()
  });
  const periods = new PeriodWatcher(counters);
  const broadcaster = new WebSocketBroadcaster({ tracker, periods, counters });

  const app = express();
  const ws = expressWs(app);

  app.use(express.json({ limit: '50mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', userActive: tracker.isUserActive(), clients: broadcaster.clientCount });
  });

  app.use(createTrackerRoutes({ tracker }));
  app.use('/stats', createStatsRoutes({ aggregation, summary }));
  app.use('/sessions', createSessionsRoutes(transfer));
  app.use(
    '/settings',
    createSettingsRoutes({
      settings,
      onIdleThresholdChanged: async (seconds) => {
        logger.info(`Idle threshold changed to ${seconds}s; flushing live sessions`);
        await tracker.forcePersistSessions();
      }
    })
  );

  ws.app.ws('/events', (socket: WebSocket) => {
    broadcaster.handleConnection(socket);
  });

  tracker.start();
  periods.start();

  const server: Server = await new Promise((resolve, reject) => {
    const instance = app.listen(options.port, options.host, () => {
      logger.info(`Local API listening on http://${options.host}:${options.port}`);
      resolve(instance);
    });
    instance.once('error', reject);
  });

  const stop = async () => {
    periods.stop();
    await tracker.stopTracking();
    for (const client of ws.getWss().clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  return {
    settings,
    sessions,
    tracker,
    counters,
    periods,
    aggregation,
    summary,
    transfer,
    identity,
    broadcaster,
    stop,
    port: options.port
  };
}
