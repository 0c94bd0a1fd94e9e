import { createBackend, type BackendServices } from '@backend/server';
import { Database } from '@backend/storage';
import { logger, setDebugLogging } from '@shared/logger';
import { formatRouteError } from '@backend/routes/validation';
import { loadConfig } from './config';

let db: Database | null = null;
let backend: BackendServices | null = null;
let stopping: Promise<void> | null = null;

async function bootstrap() {
  const config = loadConfig();
  setDebugLogging(config.debug);
  logger.info(`Bootstrap starting...${config.debug ? ' (debug logging on)' : ''}`);

  db = new Database({ filePath: config.databasePath });
  logger.info('Database initialized');

  backend = await createBackend(db, {
    port: config.port,
    host: config.host,
    ideName: config.ideName
  });
  logger.info(`Tracking for ${config.ideName}; user ${backend.identity.getUserId()}`);
}

async function shutdown(signal: string) {
  logger.info(`Received ${signal}; shutting down`);
  if (backend) {
    await backend.stop();
  }
  await db?.close();
}

function onSignal(signal: NodeJS.Signals) {
  stopping ??= shutdown(signal);
  stopping
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error('Shutdown failed', error);
      process.exit(1);
    });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

bootstrap().catch((error) => {
  logger.error('Failed to start code time tracker:', formatRouteError(error));
  process.exit(1);
});
