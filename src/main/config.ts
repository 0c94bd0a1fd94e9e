import { z } from 'zod';
import { getDefaultDatabasePath } from '@shared/platform';

const envSchema = z.object({
  CODE_TIME_PORT: z.coerce.number().int().min(1).max(65535).default(17610),
  CODE_TIME_HOST: z.string().trim().min(1).default('127.0.0.1'),
  CODE_TIME_DB_PATH: z.string().trim().min(1).optional(),
  CODE_TIME_IDE_NAME: z.string().trim().min(1).default('unknown'),
  CODE_TIME_DEBUG: z.string().optional()
});

export type AppConfig = {
  port: number;
  host: string;
  databasePath: string;
  ideName: string;
  debug: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.CODE_TIME_PORT,
    host: parsed.CODE_TIME_HOST,
    databasePath: parsed.CODE_TIME_DB_PATH ?? getDefaultDatabasePath(),
    ideName: parsed.CODE_TIME_IDE_NAME,
    debug: parsed.CODE_TIME_DEBUG === 'true'
  };
}
