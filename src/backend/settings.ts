import type { Statement } from 'better-sqlite3';
import { z } from 'zod';
import type { Database } from './storage';
import { logger } from '@shared/logger';
import { DEFAULT_IDLE_THRESHOLD_SECONDS, DEFAULT_SUMMARY_IN_MEMORY_THRESHOLD } from './defaults';

const positiveInt = z.number().int().positive();

/** Key/value settings stored as JSON in the `settings` table. */
export class SettingsService {
  private getStmt: Statement;
  private setStmt: Statement;

  constructor(database: Database) {
    const db = database.connection;
    this.getStmt = db.prepare('SELECT value FROM settings WHERE key = ?');
    this.setStmt = db.prepare('INSERT INTO settings(key, value) VALUES(?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value');
  }

  getJson<T>(key: string, schema: z.ZodType<T>): T | null {
    const row = this.getStmt.get(key) as { value: string } | undefined;
    if (!row) return null;
    try {
      const parsed = schema.safeParse(JSON.parse(row.value));
      if (!parsed.success) {
        logger.warn('Ignoring invalid setting', key, parsed.error.issues[0]?.message);
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.error('Failed to parse setting', key, error);
      return null;
    }
  }

  setJson<T>(key: string, value: T) {
    this.setStmt.run(key, JSON.stringify(value));
  }

  getIdleThreshold(): number {
    return this.getJson('idleThreshold', positiveInt) ?? DEFAULT_IDLE_THRESHOLD_SECONDS;
  }

  setIdleThreshold(value: number) {
    this.setJson('idleThreshold', positiveInt.parse(value));
  }

  getSummaryInMemoryThreshold(): number {
    return this.getJson('summaryInMemoryThreshold', positiveInt) ?? DEFAULT_SUMMARY_IN_MEMORY_THRESHOLD;
  }

  setSummaryInMemoryThreshold(value: number) {
    this.setJson('summaryInMemoryThreshold', positiveInt.parse(value));
  }

  getUserId(): string | null {
    return this.getJson('userId', z.string().min(1));
  }

  setUserId(value: string) {
    this.setJson('userId', value);
  }
}
