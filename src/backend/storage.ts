import fs from 'node:fs';
import path from 'node:path';
import DatabaseDriver, { type Database as BetterSqlite3Database } from 'better-sqlite3';
import { logger } from '@shared/logger';
import { getDefaultDatabasePath } from '@shared/platform';

export type DatabaseOptions = {
  /** File path, or ':memory:' for a throwaway database. */
  filePath?: string;
};

export class Database {
  private driver: BetterSqlite3Database;

  constructor(options: DatabaseOptions = {}) {
    const dbPath = options.filePath ?? getDefaultDatabasePath();
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    logger.info('Opening database at', dbPath);
    this.driver = new DatabaseDriver(dbPath);
    this.driver.pragma('journal_mode = WAL');
    this.initialise();
  }

  private initialise() {
    const ddl = `
      CREATE TABLE IF NOT EXISTS coding_sessions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_uuid TEXT NOT NULL UNIQUE,
        user_id TEXT NOT NULL,
        project_name TEXT NOT NULL,
        language TEXT NOT NULL,
        platform TEXT NOT NULL,
        ide_name TEXT NOT NULL DEFAULT 'unknown',
        start_time TEXT NOT NULL,
        end_time TEXT NOT NULL,
        last_modified TEXT NOT NULL,
        is_deleted INTEGER NOT NULL DEFAULT 0,
        is_synced INTEGER NOT NULL DEFAULT 0,
        synced_at TEXT,
        sync_version INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_session_uuid ON coding_sessions(session_uuid);
    `;

    this.driver.exec(ddl);

    // Migration: databases created before the host/sync columns existed
    const tableInfo = this.driver.prepare('PRAGMA table_info(coding_sessions)').all() as Array<{ name: string }>;
    const columns = new Set(tableInfo.map((c) => c.name));
    const migrations: Array<[string, string]> = [
      ['ide_name', "ALTER TABLE coding_sessions ADD COLUMN ide_name TEXT NOT NULL DEFAULT 'unknown'"],
      ['is_synced', 'ALTER TABLE coding_sessions ADD COLUMN is_synced INTEGER NOT NULL DEFAULT 0'],
      ['synced_at', 'ALTER TABLE coding_sessions ADD COLUMN synced_at TEXT'],
      ['sync_version', 'ALTER TABLE coding_sessions ADD COLUMN sync_version INTEGER NOT NULL DEFAULT 0']
    ];
    for (const [column, sql] of migrations) {
      if (!columns.has(column)) {
        logger.info(`Migrating database: Adding ${column} to coding_sessions`);
        this.driver.exec(sql);
      }
    }

    // Created after the migrations so they can reference every column.
    this.driver.exec(`
      CREATE INDEX IF NOT EXISTS idx_sessions_range ON coding_sessions(is_deleted, start_time, end_time);
      CREATE INDEX IF NOT EXISTS idx_sessions_start ON coding_sessions(is_deleted, start_time);
    `);
  }

  get connection(): BetterSqlite3Database {
    return this.driver;
  }

  async close() {
    this.driver.close();
  }
}
