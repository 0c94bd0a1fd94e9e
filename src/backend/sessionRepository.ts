import type { Database as BetterSqlite3Database, Statement } from 'better-sqlite3';
import type { Database } from './storage';
import type { CodingSession, SessionFacts, SessionSpan } from '@shared/types';
import { logger } from '@shared/logger';
import { parseLocalIso, toLocalIso } from '@shared/time';
import { SerialWriteQueue } from './writeQueue';

type SessionRow = {
  session_uuid: string;
  user_id: string;
  project_name: string;
  language: string;
  platform: string;
  ide_name: string;
  start_time: string;
  end_time: string;
  last_modified: string;
  is_deleted: number;
  is_synced: number;
  synced_at: string | null;
  sync_version: number;
};

type SpanRow = {
  start_time: string;
  end_time: string;
};

type FactsRow = SpanRow & {
  project_name: string;
  language: string;
};

export type SessionRange = {
  start: Date;
  end: Date;
};

/** Write side of the gateway, the part the session tracker depends on. */
export interface SessionWriter {
  saveSessions(sessions: CodingSession[]): Promise<number>;
  drain(timeoutMs: number): Promise<boolean>;
}

const SELECT_SESSION_COLUMNS = `
  session_uuid, user_id, project_name, language, platform, ide_name,
  start_time, end_time, last_modified, is_deleted, is_synced, synced_at, sync_version
`;

// Seconds since epoch for a stored local timestamp; only differences are used.
const epochSeconds = (column: string) => `CAST(strftime('%s', ${column}) AS INTEGER)`;

// A row whose end precedes its start counts as zero.
const sessionSeconds = `MAX(0, ${epochSeconds('end_time')} - ${epochSeconds('start_time')})`;

function parseStored(value: string, column: string): Date {
  const parsed = parseLocalIso(value);
  if (!parsed) {
    throw new Error(`Unparsable ${column} in coding_sessions: ${value}`);
  }
  return parsed;
}

function rowToSession(row: SessionRow): CodingSession {
  return {
    sessionUuid: row.session_uuid,
    userId: row.user_id,
    projectName: row.project_name,
    language: row.language,
    platform: row.platform,
    ideName: row.ide_name,
    startTime: parseStored(row.start_time, 'start_time'),
    endTime: parseStored(row.end_time, 'end_time'),
    lastModified: parseStored(row.last_modified, 'last_modified'),
    isDeleted: row.is_deleted === 1,
    isSynced: row.is_synced === 1,
    syncedAt: row.synced_at ? parseLocalIso(row.synced_at) : null,
    syncVersion: row.sync_version
  };
}

function rowToSpan(row: SpanRow): SessionSpan {
  return {
    startTime: parseStored(row.start_time, 'start_time'),
    endTime: parseStored(row.end_time, 'end_time')
  };
}

/**
 * Persistence gateway for coding sessions. Reads go straight to the connection;
 * every write is serialised through one queue and committed as a single transaction.
 */
export class SessionRepository implements SessionWriter {
  private db: BetterSqlite3Database;
  private queue: SerialWriteQueue;

  private insertStmt: Statement;
  private overlappingStmt: Statement;
  private overlappingForProjectStmt: Statement;
  private allFactsStmt: Statement;
  private allSpansStmt: Statement;
  private boundsStmt: Statement;
  private countStmt: Statement;
  private totalStmt: Statement;
  private totalForProjectStmt: Statement;
  private clippedSumStmt: Statement;
  private firstStartStmt: Statement;
  private uuidsStmt: Statement;
  private userIdStmt: Statement;
  private exportAllStmt: Statement;
  private exportRangeStmt: Statement;

  constructor(database: Database, queue: SerialWriteQueue = new SerialWriteQueue()) {
    this.db = database.connection;
    this.queue = queue;

    this.insertStmt = this.db.prepare(`
      INSERT INTO coding_sessions (
        session_uuid, user_id, project_name, language, platform, ide_name,
        start_time, end_time, last_modified, is_deleted, is_synced, synced_at, sync_version
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.overlappingStmt = this.db.prepare(`
      SELECT start_time, end_time, project_name, language
      FROM coding_sessions
      WHERE is_deleted = 0 AND end_time > ? AND start_time < ?
    `);

    this.overlappingForProjectStmt = this.db.prepare(`
      SELECT start_time, end_time, project_name, language
      FROM coding_sessions
      WHERE is_deleted = 0 AND end_time > ? AND start_time < ? AND project_name = ?
    `);

    this.allFactsStmt = this.db.prepare(`
      SELECT start_time, end_time, project_name, language
      FROM coding_sessions
      WHERE is_deleted = 0
    `);

    this.allSpansStmt = this.db.prepare(`
      SELECT start_time, end_time FROM coding_sessions WHERE is_deleted = 0
    `);

    this.boundsStmt = this.db.prepare(`
      SELECT MIN(start_time) as minStart, MAX(end_time) as maxEnd
      FROM coding_sessions WHERE is_deleted = 0
    `);

    this.countStmt = this.db.prepare('SELECT COUNT(*) as count FROM coding_sessions WHERE is_deleted = 0');

    this.totalStmt = this.db.prepare(`
      SELECT COALESCE(SUM(${sessionSeconds}), 0) as seconds
      FROM coding_sessions WHERE is_deleted = 0
    `);

    this.totalForProjectStmt = this.db.prepare(`
      SELECT COALESCE(SUM(${sessionSeconds}), 0) as seconds
      FROM coding_sessions WHERE is_deleted = 0 AND project_name = ?
    `);

    // Overlap clipping done inside SQLite: max(0, min(end, rangeEnd) - max(start, rangeStart)).
    this.clippedSumStmt = this.db.prepare(`
      SELECT COALESCE(SUM(
        MAX(0, MIN(${epochSeconds('end_time')}, ${epochSeconds('@rangeEnd')})
             - MAX(${epochSeconds('start_time')}, ${epochSeconds('@rangeStart')}))
      ), 0) as seconds
      FROM coding_sessions
      WHERE is_deleted = 0 AND end_time > @rangeStart AND start_time < @rangeEnd
    `);

    this.firstStartStmt = this.db.prepare(
      'SELECT MIN(start_time) as firstStart FROM coding_sessions WHERE is_deleted = 0'
    );

    this.uuidsStmt = this.db.prepare('SELECT session_uuid FROM coding_sessions');

    this.userIdStmt = this.db.prepare('SELECT user_id FROM coding_sessions LIMIT 1');

    this.exportAllStmt = this.db.prepare(`
      SELECT ${SELECT_SESSION_COLUMNS} FROM coding_sessions
      WHERE is_deleted = 0 ORDER BY start_time ASC
    `);

    this.exportRangeStmt = this.db.prepare(`
      SELECT ${SELECT_SESSION_COLUMNS} FROM coding_sessions
      WHERE is_deleted = 0 AND end_time > ? AND start_time < ?
      ORDER BY start_time ASC
    `);
  }

  // #region Writes

  /**
   * Queues a batch insert of finished sessions. Failures are logged and reported
   * as zero rows written; the batch is never partially committed.
   */
  async saveSessions(sessions: CodingSession[]): Promise<number> {
    if (sessions.length === 0) return 0;
    try {
      const saved = await this.insertBatch(sessions);
      logger.info(`Saved ${saved} session(s) to the database`);
      return saved;
    } catch (error) {
      logger.error(`Failed to save ${sessions.length} session(s)`, error);
      return 0;
    }
  }

  /** Same transaction semantics as `saveSessions`, but failures reach the caller. */
  insertBatch(sessions: CodingSession[]): Promise<number> {
    if (sessions.length === 0) return Promise.resolve(0);
    const insertAll = this.db.transaction((batch: CodingSession[]) => {
      for (const session of batch) {
        this.insertStmt.run(
          session.sessionUuid,
          session.userId,
          session.projectName,
          session.language,
          session.platform,
          session.ideName,
          toLocalIso(session.startTime),
          toLocalIso(session.endTime),
          toLocalIso(session.lastModified),
          session.isDeleted ? 1 : 0,
          session.isSynced ? 1 : 0,
          session.syncedAt ? toLocalIso(session.syncedAt) : null,
          session.syncVersion
        );
      }
      return batch.length;
    });
    return this.queue.enqueue(`insert ${sessions.length} session(s)`, () => insertAll(sessions));
  }

  drain(timeoutMs: number): Promise<boolean> {
    return this.queue.drain(timeoutMs);
  }

  // #endregion

  // #region Reads

  /** Candidate sessions for `[start, end)`: anything whose span intersects the range. */
  findOverlapping(range: SessionRange, projectName?: string): SessionFacts[] {
    const startIso = toLocalIso(range.start);
    const endIso = toLocalIso(range.end);
    const rows = (projectName != null
      ? this.overlappingForProjectStmt.all(startIso, endIso, projectName)
      : this.overlappingStmt.all(startIso, endIso)) as FactsRow[];
    return rows.map((row) => ({ ...rowToSpan(row), projectName: row.project_name, language: row.language }));
  }

  findAll(): SessionFacts[] {
    const rows = this.allFactsStmt.all() as FactsRow[];
    return rows.map((row) => ({ ...rowToSpan(row), projectName: row.project_name, language: row.language }));
  }

  getAllSessionSpans(): SessionSpan[] {
    return (this.allSpansStmt.all() as SpanRow[]).map(rowToSpan);
  }

  getTimeBounds(): SessionRange | null {
    const row = this.boundsStmt.get() as { minStart: string | null; maxEnd: string | null } | undefined;
    if (!row?.minStart || !row.maxEnd) return null;
    return { start: parseStored(row.minStart, 'start_time'), end: parseStored(row.maxEnd, 'end_time') };
  }

  countSessions(): number {
    const row = this.countStmt.get() as { count: number } | undefined;
    return row?.count ?? 0;
  }

  sumDurationSeconds(projectName?: string): number {
    const row = (projectName != null ? this.totalForProjectStmt.get(projectName) : this.totalStmt.get()) as
      | { seconds: number | null }
      | undefined;
    return Number(row?.seconds ?? 0);
  }

  sumOverlapSeconds(range: SessionRange): number {
    const row = this.clippedSumStmt.get({
      rangeStart: toLocalIso(range.start),
      rangeEnd: toLocalIso(range.end)
    }) as { seconds: number | null } | undefined;
    return Number(row?.seconds ?? 0);
  }

  getFirstRecordTime(): Date | null {
    const row = this.firstStartStmt.get() as { firstStart: string | null } | undefined;
    return row?.firstStart ? parseStored(row.firstStart, 'start_time') : null;
  }

  /** Includes soft-deleted rows: a deleted uuid must still not be re-imported. */
  getAllSessionUuids(): Set<string> {
    const rows = this.uuidsStmt.all() as Array<{ session_uuid: string }>;
    return new Set(rows.map((row) => row.session_uuid));
  }

  getUserIdFromDatabase(): string | null {
    const row = this.userIdStmt.get() as { user_id: string } | undefined;
    return row?.user_id ?? null;
  }

  getSessions(range?: SessionRange): CodingSession[] {
    const rows = (range
      ? this.exportRangeStmt.all(toLocalIso(range.start), toLocalIso(range.end))
      : this.exportAllStmt.all()) as SessionRow[];
    return rows.map(rowToSession);
  }

  // #endregion
}
