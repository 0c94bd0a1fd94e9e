import fs from 'node:fs/promises';
import { z } from 'zod';
import type { CodingSession, ExportData, ExportSession, ImportResult } from '@shared/types';
import { logger } from '@shared/logger';
import { parseLocalIso, toLocalIso } from '@shared/time';
import type { SessionRange, SessionRepository } from './sessionRepository';
import { EXPORT_VERSION } from './defaults';

export type ExportImportStore = Pick<SessionRepository, 'getSessions' | 'getAllSessionUuids' | 'insertBatch'>;

const exportSessionSchema = z.object({
  sessionUuid: z.string().min(1),
  userId: z.string().min(1),
  projectName: z.string(),
  language: z.string(),
  platform: z.string(),
  ideName: z.string().default('unknown'),
  startTime: z.string(),
  endTime: z.string(),
  lastModified: z.string()
});

const versionSchema = z.object({ exportVersion: z.string() });

const exportDataSchema = z.object({
  exportVersion: z.literal(EXPORT_VERSION),
  exportTime: z.string(),
  totalSessions: z.number().int().nonnegative(),
  sessions: z.array(exportSessionSchema)
});

function failure(errorMessage: string, totalInFile = 0): ImportResult {
  return { success: false, totalInFile, imported: 0, skipped: 0, failed: 0, errorMessage };
}

function describeIssue(error: z.ZodError) {
  const first = error.issues[0];
  if (!first) return 'Invalid export file';
  return `Invalid export file at ${first.path.length ? first.path.join('.') : 'root'}: ${first.message}`;
}

function parseTimestamp(value: string, field: string, uuid: string): Date {
  const parsed = parseLocalIso(value);
  if (!parsed) {
    throw new Error(`Invalid ${field} "${value}" in session ${uuid}`);
  }
  return parsed;
}

function toSession(entry: z.infer<typeof exportSessionSchema>): CodingSession {
  return {
    sessionUuid: entry.sessionUuid,
    userId: entry.userId,
    projectName: entry.projectName,
    language: entry.language,
    platform: entry.platform,
    ideName: entry.ideName,
    startTime: parseTimestamp(entry.startTime, 'startTime', entry.sessionUuid),
    endTime: parseTimestamp(entry.endTime, 'endTime', entry.sessionUuid),
    lastModified: parseTimestamp(entry.lastModified, 'lastModified', entry.sessionUuid),
    isDeleted: false,
    isSynced: false,
    syncedAt: null,
    syncVersion: 0
  };
}

/**
 * JSON export and de-duplicating import of coding sessions. Timestamps are written
 * as local `YYYY-MM-DDTHH:mm:ss`, the same form they are stored in.
 */
export class ExportImportService {
  constructor(
    private readonly store: ExportImportStore,
    private readonly now: () => Date = () => new Date()
  ) { }

  exportData(range?: SessionRange): ExportData {
    const sessions: ExportSession[] = this.store.getSessions(range).map((session) => ({
      sessionUuid: session.sessionUuid,
      userId: session.userId,
      projectName: session.projectName,
      language: session.language,
      platform: session.platform,
      ideName: session.ideName,
      startTime: toLocalIso(session.startTime),
      endTime: toLocalIso(session.endTime),
      lastModified: toLocalIso(session.lastModified)
    }));
    return {
      exportVersion: EXPORT_VERSION,
      exportTime: toLocalIso(this.now()),
      totalSessions: sessions.length,
      sessions
    };
  }

  /** Writes the export as pretty-printed JSON and returns the session count. */
  async exportToFile(filePath: string, range?: SessionRange): Promise<number> {
    const data = this.exportData(range);
    await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
    logger.info(`Exported ${data.totalSessions} session(s) to ${filePath}`);
    return data.totalSessions;
  }

  async importFromFile(filePath: string): Promise<ImportResult> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      logger.error('Failed to read import file', filePath, error);
      return failure(`Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return this.importData(content);
  }

  /** Accepts raw JSON text or an already parsed value. */
  async importData(input: unknown): Promise<ImportResult> {
    let raw: unknown = input;
    if (typeof input === 'string') {
      try {
        raw = JSON.parse(input);
      } catch (error) {
        logger.warn('Import file is not valid JSON', error);
        return failure(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    const version = versionSchema.safeParse(raw);
    if (!version.success) return failure(describeIssue(version.error));
    if (version.data.exportVersion !== EXPORT_VERSION) {
      logger.warn(`Unsupported export version: ${version.data.exportVersion}`);
      return failure(`Unsupported export version: ${version.data.exportVersion}`);
    }

    const parsed = exportDataSchema.safeParse(raw);
    if (!parsed.success) return failure(describeIssue(parsed.error));
    const entries = parsed.data.sessions;

    let sessions: CodingSession[];
    try {
      sessions = entries.map(toSession);
    } catch (error) {
      return failure(error instanceof Error ? error.message : String(error), entries.length);
    }

    const seen = this.store.getAllSessionUuids();
    const pending: CodingSession[] = [];
    for (const session of sessions) {
      if (seen.has(session.sessionUuid)) continue;
      seen.add(session.sessionUuid);
      pending.push(session);
    }
    const skipped = sessions.length - pending.length;

    try {
      const imported = await this.store.insertBatch(pending);
      logger.info(`Import completed: ${imported} imported, ${skipped} skipped of ${sessions.length}`);
      return { success: true, totalInFile: sessions.length, imported, skipped, failed: 0 };
    } catch (error) {
      logger.error(`Import of ${pending.length} session(s) failed`, error);
      return {
        success: false,
        totalInFile: sessions.length,
        imported: 0,
        skipped,
        failed: pending.length,
        errorMessage: error instanceof Error ? error.message : String(error)
      };
    }
  }
}
