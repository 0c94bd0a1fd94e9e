import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Database } from '../src/backend/storage';
import { SessionRepository } from '../src/backend/sessionRepository';
import { ExportImportService, type ExportImportStore } from '../src/backend/exportImport';
import type { ExportSession } from '../src/shared/types';
import { codingSession, may } from './helpers/sessions';

const now = () => may(8, 12);

function exported(sessionUuid: string, overrides: Partial<ExportSession> = {}): ExportSession {
  return {
    sessionUuid,
    userId: 'test-user',
    projectName: 'alpha',
    language: 'Kotlin',
    platform: 'Linux',
    ideName: 'TestIDE',
    startTime: '2024-05-06T09:00:00',
    endTime: '2024-05-06T09:30:00',
    lastModified: '2024-05-06T09:30:00',
    ...overrides
  };
}

function exportFile(sessions: ExportSession[], exportVersion = '1.0') {
  return { exportVersion, exportTime: '2024-05-08T12:00:00', totalSessions: sessions.length, sessions };
}

describe('ExportImportService', () => {
  let database: Database;
  let repository: SessionRepository;
  let service: ExportImportService;

  beforeEach(() => {
    database = new Database({ filePath: ':memory:' });
    repository = new SessionRepository(database);
    service = new ExportImportService(repository, now);
  });

  afterEach(async () => {
    await database.close();
  });

  it('exports stored sessions with local timestamps', async () => {
    await repository.insertBatch([
      codingSession('beta', 'Java', may(7, 10), may(7, 10, 15), { sessionUuid: 'uuid-2' }),
      codingSession('alpha', 'Kotlin', may(6, 9), may(6, 9, 30), { sessionUuid: 'uuid-1' })
    ]);

    const data = service.exportData();
    expect(data.exportVersion).toBe('1.0');
    expect(data.exportTime).toBe('2024-05-08T12:00:00');
    expect(data.totalSessions).toBe(2);
    expect(data.sessions[0]).toEqual({
      sessionUuid: 'uuid-1',
      userId: 'test-user',
      projectName: 'alpha',
      language: 'Kotlin',
      platform: 'Linux',
      ideName: 'TestIDE',
      startTime: '2024-05-06T09:00:00',
      endTime: '2024-05-06T09:30:00',
      lastModified: '2024-05-06T09:30:00'
    });
    expect(service.exportData({ start: may(7), end: may(8) }).sessions.map((s) => s.sessionUuid)).toEqual(['uuid-2']);
  });

  it('skips sessions that already exist or repeat in the file', async () => {
    await repository.insertBatch([codingSession('alpha', 'Kotlin', may(6, 9), may(6, 9, 30), { sessionUuid: 'uuid-1' })]);

    const result = await service.importData(exportFile([exported('uuid-1'), exported('uuid-3'), exported('uuid-3')]));

    expect(result).toEqual({ success: true, totalInFile: 3, imported: 1, skipped: 2, failed: 0 });
    expect(repository.countSessions()).toBe(2);
  });

  it('rejects other export versions', async () => {
    const result = await service.importData(JSON.stringify(exportFile([exported('uuid-1')], '2.0')));
    expect(result).toEqual({
      success: false,
      totalInFile: 0,
      imported: 0,
      skipped: 0,
      failed: 0,
      errorMessage: 'Unsupported export version: 2.0'
    });
  });

  it('fails the whole import on a bad timestamp', async () => {
    const result = await service.importData(
      exportFile([exported('uuid-8'), exported('uuid-9', { startTime: 'yesterday' })])
    );
    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe('Invalid startTime "yesterday" in session uuid-9');
    expect(repository.countSessions()).toBe(0);
  });

  it('reports malformed input', async () => {
    expect((await service.importData('{not json')).errorMessage).toMatch(/^Invalid JSON: /);
    expect((await service.importData({ exportVersion: '1.0', sessions: [] })).errorMessage).toBe(
      'Invalid export file at exportTime: Required'
    );
  });

  it('counts every pending row as failed when the batch fails', async () => {
    const store: ExportImportStore = {
      getSessions: () => [],
      getAllSessionUuids: () => new Set(['uuid-1']),
      insertBatch: async () => {
        throw new Error('disk I/O error');
      }
    };
    const result = await new ExportImportService(store, now).importData(
      exportFile([exported('uuid-1'), exported('uuid-2'), exported('uuid-3')])
    );
    expect(result).toEqual({
      success: false,
      totalInFile: 3,
      imported: 0,
      skipped: 1,
      failed: 2,
      errorMessage: 'disk I/O error'
    });
  });

  it('moves sessions between databases through a file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'code-time-export-'));
    const file = path.join(dir, 'sessions.json');
    const target = new Database({ filePath: ':memory:' });
    try {
      await repository.insertBatch([
        codingSession('alpha', 'Kotlin', may(6, 9), may(6, 9, 30)),
        codingSession('beta', 'Java', may(7, 10), may(7, 10, 15))
      ]);
      expect(await service.exportToFile(file)).toBe(2);

      const result = await new ExportImportService(new SessionRepository(target), now).importFromFile(file);
      expect(result).toEqual({ success: true, totalInFile: 2, imported: 2, skipped: 0, failed: 0 });
    } finally {
      await target.close();
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
