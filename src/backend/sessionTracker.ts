import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import type { CodingSession, EditorTarget, LiveSession, TrackerStatus } from '@shared/types';
import { logger } from '@shared/logger';
import { toLocalIso } from '@shared/time';
import type { SessionWriter } from './sessionRepository';
import type { LiveCounters } from './liveCounters';
import { isCountableActivity, normalizeProjectPath, resolveTarget, type ResolvedTarget } from './activityGate';
import {
  DEFAULT_IDLE_THRESHOLD_SECONDS,
  IDLE_CHECK_INTERVAL_MS,
  SHUTDOWN_DRAIN_TIMEOUT_MS
} from './defaults';

export type SessionTrackerOptions = {
  writer: SessionWriter;
  counters: LiveCounters;
  getUserId: () => string;
  platform: string;
  ideName: string;
  getIdleThresholdSeconds?: () => number;
  isCountable?: (target: EditorTarget) => boolean;
  resolve?: (target: EditorTarget) => ResolvedTarget;
  now?: () => Date;
  idleCheckIntervalMs?: number;
  drainTimeoutMs?: number;
};

/**
 * Turns editor activity into coding sessions.
 *
 * Live sessions are indexed by project path, then language; a project holds at most
 * one language at a time. Sessions leave the index (and go to storage) on idle
 * timeout, language switch, project close, forced flush or shutdown.
 *
 * Emits `activity-started` and `activity-stopped` as the user becomes active or idle.
 */
export class SessionTracker extends EventEmitter {
  private readonly liveSessions = new Map<string, Map<string, LiveSession>>();
  private lastActivity: Date | null = null;
  private userActive = false;
  private idleTimer: NodeJS.Timeout | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  private readonly writer: SessionWriter;
  private readonly counters: LiveCounters;
  private readonly getUserId: () => string;
  private readonly platform: string;
  private readonly ideName: string;
  private readonly getIdleThresholdSeconds: () => number;
  private readonly isCountable: (target: EditorTarget) => boolean;
  private readonly resolve: (target: EditorTarget) => ResolvedTarget;
  private readonly now: () => Date;
  private readonly idleCheckIntervalMs: number;
  private readonly drainTimeoutMs: number;

  constructor(options: SessionTrackerOptions) {
    super();
    this.writer = options.writer;
    this.counters = options.counters;
    this.getUserId = options.getUserId;
    this.platform = options.platform;
    this.ideName = options.ideName;
    this.getIdleThresholdSeconds = options.getIdleThresholdSeconds ?? (() => DEFAULT_IDLE_THRESHOLD_SECONDS);
    this.isCountable = options.isCountable ?? isCountableActivity;
    this.resolve = options.resolve ?? resolveTarget;
    this.now = options.now ?? (() => new Date());
    this.idleCheckIntervalMs = options.idleCheckIntervalMs ?? IDLE_CHECK_INTERVAL_MS;
    this.drainTimeoutMs = options.drainTimeoutMs ?? SHUTDOWN_DRAIN_TIMEOUT_MS;
  }

  start() {
    if (this.idleTimer) return;
    this.idleTimer = setInterval(() => {
      this.checkIdleStatus(this.now()).catch((error) => logger.error('Idle check failed', error));
    }, this.idleCheckIntervalMs);
  }

  /**
   * Records one activity tick. Returns false when the target does not count as editing.
   */
  onActivity(target: EditorTarget, now: Date = this.now()): boolean {
    if (!this.isCountable(target)) return false;
    const { projectPath, projectName, language } = this.resolve(target);

    const previous = this.lastActivity;
    if (previous) {
      const deltaMs = now.getTime() - previous.getTime();
      if (deltaMs < this.idleThresholdMs()) {
        this.counters.record(deltaMs);
      }
    }
    if (!previous || now.getTime() > previous.getTime()) {
      this.lastActivity = now;
    }

    if (!this.userActive) {
      this.userActive = true;
      this.emit('activity-started');
    }

    const projectSessions = this.liveSessions.get(projectPath);
    if (projectSessions && projectSessions.size > 0 && !projectSessions.has(language)) {
      logger.info(`Language switch in ${projectName}: ${[...projectSessions.keys()].join(', ')} -> ${language}`);
      this.track(this.persist(this.takeProject(projectPath, now), 'language switch'));
    }

    let sessions = this.liveSessions.get(projectPath);
    if (!sessions) {
      sessions = new Map();
      this.liveSessions.set(projectPath, sessions);
    }

    const existing = sessions.get(language);
    if (existing) {
      if (now.getTime() > existing.endTime.getTime()) {
        existing.endTime = now;
      }
    } else {
      logger.info(`Starting coding session for ${projectName} (${language})`);
      sessions.set(language, {
        sessionUuid: randomUUID(),
        projectPath,
        projectName,
        language,
        platform: this.platform,
        ideName: this.ideName,
        startTime: now,
        endTime: now
      });
    }
    return true;
  }

  /**
   * Closes every live session once the user has been idle for the threshold. End times
   * are clamped to the last activity plus the threshold, not to `now`.
   */
  async checkIdleStatus(now: Date = this.now()): Promise<void> {
    if (!this.lastActivity || !this.hasLiveSessions()) return;
    const thresholdMs = this.idleThresholdMs();
    if (now.getTime() - this.lastActivity.getTime() < thresholdMs) return;

    logger.info(`Idle for ${this.getIdleThresholdSeconds()}s; pausing tracking`);
    const clampedEnd = new Date(this.lastActivity.getTime() + thresholdMs);
    const sessions = this.takeAll(clampedEnd);
    this.markInactive();
    await this.persist(sessions, 'idle timeout');
  }

  /** Flushes everything without changing idle state; used when tracking settings change. */
  async forcePersistSessions(): Promise<void> {
    await this.persist(this.takeAll(), 'forced flush');
  }

  async stopProjectTracking(projectPath: string): Promise<void> {
    const sessions = this.takeProject(normalizeProjectPath(projectPath));
    if (!this.hasLiveSessions()) {
      this.markInactive();
    }
    await this.persist(sessions, 'project closed');
  }

  /** Shutdown path: stop the ticker, flush, and wait (bounded) for the writes. */
  async stopTracking(): Promise<void> {
    logger.info('Stopping all tracking sessions');
    if (this.idleTimer) {
      clearInterval(this.idleTimer);
      this.idleTimer = null;
    }
    this.track(this.persist(this.takeAll(), 'shutdown'));
    this.markInactive();
    const drained = await this.writer.drain(this.drainTimeoutMs);
    await this.settled();
    if (!drained) {
      logger.warn('Shutdown continued with session writes still pending');
    }
  }

  /** Resolves once every flush started so far has been handed to storage. */
  async settled(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  isUserActive() {
    return this.userActive;
  }

  status(counters = this.counters.snapshot()): TrackerStatus {
    const liveSessions = [...this.liveSessions.values()].flatMap((sessions) =>
      [...sessions.values()].map((session) => ({
        sessionUuid: session.sessionUuid,
        projectPath: session.projectPath,
        projectName: session.projectName,
        language: session.language,
        startTime: toLocalIso(session.startTime),
        endTime: toLocalIso(session.endTime)
      }))
    );
    return {
      userActive: this.userActive,
      lastActivity: this.lastActivity ? toLocalIso(this.lastActivity) : null,
      liveSessions,
      counters
    };
  }

  private idleThresholdMs() {
    return Math.max(1, this.getIdleThresholdSeconds()) * 1000;
  }

  private hasLiveSessions() {
    return [...this.liveSessions.values()].some((sessions) => sessions.size > 0);
  }

  private markInactive() {
    if (!this.userActive) return;
    this.userActive = false;
    this.emit('activity-stopped');
  }

  // Removal from the index happens synchronously, before any write is queued, so a
  // later onActivity always opens a fresh session.
  private takeProject(projectPath: string, endAt?: Date): LiveSession[] {
    const sessions = this.liveSessions.get(projectPath);
    this.liveSessions.delete(projectPath);
    return sessions ? [...sessions.values()].map((session) => withEnd(session, endAt)) : [];
  }

  private takeAll(endAt?: Date): LiveSession[] {
    const sessions = [...this.liveSessions.values()].flatMap((entries) => [...entries.values()]);
    this.liveSessions.clear();
    return sessions.map((session) => withEnd(session, endAt));
  }

  private track(flush: Promise<void>) {
    this.inFlight.add(flush);
    flush.finally(() => this.inFlight.delete(flush)).catch((error) => logger.error('Session flush failed', error));
  }

  private async persist(sessions: LiveSession[], reason: string): Promise<void> {
    if (sessions.length === 0) return;
    logger.info(`Persisting ${sessions.length} session(s) (${reason}): ${sessions.map((s) => s.language).join(', ')}`);
    const lastModified = this.now();
    const records: CodingSession[] = sessions.map((session) => toRecord(session, this.getUserId(), lastModified));
    const saved = await this.writer.saveSessions(records);
    if (saved !== records.length) {
      logger.error(`Lost ${records.length - saved} session(s) during ${reason}; they will not be retried`);
    }
  }
}

function toRecord(session: LiveSession, userId: string, lastModified: Date): CodingSession {
  return {
    sessionUuid: session.sessionUuid,
    userId,
    projectName: session.projectName,
    language: session.language,
    platform: session.platform,
    ideName: session.ideName,
    startTime: session.startTime,
    endTime: session.endTime,
    lastModified,
    isDeleted: false,
    isSynced: false,
    syncedAt: null,
    syncVersion: 0
  };
}

function withEnd(session: LiveSession, endAt?: Date): LiveSession {
  if (!endAt || endAt.getTime() <= session.endTime.getTime()) return { ...session };
  return { ...session, endTime: endAt };
}
