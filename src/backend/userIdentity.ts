import { randomUUID } from 'node:crypto';
import { logger } from '@shared/logger';
import type { SessionRepository } from './sessionRepository';
import type { SettingsService } from './settings';

/**
 * Resolves the installation's user id once and caches it. Stored sessions win, then
 * the saved setting; otherwise a fresh id is generated and saved.
 */
export class UserIdentity {
  private cached: string | null = null;

  constructor(
    private readonly sessions: Pick<SessionRepository, 'getUserIdFromDatabase'>,
    private readonly settings: Pick<SettingsService, 'getUserId' | 'setUserId'>,
    private readonly generate: () => string = randomUUID
  ) { }

  getUserId(): string {
    if (this.cached) return this.cached;

    const fromSessions = this.sessions.getUserIdFromDatabase();
    if (fromSessions) {
      this.cached = fromSessions;
      if (this.settings.getUserId() !== fromSessions) this.settings.setUserId(fromSessions);
      return fromSessions;
    }

    const fromSettings = this.settings.getUserId();
    if (fromSettings) {
      this.cached = fromSettings;
      return fromSettings;
    }

    const generated = this.generate();
    logger.info('Generated new user id');
    this.settings.setUserId(generated);
    this.cached = generated;
    return generated;
  }
}
