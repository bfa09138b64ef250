/**
 * Session lifecycle: issuance, validation, token refresh, revocation and expiry sweeps.
 *
 * A session binds a random id (the bearer credential) to a user and to encrypted copies of that
 * user's upstream provider tokens. Plaintext tokens exist only transiently, inside `create`,
 * `refresh` and the `getDecrypted*` accessors.
 */
import { logger } from '../lib/logger';
import type { Clock, Timestamp } from '../lib/time';
import { systemClock, toEpochMs } from '../lib/time';

import type { TokenCipher } from './crypto';
import { randomToken } from './crypto';
import type { CredentialStore, SessionRecord } from './storage';

const SESSION_ID_BYTES = 32;

/** Session as exposed outside the manager. Never carries tokens. */
export type SessionInfo = {
  sessionId: string;
  userId: string;
  expiresAtMs: number;
  createdAtMs: number;
  lastActivityMs: number;
  userAgent: string | null;
};

export type CreateSessionInput = {
  userId: string;
  accessToken: string;
  refreshToken: string;
  expiresAt: Timestamp;
  userAgent?: string | null;
};

const toInfo = (record: SessionRecord): SessionInfo => ({
  sessionId: record.sessionId,
  userId: record.userId,
  expiresAtMs: record.expiresAtMs,
  createdAtMs: record.createdAtMs,
  lastActivityMs: record.lastActivityMs,
  userAgent: record.userAgent,
});

// Session ids are bearer credentials; logs only ever carry a prefix.
export const sessionIdHint = (sessionId: string) => `${sessionId.slice(0, 8)}…`;

export class SessionManager {
  constructor(
    private readonly store: CredentialStore,
    private readonly cipher: TokenCipher,
    private readonly clock: Clock = systemClock
  ) {}

  async create(input: CreateSessionInput): Promise<SessionInfo> {
    const now = this.clock();
    const record: SessionRecord = {
      sessionId: randomToken(SESSION_ID_BYTES),
      userId: input.userId,
      accessTokenEnc: this.cipher.encrypt(input.accessToken),
      refreshTokenEnc: this.cipher.encrypt(input.refreshToken),
      expiresAtMs: toEpochMs(input.expiresAt),
      createdAtMs: now,
      lastActivityMs: now,
      userAgent: input.userAgent ?? null,
    };
    await this.store.createSession(record);
    logger.info('Sessions', 'Session created', { session: sessionIdHint(record.sessionId), userId: input.userId });
    return toInfo(record);
  }

  /**
   * The authorization gate: `true` iff the session exists and `now < expires_at`.
   *
   * Bumps last-activity on success. Never throws for an unknown id.
   */
  async validate(sessionId: string): Promise<boolean> {
    return (await this.authenticate(sessionId)) !== null;
  }

  /** Same gate as `validate`, returning the session so callers learn the owning user. */
  async authenticate(sessionId: string): Promise<SessionInfo | null> {
    if (!sessionId) return null;
    const record = await this.store.touchSessionIfActive(sessionId, this.clock());
    return record ? toInfo(record) : null;
  }

  async get(sessionId: string): Promise<SessionInfo | null> {
    const record = await this.store.getSession(sessionId);
    return record ? toInfo(record) : null;
  }

  async listForUser(userId: string): Promise<SessionInfo[]> {
    return (await this.store.listSessionsForUser(userId)).map(toInfo);
  }

  async getDecryptedAccessToken(sessionId: string): Promise<string | null> {
    const record = await this.store.getSession(sessionId);
    return record ? this.cipher.decrypt(record.accessTokenEnc) : null;
  }

  async getDecryptedRefreshToken(sessionId: string): Promise<string | null> {
    const record = await this.store.getSession(sessionId);
    return record ? this.cipher.decrypt(record.refreshTokenEnc) : null;
  }

  /** Replaces the access token and expiry atomically; the refresh token is unchanged. */
  async refresh(sessionId: string, accessToken: string, expiresAt: Timestamp): Promise<SessionInfo | null> {
    const record = await this.store.replaceSessionAccessToken(
      sessionId,
      this.cipher.encrypt(accessToken),
      toEpochMs(expiresAt),
      this.clock()
    );
    if (!record) return null;
    logger.info('Sessions', 'Session refreshed', { session: sessionIdHint(sessionId) });
    return toInfo(record);
  }

  async delete(sessionId: string): Promise<boolean> {
    const removed = await this.store.deleteSession(sessionId);
    if (removed) logger.info('Sessions', 'Session deleted', { session: sessionIdHint(sessionId) });
    return removed;
  }

  async cleanupExpired(): Promise<number> {
    const count = await this.store.deleteExpiredSessions(this.clock());
    logger.info('Sessions', 'Expired sessions removed', { count });
    return count;
  }
}
