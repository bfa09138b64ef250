/**
 * SQLite backend for `CredentialStore`.
 *
 * Users, sessions and dynamic clients live in the relational store next to tasks so the
 * user → sessions cascade and user → tasks restriction are enforced by foreign keys.
 */
import type { Db } from '../../db/database';
import { runStoreOp } from '../../db/database';
import { DomainError, InfrastructureError } from '../../lib/errors';

import { isPlatform } from './interface';
import type {
  ClientRecord,
  CredentialStore,
  Platform,
  SessionRecord,
  UpsertUserInput,
  UserRecord,
} from './interface';

type UserRow = {
  user_id: string;
  email: string;
  name: string | null;
  created_at_ms: number;
  last_login_ms: number;
};

type SessionRow = {
  session_id: string;
  user_id: string;
  access_token_enc: string;
  refresh_token_enc: string;
  expires_at_ms: number;
  created_at_ms: number;
  last_activity_ms: number;
  user_agent: string | null;
};

type ClientRow = {
  client_id: string;
  client_secret_digest: string;
  platform: string;
  redirect_uris: string;
  created_at_ms: number;
  expires_at_ms: number;
  last_used_ms: number | null;
};

const toUser = (row: UserRow): UserRecord => ({
  userId: row.user_id,
  email: row.email,
  name: row.name,
  createdAtMs: row.created_at_ms,
  lastLoginMs: row.last_login_ms,
});

const toSession = (row: SessionRow): SessionRecord => ({
  sessionId: row.session_id,
  userId: row.user_id,
  accessTokenEnc: row.access_token_enc,
  refreshTokenEnc: row.refresh_token_enc,
  expiresAtMs: row.expires_at_ms,
  createdAtMs: row.created_at_ms,
  lastActivityMs: row.last_activity_ms,
  userAgent: row.user_agent,
});

const parseRedirectUris = (raw: string): string[] => {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((u): u is string => typeof u === 'string');
};

const toClient = (row: ClientRow): ClientRecord => {
  if (!isPlatform(row.platform)) {
    throw new InfrastructureError('store_error', `Stored client ${row.client_id} has unknown platform`);
  }
  return {
    clientId: row.client_id,
    clientSecretDigest: row.client_secret_digest,
    platform: row.platform,
    redirectUris: parseRedirectUris(row.redirect_uris),
    createdAtMs: row.created_at_ms,
    expiresAtMs: row.expires_at_ms,
    lastUsedMs: row.last_used_ms,
  };
};

export class SqliteCredentialStore implements CredentialStore {
  constructor(private readonly db: Db) {}

  async getUser(userId: string): Promise<UserRecord | null> {
    return runStoreOp('getUser', () => {
      const row = this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE user_id = ?').get(userId);
      return row ? toUser(row) : null;
    });
  }

  async getUserByEmail(email: string): Promise<UserRecord | null> {
    return runStoreOp('getUserByEmail', () => {
      const row = this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE email = ?').get(email);
      return row ? toUser(row) : null;
    });
  }

  async upsertUser(input: UpsertUserInput): Promise<UserRecord> {
    return runStoreOp(
      'upsertUser',
      () => {
        const row = this.db
          .prepare<[string, string, string | null, number, number], UserRow>(
            `INSERT INTO users (user_id, email, name, created_at_ms, last_login_ms)
             VALUES (?, ?, ?, ?, ?)
             ON CONFLICT(user_id) DO UPDATE SET
               email = excluded.email,
               name = excluded.name,
               last_login_ms = excluded.last_login_ms
             RETURNING *`
          )
          .get(input.userId, input.email, input.name, input.nowMs, input.nowMs);
        if (!row) throw new InfrastructureError('store_error', 'User upsert returned no row');
        return toUser(row);
      },
      (code) =>
        code === 'SQLITE_CONSTRAINT_UNIQUE'
          ? new DomainError('EMAIL_IN_USE', 'Email is already linked to another account')
          : undefined
    );
  }

  async deleteUser(userId: string): Promise<boolean> {
    return runStoreOp(
      'deleteUser',
      () => this.db.prepare<[string]>('DELETE FROM users WHERE user_id = ?').run(userId).changes > 0,
      (code) =>
        code === 'SQLITE_CONSTRAINT_FOREIGNKEY'
          ? new DomainError('USER_HAS_TASKS', 'User still owns tasks and cannot be deleted')
          : undefined
    );
  }

  async createSession(record: SessionRecord): Promise<void> {
    runStoreOp('createSession', () => {
      this.db
        .prepare<[string, string, string, string, number, number, number, string | null]>(
          `INSERT INTO sessions
             (session_id, user_id, access_token_enc, refresh_token_enc, expires_at_ms, created_at_ms, last_activity_ms, user_agent)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          record.sessionId,
          record.userId,
          record.accessTokenEnc,
          record.refreshTokenEnc,
          record.expiresAtMs,
          record.createdAtMs,
          record.lastActivityMs,
          record.userAgent
        );
    });
  }

  async getSession(sessionId: string): Promise<SessionRecord | null> {
    return runStoreOp('getSession', () => {
      const row = this.db
        .prepare<[string], SessionRow>('SELECT * FROM sessions WHERE session_id = ?')
        .get(sessionId);
      return row ? toSession(row) : null;
    });
  }

  async touchSessionIfActive(sessionId: string, nowMs: number): Promise<SessionRecord | null> {
    return runStoreOp('touchSessionIfActive', () => {
      const row = this.db
        .prepare<[number, string, number], SessionRow>(
          `UPDATE sessions SET last_activity_ms = MAX(last_activity_ms, ?)
           WHERE session_id = ? AND expires_at_ms > ?
           RETURNING *`
        )
        .get(nowMs, sessionId, nowMs);
      return row ? toSession(row) : null;
    });
  }

  async replaceSessionAccessToken(
    sessionId: string,
    accessTokenEnc: string,
    expiresAtMs: number,
    nowMs: number
  ): Promise<SessionRecord | null> {
    return runStoreOp('replaceSessionAccessToken', () => {
      const row = this.db
        .prepare<[string, number, number, string], SessionRow>(
          `UPDATE sessions
           SET access_token_enc = ?, expires_at_ms = ?, last_activity_ms = MAX(last_activity_ms, ?)
           WHERE session_id = ?
           RETURNING *`
        )
        .get(accessTokenEnc, expiresAtMs, nowMs, sessionId);
      return row ? toSession(row) : null;
    });
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return runStoreOp(
      'deleteSession',
      () => this.db.prepare<[string]>('DELETE FROM sessions WHERE session_id = ?').run(sessionId).changes > 0
    );
  }

  async listSessionsForUser(userId: string): Promise<SessionRecord[]> {
    return runStoreOp('listSessionsForUser', () =>
      this.db
        .prepare<[string], SessionRow>(
          'SELECT * FROM sessions WHERE user_id = ? ORDER BY created_at_ms DESC, rowid DESC'
        )
        .all(userId)
        .map(toSession)
    );
  }

  async deleteExpiredSessions(nowMs: number): Promise<number> {
    return runStoreOp(
      'deleteExpiredSessions',
      () => this.db.prepare<[number]>('DELETE FROM sessions WHERE expires_at_ms <= ?').run(nowMs).changes
    );
  }

  async createClient(record: ClientRecord): Promise<void> {
    runStoreOp('createClient', () => {
      this.db
        .prepare<[string, string, string, string, number, number, number | null]>(
          `INSERT INTO dynamic_clients
             (client_id, client_secret_digest, platform, redirect_uris, created_at_ms, expires_at_ms, last_used_ms)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          record.clientId,
          record.clientSecretDigest,
          record.platform,
          JSON.stringify(record.redirectUris),
          record.createdAtMs,
          record.expiresAtMs,
          record.lastUsedMs
        );
    });
  }

  async getClient(clientId: string): Promise<ClientRecord | null> {
    return runStoreOp('getClient', () => {
      const row = this.db
        .prepare<[string], ClientRow>('SELECT * FROM dynamic_clients WHERE client_id = ?')
        .get(clientId);
      return row ? toClient(row) : null;
    });
  }

  async touchClient(clientId: string, nowMs: number): Promise<void> {
    runStoreOp('touchClient', () => {
      this.db.prepare<[number, string]>('UPDATE dynamic_clients SET last_used_ms = ? WHERE client_id = ?').run(nowMs, clientId);
    });
  }

  async deleteClient(clientId: string): Promise<boolean> {
    return runStoreOp(
      'deleteClient',
      () => this.db.prepare<[string]>('DELETE FROM dynamic_clients WHERE client_id = ?').run(clientId).changes > 0
    );
  }

  async listClients(platform?: Platform): Promise<ClientRecord[]> {
    return runStoreOp('listClients', () => {
      const rows = platform
        ? this.db
            .prepare<[string], ClientRow>(
              'SELECT * FROM dynamic_clients WHERE platform = ? ORDER BY created_at_ms DESC, rowid DESC'
            )
            .all(platform)
        : this.db
            .prepare<[], ClientRow>('SELECT * FROM dynamic_clients ORDER BY created_at_ms DESC, rowid DESC')
            .all();
      return rows.map(toClient);
    });
  }

  async deleteExpiredClients(nowMs: number): Promise<number> {
    return runStoreOp(
      'deleteExpiredClients',
      () => this.db.prepare<[number]>('DELETE FROM dynamic_clients WHERE expires_at_ms <= ?').run(nowMs).changes
    );
  }

  async ping(): Promise<void> {
    runStoreOp('ping', () => {
      this.db.prepare('SELECT 1').get();
    });
  }
}
