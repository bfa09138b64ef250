/**
 * Storage contracts for the OAuth flow.
 *
 * `CredentialStore` persists users, sessions and dynamically registered clients. `AuthStateStore`
 * holds the short-lived CSRF states issued by `/oauth/authorize`, so the flow can run against an
 * in-memory map on a single node or Redis when several instances share traffic.
 */
export const PLATFORMS = ['ios', 'android', 'macos', 'windows', 'linux', 'cli'] as const;

export type Platform = (typeof PLATFORMS)[number];

export const isPlatform = (value: string): value is Platform => PLATFORMS.some((p) => p === value);

export type UserRecord = {
  userId: string;
  email: string;
  name: string | null;
  createdAtMs: number;
  lastLoginMs: number;
};

export type UpsertUserInput = {
  userId: string;
  email: string;
  name: string | null;
  nowMs: number;
};

export type SessionRecord = {
  sessionId: string;
  userId: string;
  accessTokenEnc: string;
  refreshTokenEnc: string;
  expiresAtMs: number;
  createdAtMs: number;
  lastActivityMs: number;
  userAgent: string | null;
};

export type ClientRecord = {
  clientId: string;
  clientSecretDigest: string;
  platform: Platform;
  redirectUris: string[];
  createdAtMs: number;
  expiresAtMs: number;
  lastUsedMs: number | null;
};

export interface CredentialStore {
  getUser(userId: string): Promise<UserRecord | null>;
  getUserByEmail(email: string): Promise<UserRecord | null>;
  upsertUser(input: UpsertUserInput): Promise<UserRecord>;
  /** Cascades to sessions; refused with `USER_HAS_TASKS` while the user owns tasks. */
  deleteUser(userId: string): Promise<boolean>;

  createSession(record: SessionRecord): Promise<void>;
  getSession(sessionId: string): Promise<SessionRecord | null>;
  /** Bumps last-activity and returns the session only when it has not expired at `nowMs`. */
  touchSessionIfActive(sessionId: string, nowMs: number): Promise<SessionRecord | null>;
  /** Replaces access token and expiry in one write; the refresh token is left as is. */
  replaceSessionAccessToken(
    sessionId: string,
    accessTokenEnc: string,
    expiresAtMs: number,
    nowMs: number
  ): Promise<SessionRecord | null>;
  deleteSession(sessionId: string): Promise<boolean>;
  listSessionsForUser(userId: string): Promise<SessionRecord[]>;
  deleteExpiredSessions(nowMs: number): Promise<number>;

  createClient(record: ClientRecord): Promise<void>;
  getClient(clientId: string): Promise<ClientRecord | null>;
  touchClient(clientId: string, nowMs: number): Promise<void>;
  deleteClient(clientId: string): Promise<boolean>;
  listClients(platform?: Platform): Promise<ClientRecord[]>;
  deleteExpiredClients(nowMs: number): Promise<number>;

  ping(): Promise<void>;
}

export type PendingAuthorization = {
  redirectUri: string;
  clientId?: string;
  codeVerifier: string;
  createdAtMs: number;
};

export interface AuthStateStore {
  put(state: string, record: PendingAuthorization, ttlSeconds: number): Promise<void>;
  get(state: string): Promise<PendingAuthorization | null>;
  /** Atomically removes and returns the state; a second call for the same value returns `null`. */
  consume(state: string): Promise<PendingAuthorization | null>;
  close(): Promise<void>;
}
