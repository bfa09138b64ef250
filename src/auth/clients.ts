/**
 * Dynamic client registration (RFC 7591 style).
 *
 * Client secrets are stored only as an HMAC-SHA256 digest keyed by the server secret and are
 * compared digest-to-digest in constant time. The plaintext secret leaves `register` once.
 */
import { logger } from '../lib/logger';
import type { Clock } from '../lib/time';
import { systemClock } from '../lib/time';

import { hmacSha256Hex, randomToken, timingSafeEqualStr } from './crypto';
import type { ClientRecord, CredentialStore, Platform } from './storage';

const CLIENT_ID_PREFIX = 'client_';
const CLIENT_ID_BYTES = 24;
const CLIENT_SECRET_BYTES = 32;
const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_CLIENT_EXPIRY_DAYS = 365;

/** Client as exposed outside the registrar. Never carries the secret. */
export type ClientInfo = {
  clientId: string;
  platform: Platform;
  redirectUris: string[];
  createdAtMs: number;
  expiresAtMs: number;
  lastUsedMs: number | null;
};

export type ClientRegistration = {
  client: ClientInfo;
  clientSecret: string;
};

const toInfo = (record: ClientRecord): ClientInfo => ({
  clientId: record.clientId,
  platform: record.platform,
  redirectUris: [...record.redirectUris],
  createdAtMs: record.createdAtMs,
  expiresAtMs: record.expiresAtMs,
  lastUsedMs: record.lastUsedMs,
});

export class ClientRegistrar {
  constructor(
    private readonly store: CredentialStore,
    private readonly secretKey: string,
    private readonly clock: Clock = systemClock
  ) {}

  private digest(secret: string) {
    return hmacSha256Hex(this.secretKey, `client-secret:${secret}`);
  }

  /** Input is expected to be validated at the HTTP boundary (platform enum, non-empty URIs). */
  async register(
    platform: Platform,
    redirectUris: string[],
    expiresInDays = DEFAULT_CLIENT_EXPIRY_DAYS
  ): Promise<ClientRegistration> {
    const now = this.clock();
    const clientSecret = randomToken(CLIENT_SECRET_BYTES);
    const record: ClientRecord = {
      clientId: `${CLIENT_ID_PREFIX}${randomToken(CLIENT_ID_BYTES)}`,
      clientSecretDigest: this.digest(clientSecret),
      platform,
      redirectUris: [...new Set(redirectUris)],
      createdAtMs: now,
      expiresAtMs: now + expiresInDays * DAY_MS,
      lastUsedMs: null,
    };
    await this.store.createClient(record);
    logger.info('Clients', 'Client registered', { clientId: record.clientId, platform });
    return { client: toInfo(record), clientSecret };
  }

  async get(clientId: string): Promise<ClientInfo | null> {
    const record = await this.store.getClient(clientId);
    return record ? toInfo(record) : null;
  }

  /** Fails closed: unknown client, wrong secret or expired registration all return `false`. */
  async validateCredentials(clientId: string, clientSecret: string): Promise<boolean> {
    const record = await this.store.getClient(clientId);
    if (!record) return false;
    if (!timingSafeEqualStr(this.digest(clientSecret), record.clientSecretDigest)) return false;
    const now = this.clock();
    if (record.expiresAtMs <= now) return false;
    await this.store.touchClient(clientId, now);
    return true;
  }

  /** Exact membership only; no prefix or wildcard matching. */
  async validateRedirectUri(clientId: string, redirectUri: string): Promise<boolean> {
    const record = await this.store.getClient(clientId);
    if (!record) return false;
    if (record.expiresAtMs <= this.clock()) return false;
    return record.redirectUris.includes(redirectUri);
  }

  async revoke(clientId: string): Promise<boolean> {
    const removed = await this.store.deleteClient(clientId);
    if (removed) logger.info('Clients', 'Client revoked', { clientId });
    return removed;
  }

  async list(platform?: Platform): Promise<ClientInfo[]> {
    return (await this.store.listClients(platform)).map(toInfo);
  }

  async cleanupExpired(): Promise<number> {
    const count = await this.store.deleteExpiredClients(this.clock());
    logger.info('Clients', 'Expired clients removed', { count });
    return count;
  }
}
