import dotenv from 'dotenv';
dotenv.config({ quiet: true });

import { ConfigurationError } from './lib/errors';

export type AuthStateStoreKind = 'memory' | 'redis';

export type AppConfig = {
  appName: string;
  version: string;
  environment: string;
  port: number;
  publicUrl: string;
  protocolVersion: string;

  databasePath: string;
  databaseBusyTimeoutMs: number;

  encryptionKey: string;

  oidcIssuer: string;
  oidcClientId: string;
  oidcClientSecret: string;
  oidcRedirectUri: string;
  oidcScopes: string[];

  authStateStore: AuthStateStoreKind;
  redisUrl?: string;
  authStateTtlSeconds: number;

  clientExpiryDays: number;
  calendarApiUrl: string;
};

type Env = Record<string, string | undefined>;

export const APP_NAME = 'task-dispatch-mcp-server';
export const APP_VERSION = '0.1.0';
export const MCP_PROTOCOL_VERSION = '2025-06-18';

const BASE_SCOPES = ['openid', 'email', 'profile'];
const DEFAULT_EXTRA_SCOPES = 'https://www.googleapis.com/auth/calendar.events';

const required = (env: Env, name: string) => {
  const value = env[name]?.trim();
  if (!value) throw new ConfigurationError(`${name} is required`);
  return value;
};

const positiveInt = (env: Env, name: string, fallback: number) => {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
};

const trimTrailingSlash = (url: string) => url.replace(/\/+$/, '');

export const loadAppConfig = (env: Env = process.env): AppConfig => {
  const port = positiveInt(env, 'PORT', 8000);
  const publicUrl = trimTrailingSlash(env.PUBLIC_URL?.trim() || `http://localhost:${port}`);

  const storeRaw = (env.AUTH_STATE_STORE?.trim() || 'memory').toLowerCase();
  if (storeRaw !== 'memory' && storeRaw !== 'redis') {
    throw new ConfigurationError(`AUTH_STATE_STORE must be "memory" or "redis", got "${storeRaw}"`);
  }
  const redisUrl = env.REDIS_URL?.trim() || undefined;
  if (storeRaw === 'redis' && !redisUrl) {
    throw new ConfigurationError('REDIS_URL is required when AUTH_STATE_STORE=redis');
  }

  const extraScopes = (env.OIDC_EXTRA_SCOPES ?? DEFAULT_EXTRA_SCOPES).split(/[\s,]+/).filter(Boolean);

  return {
    appName: APP_NAME,
    version: APP_VERSION,
    environment: env.APP_ENV?.trim() || 'development',
    port,
    publicUrl,
    protocolVersion: MCP_PROTOCOL_VERSION,

    databasePath: env.DATABASE_PATH?.trim() || './tasks.db',
    databaseBusyTimeoutMs: positiveInt(env, 'DATABASE_BUSY_TIMEOUT_MS', 5000),

    encryptionKey: required(env, 'ENCRYPTION_KEY'),

    oidcIssuer: trimTrailingSlash(env.OIDC_ISSUER?.trim() || 'https://accounts.google.com'),
    oidcClientId: required(env, 'OIDC_CLIENT_ID'),
    oidcClientSecret: required(env, 'OIDC_CLIENT_SECRET'),
    oidcRedirectUri: env.OIDC_REDIRECT_URI?.trim() || `${publicUrl}/oauth/callback`,
    oidcScopes: [...new Set([...BASE_SCOPES, ...extraScopes])],

    authStateStore: storeRaw,
    redisUrl,
    authStateTtlSeconds: positiveInt(env, 'AUTH_STATE_TTL_SECONDS', 600),

    clientExpiryDays: positiveInt(env, 'CLIENT_EXPIRY_DAYS', 365),
    calendarApiUrl: trimTrailingSlash(env.CALENDAR_API_URL?.trim() || 'https://www.googleapis.com/calendar/v3'),
  };
};
