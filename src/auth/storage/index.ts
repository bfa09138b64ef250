/**
 * Storage selection.
 *
 * Chooses the backend for pending authorization states. Credentials always live in SQLite.
 */
import type { AppConfig } from '../../config';
import { ConfigurationError } from '../../lib/errors';

import { MemoryAuthStateStore } from './memory';
import { RedisAuthStateStore } from './redis';
import type { AuthStateStore } from './interface';

export const createAuthStateStore = (cfg: Pick<AppConfig, 'authStateStore' | 'redisUrl'>): AuthStateStore => {
  if (cfg.authStateStore === 'redis') {
    if (!cfg.redisUrl) throw new ConfigurationError('REDIS_URL is required when AUTH_STATE_STORE=redis');
    return new RedisAuthStateStore(cfg.redisUrl);
  }
  return new MemoryAuthStateStore();
};

export { SqliteCredentialStore } from './sqlite';
export * from './interface';
