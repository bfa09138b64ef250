/**
 * Redis backend for `AuthStateStore`.
 *
 * Pending authorization states are written with `SET ... EX` and consumed with `GETDEL`, so a
 * state is single-use across every instance that shares the Redis database.
 */
import Redis from 'ioredis';
import { z } from 'zod';

import { errorMessage } from '../../lib/errors';
import { logger } from '../../lib/logger';

import type { AuthStateStore, PendingAuthorization } from './interface';

const KEY_PREFIX = 'oauth:state:';

const pendingAuthorizationSchema = z.object({
  redirectUri: z.string(),
  clientId: z.string().optional(),
  codeVerifier: z.string(),
  createdAtMs: z.number(),
});

// An unreadable record is treated as an unknown state.
const parseRecord = (raw: string): PendingAuthorization | null => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logger.warn('RedisStateStore', 'Discarding unreadable authorization state', { error: errorMessage(err) });
    return null;
  }
  const parsed = pendingAuthorizationSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
};

export class RedisAuthStateStore implements AuthStateStore {
  private redis: Redis;

  constructor(redisUrl: string) {
    this.redis = new Redis(redisUrl, { lazyConnect: false });
  }

  private key(state: string) {
    return `${KEY_PREFIX}${state}`;
  }

  async put(state: string, record: PendingAuthorization, ttlSeconds: number): Promise<void> {
    await this.redis.set(this.key(state), JSON.stringify(record), 'EX', Math.max(1, ttlSeconds));
  }

  async get(state: string): Promise<PendingAuthorization | null> {
    const raw = await this.redis.get(this.key(state));
    return raw ? parseRecord(raw) : null;
  }

  async consume(state: string): Promise<PendingAuthorization | null> {
    const raw = await this.redis.getdel(this.key(state));
    return raw ? parseRecord(raw) : null;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
