/**
 * In-memory backend for `AuthStateStore`.
 *
 * Pending authorization states live in a process-local map with a TTL. State is lost on restart
 * and is not shared across replicas; use the Redis backend when more than one instance serves
 * `/oauth/callback`.
 */
import type { Clock } from '../../lib/time';
import { systemClock } from '../../lib/time';

import type { AuthStateStore, PendingAuthorization } from './interface';

type Entry = {
  record: PendingAuthorization;
  expiresAtMs: number;
};

export class MemoryAuthStateStore implements AuthStateStore {
  private states = new Map<string, Entry>();

  constructor(private readonly clock: Clock = systemClock) {}

  async put(state: string, record: PendingAuthorization, ttlSeconds: number): Promise<void> {
    this.sweep();
    this.states.set(state, { record, expiresAtMs: this.clock() + ttlSeconds * 1000 });
  }

  async get(state: string): Promise<PendingAuthorization | null> {
    const entry = this.states.get(state);
    if (!entry) return null;
    if (this.clock() >= entry.expiresAtMs) {
      this.states.delete(state);
      return null;
    }
    return entry.record;
  }

  async consume(state: string): Promise<PendingAuthorization | null> {
    // Delete before the expiry check so a state can never be presented twice.
    const entry = this.states.get(state);
    this.states.delete(state);
    if (!entry) return null;
    if (this.clock() >= entry.expiresAtMs) return null;
    return entry.record;
  }

  async close(): Promise<void> {
    this.states.clear();
  }

  get size() {
    return this.states.size;
  }

  /** Drops abandoned states. */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [state, entry] of this.states) {
      if (now >= entry.expiresAtMs) {
        this.states.delete(state);
        removed += 1;
      }
    }
    return removed;
  }
}
