import { z } from 'zod';

import type { AppConfig } from '../../src/config';
import type { AppContext } from '../../src/context';
import { createAppContext } from '../../src/context';
import { MemoryAuthStateStore } from '../../src/auth/storage/memory';
import { openDatabase } from '../../src/db/database';
import type {
  AuthorizationUrlParams,
  IdentityClaims,
  IdentityProvider,
  ProviderTokens,
  RefreshedAccess,
} from '../../src/lib/oidc';
import type { CalendarClient, CalendarEvent, CalendarEventInput, ProviderCredentials } from '../../src/services/calendar';
import { CalendarApiError } from '../../src/services/calendar';

export const BASE_TIME_MS = Date.UTC(2025, 0, 15, 12, 0, 0);

export type ManualClock = {
  now: () => number;
  advance: (ms: number) => void;
  set: (ms: number) => void;
};

export const manualClock = (startMs = BASE_TIME_MS): ManualClock => {
  let current = startMs;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
    set: (ms) => {
      current = ms;
    },
  };
};

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  appName: 'task-dispatch-mcp-server',
  version: '0.1.0',
  environment: 'test',
  port: 0,
  publicUrl: 'http://mcp.test',
  protocolVersion: '2025-06-18',
  databasePath: ':memory:',
  databaseBusyTimeoutMs: 1000,
  encryptionKey: 'test-secret',
  oidcIssuer: 'https://issuer.example',
  oidcClientId: 'test-client-id',
  oidcClientSecret: 'test-client-secret',
  oidcRedirectUri: 'http://mcp.test/oauth/callback',
  oidcScopes: ['openid', 'email', 'profile'],
  authStateStore: 'memory',
  authStateTtlSeconds: 600,
  clientExpiryDays: 365,
  calendarApiUrl: 'https://calendar.example/v3',
  ...overrides,
});

/** In-process identity provider. Codes map to scripted identities. */
export class FakeIdentityProvider implements IdentityProvider {
  identities = new Map<string, { tokens: Partial<ProviderTokens>; claims: IdentityClaims }>();
  exchangeCalls: Array<{ code: string; redirectUri: string; codeVerifier?: string }> = [];
  refreshCalls: string[] = [];
  nextAccessToken = 'refreshed-access-token';
  failExchange = false;

  constructor(private readonly clock: () => number) {}

  /** Registers `code` as a successful login for `subject`. */
  allow(code: string, subject: string, email = `${subject}@example.com`, tokens: Partial<ProviderTokens> = {}) {
    this.identities.set(code, {
      tokens: { idToken: `id-token-${code}`, refreshToken: `refresh-${code}`, accessToken: `access-${code}`, ...tokens },
      claims: { subject, email, name: `User ${subject}` },
    });
  }

  async authorizationUrl(params: AuthorizationUrlParams): Promise<string> {
    const query = new URLSearchParams({ state: params.state, redirect_uri: params.redirectUri });
    if (params.codeChallenge) query.set('code_challenge', params.codeChallenge);
    return `https://issuer.example/authorize?${query.toString()}`;
  }

  async exchangeCode(code: string, redirectUri: string, codeVerifier?: string): Promise<ProviderTokens> {
    this.exchangeCalls.push({ code, redirectUri, codeVerifier });
    const identity = this.identities.get(code);
    if (this.failExchange || !identity) {
      throw new Error('invalid_grant');
    }
    return {
      accessToken: identity.tokens.accessToken ?? `access-${code}`,
      refreshToken: identity.tokens.refreshToken,
      idToken: identity.tokens.idToken,
      expiresAtMs: this.clock() + 3600 * 1000,
    };
  }

  async verifyIdentity(idToken: string): Promise<IdentityClaims> {
    for (const identity of this.identities.values()) {
      if (identity.tokens.idToken === idToken) return identity.claims;
    }
    throw new Error('signature verification failed');
  }

  async refreshAccess(refreshToken: string): Promise<RefreshedAccess> {
    this.refreshCalls.push(refreshToken);
    return { accessToken: this.nextAccessToken, expiresAtMs: this.clock() + 3600 * 1000 };
  }
}

export class FakeCalendarClient implements CalendarClient {
  created: Array<{ credentials: ProviderCredentials; event: CalendarEventInput }> = [];
  deleted: string[] = [];
  failCreateWith: number | null = null;
  /** Runs inside `createEvent`, before the event exists. */
  beforeCreate: (() => Promise<void>) | null = null;
  private counter = 0;

  async createEvent(credentials: ProviderCredentials, event: CalendarEventInput): Promise<CalendarEvent> {
    if (this.beforeCreate) await this.beforeCreate();
    if (this.failCreateWith !== null) {
      throw new CalendarApiError(`Event creation failed with status ${this.failCreateWith}`, this.failCreateWith);
    }
    this.counter += 1;
    this.created.push({ credentials, event });
    const id = `event-${this.counter}`;
    return { id, htmlLink: `https://calendar.example/event?eid=${id}` };
  }

  async deleteEvent(_credentials: ProviderCredentials, eventId: string): Promise<void> {
    this.deleted.push(eventId);
  }
}

export type TestContext = {
  ctx: AppContext;
  clock: ManualClock;
  provider: FakeIdentityProvider;
  calendar: FakeCalendarClient;
  states: MemoryAuthStateStore;
};

export const createTestContext = (overrides: Partial<AppConfig> = {}): TestContext => {
  const clock = manualClock();
  const provider = new FakeIdentityProvider(clock.now);
  const calendar = new FakeCalendarClient();
  const states = new MemoryAuthStateStore(clock.now);
  const ctx = createAppContext(testConfig(overrides), {
    db: openDatabase(':memory:'),
    states,
    provider,
    calendar,
    clock: clock.now,
  });
  return { ctx, clock, provider, calendar, states };
};

/** Creates the user and a session one hour long; returns the session id. */
export const signIn = async (ctx: AppContext, userId: string, email = `${userId}@example.com`) => {
  await ctx.store.upsertUser({ userId, email, name: null, nowMs: BASE_TIME_MS });
  const session = await ctx.sessions.create({
    userId,
    accessToken: `access-${userId}`,
    refreshToken: `refresh-${userId}`,
    expiresAt: BASE_TIME_MS + 3600 * 1000,
  });
  return session.sessionId;
};

const envelopeSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).length(1),
});

/** Decodes the JSON payload of a tool envelope. */
export const payloadOf = (envelope: unknown): unknown => {
  const parsed = envelopeSchema.parse(envelope);
  return JSON.parse(parsed.content[0].text);
};

export const taskSchema = z.object({
  id: z.number(),
  user_id: z.string(),
  title: z.string(),
  completed: z.boolean(),
});
