/**
 * Authorization flow controller.
 *
 * Drives the upstream authorization-code dance: `beginAuthorization` issues a single-use CSRF state
 * and the upstream URL, `completeAuthorization` redeems the callback into a local session, and
 * `refreshAuthorization` renews the upstream access token for an existing session.
 */
import type { IdentityClaims, IdentityProvider, ProviderTokens, RefreshedAccess } from '../lib/oidc';
import { AuthorizationFlowError, ClientRegistrationError, errorMessage, InfrastructureError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { Clock } from '../lib/time';
import { secondsUntil, systemClock } from '../lib/time';

import type { ClientRegistrar } from './clients';
import { randomToken, timingSafeEqualStr } from './crypto';
import { createPkcePair } from './pkce';
import type { SessionInfo, SessionManager } from './sessions';
import { sessionIdHint } from './sessions';
import type { AuthStateStore, CredentialStore } from './storage';

const STATE_BYTES = 32;

export type TokenGrant = {
  session_id: string;
  access_token: string;
  refresh_token: string;
  expires_in: number;
  token_type: 'Bearer';
};

export type BeginAuthorizationInput = {
  clientId?: string;
  redirectUri?: string;
};

export type CompleteAuthorizationInput = {
  code: string;
  state: string;
  /** Space-separated scopes the identity provider reports as granted. */
  scope?: string;
  userAgent?: string;
};

export type RefreshAuthorizationInput = {
  sessionId: string;
  refreshToken: string;
};

export type AuthorizationFlowDeps = {
  provider: IdentityProvider;
  states: AuthStateStore;
  sessions: SessionManager;
  clients: ClientRegistrar;
  store: CredentialStore;
  defaultRedirectUri: string;
  stateTtlSeconds: number;
  clock?: Clock;
};

// Infrastructure failures (provider unreachable, store down) keep their own type.
const wrap = (err: unknown, code: string, message: string) => {
  if (err instanceof InfrastructureError) return err;
  return new AuthorizationFlowError(code, `${message}: ${errorMessage(err)}`, 400, { cause: err });
};

export class AuthorizationFlow {
  private readonly clock: Clock;

  constructor(private readonly deps: AuthorizationFlowDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async beginAuthorization(input: BeginAuthorizationInput = {}): Promise<string> {
    const { clientId, redirectUri } = input;
    let upstreamRedirectUri = this.deps.defaultRedirectUri;

    if (clientId || redirectUri) {
      if (!clientId || !redirectUri) {
        throw new ClientRegistrationError(
          'invalid_request',
          'Both client_id and redirect_uri are required for dynamic clients'
        );
      }
      const allowed = await this.deps.clients.validateRedirectUri(clientId, redirectUri);
      if (!allowed) {
        throw new ClientRegistrationError(
          'invalid_client',
          'Invalid client_id or redirect_uri not registered for client'
        );
      }
      upstreamRedirectUri = redirectUri;
    }

    const state = randomToken(STATE_BYTES);
    const pkce = createPkcePair();
    await this.deps.states.put(
      state,
      {
        redirectUri: upstreamRedirectUri,
        codeVerifier: pkce.codeVerifier,
        createdAtMs: this.clock(),
        ...(clientId ? { clientId } : {}),
      },
      this.deps.stateTtlSeconds
    );

    logger.debug('AuthFlow', 'Authorization started', { clientId: clientId ?? null });
    return this.deps.provider.authorizationUrl({
      state,
      redirectUri: upstreamRedirectUri,
      codeChallenge: pkce.codeChallenge,
    });
  }

  async completeAuthorization(input: CompleteAuthorizationInput): Promise<TokenGrant> {
    // Consumed before any other work: a replayed or concurrent duplicate callback always fails.
    const pending = input.state ? await this.deps.states.consume(input.state) : null;
    if (!pending) {
      throw new AuthorizationFlowError('invalid_state', 'Invalid state parameter');
    }

    let tokens: ProviderTokens;
    try {
      tokens = await this.deps.provider.exchangeCode(input.code, pending.redirectUri, pending.codeVerifier);
    } catch (err) {
      throw wrap(err, 'invalid_grant', 'Failed to exchange authorization code');
    }
    if (!tokens.idToken) {
      throw new AuthorizationFlowError('invalid_grant', 'No ID token in response');
    }

    let claims: IdentityClaims;
    try {
      claims = await this.deps.provider.verifyIdentity(tokens.idToken);
    } catch (err) {
      throw wrap(err, 'invalid_token', 'Invalid ID token');
    }
    if (!claims.subject || !claims.email) {
      throw new AuthorizationFlowError('invalid_token', 'Missing required user info in ID token');
    }
    if (!tokens.refreshToken) {
      throw new AuthorizationFlowError('invalid_grant', 'No refresh token in response');
    }

    const now = this.clock();
    await this.deps.store.upsertUser({
      userId: claims.subject,
      email: claims.email,
      name: claims.name ?? null,
      nowMs: now,
    });

    const session = await this.deps.sessions.create({
      userId: claims.subject,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      expiresAt: tokens.expiresAtMs,
      userAgent: input.userAgent ?? null,
    });

    logger.info('AuthFlow', 'Authorization completed', {
      userId: claims.subject,
      clientId: pending.clientId ?? null,
      scope: input.scope ?? null,
      session: sessionIdHint(session.sessionId),
    });
    return this.grant(session, tokens.accessToken, tokens.refreshToken);
  }

  async refreshAuthorization(input: RefreshAuthorizationInput): Promise<TokenGrant> {
    const stored = await this.deps.sessions.getDecryptedRefreshToken(input.sessionId);
    if (stored === null) {
      throw new AuthorizationFlowError('session_not_found', 'Session not found', 404);
    }
    if (!timingSafeEqualStr(stored, input.refreshToken)) {
      throw new AuthorizationFlowError('invalid_grant', 'Invalid refresh token', 401);
    }

    let refreshed: RefreshedAccess;
    try {
      refreshed = await this.deps.provider.refreshAccess(stored);
    } catch (err) {
      throw wrap(err, 'invalid_grant', 'Failed to refresh token');
    }

    const session = await this.deps.sessions.refresh(input.sessionId, refreshed.accessToken, refreshed.expiresAtMs);
    if (!session) {
      // Logged out between the lookup and the write.
      throw new AuthorizationFlowError('session_not_found', 'Session not found', 404);
    }
    return this.grant(session, refreshed.accessToken, stored);
  }

  async logout(sessionId: string): Promise<boolean> {
    return this.deps.sessions.delete(sessionId);
  }

  private grant(session: SessionInfo, accessToken: string, refreshToken: string): TokenGrant {
    return {
      session_id: session.sessionId,
      access_token: accessToken,
      refresh_token: refreshToken,
      expires_in: secondsUntil(session.expiresAtMs, this.clock()),
      token_type: 'Bearer',
    };
  }
}
