import * as jose from 'jose';
import { z } from 'zod';

import { InfrastructureError } from './errors';
import type { Clock } from './time';
import { systemClock } from './time';

export type ProviderTokens = {
  accessToken: string;
  refreshToken?: string;
  idToken?: string;
  expiresAtMs: number;
  scope?: string;
};

export type RefreshedAccess = {
  accessToken: string;
  expiresAtMs: number;
};

export type IdentityClaims = {
  subject?: string;
  email?: string;
  name?: string;
};

export type AuthorizationUrlParams = {
  state: string;
  redirectUri: string;
  codeChallenge?: string;
};

/**
 * The upstream identity provider as seen by the authorization flow.
 */
export interface IdentityProvider {
  authorizationUrl(params: AuthorizationUrlParams): Promise<string>;
  exchangeCode(code: string, redirectUri: string, codeVerifier?: string): Promise<ProviderTokens>;
  verifyIdentity(idToken: string): Promise<IdentityClaims>;
  refreshAccess(refreshToken: string): Promise<RefreshedAccess>;
}

export type OidcProviderConfig = {
  issuer: string;
  clientId: string;
  clientSecret: string;
  scopes: string[];
};

/** Raised when the provider answers a token request with a non-2xx status. */
export class ProviderRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly providerError?: string
  ) {
    super(message);
    this.name = 'ProviderRequestError';
  }
}

const discoverySchema = z.object({
  issuer: z.string(),
  authorization_endpoint: z.string(),
  token_endpoint: z.string(),
  jwks_uri: z.string(),
  userinfo_endpoint: z.string().optional(),
});

type OidcDiscovery = z.infer<typeof discoverySchema>;

const tokenResponseSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string().optional(),
  id_token: z.string().optional(),
  expires_in: z.coerce.number().optional(),
  scope: z.string().optional(),
});

const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

// Providers that omit `expires_in` are assumed to issue one-hour access tokens.
const DEFAULT_EXPIRES_IN_SECONDS = 3600;

/**
 * OIDC client for any discoverable issuer (Google by default).
 *
 * Discovery and the remote JWKS are fetched lazily and cached for the life of the instance.
 * ID tokens are verified for signature, issuer and audience (the configured client id).
 */
export class OidcIdentityProvider implements IdentityProvider {
  private discoveryCache: OidcDiscovery | null = null;
  private jwksCache: jose.JWTVerifyGetKey | null = null;

  constructor(
    private readonly cfg: OidcProviderConfig,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Fetch OIDC discovery document from the issuer.
   */
  async getDiscovery(): Promise<OidcDiscovery> {
    if (this.discoveryCache) {
      return this.discoveryCache;
    }

    const discoveryUrl = `${this.cfg.issuer}/.well-known/openid-configuration`;
    let response: Response;
    try {
      response = await fetch(discoveryUrl);
    } catch (err) {
      throw new InfrastructureError('identity_provider_unavailable', 'OIDC discovery request failed', {
        cause: err,
        retryable: true,
      });
    }
    if (!response.ok) {
      throw new InfrastructureError(
        'identity_provider_unavailable',
        `Failed to fetch OIDC discovery: ${response.status}`,
        { retryable: response.status >= 500 }
      );
    }

    const parsed = discoverySchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new InfrastructureError('identity_provider_unavailable', 'OIDC discovery document is malformed');
    }
    this.discoveryCache = parsed.data;
    return this.discoveryCache;
  }

  protected async getJwks(): Promise<jose.JWTVerifyGetKey> {
    if (this.jwksCache) {
      return this.jwksCache;
    }
    const discovery = await this.getDiscovery();
    this.jwksCache = jose.createRemoteJWKSet(new URL(discovery.jwks_uri));
    return this.jwksCache;
  }

  /**
   * Upstream authorization URL.
   *
   * Always asks for offline access, incremental consent and a forced consent screen so that a
   * refresh token is issued on every sign-in, not only the first.
   */
  async authorizationUrl(params: AuthorizationUrlParams): Promise<string> {
    const discovery = await this.getDiscovery();
    const query = new URLSearchParams({
      response_type: 'code',
      client_id: this.cfg.clientId,
      redirect_uri: params.redirectUri,
      scope: this.cfg.scopes.join(' '),
      state: params.state,
      access_type: 'offline',
      include_granted_scopes: 'true',
      prompt: 'consent',
    });
    if (params.codeChallenge) {
      query.set('code_challenge', params.codeChallenge);
      query.set('code_challenge_method', 'S256');
    }
    return `${discovery.authorization_endpoint}?${query.toString()}`;
  }

  private async tokenRequest(body: URLSearchParams): Promise<z.infer<typeof tokenResponseSchema>> {
    const discovery = await this.getDiscovery();
    body.set('client_id', this.cfg.clientId);
    body.set('client_secret', this.cfg.clientSecret);

    let response: Response;
    try {
      response = await fetch(discovery.token_endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: body.toString(),
      });
    } catch (err) {
      throw new InfrastructureError('identity_provider_unavailable', 'Token endpoint request failed', {
        cause: err,
        retryable: true,
      });
    }

    const payload: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      const providerError = errorResponseSchema.safeParse(payload);
      const detail = providerError.success ? providerError.data.error : undefined;
      throw new ProviderRequestError(
        `Token request failed: ${response.status}${detail ? ` ${detail}` : ''}`,
        response.status,
        detail
      );
    }

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderRequestError('Token response is malformed', response.status);
    }
    return parsed.data;
  }

  private expiresAt(expiresIn: number | undefined) {
    return this.clock() + (expiresIn ?? DEFAULT_EXPIRES_IN_SECONDS) * 1000;
  }

  async exchangeCode(code: string, redirectUri: string, codeVerifier?: string): Promise<ProviderTokens> {
    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: redirectUri,
    });
    if (codeVerifier) {
      body.set('code_verifier', codeVerifier);
    }

    const tokens = await this.tokenRequest(body);
    return {
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token,
      idToken: tokens.id_token,
      expiresAtMs: this.expiresAt(tokens.expires_in),
      scope: tokens.scope,
    };
  }

  async refreshAccess(refreshToken: string): Promise<RefreshedAccess> {
    const tokens = await this.tokenRequest(
      new URLSearchParams({ grant_type: 'refresh_token', refresh_token: refreshToken })
    );
    return { accessToken: tokens.access_token, expiresAtMs: this.expiresAt(tokens.expires_in) };
  }

  /**
   * Validate an ID token against the issuer's JWKS and return the identity claims.
   */
  async verifyIdentity(idToken: string): Promise<IdentityClaims> {
    const discovery = await this.getDiscovery();
    const jwks = await this.getJwks();

    // Google signs with either form of its issuer.
    const issuers = [discovery.issuer, discovery.issuer.replace(/^https:\/\//, '')];
    const { payload } = await jose.jwtVerify(idToken, jwks, {
      issuer: issuers,
      audience: this.cfg.clientId,
    });

    return {
      subject: payload.sub,
      email: typeof payload.email === 'string' ? payload.email : undefined,
      name: typeof payload.name === 'string' ? payload.name : undefined,
    };
  }

  /**
   * Clear the OIDC caches (useful for testing or when config changes).
   */
  clearCache(): void {
    this.discoveryCache = null;
    this.jwksCache = null;
  }
}
