import { z } from 'zod';

import type { AppContext } from '../../src/context';
import { createHttpApp } from '../../src/mcp_server/server';
import { createTestContext, signIn } from '../helpers/fixtures';
import type { FakeIdentityProvider } from '../helpers/fixtures';
import { withHttpServer } from './test_server';
import type { TestServer } from './test_server';

const registrationSchema = z.object({ client_id: z.string(), client_secret: z.string() });

const basic = (clientId: string, clientSecret: string) =>
  `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`;

describe('OAuth routes', () => {
  let ctx: AppContext;
  let provider: FakeIdentityProvider;
  let server: TestServer;

  beforeEach(async () => {
    ({ ctx, provider } = createTestContext());
    server = await withHttpServer(createHttpApp(ctx));
  });

  afterEach(async () => {
    await server.close();
    await ctx.close();
  });

  const get = (path: string, headers: Record<string, string> = {}) =>
    fetch(`${server.baseUrl}${path}`, { headers, redirect: 'manual' });

  const postJson = (path: string, body: unknown, headers: Record<string, string> = {}) =>
    fetch(`${server.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });

  const authorize = async () => {
    const res = await get('/oauth/authorize');
    const location = res.headers.get('location') ?? '';
    return { res, location, state: new URL(location).searchParams.get('state') ?? '' };
  };

  describe('authorization flow', () => {
    test('authorize redirects to the identity provider', async () => {
      const { res, location } = await authorize();
      expect(res.status).toBe(302);
      expect(new URL(location).origin).toBe('https://issuer.example');
      expect(new URL(location).searchParams.get('redirect_uri')).toBe('http://mcp.test/oauth/callback');
    });

    test('callback returns a grant with no-store headers', async () => {
      provider.allow('code-1', 'user-1');
      const { state } = await authorize();

      const res = await get(`/oauth/callback?code=code-1&state=${encodeURIComponent(state)}`, {
        'User-Agent': 'route-test',
      });

      expect(res.status).toBe(200);
      expect(res.headers.get('cache-control')).toBe('no-store');
      expect(res.headers.get('pragma')).toBe('no-cache');
      expect(await res.json()).toEqual({
        session_id: expect.any(String),
        access_token: 'access-code-1',
        refresh_token: 'refresh-code-1',
        expires_in: 3600,
        token_type: 'Bearer',
      });
    });

    test('an upstream error is access_denied', async () => {
      const res = await get('/oauth/callback?error=access_denied');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'access_denied',
        error_description: 'Authorization failed: access_denied',
      });
    });

    test('code and state are both required', async () => {
      const res = await get('/oauth/callback?code=code-1');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: 'code and state are required',
      });
    });

    test('a replayed state is rejected', async () => {
      provider.allow('code-1', 'user-1');
      const { state } = await authorize();
      const callback = `/oauth/callback?code=code-1&state=${encodeURIComponent(state)}`;

      expect((await get(callback)).status).toBe(200);
      const replay = await get(callback);
      expect(replay.status).toBe(400);
      expect(await replay.json()).toEqual({ error: 'invalid_state', error_description: 'Invalid state parameter' });
    });

    test('a dynamic client with an unregistered redirect URI is rejected', async () => {
      const res = await get('/oauth/authorize?client_id=client_unknown&redirect_uri=myapp%3A%2F%2Fcb');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_client',
        error_description: 'Invalid client_id or redirect_uri not registered for client',
      });
    });
  });

  describe('refresh and logout', () => {
    test('refresh renews the access token', async () => {
      const sessionId = await signIn(ctx, 'user-1');
      const res = await postJson('/oauth/refresh', { session_id: sessionId, refresh_token: 'refresh-user-1' });

      expect(res.status).toBe(200);
      expect(res.headers.get('cache-control')).toBe('no-store');
      expect(await res.json()).toEqual({
        session_id: sessionId,
        access_token: 'refreshed-access-token',
        refresh_token: 'refresh-user-1',
        expires_in: 3600,
        token_type: 'Bearer',
      });
    });

    test('refresh with the wrong token is 401', async () => {
      const sessionId = await signIn(ctx, 'user-1');
      const res = await postJson('/oauth/refresh', { session_id: sessionId, refresh_token: 'wrong' });
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'invalid_grant', error_description: 'Invalid refresh token' });
    });

    test('refresh needs both fields', async () => {
      const res = await postJson('/oauth/refresh', { session_id: 'abc' });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: 'session_id and refresh_token are required',
      });
    });

    test('a malformed JSON body is a bad request', async () => {
      const res = await fetch(`${server.baseUrl}/oauth/refresh`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"session_id":',
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'invalid_request', error_description: 'Malformed JSON body' });
    });

    test('logout revokes the calling session', async () => {
      const sessionId = await signIn(ctx, 'user-1');
      const auth = { Authorization: `Bearer ${sessionId}` };

      const res = await postJson('/oauth/logout', {}, auth);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true });

      expect((await postJson('/oauth/logout', {}, auth)).status).toBe(401);
      expect(await ctx.sessions.get(sessionId)).toBeNull();
    });
  });

  describe('client registration', () => {
    const register = (body: unknown) => postJson('/clients/register', body);

    test('registers, reads and revokes a client', async () => {
      const res = await register({ platform: 'ios', redirect_uris: ['myapp://oauth/callback'] });
      expect(res.status).toBe(201);
      const body: unknown = await res.json();
      expect(body).toEqual({
        client_id: expect.stringMatching(/^client_/),
        client_secret: expect.any(String),
        platform: 'ios',
        redirect_uris: ['myapp://oauth/callback'],
        created_at: '2025-01-15T12:00:00.000Z',
        expires_at: '2026-01-15T12:00:00.000Z',
      });

      const { client_id: clientId, client_secret: secret } = registrationSchema.parse(body);

      const read = await get(`/clients/${clientId}`, { Authorization: basic(clientId, secret) });
      expect(read.status).toBe(200);
      expect(await read.json()).toEqual({
        client_id: clientId,
        platform: 'ios',
        redirect_uris: ['myapp://oauth/callback'],
        created_at: '2025-01-15T12:00:00.000Z',
        expires_at: '2026-01-15T12:00:00.000Z',
        last_used: '2025-01-15T12:00:00.000Z',
      });

      const revoked = await fetch(`${server.baseUrl}/clients/${clientId}`, {
        method: 'DELETE',
        headers: { Authorization: basic(clientId, secret) },
      });
      expect(revoked.status).toBe(200);
      expect(await revoked.json()).toEqual({ message: 'Client registration revoked' });
      expect(await ctx.clients.get(clientId)).toBeNull();
    });

    test('reading a client needs its credentials', async () => {
      const { client } = await ctx.clients.register('cli', ['http://localhost:8080/cb']);

      const anonymous = await get(`/clients/${client.clientId}`);
      expect(anonymous.status).toBe(401);
      expect(await anonymous.json()).toEqual({
        error: 'invalid_client',
        error_description: 'Client authentication failed',
      });

      const wrong = await get(`/clients/${client.clientId}`, { Authorization: basic(client.clientId, 'wrong') });
      expect(wrong.status).toBe(401);
    });

    test('listing clients needs a bearer session', async () => {
      await ctx.clients.register('cli', ['http://localhost:8080/cb']);

      const anonymous = await get('/clients');
      expect(anonymous.status).toBe(401);
      expect(anonymous.headers.get('www-authenticate')).toContain('Bearer');
      expect(await anonymous.json()).toEqual({
        error: 'unauthorized',
        error_description: 'Authentication required',
      });

      const basicOnly = await get('/clients', { Authorization: basic('client_x', 'test-secret') });
      expect(basicOnly.status).toBe(401);
    });

    test('a signed-in caller can list clients by platform', async () => {
      const { client: cli } = await ctx.clients.register('cli', ['http://localhost:8080/cb']);
      await ctx.clients.register('ios', ['myapp://cb']);
      const sessionId = await signIn(ctx, 'user-1');

      const res = await get('/clients?platform=cli', { Authorization: `Bearer ${sessionId}` });
      expect(res.status).toBe(200);
      const body = z.object({ clients: z.array(z.object({ client_id: z.string(), platform: z.string() })) }).parse(
        await res.json()
      );
      expect(body.clients.map((c) => c.client_id)).toEqual([cli.clientId]);
      expect(body.clients[0].platform).toBe('cli');
    });

    test('rejects an unknown platform', async () => {
      const res = await register({ platform: 'tvos', redirect_uris: ['app://cb'] });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_client_metadata',
        error_description: 'Invalid platform. Must be one of: ios, android, macos, windows, linux, cli',
      });
    });

    test('rejects an empty or oversized redirect list', async () => {
      const empty = await register({ platform: 'ios', redirect_uris: [] });
      expect(await empty.json()).toEqual({
        error: 'invalid_client_metadata',
        error_description: 'At least one redirect URI is required',
      });

      const many = await register({
        platform: 'ios',
        redirect_uris: ['app://1', 'app://2', 'app://3', 'app://4', 'app://5', 'app://6'],
      });
      expect(many.status).toBe(400);
    });

    test('rejects a redirect URI with an unsupported scheme', async () => {
      const res = await register({ platform: 'android', redirect_uris: ['ftp://example.com/cb'] });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_redirect_uri',
        error_description: 'Invalid redirect URI format: ftp://example.com/cb',
      });
    });

    test('a registered client can start the flow with its own redirect URI', async () => {
      const { client } = await ctx.clients.register('ios', ['myapp://cb']);
      const res = await get(`/oauth/authorize?client_id=${client.clientId}&redirect_uri=${encodeURIComponent('myapp://cb')}`);
      expect(res.status).toBe(302);
      expect(new URL(res.headers.get('location') ?? '').searchParams.get('redirect_uri')).toBe('myapp://cb');
    });
  });

  describe('protected resource metadata', () => {
    test('describes the MCP endpoint', async () => {
      const res = await get('/.well-known/oauth-protected-resource/mcp');
      expect(res.status).toBe(200);
      expect(res.headers.get('access-control-allow-origin')).toBe('*');
      expect(await res.json()).toEqual({
        resource: 'http://mcp.test/mcp',
        authorization_servers: ['http://mcp.test'],
        authorization_endpoint: 'http://mcp.test/oauth/authorize',
        registration_endpoint: 'http://mcp.test/clients/register',
        bearer_methods_supported: ['header'],
      });
    });

    test('answers CORS preflight', async () => {
      const res = await fetch(`${server.baseUrl}/.well-known/oauth-protected-resource`, { method: 'OPTIONS' });
      expect(res.status).toBe(204);
      expect(res.headers.get('access-control-allow-methods')).toBe('GET, OPTIONS');
    });
  });
});
