/**
 * Dynamic Client Registration (DCR) endpoints.
 *
 * Lets native and CLI applications register `client_id` + redirect URIs at runtime so they can
 * start the authorization flow at `/oauth/authorize` with their own callback. Reading or revoking a
 * registration needs the client's own credentials over HTTP Basic; listing them needs a signed-in
 * bearer session.
 */
import type { Request, RequestHandler, Response, Router } from 'express';
import { z } from 'zod';

import { ClientRegistrationError } from '../../lib/errors';
import { toIso, toIsoOrNull } from '../../lib/time';
import type { ClientInfo, ClientRegistrar } from '../clients';
import { isPlatform, PLATFORMS } from '../storage';

import { queryString, setNoCORS, setNoStore } from './http_utils';

const MAX_REDIRECT_URIS = 5;
const REDIRECT_URI_PATTERN = /^(https?|myapp|app):\/\//;

const registrationSchema = z.object({
  platform: z.string(),
  redirect_uris: z.array(z.string()),
});

const clientView = (client: ClientInfo) => ({
  client_id: client.clientId,
  platform: client.platform,
  redirect_uris: client.redirectUris,
  created_at: toIso(client.createdAtMs),
  expires_at: toIso(client.expiresAtMs),
  last_used: toIsoOrNull(client.lastUsedMs),
});

/** `Basic base64(client_id:client_secret)`, or `null` when absent or malformed. */
export const parseBasicCredentials = (header: string | undefined) => {
  const match = header ? /^basic\s+(\S+)\s*$/i.exec(header) : null;
  if (!match) return null;
  const decoded = Buffer.from(match[1], 'base64').toString('utf-8');
  const sep = decoded.indexOf(':');
  if (sep <= 0) return null;
  return { clientId: decoded.slice(0, sep), clientSecret: decoded.slice(sep + 1) };
};

export const registerClientRoutes = (
  router: Router,
  clients: ClientRegistrar,
  expiryDays: number,
  requireSession: RequestHandler
) => {
  const requireClientCredentials = async (authorization: string | undefined, clientId: string) => {
    const creds = parseBasicCredentials(authorization);
    const valid =
      creds !== null &&
      creds.clientId === clientId &&
      (await clients.validateCredentials(creds.clientId, creds.clientSecret));
    if (!valid) {
      throw new ClientRegistrationError('invalid_client', 'Client authentication failed', 401);
    }
  };

  router.post('/clients/register', async (req: Request, res: Response) => {
    setNoCORS(res);
    setNoStore(res);

    const body = registrationSchema.safeParse(req.body);
    if (!body.success) {
      throw new ClientRegistrationError('invalid_client_metadata', 'platform and redirect_uris are required');
    }
    const { platform, redirect_uris: redirectUris } = body.data;

    if (!isPlatform(platform)) {
      throw new ClientRegistrationError(
        'invalid_client_metadata',
        `Invalid platform. Must be one of: ${PLATFORMS.join(', ')}`
      );
    }
    if (redirectUris.length === 0) {
      throw new ClientRegistrationError('invalid_client_metadata', 'At least one redirect URI is required');
    }
    if (redirectUris.length > MAX_REDIRECT_URIS) {
      throw new ClientRegistrationError(
        'invalid_client_metadata',
        `At most ${MAX_REDIRECT_URIS} redirect URIs can be registered`
      );
    }
    for (const uri of redirectUris) {
      if (!REDIRECT_URI_PATTERN.test(uri)) {
        throw new ClientRegistrationError('invalid_redirect_uri', `Invalid redirect URI format: ${uri}`);
      }
    }

    const { client, clientSecret } = await clients.register(platform, redirectUris, expiryDays);
    res.status(201).json({
      client_id: client.clientId,
      client_secret: clientSecret,
      platform: client.platform,
      redirect_uris: client.redirectUris,
      created_at: toIso(client.createdAtMs),
      expires_at: toIso(client.expiresAtMs),
    });
  });

  router.get('/clients', requireSession, async (req: Request, res: Response) => {
    setNoCORS(res);
    const platform = queryString(req.query.platform);
    if (platform !== undefined && !isPlatform(platform)) {
      throw new ClientRegistrationError('invalid_request', `Unknown platform: ${platform}`);
    }
    res.json({ clients: (await clients.list(platform)).map(clientView) });
  });

  router.get('/clients/:client_id', async (req: Request<{ client_id: string }>, res: Response) => {
    setNoCORS(res);
    await requireClientCredentials(req.get('authorization'), req.params.client_id);
    const client = await clients.get(req.params.client_id);
    if (!client) {
      throw new ClientRegistrationError('client_not_found', 'Client not found', 404);
    }
    res.json(clientView(client));
  });

  router.delete('/clients/:client_id', async (req: Request<{ client_id: string }>, res: Response) => {
    setNoCORS(res);
    await requireClientCredentials(req.get('authorization'), req.params.client_id);
    if (!(await clients.revoke(req.params.client_id))) {
      throw new ClientRegistrationError('client_not_found', 'Client not found', 404);
    }
    res.json({ message: 'Client registration revoked' });
  });
};
