/**
 * OAuth endpoints.
 *
 * `/oauth/authorize` starts the upstream login, `/oauth/callback` turns the upstream code into a
 * local session, `/oauth/refresh` renews the upstream access token behind a session and
 * `/oauth/logout` revokes the caller's session.
 */
import type { Request, RequestHandler, Response, Router } from 'express';
import { z } from 'zod';

import { AuthenticationError, AuthorizationFlowError, InvalidRequestError } from '../../lib/errors';
import type { AuthorizationFlow } from '../flow';
import { AUTH_MESSAGES } from '../middleware';

import { queryString, setNoCORS, setNoStore } from './http_utils';

const refreshBodySchema = z.object({
  session_id: z.string().min(1),
  refresh_token: z.string().min(1),
});

export const registerOAuthRoutes = (router: Router, flow: AuthorizationFlow, requireSession: RequestHandler) => {
  router.get('/oauth/authorize', async (req: Request, res: Response) => {
    setNoCORS(res);
    const url = await flow.beginAuthorization({
      clientId: queryString(req.query.client_id),
      redirectUri: queryString(req.query.redirect_uri),
    });
    res.redirect(302, url);
  });

  router.get('/oauth/callback', async (req: Request, res: Response) => {
    setNoCORS(res);
    setNoStore(res);

    const upstreamError = queryString(req.query.error);
    if (upstreamError) {
      throw new AuthorizationFlowError('access_denied', `Authorization failed: ${upstreamError}`);
    }

    const code = queryString(req.query.code);
    const state = queryString(req.query.state);
    if (!code || !state) {
      throw new InvalidRequestError('code and state are required');
    }

    const grant = await flow.completeAuthorization({
      code,
      state,
      scope: queryString(req.query.scope),
      userAgent: req.get('user-agent'),
    });
    res.json(grant);
  });

  router.post('/oauth/refresh', async (req: Request, res: Response) => {
    setNoCORS(res);
    setNoStore(res);

    const body = refreshBodySchema.safeParse(req.body);
    if (!body.success) {
      throw new InvalidRequestError('session_id and refresh_token are required');
    }

    const grant = await flow.refreshAuthorization({
      sessionId: body.data.session_id,
      refreshToken: body.data.refresh_token,
    });
    res.json(grant);
  });

  router.post('/oauth/logout', requireSession, async (req: Request, res: Response) => {
    setNoCORS(res);
    const auth = req.mcpAuth;
    if (!auth) {
      throw new AuthenticationError(AUTH_MESSAGES.missing);
    }
    res.json({ success: await flow.logout(auth.sessionId) });
  });
};
