/**
 * Bearer-session authentication.
 *
 * `Authorization: Bearer <session_id>` is resolved through the Session Manager. The same check
 * backs the `bearerAuth` middleware on `/mcp` and `/oauth/logout` and the authenticate step of
 * the tool dispatcher.
 */
import type { NextFunction, Request, Response } from 'express';

import { AuthenticationError } from '../lib/errors';
import { logger } from '../lib/logger';

import type { AuthContext } from './request_context';
import { runWithAuthContext } from './request_context';
import type { SessionManager } from './sessions';

export const AUTH_MESSAGES = {
  missing: 'Authentication required',
  malformed: "Invalid authorization header format (expected 'Bearer <session_id>')",
  empty: 'Missing session ID in authorization header',
  invalid: 'Invalid or expired session',
} as const;

/**
 * Extracts the session id from an Authorization header.
 *
 * A missing header and an empty token are different failures with different messages.
 */
export const parseBearer = (header: string | undefined): string => {
  if (header === undefined || header === '') {
    throw new AuthenticationError(AUTH_MESSAGES.missing);
  }
  if (!/^bearer(\s|$)/i.test(header)) {
    throw new AuthenticationError(AUTH_MESSAGES.malformed, 'invalid_request');
  }
  const token = header.slice('bearer'.length).trim();
  if (!token) {
    throw new AuthenticationError(AUTH_MESSAGES.empty, 'invalid_request');
  }
  return token;
};

export const authenticateBearer = async (sessions: SessionManager, header: string | undefined): Promise<AuthContext> => {
  const sessionId = parseBearer(header);
  const session = await sessions.authenticate(sessionId);
  if (!session) {
    throw new AuthenticationError(AUTH_MESSAGES.invalid, 'invalid_token');
  }
  return { userId: session.userId, sessionId: session.sessionId };
};

export const wwwAuthenticate = (resourceMetadataUrl: string, error?: string) => {
  const params: Record<string, string> = {
    resource_metadata: resourceMetadataUrl,
    ...(error && error !== 'unauthorized' ? { error } : {}),
  };
  const parts = Object.entries(params).map(([k, v]) => `${k}="${v.replace(/"/g, '')}"`);
  return `Bearer ${parts.join(', ')}`;
};

export const sendAuthError = (res: Response, err: AuthenticationError, resourceMetadataUrl: string) => {
  res.setHeader('WWW-Authenticate', wwwAuthenticate(resourceMetadataUrl, err.code));
  res.status(err.status).json({ error: err.code, error_description: err.message });
};

export const bearerAuth = (sessions: SessionManager, resourceMetadataUrl: string) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    let auth: AuthContext;
    try {
      auth = await authenticateBearer(sessions, req.headers.authorization);
    } catch (err) {
      if (err instanceof AuthenticationError) {
        logger.debug('BearerAuth', 'Rejected request', { path: req.path, reason: err.message });
        sendAuthError(res, err, resourceMetadataUrl);
        return;
      }
      next(err);
      return;
    }

    req.mcpAuth = auth;
    return runWithAuthContext(auth, () => next());
  };
};
